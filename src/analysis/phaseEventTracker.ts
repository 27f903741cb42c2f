import type { EntityStore } from '../memory/entityStore.js';
import { isKnownRole, type PlayerRole } from '../types.js';

const ELIMINATION_PATTERN = /(\w+) has been eliminated/;
const INVESTIGATION_PATTERN = /(\w+) is (?:a |an |the )?(werewolf|wolf|villager|seer|doctor)\b/;

export type PhaseUpdate =
  | { kind: 'elimination'; player: string }
  | { kind: 'night'; nightCount: number }
  | { kind: 'day'; dayCount: number };

export interface InvestigationResult {
  player: string;
  role: PlayerRole;
}

/**
 * Moderator announcements drive the clock and the graveyard. Each trigger is its own
 * substring check, so one announcement can fire several of them.
 */
export class PhaseEventTracker {
  private readonly store: EntityStore;

  constructor(store: EntityStore) {
    this.store = store;
  }

  observeAnnouncement(text: string): PhaseUpdate[] {
    const content = text.toLowerCase();
    const updates: PhaseUpdate[] = [];

    const eliminated = content.match(ELIMINATION_PATTERN)?.[1];
    if (eliminated) {
      const player = this.store.resolveName(eliminated);
      this.store.markDead(player);
      this.store.self.recordKeyEvent('elimination', `${player} was eliminated`, [player]);
      updates.push({ kind: 'elimination', player });
    }

    if (content.includes('night phase')) {
      this.store.isNight = true;
      this.store.nightCount += 1;
      this.store.resetCycleFlags();
      this.store.self.recordKeyEvent('phase_change', 'Night phase began');
      updates.push({ kind: 'night', nightCount: this.store.nightCount });
    }

    if (content.includes('day phase')) {
      this.store.isNight = false;
      this.store.dayCount += 1;
      this.store.self.recordKeyEvent('phase_change', 'Day phase began');
      updates.push({ kind: 'day', dayCount: this.store.dayCount });
    }

    return updates;
  }

  /**
   * Seer results arrive as a direct moderator message such as "player3 is a werewolf".
   * Only registered players are accepted, so "you are a seer" style text never matches.
   */
  observeInvestigationResult(text: string): InvestigationResult | null {
    const m = text.toLowerCase().match(INVESTIGATION_PATTERN);
    if (!m?.[1] || !m[2]) return null;

    const player = this.store.resolveName(m[1]);
    if (!this.store.hasPlayer(player) || this.store.isObserver(player)) return null;

    const word = m[2] === 'wolf' ? 'werewolf' : m[2];
    const role: PlayerRole = isKnownRole(word) ? word : 'unknown';
    this.store.setSuspectedRole(player, role);
    this.store.markInvestigated(player);
    this.store.self.recordInvestigation(player, role);
    this.store.self.recordKeyEvent('investigation_result', `${player} is a ${role}`, [player]);

    if (role === 'werewolf') {
      this.store.self.setEnmity(player, 'Revealed as a werewolf by my investigation');
    } else {
      this.store.self.setTrust(player, 0.8);
    }

    return { player, role };
  }
}

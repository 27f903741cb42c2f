import type { EntityStore } from '../memory/entityStore.js';

const VOTE_PATTERN = /vote (?:for )?(\w+)/;

export const ACCUSATION_DELTA = 0.2;
export const DEFENSIVE_DELTA = 0.1;

export interface BehaviorReading {
  vote: { voter: string; target: string } | null;
  accused: string[];
  defensive: boolean;
  accusedSelf: boolean;
}

/**
 * Keyword rules over one group-channel message. The rules are independent: a single
 * message can vote, accuse and sound defensive all at once.
 */
export class BehaviorClassifier {
  private readonly store: EntityStore;

  constructor(store: EntityStore) {
    this.store = store;
  }

  classify(sender: string, text: string): BehaviorReading {
    const content = text.toLowerCase();
    return {
      vote: this.trackVote(sender, content),
      ...this.trackAccusations(sender, content),
      defensive: this.trackDefense(sender, content),
    };
  }

  // The captured token is not checked against known players; see DESIGN.md (vote targets).
  private trackVote(sender: string, content: string): BehaviorReading['vote'] {
    if (!content.includes('vote')) return null;
    const token = content.match(VOTE_PATTERN)?.[1];
    if (!token) return null;

    const target = this.store.resolveName(token);
    this.store.recordVote(sender, target);
    this.store.self.addBehavioralNote(sender, `Voted for ${target}`);
    return { voter: sender, target };
  }

  private trackAccusations(sender: string, content: string): Pick<BehaviorReading, 'accused' | 'accusedSelf'> {
    if (!content.includes('suspicious') && !content.includes('wolf')) {
      return { accused: [], accusedSelf: false };
    }

    // Score goes to the accused, the note to the accuser.
    const accused = this.store.aliveOrdered().filter(player => content.includes(player.toLowerCase()));
    for (const player of accused) {
      this.store.adjustSuspicion(player, ACCUSATION_DELTA);
      this.store.self.addBehavioralNote(sender, `Accused ${player} of suspicious behavior.`);
    }

    const selfName = this.store.selfName;
    const accusedSelf = sender !== selfName && content.includes(selfName.toLowerCase());
    if (accusedSelf) {
      this.store.self.setEnmity(sender, 'Accused me of suspicious behavior');
    }

    return { accused, accusedSelf };
  }

  private trackDefense(sender: string, content: string): boolean {
    if (!content.includes(sender.toLowerCase())) return false;
    if (!content.includes('not') && !content.includes('innocent')) return false;

    this.store.self.addBehavioralNote(sender, 'Defensive behavior in response to accusations');
    this.store.adjustSuspicion(sender, DEFENSIVE_DELTA);
    return true;
  }
}

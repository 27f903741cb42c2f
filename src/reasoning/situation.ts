import type { EntityStore } from '../memory/entityStore.js';
import { type BehavioralNote, type KeyEvent, recentKeyEvents } from '../memory/selfState.js';
import { titleCase } from '../utils.js';

export interface SituationInput {
  persona: string;
  /** Role-specific description of the immediate game situation. */
  gameSituation: string;
  guidingQuestions: string;
}

const NOTES_PER_PLAYER = 3;
const KEY_EVENT_COUNT = 3;

export function formatKeyEvents(events: readonly KeyEvent[]): string {
  if (events.length === 0) return 'No key events recorded';
  return events
    .map(e => `- ${titleCase(e.type)}: ${e.details} (Players: ${e.players.join(', ')})`)
    .join('\n');
}

export function formatBehavioralNotes(notes: ReadonlyMap<string, readonly BehavioralNote[]>): string {
  const lines: string[] = [];
  for (const [player, observations] of notes) {
    if (observations.length === 0) continue;
    lines.push(`${player}:`);
    for (const obs of observations.slice(-NOTES_PER_PLAYER)) {
      lines.push(`  - ${obs.observation}`);
    }
  }
  return lines.length ? lines.join('\n') : 'No behavioral observations recorded';
}

function listOrNone(items: readonly string[]): string {
  return items.length ? items.join(', ') : 'None';
}

/**
 * Render everything the agent currently believes into the single text block the monologue
 * call reasons over.
 */
export function compileSituation(store: EntityStore, input: SituationInput): string {
  const self = store.self.snapshot();
  const alliances = Array.from(self.alliances, ([p, t]) => `${p}(trust:${t.toFixed(1)})`);
  const enemies = Array.from(self.enemies, ([p, r]) => `${p}(${r})`);

  return `
${input.persona}

Current Game State:
- Day: ${store.dayCount}, Night: ${store.nightCount}
- Alive Players: ${listOrNone(store.aliveOrdered())}
- Most Suspicious Players: ${listOrNone(store.topSuspicious(3))}
- My Alliances: ${listOrNone(alliances)}
- My Enemies: ${listOrNone(enemies)}
- My Current Strategy: ${self.strategy}

Recent Events:
${formatKeyEvents(recentKeyEvents(self, KEY_EVENT_COUNT))}

Behavioral Observations:
${formatBehavioralNotes(self.behavioralNotes)}

Game Situation:
${input.gameSituation.trim()}

Consider carefully:
${input.guidingQuestions}`.trim();
}

import type { EntityStore } from '../memory/entityStore.js';
import type { GameHistory } from '../memory/gameHistory.js';
import type { ReasoningPipeline } from '../reasoning/reasoningPipeline.js';
import type { InboundMessage } from '../types.js';

export interface FlowContext {
  store: EntityStore;
  pipeline: ReasoningPipeline;
  history: GameHistory;
  message: InboundMessage;
  moderatorName: string;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function mentions(text: string, name: string): boolean {
  return new RegExp(`(?<![\\w])${escapeRegExp(name.toLowerCase())}(?![\\w])`).test(text);
}

/**
 * Resolve the extracted action to a registered contender: an exact (case-insensitive) name
 * first, then the longest alive name mentioned as a whole word. Falls back to the text itself.
 */
export function resolveTarget(store: EntityStore, action: string): string {
  const cleaned = action.replace(/^["'`*\s]+|["'`*.!\s]+$/g, '');
  const exact = store.resolveName(cleaned);
  if (store.hasPlayer(exact) && !store.isObserver(exact)) return exact;

  const lowered = cleaned.toLowerCase();
  const mentioned = store
    .aliveOrdered()
    .filter(name => mentions(lowered, name))
    .sort((a, b) => b.length - a.length);
  return mentioned[0] ?? cleaned;
}

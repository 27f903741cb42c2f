import type { AgentLogEntry } from '../types.js';
import { EventBus } from './eventBus.js';

export { EventBus, type Unsubscribe } from './eventBus.js';

/**
 * Process-wide stream of agent log entries. The logger persists/prints them; tests and
 * the CLI may subscribe for their own purposes.
 */
export const eventBus = new EventBus<AgentLogEntry>();

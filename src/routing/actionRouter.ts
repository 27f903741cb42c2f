import type { EntityStore } from '../memory/entityStore.js';
import type { GameHistory } from '../memory/gameHistory.js';
import type { ReasoningPipeline } from '../reasoning/reasoningPipeline.js';
import type { FlowKind } from '../roles.js';
import type { InboundMessage, PlayerRole } from '../types.js';
import type { FlowContext } from '../roleModules/flowContext.js';
import { runSeerInvestigation } from '../roleModules/seer.js';
import { runDoctorProtection } from '../roleModules/doctor.js';
import { runWerewolfElimination } from '../roleModules/werewolf.js';
import { runDiscussionOrVote } from '../roleModules/discussion.js';

export const NOT_A_WEREWOLF_RESPONSE = 'I am not a werewolf';
export const NO_ACTION_RESPONSE = 'I have no action to take.';

export interface RouterChannels {
  moderatorName: string;
  gameChannel: string;
  packChannel: string;
}

export type Route =
  | { kind: FlowKind }
  | { kind: 'refuse'; response: string }
  | { kind: 'idle'; response: string };

const FLOWS: Record<FlowKind, (ctx: FlowContext) => Promise<string>> = {
  investigate: runSeerInvestigation,
  protect: runDoctorProtection,
  eliminate: runWerewolfElimination,
  discuss: runDiscussionOrVote,
};

/** Pure routing decision over (role, channel, sender). */
export function selectRoute(role: PlayerRole, message: InboundMessage, channels: RouterChannels): Route {
  if (message.channelType === 'direct') {
    if (message.sender !== channels.moderatorName) return { kind: 'idle', response: NO_ACTION_RESPONSE };
    if (role === 'seer') return { kind: 'investigate' };
    if (role === 'doctor') return { kind: 'protect' };
    return { kind: 'idle', response: NO_ACTION_RESPONSE };
  }

  if (message.channel === channels.gameChannel) return { kind: 'discuss' };

  if (message.channel === channels.packChannel) {
    return role === 'werewolf'
      ? { kind: 'eliminate' }
      : { kind: 'refuse', response: NOT_A_WEREWOLF_RESPONSE };
  }

  return { kind: 'idle', response: NO_ACTION_RESPONSE };
}

export interface ActionRouterDeps {
  store: EntityStore;
  pipeline: ReasoningPipeline;
  history: GameHistory;
  channels: RouterChannels;
}

export class ActionRouter {
  private readonly deps: ActionRouterDeps;

  constructor(deps: ActionRouterDeps) {
    this.deps = deps;
  }

  async route(message: InboundMessage): Promise<string> {
    const { store, pipeline, history, channels } = this.deps;
    const route = selectRoute(store.myRole, message, channels);

    switch (route.kind) {
      case 'refuse':
      case 'idle':
        return route.response;
      default:
        return FLOWS[route.kind]({ store, pipeline, history, message, moderatorName: channels.moderatorName });
    }
  }
}

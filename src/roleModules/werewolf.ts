import { logger } from '../logger.js';
import { FALLBACK_RESPONSE } from '../reasoning/reasoningPipeline.js';
import { FLOW_DEFINITIONS, personaFor } from '../roles.js';
import { type FlowContext, resolveTarget } from './flowContext.js';

const FLOW = FLOW_DEFINITIONS.eliminate;

/** Night kill coordination on the pack channel. Only routed here for werewolves. */
export async function runWerewolfElimination(ctx: FlowContext): Promise<string> {
  const { store, message } = ctx;

  // Whoever else speaks on the pack channel is one of us.
  if (message.sender !== store.selfName && message.sender !== ctx.moderatorName) {
    store.self.addPackMember(message.sender);
    store.self.setTrust(message.sender, 1);
  }
  const packMembers = store.self.snapshot().packMembers;

  store.self.setStrategy(FLOW.strategy);
  const outcome = await ctx.pipeline.run({
    persona: personaFor('werewolf'),
    gameSituation: `
Pack Information:
Known werewolves: ${packMembers.length ? packMembers.join(', ') : 'None'}

Current Game State:
${ctx.history.render({ includePrivate: true })}`,
    guidingQuestions: FLOW.guidingQuestions,
    actionType: FLOW.actionType,
  });

  if (outcome.action === FALLBACK_RESPONSE) return outcome.action;

  const target = resolveTarget(store, outcome.action);
  store.self.recordKeyEvent('elimination_target', `Proposed ${target} for elimination`, [target]);

  logger.log({
    type: 'ACTION',
    player: store.selfName,
    content: `proposed ${target} for elimination`,
    metadata: { target, role: 'werewolf', kind: 'eliminate', channel: message.channel },
  });
  return outcome.action;
}

import { logger } from '../logger.js';
import { FALLBACK_RESPONSE } from '../reasoning/reasoningPipeline.js';
import { FLOW_DEFINITIONS, personaFor } from '../roles.js';
import { type FlowContext, resolveTarget } from './flowContext.js';

const FLOW = FLOW_DEFINITIONS.protect;

export async function runDoctorProtection(ctx: FlowContext): Promise<string> {
  const { store } = ctx;
  const protectedPlayers = store.self.snapshot().protectedPlayers;

  store.self.setStrategy(FLOW.strategy);
  const outcome = await ctx.pipeline.run({
    persona: personaFor('doctor'),
    gameSituation: `
Previous Protections:
${protectedPlayers.length ? protectedPlayers.join(', ') : 'None'}

Current Game State:
${ctx.history.render()}`,
    guidingQuestions: FLOW.guidingQuestions,
    actionType: FLOW.actionType,
  });

  if (outcome.action === FALLBACK_RESPONSE) return outcome.action;

  const target = resolveTarget(store, outcome.action);
  store.self.recordProtection(target);
  store.markProtected(target);

  logger.log({
    type: 'ACTION',
    player: store.selfName,
    content: `chose to protect ${target}`,
    metadata: { target, role: 'doctor', kind: 'protect' },
  });
  return outcome.action;
}

import { logger } from '../logger.js';
import { FALLBACK_RESPONSE } from '../reasoning/reasoningPipeline.js';
import { FLOW_DEFINITIONS, personaFor } from '../roles.js';
import { type FlowContext, resolveTarget } from './flowContext.js';

const FLOW = FLOW_DEFINITIONS.investigate;

export async function runSeerInvestigation(ctx: FlowContext): Promise<string> {
  const { store } = ctx;
  const checks = Array.from(store.self.snapshot().investigations, ([player, result]) => `Checked ${player}: ${result}`);

  store.self.setStrategy(FLOW.strategy);
  const outcome = await ctx.pipeline.run({
    persona: personaFor('seer'),
    gameSituation: `
Previous Investigations:
${checks.length ? checks.join('\n') : 'None'}

Current Game State:
${ctx.history.render()}`,
    guidingQuestions: FLOW.guidingQuestions,
    actionType: FLOW.actionType,
  });

  // No target was chosen; there is nothing to record.
  if (outcome.action === FALLBACK_RESPONSE) return outcome.action;

  const target = resolveTarget(store, outcome.action);
  store.self.recordInvestigation(target);
  store.markInvestigated(target);

  logger.log({
    type: 'ACTION',
    player: store.selfName,
    content: `chose to investigate ${target}`,
    metadata: { target, role: 'seer', kind: 'investigate' },
  });
  return outcome.action;
}

import { logger } from '../logger.js';
import { FALLBACK_RESPONSE } from '../reasoning/reasoningPipeline.js';
import { FLOW_DEFINITIONS, personaFor } from '../roles.js';
import { type FlowContext, resolveTarget } from './flowContext.js';

const FLOW = FLOW_DEFINITIONS.discuss;

/** Public-channel turn: a discussion message, or a vote when the prompt asks for one. */
export async function runDiscussionOrVote(ctx: FlowContext): Promise<string> {
  const { store, message } = ctx;

  store.self.setStrategy(FLOW.strategy);
  const outcome = await ctx.pipeline.run({
    persona: personaFor(store.myRole),
    gameSituation: `
Recent Game History:
${ctx.history.render()}`,
    guidingQuestions: FLOW.guidingQuestions,
    actionType: FLOW.actionType,
  });

  if (outcome.action !== FALLBACK_RESPONSE && message.text.toLowerCase().includes('vote')) {
    const target = resolveTarget(store, outcome.action);
    store.self.recordVoteJustification(target, outcome.monologue);
    logger.log({
      type: 'ACTION',
      player: store.selfName,
      content: `voted for ${target}`,
      metadata: { target, role: store.myRole, kind: 'vote', channel: message.channel },
    });
  }

  return outcome.action;
}

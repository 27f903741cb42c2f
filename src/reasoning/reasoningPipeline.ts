import type { EntityStore } from '../memory/entityStore.js';
import type { Oracle, OraclePurpose } from '../oracle/oracle.js';
import { logger } from '../logger.js';
import { describeError } from '../utils.js';
import { compileSituation, type SituationInput } from './situation.js';

export const FALLBACK_RESPONSE = 'I need more time to think about this.';

export interface ReasoningRequest extends SituationInput {
  actionType: string;
}

export interface ReasoningOutcome {
  situation: string;
  monologue: string;
  action: string;
}

export interface ReasoningPipelineOptions {
  temperature: number;
  maxOutputTokens: number;
  logThoughts: boolean;
}

export function buildActionPrompt(monologue: string, situation: string, actionType: string): string {
  return `
Based on this analysis:
${monologue}

And considering:
${situation}

Provide only your final ${actionType} in a clear, concise format.
Do not include explanations or additional text.`.trim();
}

/**
 * Reason, then extract: a free-text monologue over the compiled situation, followed by a
 * second call that reduces it to the bare action. Neither call can make `run` reject.
 */
export class ReasoningPipeline {
  private readonly store: EntityStore;
  private readonly oracle: Oracle | undefined;
  private readonly opts: ReasoningPipelineOptions;

  constructor(store: EntityStore, oracle: Oracle | undefined, opts?: Partial<ReasoningPipelineOptions>) {
    this.store = store;
    this.oracle = oracle;
    this.opts = {
      temperature: opts?.temperature ?? 0.7,
      maxOutputTokens: opts?.maxOutputTokens ?? 500,
      logThoughts: opts?.logThoughts ?? false,
    };
  }

  async run(request: ReasoningRequest): Promise<ReasoningOutcome> {
    const situation = compileSituation(this.store, request);

    const monologue = await this.ask('monologue', situation);
    this.store.self.addThought(monologue);
    this.logThought(`Inner monologue: ${monologue}`);

    const extracted = (await this.ask('action', buildActionPrompt(monologue, situation, request.actionType))).trim();
    const action = extracted || FALLBACK_RESPONSE;
    this.store.self.addThought(`Final ${request.actionType}: ${action}`);
    this.logThought(`Final ${request.actionType}: ${action}`);

    return { situation, monologue, action };
  }

  private async ask(purpose: Extract<OraclePurpose, 'monologue' | 'action'>, prompt: string): Promise<string> {
    if (!this.oracle) return FALLBACK_RESPONSE;
    try {
      return await this.oracle.complete({
        purpose,
        messages: [{ role: 'user', content: prompt }],
        temperature: this.opts.temperature,
        maxOutputTokens: this.opts.maxOutputTokens,
      });
    } catch (error) {
      logger.log({
        type: 'SYSTEM',
        player: this.store.selfName,
        content: `Error getting ${purpose} from oracle: ${describeError(error)}`,
        metadata: { kind: 'oracle_error' },
      });
      return FALLBACK_RESPONSE;
    }
  }

  private logThought(content: string) {
    if (!this.opts.logThoughts) return;
    logger.log({
      type: 'THOUGHT',
      player: this.store.selfName,
      content,
      metadata: { role: this.store.myRole, kind: 'reasoning' },
    });
  }
}

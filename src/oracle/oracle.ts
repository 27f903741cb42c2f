import { generateText, gateway, type ModelMessage } from 'ai';
import { KNOWN_ROLES, type OracleConfig } from '../types.js';
import { logger } from '../logger.js';
import { isDryRun, pickDeterministicOption } from '../utils.js';

export interface OracleMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

/** Which call site issued the request; only used for logging and dry-run answers. */
export type OraclePurpose = 'security_analysis' | 'role_inference' | 'monologue' | 'action';

export interface OracleRequest {
  purpose: OraclePurpose;
  messages: OracleMessage[];
  temperature?: number;
  maxOutputTokens?: number;
}

/**
 * Opaque text-completion service. Implementations may reject; every caller in this
 * package owns a fallback for that.
 */
export interface Oracle {
  readonly modelId: string;
  complete(request: OracleRequest): Promise<string>;
}

function toModelMessage(message: OracleMessage): ModelMessage {
  if (message.role === 'system') return { role: 'system', content: message.content };
  if (message.role === 'assistant') return { role: 'assistant', content: message.content };
  return { role: 'user', content: message.content };
}

export class GatewayOracle implements Oracle {
  readonly modelId: string;
  private readonly defaults: Pick<OracleConfig, 'temperature' | 'max_output_tokens'>;
  private cachedModel?: ReturnType<typeof gateway>;

  constructor(config: OracleConfig) {
    this.modelId = config.model;
    this.defaults = { temperature: config.temperature, max_output_tokens: config.max_output_tokens };
  }

  async complete(request: OracleRequest): Promise<string> {
    const result = await generateText({
      model: this.getModel(),
      messages: request.messages.map(toModelMessage),
      temperature: request.temperature ?? this.defaults.temperature,
      maxOutputTokens: request.maxOutputTokens ?? this.defaults.max_output_tokens,
    });
    return result.text;
  }

  private getModel() {
    if (this.cachedModel) return this.cachedModel;
    // AI Gateway expects `provider/model` (e.g. `openai/gpt-4o`). Fail fast on anything else.
    if (!this.modelId.includes('/')) {
      throw new Error(
        `Invalid model id "${this.modelId}". Use AI Gateway format "provider/model" (e.g. "openai/gpt-4o").`
      );
    }
    this.cachedModel = gateway(this.modelId);
    logger.log({ type: 'SYSTEM', content: `Oracle model ready: ${this.modelId}` });
    return this.cachedModel;
  }
}

function lastUserContent(request: OracleRequest): string {
  const users = request.messages.filter(m => m.role === 'user');
  return users[users.length - 1]?.content ?? '';
}

function parseAlivePlayers(prompt: string): string[] {
  const m = prompt.match(/Alive Players:\s*([^\n]+)/);
  if (!m?.[1] || m[1].trim() === 'None') return [];
  return m[1]
    .split(',')
    .map(s => s.trim())
    .filter(Boolean);
}

/**
 * Deterministic stand-in used for offline runs, so a whole scripted game can be played
 * without credentials. Answers depend only on the seed and the prompt.
 */
export class DryRunOracle implements Oracle {
  readonly modelId = 'dry-run';

  async complete(request: OracleRequest): Promise<string> {
    const prompt = lastUserContent(request);

    switch (request.purpose) {
      case 'security_analysis':
        return 'HAS_INJECTION: false\nREASON: dry-run analysis\nCLEANED_CONTENT: N/A';
      case 'role_inference': {
        const quoted = (prompt.match(/"""\n?([\s\S]*?)\n?"""/)?.[1] ?? prompt).toLowerCase();
        const role = KNOWN_ROLES.find(r => quoted.includes(r)) ?? (quoted.includes('wolf') ? 'werewolf' : 'villager');
        return `You are the ${role}.`;
      }
      case 'monologue': {
        const suspect = prompt.match(/Most Suspicious Players:\s*([^,\n]+)/)?.[1]?.trim();
        return suspect && suspect !== 'None'
          ? `dry-run reasoning: ${suspect} has drawn the most suspicion so far.`
          : 'dry-run reasoning: no strong reads yet.';
      }
      case 'action': {
        const alive = parseAlivePlayers(prompt);
        return alive.length ? pickDeterministicOption(alive, prompt) : 'No strong reads yet.';
      }
    }
  }
}

/**
 * Dry-run wins over credentials; without either there is no oracle at all and every
 * oracle-backed step takes its fallback.
 */
export function createOracle(config: OracleConfig, env: NodeJS.ProcessEnv = process.env): Oracle | undefined {
  if (isDryRun()) return new DryRunOracle();
  if (!env.AI_GATEWAY_API_KEY) return undefined;
  return new GatewayOracle(config);
}

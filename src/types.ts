import { z } from 'zod';

// --- Roles ---

export const PlayerRoleSchema = z.enum(['unknown', 'villager', 'werewolf', 'seer', 'doctor']);
export type PlayerRole = z.infer<typeof PlayerRoleSchema>;

/** Roles the moderator can actually hand out. */
export type KnownRole = Exclude<PlayerRole, 'unknown'>;

export const KNOWN_ROLES: readonly KnownRole[] = ['villager', 'werewolf', 'seer', 'doctor'];

export function isKnownRole(value: string): value is KnownRole {
  return KNOWN_ROLES.some(role => role === value);
}

export type PlayerStatus = 'alive' | 'dead';

// --- Configuration Types ---

export const OracleConfigSchema = z.object({
  // AI Gateway model id in `provider/model` format, e.g. `openai/gpt-4o`.
  model: z.string().default('openai/gpt-4o'),
  temperature: z.number().default(0.7),
  max_output_tokens: z.number().int().positive().default(500),
});
export type OracleConfig = z.infer<typeof OracleConfigSchema>;

export const SanitizerConfigSchema = z.object({
  // Structural transcript-forgery detection always runs; this toggles the oracle pass.
  semantic_check: z.boolean().default(true),
  temperature: z.number().default(0),
  max_output_tokens: z.number().int().positive().default(300),
});
export type SanitizerConfig = z.infer<typeof SanitizerConfigSchema>;

export const AgentConfigSchema = z.object({
  name: z.string().min(1),
  description: z.string().default(''),
  moderator_name: z.string().min(1).default('moderator'),
  game_channel: z.string().min(1).default('play-arena'),
  pack_channel: z.string().min(1).default("wolf's-den"),
  oracle: OracleConfigSchema.default({}),
  sanitizer: SanitizerConfigSchema.default({}),
  log_thoughts: z.boolean().default(false),
});
export type AgentConfig = z.infer<typeof AgentConfigSchema>;

// --- Messages ---

export const ChannelTypeSchema = z.enum(['direct', 'group']);
export type ChannelType = z.infer<typeof ChannelTypeSchema>;

export interface InboundMessage {
  sender: string;
  channel: string;
  channelType: ChannelType;
  text: string;
}

// --- Logging Types ---

export type LogType = 'SYSTEM' | 'MESSAGE' | 'THOUGHT' | 'ACTION' | 'EVENT' | 'SECURITY';

export interface AgentLogMetadata {
  channel?: string;
  role?: PlayerRole;
  target?: string;
  kind?: string;

  // Allow additional structured fields without `any`
  [key: string]: unknown;
}

export interface AgentLogEntry {
  id: string;
  timestamp: string;
  type: LogType;
  player?: string;
  content: string;
  metadata?: AgentLogMetadata;
}

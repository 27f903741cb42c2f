import * as fs from 'fs';
import * as yaml from 'yaml';
import { z } from 'zod';
import type { WerewolfAgent } from '../agent.js';
import { logger } from '../logger.js';
import { ChannelTypeSchema, type InboundMessage, type KnownRole } from '../types.js';

export const ScenarioStepSchema = z.object({
  sender: z.string().min(1),
  channel: z.string().min(1),
  channel_type: ChannelTypeSchema.default('group'),
  text: z.string(),
  respond: z.boolean().default(false),
});
export type ScenarioStep = z.infer<typeof ScenarioStepSchema>;

export const ScenarioSchema = z.object({
  name: z.string().default('scenario'),
  steps: z.array(ScenarioStepSchema).min(1),
});
export type Scenario = z.infer<typeof ScenarioSchema>;

export interface TranscriptEntry {
  step: number;
  message: InboundMessage;
  response: string;
}

export function parseScenario(source: string): Scenario {
  const parsedYaml: unknown = yaml.parse(source);
  return ScenarioSchema.parse(parsedYaml);
}

export function loadScenario(scenarioPath: string): Scenario {
  logger.log({ type: 'SYSTEM', content: `Loading scenario from ${scenarioPath}` });
  return parseScenario(fs.readFileSync(scenarioPath, 'utf-8'));
}

function toMessage(step: ScenarioStep): InboundMessage {
  return { sender: step.sender, channel: step.channel, channelType: step.channel_type, text: step.text };
}

/**
 * Plays a scripted game against one agent, the way a host would: every step is delivered
 * to `notify`, and steps marked `respond` are then answered.
 */
export async function runScenario(agent: WerewolfAgent, scenario: Scenario): Promise<TranscriptEntry[]> {
  logger.log({ type: 'SYSTEM', content: `Running scenario "${scenario.name}" (${scenario.steps.length} steps)` });

  const transcript: TranscriptEntry[] = [];
  for (const [i, step] of scenario.steps.entries()) {
    const message = toMessage(step);
    await agent.notify(message);
    if (!step.respond) continue;
    const response = await agent.respond(message);
    transcript.push({ step: i, message, response });
  }
  return transcript;
}

export interface DefaultScenarioOptions {
  moderatorName?: string;
  gameChannel?: string;
  packChannel?: string;
  players?: readonly string[];
  days?: number;
}

/** Role assignment, then `days` rounds of discussion, a vote call and the role's night action. */
export function buildDefaultScenario(role: KnownRole, opts?: DefaultScenarioOptions): Scenario {
  const moderator = opts?.moderatorName ?? 'moderator';
  const game = opts?.gameChannel ?? 'play-arena';
  const pack = opts?.packChannel ?? "wolf's-den";
  const [p1 = 'player1', p2 = 'player2', p3 = 'player3'] = opts?.players ?? [];
  const days = opts?.days ?? 2;

  const steps: ScenarioStep[] = [
    { sender: moderator, channel: 'direct', channel_type: 'direct', text: `You are a ${role} in this game.`, respond: false },
  ];

  for (let day = 1; day <= days; day++) {
    steps.push(
      { sender: moderator, channel: game, channel_type: 'group', text: `Day ${day}: the day phase has begun. Please discuss and vote.`, respond: false },
      { sender: p1, channel: game, channel_type: 'group', text: `I think ${p3} is acting suspicious`, respond: true },
      { sender: p3, channel: game, channel_type: 'group', text: `No, I'm innocent! ${p2} is the one acting weird`, respond: true },
      { sender: p2, channel: game, channel_type: 'group', text: 'I am just trying to help the village', respond: true },
      { sender: moderator, channel: game, channel_type: 'group', text: "Please cast your votes now using 'vote [player_name]'", respond: true },
      { sender: moderator, channel: game, channel_type: 'group', text: `Night ${day}: the night phase has begun. Special roles perform your actions.`, respond: false }
    );

    if (role === 'werewolf') {
      steps.push({ sender: p2, channel: pack, channel_type: 'group', text: 'Who should we target tonight?', respond: true });
    } else if (role === 'seer') {
      steps.push({ sender: moderator, channel: 'direct', channel_type: 'direct', text: 'Choose a player to investigate', respond: true });
    } else if (role === 'doctor') {
      steps.push({ sender: moderator, channel: 'direct', channel_type: 'direct', text: 'Choose a player to protect', respond: true });
    }
  }

  return { name: `default-${role}`, steps };
}

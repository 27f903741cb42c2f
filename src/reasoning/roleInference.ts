import type { Oracle } from '../oracle/oracle.js';
import type { KnownRole } from '../types.js';
import { logger } from '../logger.js';
import { describeError } from '../utils.js';

const ROLE_WORDS: ReadonlyArray<readonly [KnownRole, RegExp]> = [
  ['villager', /\bvillagers?\b/],
  ['seer', /\bseers?\b/],
  ['doctor', /\bdoctors?\b/],
  ['werewolf', /\b(?:were)?wol(?:f|ves)\b/],
];

/**
 * Map the oracle's free-text guess onto a role. Anything naming no role, or more than
 * one, counts as ambiguous and becomes villager.
 */
export function parseRoleGuess(guess: string): KnownRole {
  const text = guess.toLowerCase();
  const matches = ROLE_WORDS.filter(([, pattern]) => pattern.test(text)).map(([role]) => role);
  return matches.length === 1 && matches[0] ? matches[0] : 'villager';
}

export async function inferRole(oracle: Oracle | undefined, selfName: string, moderatorText: string): Promise<KnownRole> {
  if (!oracle) return 'villager';

  try {
    const guess = await oracle.complete({
      purpose: 'role_inference',
      messages: [
        {
          role: 'system',
          content: `The user is playing a game of werewolf as user ${selfName}, help the user with question with less than a line answer`,
        },
        {
          role: 'user',
          content: `You have got a message from the moderator about my role in the werewolf game. Here is the message:
"""
${moderatorText}
"""
What is my role? Possible roles are 'wolf', 'villager', 'doctor' and 'seer'. Answer in a few words.`,
        },
      ],
      temperature: 0,
      maxOutputTokens: 30,
    });
    logger.log({ type: 'THOUGHT', player: selfName, content: `Role guess: ${guess}`, metadata: { kind: 'role_guess' } });
    return parseRoleGuess(guess);
  } catch (error) {
    logger.log({
      type: 'SYSTEM',
      player: selfName,
      content: `Error determining role, assuming villager: ${describeError(error)}`,
      metadata: { kind: 'oracle_error' },
    });
    return 'villager';
  }
}

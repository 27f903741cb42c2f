import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { logger } from '../logger.js';
import { describeError } from '../utils.js';

export const PlayerResultSchema = z
  .object({
    won: z.boolean().default(false),
    survived: z.boolean().default(false),
    response_failures: z.number().int().nonnegative().default(0),
  })
  .passthrough();
export type PlayerResult = z.infer<typeof PlayerResultSchema>;

export const GameResultSchema = z
  .object({
    player_results: z.record(PlayerResultSchema).default({}),
  })
  .passthrough();
export type GameResult = z.infer<typeof GameResultSchema>;

export interface GameMetrics {
  totalGames: number;
  wins: number;
  losses: number;
  responseFailures: number;
  survivalRate: number;
  winRate: number;
  failureRate: number;
}

/**
 * Loads every `*.json` game result in a directory, in file-name order.
 * Files that are not valid JSON or do not match the result shape are skipped with a warning.
 */
export function loadGameResults(resultsDir: string): GameResult[] {
  if (!fs.existsSync(resultsDir)) {
    throw new Error(`Results directory not found: ${resultsDir}`);
  }

  const files = fs
    .readdirSync(resultsDir)
    .filter(f => f.endsWith('.json'))
    .sort();

  const results: GameResult[] = [];
  for (const file of files) {
    const filePath = path.join(resultsDir, file);
    try {
      const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
      results.push(GameResultSchema.parse(raw));
    } catch (error) {
      logger.log({
        type: 'SYSTEM',
        content: `Warning: Could not parse ${filePath}: ${describeError(error)}`,
        metadata: { kind: 'metrics_warning' },
      });
    }
  }
  return results;
}

export function calculateMetrics(results: readonly GameResult[], playerName: string): GameMetrics {
  const totalGames = results.length;
  let wins = 0;
  let survivals = 0;
  let responseFailures = 0;

  for (const result of results) {
    const player = result.player_results[playerName];
    if (!player) continue;
    if (player.won) wins += 1;
    if (player.survived) survivals += 1;
    responseFailures += player.response_failures;
  }

  const rate = (n: number) => (totalGames > 0 ? n / totalGames : 0);
  return {
    totalGames,
    wins,
    losses: totalGames - wins,
    responseFailures,
    survivalRate: rate(survivals),
    winRate: rate(wins),
    failureRate: rate(responseFailures),
  };
}

const percent = (value: number) => `${(value * 100).toFixed(2)}%`;

export function formatMetrics(metrics: GameMetrics): string {
  return [
    `Results over ${metrics.totalGames} games:`,
    `Win Rate: ${percent(metrics.winRate)}`,
    `Survival Rate: ${percent(metrics.survivalRate)}`,
    `Response Failure Rate: ${percent(metrics.failureRate)}`,
    `Total Wins: ${metrics.wins}`,
    `Total Losses: ${metrics.losses}`,
    `Total Response Failures: ${metrics.responseFailures}`,
  ].join('\n');
}

#!/usr/bin/env node
import * as path from 'path';
import * as dotenv from 'dotenv';
import { loadConfig } from './config.js';
import { WerewolfAgent } from './agent.js';
import { logger } from './logger.js';
import { createOracle } from './oracle/oracle.js';
import { calculateMetrics, formatMetrics, loadGameResults } from './metrics/gameResults.js';
import { buildDefaultScenario, loadScenario, runScenario } from './simulation/scenario.js';
import { type MetricsArgs, type RunArgs, parseArgs } from './cliArgs.js';
import { describeError, isDryRun } from './utils.js';

async function runGame(args: RunArgs) {
  if (args.dryRun) {
    process.env.WEREWOLF_AGENT_DRY_RUN = '1';
    if (args.dryRunSeed !== undefined) process.env.WEREWOLF_AGENT_DRY_RUN_SEED = String(args.dryRunSeed);
    logger.log({
      type: 'SYSTEM',
      content: `Dry-run mode enabled (seed: ${process.env.WEREWOLF_AGENT_DRY_RUN_SEED ?? 'default'})`,
    });
  }
  if (args.persistLogs) logger.enablePersistence();

  const config = loadConfig(path.resolve(process.cwd(), args.configFile));
  const oracle = createOracle(config.oracle);
  if (!oracle && !isDryRun()) {
    logger.log({
      type: 'SYSTEM',
      content: 'No AI_GATEWAY_API_KEY set and dry-run is off: every reasoning step will use its fallback answer.',
    });
  }

  const agent = new WerewolfAgent(config, { oracle });
  const scenario = args.scenarioFile
    ? loadScenario(path.resolve(process.cwd(), args.scenarioFile))
    : buildDefaultScenario(args.role, {
        moderatorName: config.moderator_name,
        gameChannel: config.game_channel,
        packChannel: config.pack_channel,
      });

  const transcript = await runScenario(agent, scenario);
  logger.log({
    type: 'SYSTEM',
    content: `Scenario finished: ${transcript.length} responses, role ${agent.role}`,
  });
}

function reportMetrics(args: MetricsArgs) {
  const metrics = calculateMetrics(loadGameResults(path.resolve(process.cwd(), args.resultsDir)), args.player);
  console.log(formatMetrics(metrics));
}

async function main() {
  // Load local environment variables from .env
  dotenv.config();

  try {
    const args = parseArgs(process.argv.slice(2));
    if (args.command === 'metrics') {
      reportMetrics(args);
      return;
    }
    await runGame(args);
  } catch (error) {
    console.error('Fatal Error:', describeError(error));
    process.exit(1);
  }
}

await main();

import { isKnownRole, type KnownRole } from './types.js';

export interface RunArgs {
  command: 'run';
  configFile: string;
  scenarioFile?: string;
  role: KnownRole;
  dryRun: boolean;
  dryRunSeed?: number;
  persistLogs: boolean;
}

export interface MetricsArgs {
  command: 'metrics';
  resultsDir: string;
  player: string;
}

export type CliArgs = RunArgs | MetricsArgs;

function takeValue(argv: readonly string[], i: number, flag: string): string {
  const next = argv[i + 1];
  if (!next || next.startsWith('--')) throw new Error(`Missing value for ${flag}`);
  return next;
}

export function parseArgs(argv: readonly string[]): CliArgs {
  // Package managers often forward a literal `--`.
  const args = argv.filter(a => a !== '--');
  const [first, ...rest] = args;
  const command = first === 'metrics' || first === 'run' ? first : 'run';
  const tokens = first === command ? rest : args;

  if (command === 'metrics') {
    let resultsDir: string | undefined;
    let player: string | undefined;
    for (let i = 0; i < tokens.length; i++) {
      const arg = tokens[i] ?? '';
      if (arg === '--player') {
        player = takeValue(tokens, i, arg);
        i++;
        continue;
      }
      if (arg.startsWith('-')) throw new Error(`Unknown argument: ${arg}`);
      if (!resultsDir) resultsDir = arg;
    }
    if (!player) throw new Error('Missing --player for metrics');
    return { command, resultsDir: resultsDir ?? 'game_results', player };
  }

  let configFile: string | undefined;
  let scenarioFile: string | undefined;
  let role: KnownRole = 'villager';
  let dryRun = false;
  let dryRunSeed: number | undefined;
  let persistLogs = false;

  for (let i = 0; i < tokens.length; i++) {
    const arg = tokens[i] ?? '';

    if (arg === '--dry-run' || arg === '--dryrun') {
      dryRun = true;
      continue;
    }

    if (arg === '--persist-logs') {
      persistLogs = true;
      continue;
    }

    if (arg === '--seed' || arg === '--dry-run-seed') {
      const next = takeValue(tokens, i, arg);
      const n = Number(next);
      if (!Number.isFinite(n)) throw new Error(`Invalid seed "${next}" for ${arg}`);
      dryRunSeed = n;
      i++;
      continue;
    }

    if (arg === '--config') {
      configFile = takeValue(tokens, i, arg);
      i++;
      continue;
    }

    if (arg === '--scenario') {
      scenarioFile = takeValue(tokens, i, arg);
      i++;
      continue;
    }

    if (arg === '--role') {
      const next = takeValue(tokens, i, arg).toLowerCase();
      const normalized = next === 'wolf' ? 'werewolf' : next;
      if (!isKnownRole(normalized)) throw new Error(`Unknown role "${next}" for --role`);
      role = normalized;
      i++;
      continue;
    }

    if (arg.startsWith('-')) {
      throw new Error(`Unknown argument: ${arg}`);
    }

    // First positional arg is the config file.
    if (!configFile) configFile = arg;
  }

  return {
    command,
    configFile: configFile ?? 'agent-config.yaml',
    scenarioFile,
    role,
    dryRun,
    dryRunSeed,
    persistLogs,
  };
}

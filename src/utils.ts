export function isTruthyFlag(raw: string | undefined): boolean {
  const v = (raw ?? '').toLowerCase().trim();
  return v === '1' || v === 'true' || v === 'yes' || v === 'on';
}

export function isDryRun(): boolean {
  return isTruthyFlag(process.env.WEREWOLF_AGENT_DRY_RUN ?? process.env.DRY_RUN);
}

export function dryRunSeed(): number {
  const raw = process.env.WEREWOLF_AGENT_DRY_RUN_SEED;
  if (!raw) return 1;
  const n = Number(raw);
  return Number.isFinite(n) ? n : 1;
}

export function fnv1a32(input: string): number {
  // FNV-1a 32-bit hash, deterministic across runs.
  let hash = 0x811c9dc5;
  for (let i = 0; i < input.length; i++) {
    hash ^= input.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

export function pickDeterministicOption(options: readonly string[], key: string): string {
  if (options.length === 0) return '';
  const h = fnv1a32(`${dryRunSeed()}|${key}|${options.join('|')}`);
  return options[h % options.length] ?? '';
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** `phase_change` -> `Phase Change` */
export function titleCase(value: string): string {
  return value
    .split(/[_\s]+/)
    .filter(Boolean)
    .map(w => w.charAt(0).toUpperCase() + w.slice(1).toLowerCase())
    .join(' ');
}

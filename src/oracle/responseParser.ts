export type Marker<T> = { found: true; value: T } | { found: false };

export interface SecurityAnalysis {
  hasInjection: Marker<boolean>;
  reason: Marker<string>;
  cleanedContent: Marker<string>;
}

type MarkerName = 'HAS_INJECTION' | 'REASON' | 'CLEANED_CONTENT';

// Tolerates markdown emphasis around the marker, e.g. `**HAS_INJECTION:** true`.
const MARKER_LINE = /^\s*[*_`]*\s*(HAS_INJECTION|REASON|CLEANED_CONTENT)\s*[*_`]*\s*:\s*[*_`]*\s*(.*)$/i;

const PLACEHOLDERS = new Set(['', 'n/a', 'na', 'none', 'null', 'nil', '-', '...', '(none)', '(empty)']);

const missing: { found: false } = { found: false };

function isMarkerName(value: string): value is MarkerName {
  return value === 'HAS_INJECTION' || value === 'REASON' || value === 'CLEANED_CONTENT';
}

function parseBoolean(raw: string): Marker<boolean> {
  const v = raw.trim().replace(/^[*_`"']+|[*_`"'.]+$/g, '').toLowerCase();
  if (/^(true|yes)\b/.test(v)) return { found: true, value: true };
  if (/^(false|no)\b/.test(v)) return { found: true, value: false };
  return missing;
}

/**
 * `N/A`, `none`, an empty value or an echoed template like `[cleaned content here]` all
 * mean the model gave no usable replacement.
 */
export function isPlaceholderContent(value: string): boolean {
  const v = value.trim();
  if (PLACEHOLDERS.has(v.toLowerCase())) return true;
  return /^[[<(].*\b(cleaned|content|original|message)\b.*[\]>)]$/i.test(v);
}

/**
 * Parse a `HAS_INJECTION:` / `REASON:` / `CLEANED_CONTENT:` reply.
 *
 * Each marker's value runs until the next marker line, so a multi-line cleaned message
 * survives intact. The first occurrence of a marker wins.
 */
export function parseSecurityAnalysis(raw: string): SecurityAnalysis {
  const values = new Map<MarkerName, string[]>();
  let current: MarkerName | null = null;

  for (const line of raw.split(/\r?\n/)) {
    const m = line.match(MARKER_LINE);
    const name = m?.[1]?.toUpperCase();
    if (m && name && isMarkerName(name)) {
      if (values.has(name)) {
        current = null;
        continue;
      }
      current = name;
      values.set(name, [m[2] ?? '']);
      continue;
    }
    if (current) values.get(current)?.push(line);
  }

  const text = (name: MarkerName): Marker<string> => {
    const lines = values.get(name);
    if (!lines) return missing;
    return { found: true, value: lines.join('\n').trim() };
  };

  const injection = values.get('HAS_INJECTION');
  const cleaned = text('CLEANED_CONTENT');

  return {
    hasInjection: injection ? parseBoolean(injection.join(' ')) : missing,
    reason: text('REASON'),
    cleanedContent: cleaned.found && !isPlaceholderContent(cleaned.value) ? cleaned : missing,
  };
}

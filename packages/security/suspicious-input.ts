/**
 * Suspicious Search Input Detection
 *
 * Classifies free-text search input as clean or suspicious (URLs, injected
 * markup or code, shell and SQL shapes, file paths, symbol-heavy text).
 * Rules are data: an ordered table evaluated first match wins.
 */

import { getLogger } from '@kernel/logger';

const logger = getLogger('suspicious-input');

// ============================================================================
// Types
// ============================================================================

export type SuspicionCategory =
  | 'url'
  | 'markup'
  | 'sql'
  | 'script-call'
  | 'style-expression'
  | 'embedded-script'
  | 'shell'
  | 'filesystem-path'
  | 'obfuscation';

export interface SuspicionRule {
  id: string;
  category: SuspicionCategory;
  /** Regular expression source, compiled case-insensitive */
  pattern: string;
}

export interface SuspicionVerdict {
  isSuspicious: boolean;
  /** For server-side logs only */
  category?: SuspicionCategory | undefined;
}

// ============================================================================
// Rule table
// ============================================================================

const KNOWN_TLDS = 'com|org|net|edu|gov|mil|int|co|uk|de|fr|jp|cn|au|ca|ru|br|in|it|es';

export const SUSPICIOUS_INPUT_RULES: readonly SuspicionRule[] = [
  { id: 'url-scheme', category: 'url', pattern: String.raw`https?://\S+` },
  { id: 'url-www', category: 'url', pattern: String.raw`www\.\S+` },
  { id: 'url-bare-domain', category: 'url', pattern: String.raw`\S+\.(?:${KNOWN_TLDS})\S*` },
  {
    id: 'markup-tag',
    category: 'markup',
    pattern: String.raw`<\s*(?:script|iframe|object|embed|link|style|meta|form)\b`,
  },
  {
    id: 'sql-mutation',
    category: 'sql',
    pattern: String.raw`\b(?:union\s+select|insert\s+into|update\s+\w+\s+set|delete\s+from|drop\s+table|create\s+table|alter\s+table)\b`,
  },
  {
    id: 'script-call',
    category: 'script-call',
    pattern: String.raw`\b(?:eval|document\.cookie|window\.location|location\.href)\s*\(`,
  },
  { id: 'css-expression', category: 'style-expression', pattern: String.raw`expression\s*\(` },
  { id: 'php-open-tag', category: 'embedded-script', pattern: String.raw`<\?php` },
  { id: 'short-open-tag', category: 'embedded-script', pattern: String.raw`<\?` },
  {
    id: 'shell-command',
    category: 'shell',
    pattern: String.raw`\b(?:rm\s+-rf|chmod\s+\d{3,4}|wget\s+http|curl\s+http)\b`,
  },
  { id: 'unix-path', category: 'filesystem-path', pattern: String.raw`(?<![\w/])/[\w.-]+/[\w.-]+` },
  { id: 'windows-path', category: 'filesystem-path', pattern: String.raw`\b[a-z]:[\\/][\w.-]+` },
];

/** Texts at or below this many characters skip the density check */
const DENSITY_MIN_LENGTH = 20;
const DENSITY_MAX_SPECIAL_RATIO = 0.3;
const SPECIAL_CHAR = /[^\p{L}\p{N}_\s]/gu;

// ============================================================================
// Pattern compilation
// ============================================================================

/** Compiled patterns by source; null marks a source that failed to compile */
const compiled = new Map<string, RegExp | null>();

function compile(rule: SuspicionRule): RegExp | null {
  const known = compiled.get(rule.pattern);
  if (known !== undefined) return known;

  let regex: RegExp | null = null;
  try {
    regex = new RegExp(rule.pattern, 'i');
  } catch (error) {
    logger.warn('Skipping malformed suspicious-input pattern', {
      ruleId: rule.id,
      error: error instanceof Error ? error.message : String(error),
    });
  }
  compiled.set(rule.pattern, regex);
  return regex;
}

// ============================================================================
// Classification
// ============================================================================

function hasSymbolDensity(text: string): boolean {
  const length = [...text].length;
  if (length <= DENSITY_MIN_LENGTH) return false;

  const special = text.match(SPECIAL_CHAR)?.length ?? 0;
  return special / length > DENSITY_MAX_SPECIAL_RATIO;
}

/**
 * Classify search text. Any single rule match, or the density heuristic,
 * makes the whole text suspicious.
 *
 * @example
 * ```typescript
 * classifySearchInput('how to code');            // { isSuspicious: false }
 * classifySearchInput('visit https://x.example'); // { isSuspicious: true, category: 'url' }
 * ```
 */
export function classifySearchInput(
  text: string,
  rules: readonly SuspicionRule[] = SUSPICIOUS_INPUT_RULES
): SuspicionVerdict {
  for (const rule of rules) {
    const regex = compile(rule);
    if (regex?.test(text)) {
      return { isSuspicious: true, category: rule.category };
    }
  }

  if (hasSymbolDensity(text)) {
    return { isSuspicious: true, category: 'obfuscation' };
  }

  return { isSuspicious: false };
}

export function isSuspiciousInput(text: string): boolean {
  return classifySearchInput(text).isSuspicious;
}

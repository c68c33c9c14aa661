/**
 * Building height estimation from free-form tags.
 *
 * Rules are evaluated in order and the first one yielding a finite, positive
 * value wins:
 *
 * 1. explicit height tag (a trailing unit such as "m" is stripped)
 * 2. level count × per-level height
 * 3. configured default height
 *
 * A rule that is present but unparseable is reported as a HeightFallback and
 * evaluation continues; nothing here throws.
 */

import type { TagMap } from './types';
import type { HeightFallback, HeightRule } from '../errors';
import { DEFAULT_HEIGHT_KEY, DEFAULT_LEVELS_KEY } from '../tiles/types';

/**
 * Height estimation options
 */
export interface HeightOptions {
  /** Height used when no rule applies (metres, > 0) */
  defaultHeight: number;
  /** Height of one storey (metres, > 0) */
  levelHeight: number;
  /** Tag holding an explicit height (default: "height") */
  heightKey?: string;
  /** Tag holding a level count (default: "building:levels") */
  levelsKey?: string;
}

export type HeightSource = HeightRule | 'default';

export interface HeightEstimate {
  height: number;
  source: HeightSource;
  fallbacks: HeightFallback[];
}

interface HeightRuleDefinition {
  rule: HeightRule;
  key: (options: HeightOptions) => string;
  evaluate: (value: unknown, options: HeightOptions) => number | undefined;
}

const UNIT_SUFFIX = /\s*(m|meters?|metres?)$/i;
const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

const HEIGHT_RULES: readonly HeightRuleDefinition[] = [
  {
    rule: 'height',
    key: (options) => options.heightKey ?? DEFAULT_HEIGHT_KEY,
    evaluate: (value) => parseHeightValue(value),
  },
  {
    rule: 'levels',
    key: (options) => options.levelsKey ?? DEFAULT_LEVELS_KEY,
    evaluate: (value, options) => {
      const levels = parseDecimal(value);
      return levels === undefined ? undefined : levels * options.levelHeight;
    },
  },
];

// ─────────────────────────────────────────────────────────────────────────────
// Public API
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Estimates a single building height in metres.
 *
 * @example
 * estimateHeight({ height: '12m' }, { defaultHeight: 5, levelHeight: 5 }).height; // 12
 * estimateHeight({ 'building:levels': '3' }, { defaultHeight: 5, levelHeight: 5 }).height; // 15
 */
export function estimateHeight(tags: TagMap, options: HeightOptions): HeightEstimate {
  const fallbacks: HeightFallback[] = [];

  for (const { rule, key, evaluate } of HEIGHT_RULES) {
    const value = readTag(tags, key(options));
    if (isBlank(value)) continue;

    const height = evaluate(value, options);
    if (height !== undefined && Number.isFinite(height) && height > 0) {
      return { height, source: rule, fallbacks };
    }
    fallbacks.push({ kind: 'height-fallback', rule, value });
  }

  return { height: options.defaultHeight, source: 'default', fallbacks };
}

/**
 * Parses an explicit height tag such as "12", "12m" or " 7.5 metres ".
 *
 * @returns The parsed number, or undefined when the value is not a decimal
 */
export function parseHeightValue(value: unknown): number | undefined {
  if (typeof value === 'string') {
    return parseDecimal(value.trim().replace(UNIT_SUFFIX, ''));
  }
  return parseDecimal(value);
}

/**
 * Strict decimal parsing. `Number('')` is 0 and `parseFloat('3a')` is 3;
 * both are rejected here.
 */
export function parseDecimal(value: unknown): number | undefined {
  if (typeof value === 'number') return value;
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  return DECIMAL.test(trimmed) ? Number(trimmed) : undefined;
}

// ─────────────────────────────────────────────────────────────────────────────
// Tag Access
// ─────────────────────────────────────────────────────────────────────────────

function readTag(tags: TagMap, key: string): unknown {
  return Object.hasOwn(tags, key) ? tags[key] : undefined;
}

function isBlank(value: unknown): boolean {
  return value === undefined || value === null || value === '';
}

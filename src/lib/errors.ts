/**
 * Error taxonomy for the packing pipeline.
 *
 * Per-record problems (skipped geometry, height fallbacks) are plain data
 * returned alongside results; they never abort a run. Structural problems
 * (configuration, I/O, malformed packs) are thrown as Error subclasses.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Non-fatal conditions
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Why a geometry (or one part of a multi-polygon) was dropped.
 */
export type SkipReason =
  | 'null-geometry'
  | 'unsupported-type'
  | 'empty'
  | 'missing-exterior'
  | 'non-finite-coordinate'
  | 'too-few-points'
  | 'zero-area'
  | 'self-intersection'
  | 'hole-outside-shell';

export interface SkippedGeometry {
  readonly kind: 'skipped-geometry';
  readonly reason: SkipReason;
  /** Index of the polygon within a multi-polygon (0 for simple geometries) */
  readonly part: number;
}

/**
 * Height rules that can fail and fall through to the next one.
 */
export type HeightRule = 'height' | 'levels';

export interface HeightFallback {
  readonly kind: 'height-fallback';
  readonly rule: HeightRule;
  /** The raw tag value that could not be used */
  readonly value: unknown;
}

// ─────────────────────────────────────────────────────────────────────────────
// Fatal errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Invalid run configuration (non-positive tile size, unknown codec, ...).
 */
export class ConfigurationError extends Error {
  readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/**
 * A read or write failed. Any artifact of the run must be considered invalid.
 */
export class IOFailure extends Error {
  readonly path: string;

  constructor(message: string, path: string, options?: { cause?: unknown }) {
    super(`${message}: ${path}`, options);
    this.name = 'IOFailure';
    this.path = path;
  }
}

/**
 * A pack blob or index does not satisfy the pack format.
 */
export class PackFormatError extends Error {
  readonly problems: readonly string[];

  constructor(message: string, problems: readonly string[] = []) {
    super(problems.length > 0 ? `${message}: ${problems.join('; ')}` : message);
    this.name = 'PackFormatError';
    this.problems = problems;
  }
}

/**
 * Formats an unknown thrown value for log output.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

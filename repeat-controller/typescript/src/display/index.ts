/**
 * Per-attempt display names.
 *
 * Patterns are plain strings with `{placeholder}` tokens. Unknown tokens are
 * left as written.
 */

export const DISPLAY_NAME_PLACEHOLDER = '{displayName}';
export const CURRENT_REPETITION_PLACEHOLDER = '{currentRepetition}';
export const TOTAL_REPETITIONS_PLACEHOLDER = '{totalRepetitions}';
export const MIN_SUCCESS_PLACEHOLDER = '{minSuccess}';
export const SUCCESS_COUNT_PLACEHOLDER = '{successCount}';

/** "Repetition 2 of 5" */
export const SHORT_DISPLAY_NAME = `Repetition ${CURRENT_REPETITION_PLACEHOLDER} of ${TOTAL_REPETITIONS_PLACEHOLDER}`;

/** "fetches profile :: Repetition 2 of 5" */
export const LONG_DISPLAY_NAME = `${DISPLAY_NAME_PLACEHOLDER} :: ${SHORT_DISPLAY_NAME}`;

/**
 * Values that only some patterns use.
 */
export interface DisplayNameExtras {
  minSuccesses?: number;
  successCount?: number;
}

const PLACEHOLDER_PATTERN = /\{(\w+)\}/g;

/**
 * Format the display name of one attempt.
 *
 * A missing or blank pattern yields `baseDisplayName` unchanged. The pattern
 * is trimmed before substitution.
 *
 * @example
 * ```typescript
 * formatDisplayName(LONG_DISPLAY_NAME, 'fetches profile', 2, 5);
 * // => 'fetches profile :: Repetition 2 of 5'
 * ```
 */
export function formatDisplayName(
  pattern: string | undefined,
  baseDisplayName: string,
  attemptIndex: number,
  totalAttempts: number,
  extras: DisplayNameExtras = {}
): string {
  if (pattern === undefined || pattern.trim() === '') {
    return baseDisplayName;
  }

  const values: Record<string, string | undefined> = {
    displayName: baseDisplayName,
    currentRepetition: String(attemptIndex),
    totalRepetitions: String(totalAttempts),
    minSuccess: extras.minSuccesses === undefined ? undefined : String(extras.minSuccesses),
    successCount: extras.successCount === undefined ? undefined : String(extras.successCount),
  };

  return pattern.trim().replace(PLACEHOLDER_PATTERN, (token: string, key: string) => {
    return Object.hasOwn(values, key) ? values[key] ?? token : token;
  });
}

/**
 * Binds a pattern and base name so the engine only supplies counters.
 */
export class DisplayNameFormatter {
  constructor(
    private readonly pattern: string | undefined,
    private readonly baseDisplayName: string
  ) {}

  format(attemptIndex: number, totalAttempts: number, extras?: DisplayNameExtras): string {
    return formatDisplayName(this.pattern, this.baseDisplayName, attemptIndex, totalAttempts, extras);
  }
}

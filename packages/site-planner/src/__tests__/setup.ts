/**
 * Global Test Setup for the site planner
 *
 * Registers custom matchers and keeps library logging quiet unless a test
 * run asks for it with LOG_LEVEL.
 */

import { expect } from 'vitest';

// ============================================================================
// Custom Matchers
// ============================================================================

/**
 * Custom matcher: toBeOneOf
 *
 * Usage:
 * ```typescript
 * expect(score.confidence_class).toBeOneOf(['HIGH', 'MED']);
 * ```
 */
expect.extend({
  toBeOneOf<T>(received: T, expected: readonly T[]): { pass: boolean; message: () => string } {
    const pass = expected.includes(received);
    return {
      pass,
      message: () =>
        pass
          ? `expected ${JSON.stringify(received)} not to be one of ${JSON.stringify(expected)}`
          : `expected ${JSON.stringify(received)} to be one of ${JSON.stringify(expected)}`,
    };
  },
});

// ============================================================================
// Environment
// ============================================================================

process.env.LOG_LEVEL ??= 'error';

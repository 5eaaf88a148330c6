/**
 * Result types.
 *
 * Canonical Result<T> shape returned by the retry coordinator, the
 * assemblers and tool handlers. Those APIs never throw; failures travel as
 * ClassifiedError values.
 */

import type { ClassifiedError } from './errors.js';

export type Result<T, E = ClassifiedError> =
  | {
      success: true;
      data: T;
    }
  | {
      success: false;
      error: E;
    };

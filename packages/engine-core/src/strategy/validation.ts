import { EngineError } from '../types.js';
import type { ConcessionParams } from './types.js';

/** Validate a concession schedule. Returns the first error found, or null. */
export function validateStrategy(params: ConcessionParams): EngineError | null {
  if (params.target <= params.reservation) {
    return EngineError.INVALID_RANGE;
  }
  if (params.initial_concession <= 0 || params.initial_concession > 1) {
    return EngineError.INVALID_CONCESSION;
  }
  if (params.decay <= 0 || params.decay >= 1) {
    return EngineError.INVALID_CONCESSION;
  }
  return null;
}

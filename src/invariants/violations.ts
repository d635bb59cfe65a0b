import { MerkleTreeError } from '../merkle/merkle-types.js';
import type { InvariantViolation } from './types.js';

export class TreeInvariantViolationError extends MerkleTreeError {
  constructor(
    public readonly violations: InvariantViolation[]
  ) {
    super(`Tree invariant violations: ${violations.map(v => v.invariantId).join(', ')}`);
    this.name = 'TreeInvariantViolationError';
  }

  hasFatalViolations(): boolean {
    return this.violations.some(v => v.severity === 'fatal');
  }
}

export function summarizeViolations(violations: InvariantViolation[]): {
  total: number;
  warn: number;
  error: number;
  fatal: number;
} {
  return {
    total: violations.length,
    warn: violations.filter(v => v.severity === 'warn').length,
    error: violations.filter(v => v.severity === 'error').length,
    fatal: violations.filter(v => v.severity === 'fatal').length,
  };
}

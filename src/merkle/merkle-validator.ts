import { getTreeConfig } from '../config/tree-config.js';
import { metrics } from '../metrics/metrics.js';
import { abbreviate, logger } from '../observability/logger.js';
import { Proof } from './merkle-proof.js';
import type { MerkleVerificationRequest, MerkleVerificationResult } from './merkle-types.js';
import { MerkleTreeError } from './merkle-types.js';

/**
 * Verify a sibling path against a claimed root.
 *
 * Algorithm:
 * 1. Start with the element's hash
 * 2. Combine with each sibling from the leaf upward, side chosen by the bit
 * 3. Final hash should equal the claimed root
 *
 * Malformed input (bad digests, path length mismatch) yields `valid: false`
 * with a reason instead of throwing. Log entries carry no tree context.
 */
export function verifyMerkleProof<F>(request: MerkleVerificationRequest<F>): MerkleVerificationResult {
  getTreeConfig();
  logger.clearContext();

  logger.info('merkle_proof_verification', 'Verifying Merkle proof', {
    pathLength: request.bitsIndex.length,
    proofSteps: request.siblingHashes.length,
    expectedRoot: abbreviate(request.root),
  });

  let recomputedRoot: string;
  try {
    recomputedRoot = new Proof(request.siblingHashes).calculateRoot(request.bitsIndex, request.element);
  } catch (error) {
    if (!(error instanceof MerkleTreeError)) throw error;

    logger.warn('merkle_proof_invalid', 'Malformed Merkle proof', { reason: error.message });
    metrics.recordProofVerification(false);
    return {
      valid: false,
      reason: error.message,
    };
  }

  const valid = recomputedRoot === request.root;
  metrics.recordProofVerification(valid);

  if (!valid) {
    logger.warn('merkle_proof_invalid', 'Merkle proof verification failed', {
      expectedRoot: abbreviate(request.root),
      recomputedRoot: abbreviate(recomputedRoot),
    });

    return {
      valid: false,
      recomputedRoot,
      reason: 'Recomputed root does not match expected root',
    };
  }

  logger.info('merkle_proof_verified', 'Merkle proof verified successfully', {
    root: abbreviate(request.root),
  });

  return {
    valid: true,
    recomputedRoot,
  };
}

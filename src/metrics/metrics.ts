export type UpdateRejection = 'malformed_path' | 'inconsistent_store' | 'store_capacity' | 'invariant_violation';

export interface MetricsSnapshot {
  processStartTime: string;
  uptimeSeconds: number;
  trees: {
    initialized: number;
  };
  updates: {
    applied: number;
    rejected: number;
    rejectedMalformedPath: number;
    rejectedInconsistentStore: number;
    rejectedStoreCapacity: number;
    rejectedInvariantViolation: number;
    nodesWritten: number;
  };
  siblings: {
    pathsExtracted: number;
  };
  proofs: {
    verified: number;
    valid: number;
    invalid: number;
    validRate: number;
  };
  store: {
    peakSize: number;
  };
}

function emptyCounters() {
  return {
    treesInitialized: 0,
    updatesApplied: 0,
    updatesRejectedMalformedPath: 0,
    updatesRejectedInconsistentStore: 0,
    updatesRejectedStoreCapacity: 0,
    updatesRejectedInvariantViolation: 0,
    nodesWritten: 0,
    siblingPathsExtracted: 0,
    proofsValid: 0,
    proofsInvalid: 0,
    peakStoreSize: 0,
  };
}

class Metrics {
  private startTime: Date = new Date();

  private counters = emptyCounters();

  recordTreeInitialized(storeSize: number): void {
    this.counters.treesInitialized++;
    this.observeStoreSize(storeSize);
  }

  recordUpdateApplied(nodesWritten: number, storeSize: number): void {
    this.counters.updatesApplied++;
    this.counters.nodesWritten += nodesWritten;
    this.observeStoreSize(storeSize);
  }

  recordUpdateRejected(reason: UpdateRejection): void {
    switch (reason) {
      case 'malformed_path':
        this.counters.updatesRejectedMalformedPath++;
        break;
      case 'inconsistent_store':
        this.counters.updatesRejectedInconsistentStore++;
        break;
      case 'store_capacity':
        this.counters.updatesRejectedStoreCapacity++;
        break;
      case 'invariant_violation':
        this.counters.updatesRejectedInvariantViolation++;
        break;
    }
  }

  recordSiblingPathExtracted(): void {
    this.counters.siblingPathsExtracted++;
  }

  recordProofVerification(valid: boolean): void {
    if (valid) {
      this.counters.proofsValid++;
    } else {
      this.counters.proofsInvalid++;
    }
  }

  private observeStoreSize(size: number): void {
    if (size > this.counters.peakStoreSize) {
      this.counters.peakStoreSize = size;
    }
  }

  snapshot(): MetricsSnapshot {
    const uptimeMs = Date.now() - this.startTime.getTime();
    const verified = this.counters.proofsValid + this.counters.proofsInvalid;
    const validRate = verified > 0 ? this.counters.proofsValid / verified : 0;
    const rejected =
      this.counters.updatesRejectedMalformedPath +
      this.counters.updatesRejectedInconsistentStore +
      this.counters.updatesRejectedStoreCapacity +
      this.counters.updatesRejectedInvariantViolation;

    return {
      processStartTime: this.startTime.toISOString(),
      uptimeSeconds: Math.floor(uptimeMs / 1000),
      trees: {
        initialized: this.counters.treesInitialized,
      },
      updates: {
        applied: this.counters.updatesApplied,
        rejected,
        rejectedMalformedPath: this.counters.updatesRejectedMalformedPath,
        rejectedInconsistentStore: this.counters.updatesRejectedInconsistentStore,
        rejectedStoreCapacity: this.counters.updatesRejectedStoreCapacity,
        rejectedInvariantViolation: this.counters.updatesRejectedInvariantViolation,
        nodesWritten: this.counters.nodesWritten,
      },
      siblings: {
        pathsExtracted: this.counters.siblingPathsExtracted,
      },
      proofs: {
        verified,
        valid: this.counters.proofsValid,
        invalid: this.counters.proofsInvalid,
        validRate: parseFloat(validRate.toFixed(4)),
      },
      store: {
        peakSize: this.counters.peakStoreSize,
      },
    };
  }

  reset(): void {
    this.startTime = new Date();
    this.counters = emptyCounters();
  }
}

export const metrics = new Metrics();

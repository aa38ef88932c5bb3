// Orchestration-specific types
import { CheckOutcome, ExecutionState } from '../types';

export interface DeployOptions {
  signal?: AbortSignal;
}

export interface PhaseStatusReport {
  state: ExecutionState;
  /** Identities of declared resources absent from the platform */
  missing: string[];
  /** Identities whose live object differs from the declared payload */
  drifted: string[];
  checks: CheckOutcome[];
  warnings: string[];
}

export interface StatusReport {
  platform: string;
  order: string[];
  phases: PhaseStatusReport[];
  exitCode: number;
}

export interface ResourceFailure {
  identity: string;
  phase: string;
  error: string;
}

export interface TeardownResult {
  order: string[];
  deleted: string[];
  /** Already absent when teardown reached them */
  absent: string[];
  failed: ResourceFailure[];
}

export interface ReconcileReport {
  checked: number;
  reapplied: string[];
  failed: ResourceFailure[];
  durationMs: number;
}

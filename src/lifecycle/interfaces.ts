import type { WorkloadStatus } from '../state/interfaces';
import type { LifecycleFlags } from './lifecycle.transitions';

/**
 * Configuration for the lifecycle coordinator.
 */
export interface LifecycleConfig {
  /** Gate for registration and renewal. */
  disabled: boolean;
  /** Gate for the periodic trigger and renewals. */
  renewDisabled: boolean;
  /** Status tick period in milliseconds; 0 disables the tick. */
  updateStatusInterval: number;
}

/**
 * Snapshot returned by the status endpoint.
 */
export interface LifecycleSnapshot {
  status: WorkloadStatus | null;
  flags: LifecycleFlags;
  fqdn: string;
  contactEmail: string;
  pendingRequests: number;
  renewalSchedule: string | null;
  lastRenewedAt: string | null;
}

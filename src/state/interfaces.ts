/**
 * Where a certificate request came from.
 */
export type RequestSource = 'config' | 'api';

/**
 * A pending request for one certificate covering one or more names.
 */
export interface CertificateRequest {
  /** Stable identifier used to consume the request once attempted. */
  readonly id: string;
  /** Subject names, in order; the first becomes the certificate name. */
  readonly fqdns: readonly string[];
  /** ACME contact address; registration proceeds without email when absent. */
  readonly contactEmail?: string;
  readonly source: RequestSource;
  /** ISO 8601 creation time. */
  readonly createdAt: string;
}

export type WorkloadState = 'blocked' | 'waiting' | 'active';

/**
 * Last status reported to operators.
 */
export interface WorkloadStatus {
  state: WorkloadState;
  message: string;
  /** ISO 8601 time the status was set. */
  updatedAt: string;
}

/**
 * The persisted state record.
 */
export interface StewardState {
  /** The issuance client is installed and the standing ports were opened. */
  installed: boolean;
  /** A full issuance pass succeeded for the current domain settings. */
  registered: boolean;
  /** A renewal was requested by the periodic trigger or the API. */
  renewRequested: boolean;
  /** At least one renewal run completed successfully. */
  renewed: boolean;
  lastRenewedAt: string | null;
  /** The fqdn setting at the last configuration evaluation; null before the first one. */
  previousFqdn: string | null;
  /** An fqdn whose configured request failed; it is not retried until an explicit trigger. */
  failedFqdn: string | null;
  /** Ports opened by this process when no port commands are configured, e.g. "80/tcp". */
  openedPorts: string[];
  pendingRequests: CertificateRequest[];
  status: WorkloadStatus | null;
}

/**
 * Configuration for the state module.
 */
export interface StateConfig {
  /** Directory holding state.json. */
  dataPath: string;
}

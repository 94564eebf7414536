/**
 * Configuration for the certificate module.
 */
export interface CertificateConfig {
  /** Executable of the ACME client. */
  binary: string;
  /** argv installing the client; empty skips installation. */
  installCommand: string[];
  /** Whether to issue against the ACME staging environment. */
  staging: boolean;
  /** Client configuration directory; certificates live under `live/<fqdn>`. */
  configDir: string;
  /** Diffie-Hellman parameter file installed after a registration pass. */
  dhparamSource: string;
}

/**
 * An issued certificate found in the client's live directory.
 */
export interface IssuedCertificate {
  /** Directory name under `live/`, the first name of the original request. */
  name: string;
  /** Names covered by the certificate. */
  domains: string[];
  issuedAt: Date;
  expiresAt: Date;
  daysUntilExpiry: number;
}

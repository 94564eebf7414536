/**
 * Configuration for the host module.
 */
export interface HostConfig {
  /** systemd unit of the web service that normally holds ports 80/443. */
  serviceName?: string;
  /** argv printing the opened ports, one `<port>/<proto>` entry per token. Empty: tracked in the state record. */
  portsListCommand: string[];
  /** argv opening a port; `<port>/tcp` is appended. Empty: tracked in the state record. */
  portOpenCommand: string[];
  /** Required os-release ID. Empty skips the platform check. */
  platformId: string;
  minPlatformVersion: string;
  osReleasePath: string;
}

/**
 * Result of the platform check.
 */
export interface PlatformCheck {
  supported: boolean;
  /** Human-readable platform name, as reported in the status. */
  description: string;
}

/**
 * Configuration type definition for type-safe access
 */
export interface StewardConfiguration {
  environment: string;
  dataPath: string;
  api: {
    host: string;
    port: number;
    apiKey: string;
  };
  domain: {
    fqdn: string;
    contactEmail: string;
  };
  client: {
    binary: string;
    installCommand: string[];
    staging: boolean;
    configDir: string;
    dhparamSource: string;
  };
  host: {
    serviceName?: string;
    portsListCommand: string[];
    portOpenCommand: string[];
    platformId: string;
    minPlatformVersion: string;
    osReleasePath: string;
  };
  renewal: {
    disabled: boolean;
    hours: number[];
  };
  lifecycle: {
    disabled: boolean;
    updateStatusInterval: number;
  };
  throttle: {
    ttl: number;
    limit: number;
  };
}

import { randomBytes } from 'crypto';
import { Logger } from '@nestjs/common';
import type { StewardConfiguration } from './config.types';

/**
 * Generate API Key
 *
 * Creates a random key for the local management API when none is configured.
 */
export function generateApiKey(): string {
  return randomBytes(32).toString('base64');
}

/* c8 ignore start */
/**
 * Log Configuration Summary
 *
 * Logs a summary of the loaded configuration for debugging purposes.
 * The API key is never printed.
 *
 * @param config - The complete configuration object
 */
export function logConfigurationSummary(config: StewardConfiguration): void {
  const summaryLogger = new Logger('Configuration');

  summaryLogger.log(`Environment: ${config.environment}`);
  summaryLogger.log(`Data path: ${config.dataPath}`);
  summaryLogger.log(`Management API: ${config.api.host}:${config.api.port}`);
  summaryLogger.log(`FQDN: ${config.domain.fqdn || 'not configured'}`);
  summaryLogger.log(`Contact email: ${config.domain.contactEmail || 'none (registering without email)'}`);
  summaryLogger.log(`Issuance client: ${config.client.binary}${config.client.staging ? ' (STAGING)' : ''}`);
  summaryLogger.log(`Certificate directory: ${config.client.configDir}`);
  summaryLogger.log(`Managed web service: ${config.host.serviceName ?? 'none'}`);
  summaryLogger.log(
    `Port tracking: ${config.host.portsListCommand.length > 0 ? config.host.portsListCommand.join(' ') : 'state record'}`,
  );

  if (config.renewal.disabled) {
    summaryLogger.log('Periodic renewal: disabled');
  } else {
    summaryLogger.log(`Periodic renewal: at hours ${config.renewal.hours.join(',')} (random minute)`);
  }

  if (config.lifecycle.disabled) {
    summaryLogger.log('Certificate management: disabled');
  }

  summaryLogger.log(`Status tick: every ${config.lifecycle.updateStatusInterval}ms`);
  summaryLogger.log('Configuration loaded successfully');
}
/* c8 ignore stop */

import { registerAs } from '@nestjs/config';
import * as process from 'process';
import { join } from 'path';
import { Logger } from '@nestjs/common';
import { readFileSync, writeFileSync, existsSync, mkdirSync } from 'fs';
import {
  DEFAULT_DATA_PATH,
  DEFAULT_API_HOST,
  DEFAULT_API_PORT,
  MIN_API_KEY_LENGTH,
  DEFAULT_CLIENT_BINARY,
  DEFAULT_CLIENT_INSTALL_COMMAND,
  DEFAULT_CONFIG_DIR,
  DEFAULT_PLATFORM_ID,
  DEFAULT_MIN_PLATFORM_VERSION,
  DEFAULT_OS_RELEASE_PATH,
  DEFAULT_RENEW_HOURS,
  DEFAULT_UPDATE_STATUS_INTERVAL,
  DEFAULT_THROTTLE_TTL,
  DEFAULT_THROTTLE_LIMIT,
} from './config/config.constants';
import {
  parseOptionalBoolean,
  parseNumberWithDefault,
  parseStringWithDefault,
  parseCommand,
  parseHourList,
} from './config/config.parsers';
import { isValidDomain, isValidEmail } from './config/config.validators';
import { generateApiKey } from './config/config.utils';
import type { StewardConfiguration } from './config/config.types';

const logger = new Logger('ConfigValidation');

/**
 * Build API Configuration
 *
 * Configures the local management API. The API never binds the ports the
 * issuance client needs.
 *
 * API Key Loading Strategy (in order of precedence):
 * 1. STEWARD_API_KEY environment variable
 * 2. Persisted key from ${STEWARD_DATA_PATH}/.api-key
 * 3. Auto-generate and persist a new key
 *
 * @throws {Error} If the key is shorter than 32 characters or cannot be persisted
 */
export function buildApiConfig(dataPath: string) {
  const apiKeyFilePath = join(dataPath, '.api-key');
  let apiKey = process.env.STEWARD_API_KEY?.trim();

  if (!apiKey && existsSync(apiKeyFilePath)) {
    const fileContent = readFileSync(apiKeyFilePath, 'utf-8').trim();
    if (fileContent.length >= MIN_API_KEY_LENGTH) {
      apiKey = fileContent;
      logger.log('Management API key loaded from file');
    }
  }

  if (!apiKey) {
    apiKey = generateApiKey();

    try {
      mkdirSync(dataPath, { recursive: true, mode: 0o700 });
      writeFileSync(apiKeyFilePath, apiKey, { mode: 0o600 });
    } catch (err) {
      const errorMessage = err instanceof Error ? err.message : String(err);
      throw new Error(
        `Cannot persist auto-generated API key to ${apiKeyFilePath}: ${errorMessage}. ` +
          'Set STEWARD_API_KEY explicitly (generate with: openssl rand -base64 32)',
      );
    }

    logger.warn(`Generated management API key; saved to ${apiKeyFilePath}`);
  }

  if (apiKey.length < MIN_API_KEY_LENGTH) {
    throw new Error(
      `STEWARD_API_KEY must be at least ${MIN_API_KEY_LENGTH} characters (current: ${apiKey.length}). ` +
        'Generate with: openssl rand -base64 32',
    );
  }

  return {
    host: parseStringWithDefault(process.env.STEWARD_API_HOST, DEFAULT_API_HOST),
    port: parseNumberWithDefault(process.env.STEWARD_API_PORT, DEFAULT_API_PORT),
    apiKey,
  };
}

/**
 * Build Domain Configuration
 *
 * The single-FQDN setting and its ACME contact address. Both are optional:
 * certificates may also be requested through the API.
 *
 * Optional environment variables:
 * - STEWARD_FQDN: Domain to obtain a certificate for
 * - STEWARD_CONTACT_EMAIL: ACME account contact (default: register without email)
 *
 * @throws {Error} If either value is malformed
 */
export function buildDomainConfig() {
  const fqdn = parseStringWithDefault(process.env.STEWARD_FQDN, '').trim().toLowerCase();
  const contactEmail = parseStringWithDefault(process.env.STEWARD_CONTACT_EMAIL, '').trim();

  if (fqdn && !isValidDomain(fqdn)) {
    throw new Error(`Invalid domain format in STEWARD_FQDN: ${fqdn}`);
  }

  if (contactEmail && !isValidEmail(contactEmail)) {
    throw new Error(`Invalid email address in STEWARD_CONTACT_EMAIL: ${contactEmail}`);
  }

  return { fqdn, contactEmail };
}

/**
 * Build Issuance Client Configuration
 *
 * Optional environment variables:
 * - STEWARD_CLIENT_BINARY: ACME client executable (default: certbot)
 * - STEWARD_CLIENT_INSTALL_COMMAND: Command installing the client (default: apt-get install -y certbot, empty to skip)
 * - STEWARD_CLIENT_STAGING: Issue against the ACME staging environment (default: false)
 * - STEWARD_CONFIG_DIR: Client configuration directory holding live/ (default: /etc/letsencrypt)
 * - STEWARD_DHPARAM_SOURCE: Diffie-Hellman parameters to install (default: packaged assets/dhparam.pem)
 */
export function buildClientConfig() {
  return {
    binary: parseStringWithDefault(process.env.STEWARD_CLIENT_BINARY, DEFAULT_CLIENT_BINARY),
    installCommand: parseCommand(process.env.STEWARD_CLIENT_INSTALL_COMMAND, DEFAULT_CLIENT_INSTALL_COMMAND),
    staging: parseOptionalBoolean(process.env.STEWARD_CLIENT_STAGING, false),
    configDir: parseStringWithDefault(process.env.STEWARD_CONFIG_DIR, DEFAULT_CONFIG_DIR),
    dhparamSource: parseStringWithDefault(
      process.env.STEWARD_DHPARAM_SOURCE,
      join(__dirname, '..', 'assets', 'dhparam.pem'),
    ),
  };
}

/**
 * Build Host Configuration
 *
 * Optional environment variables:
 * - STEWARD_SERVICE_NAME: systemd unit of the web service sharing ports 80/443 (default: none)
 * - STEWARD_PORTS_LIST_COMMAND: Command printing opened ports such as "80/tcp" (default: state record)
 * - STEWARD_PORT_OPEN_COMMAND: Command opening a port, invoked with "<port>/tcp" (default: state record)
 * - STEWARD_PLATFORM_ID: Required os-release ID, empty to skip the platform check (default: ubuntu)
 * - STEWARD_MIN_PLATFORM_VERSION: Minimum os-release VERSION_ID (default: 16.04)
 * - STEWARD_OS_RELEASE_PATH: os-release file (default: /etc/os-release)
 */
export function buildHostConfig() {
  const serviceName = process.env.STEWARD_SERVICE_NAME?.trim();

  return {
    serviceName: serviceName || undefined,
    portsListCommand: parseCommand(process.env.STEWARD_PORTS_LIST_COMMAND),
    portOpenCommand: parseCommand(process.env.STEWARD_PORT_OPEN_COMMAND),
    platformId: process.env.STEWARD_PLATFORM_ID ?? DEFAULT_PLATFORM_ID,
    minPlatformVersion: parseStringWithDefault(process.env.STEWARD_MIN_PLATFORM_VERSION, DEFAULT_MIN_PLATFORM_VERSION),
    osReleasePath: parseStringWithDefault(process.env.STEWARD_OS_RELEASE_PATH, DEFAULT_OS_RELEASE_PATH),
  };
}

/**
 * Register Config Steward
 */
export default registerAs('steward', (): StewardConfiguration => {
  const dataPath = parseStringWithDefault(process.env.STEWARD_DATA_PATH, DEFAULT_DATA_PATH);

  return {
    environment: parseStringWithDefault(process.env.NODE_ENV, 'production'),
    dataPath,
    api: buildApiConfig(dataPath),
    domain: buildDomainConfig(),
    client: buildClientConfig(),
    host: buildHostConfig(),
    renewal: {
      disabled: parseOptionalBoolean(process.env.STEWARD_RENEW_DISABLED, false),
      hours: parseHourList(process.env.STEWARD_RENEW_HOURS, DEFAULT_RENEW_HOURS),
    },
    lifecycle: {
      disabled: parseOptionalBoolean(process.env.STEWARD_DISABLED, false),
      updateStatusInterval: parseNumberWithDefault(
        process.env.STEWARD_UPDATE_STATUS_INTERVAL,
        DEFAULT_UPDATE_STATUS_INTERVAL,
      ),
    },
    throttle: {
      ttl: parseNumberWithDefault(process.env.STEWARD_THROTTLE_TTL, DEFAULT_THROTTLE_TTL),
      limit: parseNumberWithDefault(process.env.STEWARD_THROTTLE_LIMIT, DEFAULT_THROTTLE_LIMIT),
    },
  };
});

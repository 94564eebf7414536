import { Inject, Injectable, Logger } from '@nestjs/common';
import { promises as fs } from 'fs';
import { getErrorMessage } from '../shared/error.utils';
import { HOST_CONFIG } from './host.tokens';
import type { HostConfig, PlatformCheck } from './interfaces';

/**
 * Parses os-release(5) content into a key/value map. Quotes around values are removed.
 */
export function parseOsRelease(content: string): Record<string, string> {
  const fields: Record<string, string> = {};

  for (const line of content.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) {
      continue;
    }

    const separator = trimmed.indexOf('=');
    if (separator <= 0) {
      continue;
    }

    const key = trimmed.slice(0, separator);
    const value = trimmed.slice(separator + 1).replace(/^(["'])(.*)\1$/, '$2');
    fields[key] = value;
  }

  return fields;
}

/**
 * Compares dotted numeric versions ("16.04" < "18.04" < "18.10").
 * @returns A negative number, zero or a positive number
 */
export function compareVersions(left: string, right: string): number {
  const a = left.split('.').map((part) => parseInt(part, 10) || 0);
  const b = right.split('.').map((part) => parseInt(part, 10) || 0);

  for (let i = 0; i < Math.max(a.length, b.length); i++) {
    const difference = (a[i] ?? 0) - (b[i] ?? 0);
    if (difference !== 0) {
      return difference;
    }
  }

  return 0;
}

/**
 * Decides whether the host can run the issuance client.
 */
@Injectable()
export class PlatformService {
  private readonly logger = new Logger(PlatformService.name);

  constructor(@Inject(HOST_CONFIG) private readonly config: HostConfig) {}

  async check(): Promise<PlatformCheck> {
    if (!this.config.platformId) {
      return { supported: true, description: 'platform check disabled' };
    }

    let content: string;
    try {
      content = await fs.readFile(this.config.osReleasePath, 'utf-8');
    } catch (error) {
      this.logger.warn(`Cannot read ${this.config.osReleasePath}: ${getErrorMessage(error)}`);
      return { supported: false, description: 'unknown' };
    }

    const release = parseOsRelease(content);
    const id = release.ID ?? '';
    const version = release.VERSION_ID ?? '';
    const description = release.PRETTY_NAME || `${id} ${version}`.trim() || 'unknown';
    const supported =
      id === this.config.platformId &&
      version !== '' &&
      compareVersions(version, this.config.minPlatformVersion) >= 0;

    this.logger.log(`Platform ${description} is ${supported ? 'supported' : 'not supported'}`, {
      id,
      version,
      required: `${this.config.platformId} >= ${this.config.minPlatformVersion}`,
    });

    return { supported, description };
  }
}

import { Inject, Injectable, Logger } from '@nestjs/common';
import * as fs from 'fs';
import * as path from 'path';
import * as acme from 'acme-client';
import type { CertificateInfo } from 'acme-client';
import { getErrorMessage } from '../../shared/error.utils';
import { CERTIFICATE_CONFIG } from '../certificate.tokens';
import type { CertificateConfig, IssuedCertificate } from '../interfaces';

const LIVE_DIRECTORY = 'live';
const CERTIFICATE_FILE = 'cert.pem';
const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Read-only view of the certificates the client keeps under `<configDir>/live`.
 */
@Injectable()
export class CertificateInventoryService {
  private readonly logger = new Logger(CertificateInventoryService.name);

  constructor(@Inject(CERTIFICATE_CONFIG) private readonly config: CertificateConfig) {}

  certificateDirectory(fqdn: string): string {
    return path.join(this.config.configDir, LIVE_DIRECTORY, fqdn);
  }

  /**
   * True when the client already holds a certificate directory for `fqdn`.
   */
  hasCertificate(fqdn: string): boolean {
    try {
      return fs.statSync(this.certificateDirectory(fqdn)).isDirectory();
    } catch {
      return false;
    }
  }

  /**
   * Lists issued certificates with their validity. Unreadable entries are skipped.
   */
  async list(): Promise<IssuedCertificate[]> {
    const liveDirectory = path.join(this.config.configDir, LIVE_DIRECTORY);

    if (!fs.existsSync(liveDirectory)) {
      return [];
    }

    const entries = fs
      .readdirSync(liveDirectory, { withFileTypes: true })
      .filter((entry) => entry.isDirectory())
      .map((entry) => entry.name)
      .sort();

    const certificates: IssuedCertificate[] = [];

    for (const name of entries) {
      const certPath = path.join(liveDirectory, name, CERTIFICATE_FILE);
      if (!fs.existsSync(certPath)) {
        continue;
      }

      try {
        const info: CertificateInfo = await acme.forge.readCertificateInfo(fs.readFileSync(certPath));
        certificates.push({
          name,
          domains: [...new Set([info.domains.commonName, ...(info.domains.altNames ?? [])])].filter(Boolean),
          issuedAt: info.notBefore,
          expiresAt: info.notAfter,
          daysUntilExpiry: Math.floor((info.notAfter.getTime() - Date.now()) / DAY_MS),
        });
      } catch (error) {
        this.logger.warn(`Could not read certificate ${certPath}: ${getErrorMessage(error)}`);
      }
    }

    return certificates;
  }
}

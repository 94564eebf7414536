import { Injectable, Logger } from '@nestjs/common';
import { getErrorMessage } from '../../shared/error.utils';
import type { CommandResult } from '../../shared/command-runner.service';
import { PortCoordinatorService } from '../../host/port-coordinator.service';
import { RequestStoreService } from '../../state/request-store.service';
import { StatusService } from '../../state/status.service';
import type { CertificateRequest } from '../../state/interfaces';
import { CertbotClientService } from '../client/certbot-client.service';
import { CertificateInventoryService } from '../storage/certificate-inventory.service';

/**
 * Processes certificate requests strictly in order.
 *
 * A request whose names already have a certificate directory is considered
 * satisfied. Every other request gets exactly one issuance attempt with the
 * web service yielded; the first failure stops the batch.
 */
@Injectable()
export class IssuanceService {
  private readonly logger = new Logger(IssuanceService.name);

  constructor(
    private readonly certbot: CertbotClientService,
    private readonly inventory: CertificateInventoryService,
    private readonly portCoordinator: PortCoordinatorService,
    private readonly requestStore: RequestStoreService,
    private readonly statusService: StatusService,
  ) {}

  /**
   * @returns false as soon as one attempt fails; requests after it stay pending.
   */
  async createCertificates(requests: readonly CertificateRequest[]): Promise<boolean> {
    for (const request of requests) {
      const existing = request.fqdns.find((fqdn) => this.inventory.hasCertificate(fqdn));

      if (existing) {
        this.logger.log(`Certificate for ${existing} already exists; skipping request`, {
          id: request.id,
          fqdns: request.fqdns,
        });
        this.requestStore.consume(request.id);
        continue;
      }

      const result = await this.attempt(request);

      if (result.exitCode !== 0) {
        this.statusService.blocked(`letsencrypt registration failed: \n${result.output}`);
        return false;
      }

      this.statusService.active(`registered ${request.fqdns.join(', ')}`);
    }

    return true;
  }

  private async attempt(request: CertificateRequest): Promise<CommandResult> {
    this.logger.log(`Requesting certificate for ${request.fqdns.join(', ')}`, { id: request.id });

    try {
      return await this.portCoordinator.withServiceYielded(() => this.certbot.certonly(request));
    } catch (error) {
      // The client never ran (or the service could not be controlled)
      return { exitCode: -1, output: getErrorMessage(error) };
    } finally {
      this.requestStore.consume(request.id);
    }
  }
}

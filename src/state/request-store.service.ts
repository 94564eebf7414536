import { Injectable, Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { StateStoreService } from './state-store.service';
import type { CertificateRequest, RequestSource } from './interfaces';

/**
 * Durable queue of pending certificate requests and the registration flag.
 *
 * Appending is additive: the same names may be queued more than once. The
 * issuance engine resolves duplicates through its existing-certificate check.
 */
@Injectable()
export class RequestStoreService {
  private readonly logger = new Logger(RequestStoreService.name);

  constructor(private readonly stateStore: StateStoreService) {}

  pendingRequests(): CertificateRequest[] {
    return this.stateStore.snapshot().pendingRequests;
  }

  /**
   * Queues a request for one certificate covering `fqdns`.
   * @throws {Error} If `fqdns` is empty or names a domain twice
   */
  append(fqdns: readonly string[], contactEmail: string | undefined, source: RequestSource): CertificateRequest {
    const names = fqdns.map((fqdn) => fqdn.trim().toLowerCase());

    if (names.length === 0 || names.some((name) => name.length === 0)) {
      throw new Error('A certificate request needs at least one domain name');
    }

    if (new Set(names).size !== names.length) {
      throw new Error(`Duplicate domain names in certificate request: ${names.join(', ')}`);
    }

    const request: CertificateRequest = {
      id: randomUUID(),
      fqdns: names,
      contactEmail: contactEmail?.trim() || undefined,
      source,
      createdAt: new Date().toISOString(),
    };

    this.stateStore.update((state) => {
      state.pendingRequests.push(request);
    });

    this.logger.log('Certificate request queued', { id: request.id, fqdns: request.fqdns, source });
    return request;
  }

  /**
   * Queues the request derived from the single-FQDN setting.
   */
  appendFromConfig(fqdn: string, contactEmail: string): CertificateRequest {
    return this.append([fqdn], contactEmail, 'config');
  }

  /**
   * Removes a request from the queue once an issuance attempt was made for it.
   */
  consume(id: string): void {
    this.stateStore.update((state) => {
      state.pendingRequests = state.pendingRequests.filter((request) => request.id !== id);
    });
  }

  isRegistered(): boolean {
    return this.stateStore.snapshot().registered;
  }

  setRegistered(registered: boolean): void {
    this.stateStore.update((state) => {
      state.registered = registered;
    });
  }
}

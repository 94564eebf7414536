import { Inject, Injectable, Logger } from '@nestjs/common';
import { HostPortsService, formatPort } from './host-ports.service';
import { ServiceControlService } from './service-control.service';
import { HOST_CONFIG } from './host.tokens';
import type { HostConfig } from './interfaces';
import { STANDALONE_PORTS } from '../config/config.constants';

/**
 * Coordinates ports 80/443 between the web service and the issuance client.
 */
@Injectable()
export class PortCoordinatorService {
  private readonly logger = new Logger(PortCoordinatorService.name);

  constructor(
    @Inject(HOST_CONFIG) private readonly config: HostConfig,
    private readonly hostPorts: HostPortsService,
    private readonly serviceControl: ServiceControlService,
  ) {}

  /**
   * True when port 80 or 443 is open on the host. Never opens anything.
   */
  async ensurePortsAvailable(): Promise<boolean> {
    const opened = await this.hostPorts.listOpenedPorts();
    const available = STANDALONE_PORTS.some((port) => opened.includes(formatPort(port)));

    if (!available) {
      this.logger.warn('Neither 80/tcp nor 443/tcp is open', { opened });
    }

    return available;
  }

  async openStandingPorts(): Promise<void> {
    for (const port of STANDALONE_PORTS) {
      await this.hostPorts.open(port);
    }
  }

  /**
   * Runs `fn` with the web service stopped, then starts it again if it was
   * running before. The restart happens on every exit path, a failed stop included.
   */
  async withServiceYielded<T>(fn: () => Promise<T>): Promise<T> {
    const serviceName = this.config.serviceName;

    if (!serviceName) {
      return fn();
    }

    const wasRunning = await this.serviceControl.isRunning(serviceName);

    try {
      if (wasRunning) {
        await this.serviceControl.stop(serviceName);
      }
      return await fn();
    } finally {
      if (wasRunning) {
        await this.serviceControl.start(serviceName);
      }
    }
  }
}

import { Inject, Injectable, Logger } from '@nestjs/common';
import { CommandRunnerService } from '../shared/command-runner.service';
import { StateStoreService } from '../state/state-store.service';
import { HOST_CONFIG } from './host.tokens';
import type { HostConfig } from './interfaces';

const PORT_ENTRY = /^\d+\/(tcp|udp)$/;

export function formatPort(port: number): string {
  return `${port}/tcp`;
}

/**
 * Extracts `<port>/<proto>` entries from the output of the ports list command.
 */
export function parsePortList(output: string): string[] {
  return output
    .split(/[\s,]+/)
    .map((token) => token.trim())
    .filter((token) => PORT_ENTRY.test(token));
}

/**
 * The host's set of opened ports.
 *
 * When no commands are configured the set lives in the state record, so
 * opening is a bookkeeping step and the set survives restarts.
 */
@Injectable()
export class HostPortsService {
  private readonly logger = new Logger(HostPortsService.name);

  constructor(
    @Inject(HOST_CONFIG) private readonly config: HostConfig,
    private readonly commandRunner: CommandRunnerService,
    private readonly stateStore: StateStoreService,
  ) {}

  /**
   * Reads the opened-port set fresh.
   * @throws {Error} If the ports list command fails
   */
  async listOpenedPorts(): Promise<string[]> {
    const [command, ...args] = this.config.portsListCommand;

    if (!command) {
      return this.stateStore.snapshot().openedPorts;
    }

    const result = await this.commandRunner.run(command, args);
    if (result.exitCode !== 0) {
      throw new Error(`Listing opened ports failed with code ${result.exitCode}: ${result.output.trim()}`);
    }

    return parsePortList(result.output);
  }

  /**
   * @throws {Error} If the port open command fails
   */
  async open(port: number): Promise<void> {
    const entry = formatPort(port);
    const [command, ...args] = this.config.portOpenCommand;

    if (!command) {
      this.stateStore.update((state) => {
        if (!state.openedPorts.includes(entry)) {
          state.openedPorts.push(entry);
        }
      });
      this.logger.log(`Port ${entry} marked as opened`);
      return;
    }

    const result = await this.commandRunner.run(command, [...args, entry]);
    if (result.exitCode !== 0) {
      throw new Error(`Opening port ${entry} failed with code ${result.exitCode}: ${result.output.trim()}`);
    }

    this.logger.log(`Port ${entry} opened`);
  }
}

import { Injectable, Logger } from '@nestjs/common';
import { CommandRunnerService } from '../shared/command-runner.service';

const SYSTEMCTL = 'systemctl';

/**
 * Starts and stops systemd units.
 */
@Injectable()
export class ServiceControlService {
  private readonly logger = new Logger(ServiceControlService.name);

  constructor(private readonly commandRunner: CommandRunnerService) {}

  async isRunning(name: string): Promise<boolean> {
    const result = await this.commandRunner.run(SYSTEMCTL, ['is-active', '--quiet', name]);
    return result.exitCode === 0;
  }

  /**
   * @throws {Error} If systemctl reports a failure
   */
  async stop(name: string): Promise<void> {
    this.logger.log(`Stopping service ${name}`);
    await this.control('stop', name);
  }

  /**
   * @throws {Error} If systemctl reports a failure
   */
  async start(name: string): Promise<void> {
    this.logger.log(`Starting service ${name}`);
    await this.control('start', name);
  }

  private async control(action: 'start' | 'stop', name: string): Promise<void> {
    const result = await this.commandRunner.run(SYSTEMCTL, [action, name]);

    if (result.exitCode !== 0) {
      throw new Error(`systemctl ${action} ${name} exited with code ${result.exitCode}: ${result.output.trim()}`);
    }
  }
}

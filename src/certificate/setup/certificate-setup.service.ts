import { Inject, Injectable, Logger } from '@nestjs/common';
import { promises as fs } from 'fs';
import * as path from 'path';
import { CommandRunnerService } from '../../shared/command-runner.service';
import { CERTIFICATE_CONFIG } from '../certificate.tokens';
import type { CertificateConfig } from '../interfaces';

const DHPARAM_FILE = 'dhparam.pem';

/**
 * Host preparation for the issuance client.
 */
@Injectable()
export class CertificateSetupService {
  private readonly logger = new Logger(CertificateSetupService.name);

  constructor(
    @Inject(CERTIFICATE_CONFIG) private readonly config: CertificateConfig,
    private readonly commandRunner: CommandRunnerService,
  ) {}

  /**
   * Runs the configured install command.
   * @throws {Error} If the command exits with a non-zero code
   */
  async installClient(): Promise<void> {
    const [command, ...args] = this.config.installCommand;

    if (!command) {
      this.logger.log('No client install command configured; assuming the client is present');
      return;
    }

    this.logger.log(`Installing issuance client: ${this.config.installCommand.join(' ')}`);
    const result = await this.commandRunner.run(command, args);

    if (result.exitCode !== 0) {
      throw new Error(`Client installation exited with code ${result.exitCode}: ${result.output.trim()}`);
    }
  }

  /**
   * Copies the Diffie-Hellman parameters next to the client's certificates.
   * @returns The installed file path.
   */
  async installDhParams(): Promise<string> {
    const target = path.join(this.config.configDir, DHPARAM_FILE);

    await fs.mkdir(this.config.configDir, { recursive: true });
    await fs.copyFile(this.config.dhparamSource, target);

    this.logger.log(`Diffie-Hellman parameters installed at ${target}`);
    return target;
  }
}

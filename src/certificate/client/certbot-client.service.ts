import { Inject, Injectable, Logger } from '@nestjs/common';
import { CommandRunnerService } from '../../shared/command-runner.service';
import type { CommandResult } from '../../shared/command-runner.service';
import type { CertificateRequest } from '../../state/interfaces';
import { CERTIFICATE_CONFIG } from '../certificate.tokens';
import type { CertificateConfig } from '../interfaces';
import { DEFAULT_CONFIG_DIR } from '../../config/config.constants';

/** Printed by `renew` when no certificate is due. */
export const NOTHING_DUE_MARKER = 'No renewals were attempted.';

/**
 * Drives the certbot command line.
 *
 * Every method resolves with the exit code and combined output of the run;
 * interpreting them is up to the caller.
 */
@Injectable()
export class CertbotClientService {
  private readonly logger = new Logger(CertbotClientService.name);

  constructor(
    @Inject(CERTIFICATE_CONFIG) private readonly config: CertificateConfig,
    private readonly commandRunner: CommandRunnerService,
  ) {}

  /**
   * Arguments of a standalone issuance for one request.
   */
  buildCertonlyArgs(request: Pick<CertificateRequest, 'fqdns' | 'contactEmail'>): string[] {
    const args = ['certonly', '--standalone', '--agree-tos', '--non-interactive'];

    for (const fqdn of request.fqdns) {
      args.push('-d', fqdn);
    }

    if (request.contactEmail) {
      args.push('--email', request.contactEmail);
    } else {
      args.push('--register-unsafely-without-email');
    }

    return [...args, ...this.commonArgs()];
  }

  buildRenewArgs(): string[] {
    return ['renew', '--agree-tos', ...this.commonArgs()];
  }

  async certonly(request: Pick<CertificateRequest, 'fqdns' | 'contactEmail'>): Promise<CommandResult> {
    return this.execute(this.buildCertonlyArgs(request));
  }

  async renew(): Promise<CommandResult> {
    return this.execute(this.buildRenewArgs());
  }

  isNothingDue(output: string): boolean {
    return output.includes(NOTHING_DUE_MARKER);
  }

  private commonArgs(): string[] {
    const args: string[] = [];

    if (this.config.staging) {
      args.push('--staging');
    }

    if (this.config.configDir !== DEFAULT_CONFIG_DIR) {
      args.push('--config-dir', this.config.configDir);
    }

    return args;
  }

  private async execute(args: string[]): Promise<CommandResult> {
    const result = await this.commandRunner.run(this.config.binary, args);

    // Client output belongs in the daemon's log
    this.logger.log(`${this.config.binary} ${args[0]} exited with code ${result.exitCode}`);
    if (result.output.trim()) {
      this.logger.log(result.output.trimEnd());
    }

    return result;
  }
}

import { Injectable, Logger } from '@nestjs/common';
import { spawn } from 'child_process';

/**
 * Outcome of an external program run.
 */
export interface CommandResult {
  /** Process exit code; -1 when the process was terminated by a signal. */
  exitCode: number;
  /** Interleaved stdout and stderr, decoded as UTF-8. */
  output: string;
}

/**
 * Runs external programs without a shell and captures their combined output.
 *
 * A non-zero exit code is reported in the result, not thrown. The returned
 * promise only rejects when the program cannot be started at all (for
 * example ENOENT for a missing binary).
 */
@Injectable()
export class CommandRunnerService {
  private readonly logger = new Logger(CommandRunnerService.name);

  run(command: string, args: readonly string[] = []): Promise<CommandResult> {
    this.logger.debug(`Running ${[command, ...args].join(' ')}`);

    return new Promise<CommandResult>((resolve, reject) => {
      const chunks: Buffer[] = [];
      const child = spawn(command, [...args], { stdio: ['ignore', 'pipe', 'pipe'] });

      child.stdout.on('data', (chunk: Buffer) => chunks.push(chunk));
      child.stderr.on('data', (chunk: Buffer) => chunks.push(chunk));

      child.once('error', (error) => {
        reject(new Error(`Failed to start ${command}: ${error.message}`));
      });

      child.once('close', (code) => {
        resolve({
          exitCode: code ?? -1,
          output: Buffer.concat(chunks).toString('utf-8'),
        });
      });
    });
  }
}

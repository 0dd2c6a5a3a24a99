import { Injectable, Logger } from '@nestjs/common';
import { execFile } from 'child_process';
import type { ExecFileException } from 'child_process';

export interface CommandOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface CommandResult {
  /** Process exit code; null when it never ran or was killed. */
  exitCode: number | null;
  /** stdout followed by stderr. */
  output: string;
  timedOut: boolean;
  aborted: boolean;
}

const MAX_OUTPUT_BYTES = 4 * 1024 * 1024;

/**
 * Runs external programs without a shell. Never rejects on a failing command;
 * callers inspect the result.
 */
@Injectable()
export class CommandRunnerService {
  private readonly logger = new Logger(CommandRunnerService.name);

  run(argv: readonly string[], options: CommandOptions): Promise<CommandResult> {
    const [file, ...args] = argv;
    if (!file) {
      return Promise.resolve({ exitCode: null, output: 'empty command', timedOut: false, aborted: false });
    }

    this.logger.debug(`Running ${argv.join(' ')}`);

    return new Promise((resolve) => {
      execFile(
        file,
        args,
        { timeout: options.timeoutMs, signal: options.signal, maxBuffer: MAX_OUTPUT_BYTES, killSignal: 'SIGTERM' },
        (error: ExecFileException | null, stdout: string, stderr: string) => {
          const output = [stdout, stderr].filter((chunk) => chunk.length > 0).join('\n');

          if (!error) {
            resolve({ exitCode: 0, output, timedOut: false, aborted: false });
            return;
          }

          const aborted = error.name === 'AbortError' || options.signal?.aborted === true;
          const timedOut = !aborted && error.killed === true && error.signal === 'SIGTERM';
          const exitCode = typeof error.code === 'number' ? error.code : null;

          resolve({
            exitCode,
            output: output || error.message,
            timedOut,
            aborted,
          });
        },
      );
    });
  }
}

import { Logger } from '@nestjs/common';
import * as fs from 'fs';
import * as path from 'path';
import type { CommandRunnerService } from '../shared/command-runner.service';
import { atomicSymlinkSync, atomicWriteFileSync } from '../shared/fs.utils';
import { getErrorMessage, hasErrorCode } from '../shared/error.utils';
import type { ManagedService, ManagedServiceDefinition, ReloadTarget, RenderHandle, ServicesConfig } from './interfaces';
import { probePort } from './port-probe';
import { renderTemplate } from './render-template';

const DEFAULT_HOST = '127.0.0.1';
const DEFAULT_FILE_MODE = 0o644;

type Restore = () => void;

/**
 * A managed service driven entirely by its definition: templated config
 * snippets and symlinks, argv lists for validate and reload, and process and
 * port checks for liveness.
 */
export class CommandManagedService implements ManagedService {
  private readonly logger: Logger;

  constructor(
    private readonly definition: ManagedServiceDefinition,
    private readonly commandRunner: CommandRunnerService,
    private readonly config: ServicesConfig,
  ) {
    this.logger = new Logger(`${CommandManagedService.name}:${definition.name}`);
  }

  get name(): string {
    return this.definition.name;
  }

  async renderConfig(target: ReloadTarget): Promise<RenderHandle> {
    const values = templateValues(target);
    const restores: Restore[] = [];
    const paths: string[] = [];

    try {
      for (const entry of this.definition.render) {
        const entryPath = renderTemplate(entry.path, values);
        const restore = snapshot(entryPath);
        fs.mkdirSync(path.dirname(entryPath), { recursive: true });

        if (entry.kind === 'file') {
          const mode = entry.mode === undefined ? DEFAULT_FILE_MODE : parseInt(entry.mode, 8);
          atomicWriteFileSync(entryPath, renderTemplate(entry.template, values), mode);
        } else {
          atomicSymlinkSync(renderTemplate(entry.target, values), entryPath);
        }

        restores.push(restore);
        paths.push(entryPath);
      }
    } catch (error) {
      try {
        this.restoreAll(restores);
      } catch (rollbackError) {
        this.logger.error(`Partial render for ${target.domain} not fully undone: ${getErrorMessage(rollbackError)}`);
      }
      throw error;
    }

    this.logger.debug(`Rendered ${paths.length} config entries for ${target.domain}`);

    return {
      paths,
      rollback: async () => {
        this.restoreAll(restores);
        this.logger.log(`Rolled back config for ${target.domain}`);
      },
    };
  }

  async validateConfig(): Promise<void> {
    await this.runAll(this.definition.validate, 'Config check');
  }

  async reload(): Promise<void> {
    await this.runAll(this.definition.reload, 'Reload');
  }

  async probe(): Promise<void> {
    for (const processName of this.definition.processes) {
      const result = await this.commandRunner.run(['pgrep', '-x', processName], {
        timeoutMs: this.config.commandTimeoutMs,
      });
      if (result.exitCode !== 0) {
        throw new Error(`Process ${processName} is not running`);
      }
    }

    const host = this.definition.host ?? DEFAULT_HOST;
    for (const port of this.definition.ports) {
      if (!(await probePort(host, port, this.config.probeTimeoutMs))) {
        throw new Error(`Port ${host}:${port} is not accepting connections`);
      }
    }

    for (const port of this.definition.optionalPorts ?? []) {
      if (!(await probePort(host, port, this.config.probeTimeoutMs))) {
        this.logger.warn(`Optional port ${host}:${port} is not accepting connections`);
      }
    }
  }

  private async runAll(commands: string[][], label: string): Promise<void> {
    for (const argv of commands) {
      const result = await this.commandRunner.run(argv, { timeoutMs: this.config.commandTimeoutMs });
      if (result.timedOut) {
        throw new Error(`${label} "${argv.join(' ')}" timed out after ${this.config.commandTimeoutMs}ms`);
      }
      if (result.exitCode !== 0) {
        throw new Error(`${label} "${argv.join(' ')}" failed (exit code ${result.exitCode ?? 'none'}): ${result.output.trim()}`);
      }
    }
  }

  /**
   * Restores entries newest first. Every entry is attempted even if an
   * earlier one fails.
   */
  private restoreAll(restores: Restore[]): void {
    const failures: string[] = [];
    for (const restore of [...restores].reverse()) {
      try {
        restore();
      } catch (error) {
        failures.push(getErrorMessage(error));
      }
    }
    restores.length = 0;

    if (failures.length > 0) {
      throw new Error(`Config rollback incomplete: ${failures.join('; ')}`);
    }
  }
}

function templateValues(target: ReloadTarget): Record<string, string> {
  const fullchainPath = target.fullchainPath ?? target.certificatePath;
  return {
    domain: target.domain,
    certificateId: String(target.certificateId),
    certificatePath: target.certificatePath,
    privateKeyPath: target.privateKeyPath,
    chainPath: target.chainPath ?? fullchainPath,
    fullchainPath,
  };
}

/**
 * Captures what currently sits at `entryPath` and returns a function that
 * puts it back.
 */
function snapshot(entryPath: string): Restore {
  let stats: fs.Stats;
  try {
    stats = fs.lstatSync(entryPath);
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) {
      return () => fs.rmSync(entryPath, { force: true });
    }
    throw error;
  }

  if (stats.isSymbolicLink()) {
    const previousTarget = fs.readlinkSync(entryPath);
    return () => atomicSymlinkSync(previousTarget, entryPath);
  }

  if (stats.isFile()) {
    const previousContent = fs.readFileSync(entryPath);
    const previousMode = stats.mode & 0o777;
    return () => atomicWriteFileSync(entryPath, previousContent, previousMode);
  }

  throw new Error(`Refusing to replace ${entryPath}: not a regular file or symlink`);
}

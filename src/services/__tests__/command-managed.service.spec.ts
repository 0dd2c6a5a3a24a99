import * as fs from 'fs';
import { createServer } from 'net';
import type { Server } from 'net';
import * as path from 'path';
import { CommandManagedService } from '../command-managed.service';
import type { ManagedServiceDefinition, ReloadTarget, ServicesConfig } from '../interfaces';
import { silenceNestLogger } from '../../../test/helpers/silence-logger';
import { FakeCommandRunner, commandResult, createTempDir, removeTempDir } from '../../../test/helpers/certificates';

const config: ServicesConfig = {
  definitionsPath: 'unused.json',
  enabled: ['mail'],
  commandTimeoutMs: 1000,
  probeTimeoutMs: 500,
};

function listen(): Promise<Server> {
  return new Promise((resolve) => {
    const server = createServer((socket) => socket.destroy());
    server.listen(0, '127.0.0.1', () => resolve(server));
  });
}

function close(server: Server): Promise<void> {
  return new Promise((resolve) => server.close(() => resolve()));
}

function portOf(server: Server): number {
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('server is not listening on a TCP port');
  }
  return address.port;
}

describe('CommandManagedService', () => {
  let directory: string;
  let runner: FakeCommandRunner;
  let target: ReloadTarget;
  let restoreLogger: () => void;

  const createService = (overrides: Partial<ManagedServiceDefinition> = {}): CommandManagedService =>
    new CommandManagedService(
      {
        name: 'mail',
        render: [
          {
            kind: 'file',
            path: path.join(directory, 'conf', '{{domain}}.conf'),
            template: 'cert {{certificateId}} {{fullchainPath}}\nkey {{privateKeyPath}}\n',
            mode: '640',
          },
          { kind: 'link', path: path.join(directory, 'key.pem'), target: '{{privateKeyPath}}' },
        ],
        validate: [['mailctl', 'check'], ['smtpctl', 'check']],
        reload: [['mailctl', 'reload']],
        processes: [],
        ports: [],
        ...overrides,
      },
      runner,
      config,
    );

  beforeEach(() => {
    restoreLogger = silenceNestLogger();
    directory = createTempDir('certd-render-');
    runner = new FakeCommandRunner();
    target = {
      domain: 'test.local',
      certificateId: 7,
      certificatePath: '/certs/cert.pem',
      privateKeyPath: '/certs/privkey.pem',
      fullchainPath: '/certs/fullchain.pem',
    };
  });

  afterEach(() => {
    removeTempDir(directory);
    restoreLogger();
  });

  describe('renderConfig', () => {
    it('should write templated files and symlinks', async () => {
      const handle = await createService().renderConfig(target);

      const configPath = path.join(directory, 'conf', 'test.local.conf');
      expect(handle.paths).toEqual([configPath, path.join(directory, 'key.pem')]);
      expect(fs.readFileSync(configPath, 'utf-8')).toBe('cert 7 /certs/fullchain.pem\nkey /certs/privkey.pem\n');
      expect(fs.statSync(configPath).mode & 0o777).toBe(0o640);
      expect(fs.readlinkSync(path.join(directory, 'key.pem'))).toBe('/certs/privkey.pem');
    });

    it('should restore what was there before on rollback', async () => {
      const configPath = path.join(directory, 'conf', 'test.local.conf');
      fs.mkdirSync(path.dirname(configPath));
      fs.writeFileSync(configPath, 'previous config\n');
      fs.symlinkSync('/old/privkey.pem', path.join(directory, 'key.pem'));

      const handle = await createService().renderConfig(target);
      await handle.rollback();

      expect(fs.readFileSync(configPath, 'utf-8')).toBe('previous config\n');
      expect(fs.readlinkSync(path.join(directory, 'key.pem'))).toBe('/old/privkey.pem');
    });

    it('should remove entries that did not exist before on rollback', async () => {
      const handle = await createService().renderConfig(target);
      await handle.rollback();

      expect(fs.existsSync(path.join(directory, 'conf', 'test.local.conf'))).toBe(false);
      expect(fs.existsSync(path.join(directory, 'key.pem'))).toBe(false);
    });

    it('should undo earlier entries when a later one cannot be written', async () => {
      fs.mkdirSync(path.join(directory, 'key.pem'));

      await expect(createService().renderConfig(target)).rejects.toThrow(
        `Refusing to replace ${path.join(directory, 'key.pem')}: not a regular file or symlink`,
      );
      expect(fs.existsSync(path.join(directory, 'conf', 'test.local.conf'))).toBe(false);
    });
  });

  describe('validateConfig and reload', () => {
    it('should run every validate command in order', async () => {
      await createService().validateConfig();

      expect(runner.calls).toEqual([
        ['mailctl', 'check'],
        ['smtpctl', 'check'],
      ]);
    });

    it('should stop at the first failing command', async () => {
      runner.respondWith((argv) => (argv[0] === 'mailctl' ? commandResult({ exitCode: 2, output: 'bad config\n' }) : commandResult()));

      await expect(createService().validateConfig()).rejects.toThrow('Config check "mailctl check" failed (exit code 2): bad config');
      expect(runner.calls).toHaveLength(1);
    });

    it('should report a timed out reload', async () => {
      runner.respondWith(() => commandResult({ exitCode: null, timedOut: true }));

      await expect(createService().reload()).rejects.toThrow('Reload "mailctl reload" timed out after 1000ms');
    });
  });

  describe('probe', () => {
    let server: Server;

    beforeEach(async () => {
      server = await listen();
    });

    afterEach(async () => {
      if (server.listening) {
        await close(server);
      }
    });

    it('should pass when processes run and ports accept connections', async () => {
      const service = createService({ processes: ['maild'], ports: [portOf(server)] });

      await expect(service.probe()).resolves.toBeUndefined();
      expect(runner.calls).toEqual([['pgrep', '-x', 'maild']]);
    });

    it('should fail when a process is not running', async () => {
      runner.respondWith(() => commandResult({ exitCode: 1 }));

      await expect(createService({ processes: ['maild'] }).probe()).rejects.toThrow('Process maild is not running');
    });

    it('should fail on a closed required port but only warn on a closed optional one', async () => {
      const port = portOf(server);
      const open = await listen();
      const openPort = portOf(open);
      await close(server);

      try {
        await expect(createService({ ports: [port] }).probe()).rejects.toThrow(
          `Port 127.0.0.1:${port} is not accepting connections`,
        );
        await expect(createService({ ports: [openPort], optionalPorts: [port] }).probe()).resolves.toBeUndefined();
      } finally {
        await close(open);
      }
    });
  });
});

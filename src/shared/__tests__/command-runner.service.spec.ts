import { CommandRunnerService } from '../command-runner.service';

describe('CommandRunnerService', () => {
  const runner = new CommandRunnerService();

  it('should report a successful command with its output', async () => {
    const result = await runner.run(['sh', '-c', 'echo out; echo err >&2'], { timeoutMs: 5000 });

    expect(result).toEqual({ exitCode: 0, output: 'out\n\nerr\n', timedOut: false, aborted: false });
  });

  it('should resolve with the exit code of a failing command', async () => {
    const result = await runner.run(['sh', '-c', 'echo broken >&2; exit 3'], { timeoutMs: 5000 });

    expect(result).toEqual({ exitCode: 3, output: 'broken\n', timedOut: false, aborted: false });
  });

  it('should mark a command killed by the timeout', async () => {
    const result = await runner.run(['sleep', '5'], { timeoutMs: 50 });

    expect(result.timedOut).toBe(true);
    expect(result.exitCode).toBeNull();
  });

  it('should mark an aborted command', async () => {
    const controller = new AbortController();
    const pending = runner.run(['sleep', '5'], { timeoutMs: 5000, signal: controller.signal });
    controller.abort();

    const result = await pending;

    expect(result.aborted).toBe(true);
    expect(result.timedOut).toBe(false);
  });

  it('should not reject when the executable does not exist', async () => {
    const result = await runner.run(['/nonexistent/certd-tool'], { timeoutMs: 1000 });

    expect(result.exitCode).toBeNull();
    expect(result.output).toMatch(/ENOENT/);
  });

  it('should not spawn anything for an empty argv', async () => {
    await expect(runner.run([], { timeoutMs: 1000 })).resolves.toEqual({
      exitCode: null,
      output: 'empty command',
      timedOut: false,
      aborted: false,
    });
  });
});

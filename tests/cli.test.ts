import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from 'vitest';

type RunCommand = typeof import('../src/pipeline-runner.js').runCaptureCommand;

describe('bookmark-pdf CLI', () => {
  const originalArgv = process.argv;
  let runCaptureCommand: Mock<RunCommand>;
  let listeners: { SIGINT: NodeJS.SignalsListener[]; SIGTERM: NodeJS.SignalsListener[] };

  let killActiveRenders: Mock<() => number>;

  async function startCli(...args: string[]) {
    vi.resetModules();
    vi.doMock('../src/pipeline-runner.js', async (importOriginal) => ({
      ...(await importOriginal<typeof import('../src/pipeline-runner.js')>()),
      runCaptureCommand,
    }));
    vi.doMock('../src/integrations/chrome-runner.js', async (importOriginal) => ({
      ...(await importOriginal<typeof import('../src/integrations/chrome-runner.js')>()),
      killActiveRenders,
    }));

    const exitSpy = vi.spyOn(process, 'exit').mockImplementation(() => {
      return undefined as never;
    });
    process.argv = ['node', 'bookmark-pdf', ...args];

    await import('../src/cli.js');
    return exitSpy;
  }

  async function runCli(...args: string[]) {
    const exitSpy = await startCli(...args);
    await vi.waitFor(() => expect(exitSpy).toHaveBeenCalled());
    return exitSpy;
  }

  /** Deliver a signal to the handlers the CLI registered */
  function sendSignal(signal: 'SIGINT' | 'SIGTERM') {
    for (const listener of process.listeners(signal)) {
      if (!listeners[signal].includes(listener)) listener(signal);
    }
  }

  beforeEach(() => {
    runCaptureCommand = vi.fn<RunCommand>(async () => ({ exitCode: 0, summary: null }));
    killActiveRenders = vi.fn(() => 0);
    listeners = { SIGINT: process.listeners('SIGINT'), SIGTERM: process.listeners('SIGTERM') };
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    for (const signal of ['SIGINT', 'SIGTERM'] as const) {
      for (const listener of process.listeners(signal)) {
        if (!listeners[signal].includes(listener)) process.off(signal, listener);
      }
    }
    process.argv = originalArgv;
    vi.doUnmock('../src/pipeline-runner.js');
    vi.doUnmock('../src/integrations/chrome-runner.js');
    vi.restoreAllMocks();
  });

  it('prints usage for --help and exits cleanly', async () => {
    const exitSpy = await runCli('--help');

    expect(exitSpy).toHaveBeenCalledWith(0);
    expect(console.log).toHaveBeenCalledWith(expect.stringContaining('Usage:'));
    expect(runCaptureCommand).not.toHaveBeenCalled();
  });

  it('exits with status 2 on a usage error', async () => {
    const exitSpy = await runCli('--input', 'export.csv');

    expect(exitSpy).toHaveBeenCalledWith(2);
    expect(console.error).toHaveBeenCalledWith('Error: Both --input and --output are required');
    expect(runCaptureCommand).not.toHaveBeenCalled();
  });

  it('runs the capture and exits with its status', async () => {
    runCaptureCommand.mockResolvedValue({ exitCode: 1, summary: null });

    const exitSpy = await runCli('--input', 'export.csv', '--output', 'out', '--strict');

    expect(exitSpy).toHaveBeenCalledWith(1);
    expect(runCaptureCommand).toHaveBeenCalledTimes(1);
    const [cli, context] = runCaptureCommand.mock.calls[0] ?? [];
    expect(cli).toMatchObject({ input: 'export.csv', output: 'out', strict: true });
    expect(context?.signal).toBeInstanceOf(AbortSignal);
    expect(context?.signal?.aborted).toBe(false);
  });

  it('reports an unexpected error with status 1', async () => {
    runCaptureCommand.mockRejectedValue(new Error('disk on fire'));

    const exitSpy = await runCli('--input', 'export.csv', '--output', 'out');

    expect(exitSpy).toHaveBeenCalledWith(1);
    expect(console.error).toHaveBeenCalledWith('Capture failed: disk on fire');
  });

  it('aborts on the first signal and kills running renders on the second', async () => {
    let finishRun = (): void => {};
    runCaptureCommand.mockImplementation(
      () =>
        new Promise((resolve) => {
          finishRun = () => resolve({ exitCode: 0, summary: null });
        })
    );

    const exitSpy = await startCli('--input', 'export.csv', '--output', 'out');
    await vi.waitFor(() => expect(runCaptureCommand).toHaveBeenCalled());
    const context = runCaptureCommand.mock.calls[0]?.[1];

    sendSignal('SIGINT');
    expect(context?.signal?.aborted).toBe(true);
    expect(killActiveRenders).not.toHaveBeenCalled();
    expect(exitSpy).not.toHaveBeenCalled();

    sendSignal('SIGINT');
    expect(killActiveRenders).toHaveBeenCalledTimes(1);
    expect(exitSpy).toHaveBeenCalledWith(130);
    expect(killActiveRenders.mock.invocationCallOrder[0]).toBeLessThan(exitSpy.mock.invocationCallOrder[0] ?? 0);

    finishRun();
    await vi.waitFor(() => expect(exitSpy).toHaveBeenCalledTimes(2));
  });

  it('exits with 143 after a SIGTERM once the run has stopped', async () => {
    let finishRun = (): void => {};
    runCaptureCommand.mockImplementation(
      () =>
        new Promise((resolve) => {
          finishRun = () => resolve({ exitCode: 0, summary: null });
        })
    );

    const exitSpy = await startCli('--input', 'export.csv', '--output', 'out');
    await vi.waitFor(() => expect(runCaptureCommand).toHaveBeenCalled());

    sendSignal('SIGTERM');
    finishRun();

    await vi.waitFor(() => expect(exitSpy).toHaveBeenCalledWith(143));
    expect(killActiveRenders).not.toHaveBeenCalled();
  });
});

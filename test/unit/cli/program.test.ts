import { describe, it, expect, vi } from 'vitest';

import { runCli } from '../../../src/cli/program.js';
import { createMockLocator, createMockRunner } from '../../../src/process/mock.js';
import { captureStderr } from '../../helpers/stderr.js';

const SCRIPT = '/home/dev/.cargo/bin/cargo-verify';
const ALL_TOOLS = ['cargo-fmt', 'cargo-clippy'];

function argv(...args: string[]): string[] {
  return ['/usr/bin/node', SCRIPT, ...args];
}

describe('runCli', () => {
  it('prints the usage line for `cargo verify --help` and exits 0', async () => {
    const stderr = captureStderr();
    const stdout = vi.fn();
    const locator = createMockLocator([]);
    const runner = createMockRunner();

    const code = await runCli(argv('verify', '--help'), { locator, runner, stdout });

    expect(code).toBe(0);
    expect(stdout).toHaveBeenCalledTimes(1);
    expect(stdout).toHaveBeenCalledWith('run fmt, clippy and test\n');
    expect(locator.lookups).toEqual([]);
    expect(runner.calls).toEqual([]);
    expect(stderr).toEqual([]);
  });

  it('runs the chain when --help is not the second argument', async () => {
    captureStderr();
    const stdout = vi.fn();
    const runner = createMockRunner();

    const code = await runCli(argv('--help', 'verify'), {
      locator: createMockLocator(ALL_TOOLS),
      runner,
      stdout,
    });

    expect(code).toBe(0);
    expect(stdout).not.toHaveBeenCalled();
    expect(runner.calls).toHaveLength(3);
  });

  it('runs the chain for `cargo verify -- --help`', async () => {
    captureStderr();
    const stdout = vi.fn();
    const runner = createMockRunner();

    const code = await runCli(argv('verify', '--', '--help'), {
      locator: createMockLocator(ALL_TOOLS),
      runner,
      stdout,
    });

    expect(code).toBe(0);
    expect(stdout).not.toHaveBeenCalled();
    expect(runner.calls).toHaveLength(3);
  });

  it('keeps argument order when an unknown option comes first', async () => {
    captureStderr();
    const stdout = vi.fn();
    const runner = createMockRunner();

    const code = await runCli(argv('verify', '-x', '--help'), {
      locator: createMockLocator(ALL_TOOLS),
      runner,
      stdout,
    });

    expect(code).toBe(0);
    expect(stdout).not.toHaveBeenCalled();
    expect(runner.calls).toHaveLength(3);
  });

  it('exits 1 naming the first missing tool, without running the chain', async () => {
    const stderr = captureStderr();
    const locator = createMockLocator([]);
    const runner = createMockRunner();

    const code = await runCli(argv('verify'), { locator, runner, stdout: vi.fn() });

    expect(code).toBe(1);
    expect(stderr).toEqual(["error: 'cargo-fmt' is required for verify to run\n"]);
    expect(locator.lookups).toEqual(['cargo-fmt']);
    expect(runner.calls).toEqual([]);
  });

  it('reports clippy when only the formatter is installed', async () => {
    const stderr = captureStderr();

    const code = await runCli(argv('verify'), {
      locator: createMockLocator(['cargo-fmt']),
      runner: createMockRunner(),
      stdout: vi.fn(),
    });

    expect(code).toBe(1);
    expect(stderr).toEqual(["error: 'cargo-clippy' is required for verify to run\n"]);
  });

  it('uses the invoked script name in the error', async () => {
    const stderr = captureStderr();

    const code = await runCli(['/usr/bin/node', '/opt/bin/cargo-check', 'check'], {
      locator: createMockLocator([]),
      runner: createMockRunner(),
      stdout: vi.fn(),
    });

    expect(code).toBe(1);
    expect(stderr).toEqual(["error: 'cargo-fmt' is required for check to run\n"]);
  });

  it('stops after a failing format check and returns its code', async () => {
    captureStderr();
    const runner = createMockRunner([1]);

    const code = await runCli(argv('verify'), {
      locator: createMockLocator(ALL_TOOLS),
      runner,
      stdout: vi.fn(),
    });

    expect(code).toBe(1);
    expect(runner.calls).toEqual([{ program: 'cargo', args: ['fmt', '--all', '--', '--check'] }]);
  });

  it('propagates a lint failure code verbatim', async () => {
    captureStderr();
    const runner = createMockRunner([0, 101]);

    const code = await runCli(argv('verify'), {
      locator: createMockLocator(ALL_TOOLS),
      runner,
      stdout: vi.fn(),
    });

    expect(code).toBe(101);
    expect(runner.calls).toHaveLength(2);
  });

  it('exits 0 when all three steps pass', async () => {
    const stderr = captureStderr();
    const runner = createMockRunner([0, 0, 0]);

    const code = await runCli(argv('verify'), {
      locator: createMockLocator(ALL_TOOLS),
      runner,
      stdout: vi.fn(),
    });

    expect(code).toBe(0);
    expect(runner.calls.map((c) => c.args[0])).toEqual(['fmt', 'clippy', 'test']);
    expect(stderr.at(-1)).toBe('✔ all checks passed\n');
  });

  it('passes through extra arguments without failing', async () => {
    captureStderr();

    const code = await runCli(argv('verify', '--release', 'extra'), {
      locator: createMockLocator(ALL_TOOLS),
      runner: createMockRunner(),
      stdout: vi.fn(),
    });

    expect(code).toBe(0);
  });

  it('gives the same result on a second identical run', async () => {
    captureStderr();
    const deps = () => ({
      locator: createMockLocator(ALL_TOOLS),
      runner: createMockRunner([0, 0, 4]),
      stdout: vi.fn(),
    });

    const first = await runCli(argv('verify'), deps());
    const second = await runCli(argv('verify'), deps());

    expect(first).toBe(4);
    expect(second).toBe(first);
  });

  it('passes an empty plan without running anything', async () => {
    const stderr = captureStderr();
    const runner = createMockRunner();

    const code = await runCli(argv('verify'), {
      locator: createMockLocator(ALL_TOOLS),
      runner,
      stdout: vi.fn(),
      plan: { requiredTools: [], steps: [] },
    });

    expect(code).toBe(0);
    expect(runner.calls).toEqual([]);
    expect(stderr).toEqual(['✔ all checks passed\n']);
  });
});

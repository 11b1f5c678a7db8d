import { describe, it, expect } from '@jest/globals';
import {
  CommandExecutor,
  OutputTail,
  describeCommand,
  executeCommand,
  failureReason,
  type CommandResult,
} from '../../../src/infrastructure/command-executor';
import { createFakeRunner, createMockLogger } from '../../__support__/utilities/mock-infrastructure';

const NODE = process.execPath;

describe('CommandExecutor', () => {
  const executor = new CommandExecutor(createMockLogger(), 10000);

  it('captures trimmed output and the exit code', async () => {
    const result = await executor.execute(NODE, [
      '-e',
      "process.stdout.write('hello\\n'); process.stderr.write('careful\\n'); process.exit(3)",
    ]);

    expect(result).toEqual({
      stdout: 'hello',
      stderr: 'careful',
      exitCode: 3,
      timedOut: false,
      aborted: false,
    });
  });

  it('merges the given environment over the parent one', async () => {
    const result = await executor.execute(NODE, ['-e', 'process.stdout.write(process.env.KOPS_GCE_PROBE ?? "")'], {
      env: { KOPS_GCE_PROBE: 'from-test' },
    });

    expect(result.stdout).toBe('from-test');
    expect(result.exitCode).toBe(0);
  });

  it('terminates a process that outlives its timeout', async () => {
    const result = await executor.execute(NODE, ['-e', 'setTimeout(() => {}, 30000)'], { timeout: 100 });

    expect(result.timedOut).toBe(true);
    expect(result.aborted).toBe(false);
    expect(result.exitCode).toBe(-1);
  });

  it('terminates a process when the signal aborts', async () => {
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 100);

    const result = await executor.execute(NODE, ['-e', 'setTimeout(() => {}, 30000)'], {
      signal: controller.signal,
    });

    expect(result.aborted).toBe(true);
    expect(result.timedOut).toBe(false);
  });

  it('rejects when the program cannot be started', async () => {
    await expect(executor.execute('kops-gce-no-such-program')).rejects.toThrow('ENOENT');
  });

  it('keeps the end of output that exceeds maxBuffer', async () => {
    const result = await executor.execute(
      NODE,
      ['-e', "process.stderr.write('x'.repeat(64) + '\\nError: final line\\n')"],
      { maxBuffer: 32 },
    );

    expect(result.stderr).toBe(`${'x'.repeat(13)}\nError: final line`);
    expect(failureReason(result)).toBe('Error: final line');
  });
});

describe('executeCommand', () => {
  it('maps a program that cannot be started to a failed result', async () => {
    const result = await executeCommand(new CommandExecutor(createMockLogger()), 'kops-gce-no-such-program', []);

    expect(result.exitCode).toBe(-1);
    expect(result.startError).toContain('ENOENT');
    expect(failureReason(result)).toBe(result.startError);
  });

  it('passes results through unchanged', async () => {
    const { runner, calls } = createFakeRunner(() => ({ stdout: 'ok' }));

    const result = await executeCommand(runner, 'gcloud', ['version'], { timeout: 1000 });

    expect(result).toEqual({ stdout: 'ok', stderr: '', exitCode: 0, timedOut: false, aborted: false });
    expect(calls[0]?.options).toEqual({ timeout: 1000 });
  });
});

describe('OutputTail', () => {
  it('counts bytes, not characters', () => {
    const tail = new OutputTail(4);

    tail.push(Buffer.from('ab'));
    tail.push(Buffer.from('é'));

    expect(tail.toString()).toBe('abé');
  });

  it('drops the oldest chunks first', () => {
    const tail = new OutputTail(6);

    tail.push(Buffer.from('first\n'));
    tail.push(Buffer.from('last\n'));

    expect(tail.toString()).toBe('last\n');
  });

  it('trims a single oversized chunk to its last bytes', () => {
    const tail = new OutputTail(5);

    tail.push(Buffer.from('0123456789'));

    expect(tail.toString()).toBe('56789');
  });
});

describe('failureReason', () => {
  const result = (overrides: Partial<CommandResult>): CommandResult => ({
    stdout: '',
    stderr: '',
    exitCode: 1,
    timedOut: false,
    aborted: false,
    ...overrides,
  });

  it('prefers timeout and abort over output', () => {
    expect(failureReason(result({ timedOut: true, stderr: 'boom' }))).toBe('timed out');
    expect(failureReason(result({ aborted: true, stderr: 'boom' }))).toBe('aborted');
  });

  it('uses the last non-empty stderr line', () => {
    expect(failureReason(result({ stderr: 'W0101 warning\n\nError: quota exceeded\n  ' }))).toBe(
      'Error: quota exceeded',
    );
  });

  it('falls back to the exit code', () => {
    expect(failureReason(result({ exitCode: 7 }))).toBe('exit code 7');
  });
});

describe('describeCommand', () => {
  it('joins the program and its arguments', () => {
    expect(describeCommand('gsutil', ['mb', '-p', 'p1', 'gs://b'])).toBe('gsutil mb -p p1 gs://b');
  });
});

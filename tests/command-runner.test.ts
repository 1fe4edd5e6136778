import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { createProcessRunner } from '../src/command-runner';
import { CommandError } from '../src/errors';
import { makeTempDir, removeDir } from './helpers';

const NODE = process.execPath;

describe('createProcessRunner', () => {
  const runner = createProcessRunner();

  it('should find executables given by path', async () => {
    expect(await runner.exists(process.execPath)).toBe(true);
    expect(await runner.exists(path.join(path.dirname(process.execPath), 'no-such-tool'))).toBe(false);
  });

  it('should not find unknown commands on PATH', async () => {
    expect(await runner.exists('stackpilot-no-such-tool')).toBe(false);
  });

  describe('run', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await makeTempDir();
    });

    afterEach(async () => {
      await removeDir(dir);
    });

    it('should capture stdout and stderr of a successful command', async () => {
      const result = await runner.run(NODE, [
        '-e',
        'process.stdout.write("out"); process.stderr.write("err")',
      ]);

      expect(result).toEqual({ exitCode: 0, stdout: 'out', stderr: 'err' });
    });

    it('should run in the given working directory', async () => {
      const result = await runner.run(NODE, ['-e', 'process.stdout.write(process.cwd())'], { cwd: dir });

      expect(result.stdout).toBe(dir);
    });

    it('should throw CommandError with stderr on a non-zero exit', async () => {
      const script = 'process.stderr.write("boom"); process.exit(3)';

      const error = await runner.run(NODE, ['-e', script]).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(CommandError);
      expect(error).toMatchObject({
        status: 3,
        stderr: 'boom',
        message: `Command failed (exit 3): ${NODE} -e ${script}: boom`,
      });
    });

    it('should resolve with the exit code when failure is allowed', async () => {
      const result = await runner.run(NODE, ['-e', 'process.stdout.write("partial"); process.exit(2)'], {
        allowFailure: true,
      });

      expect(result).toEqual({ exitCode: 2, stdout: 'partial', stderr: '' });
    });

    it('should finish writing stdoutFile before resolving', async () => {
      const file = path.join(dir, 'dump.sql');

      const result = await runner.run(NODE, ['-e', 'process.stdout.write("x".repeat(200000))'], {
        stdoutFile: file,
      });

      expect(result.stdout).toBe('');
      expect(await readFile(file, 'utf8')).toBe('x'.repeat(200_000));
    });

    it('should reject when stdoutFile cannot be opened', async () => {
      const file = path.join(dir, 'missing', 'dump.sql');

      await expect(runner.run(NODE, ['-e', 'setTimeout(() => {}, 5000)'], { stdoutFile: file })).rejects.toThrow(
        /ENOENT/
      );
    });

    it('should reject when the command does not exist', async () => {
      await expect(runner.run('stackpilot-no-such-tool', [])).rejects.toThrow(/ENOENT/);
    });

    it('should remove stdoutFile when the command cannot start', async () => {
      const file = path.join(dir, 'dump.sql');

      await expect(runner.run('stackpilot-no-such-tool', [], { stdoutFile: file })).rejects.toThrow(/ENOENT/);
      await expect(readFile(file, 'utf8')).rejects.toThrow(/ENOENT/);
    });
  });
});

describe('CommandError', () => {
  it('should keep the last lines of stderr in the message', () => {
    const error = new CommandError('git', ['clone', 'x'], 128, 'line 1\nline 2\nline 3\nline 4\n');

    expect(error.message).toBe('Command failed (exit 128): git clone x: line 2 | line 3 | line 4');
    expect(error.exitCode).toBe(4);
    expect(error.name).toBe('CommandError');
  });

  it('should report termination by signal', () => {
    expect(new CommandError('docker', ['build'], null, '').message).toBe('Command failed (exit signal): docker build');
  });
});

import { spawn } from 'node:child_process';
import { createWriteStream } from 'node:fs';
import { access, constants, rm } from 'node:fs/promises';
import path from 'node:path';
import logger from './logger';
import { CommandError } from './errors';

export interface RunOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Resolve with the non-zero exit code instead of throwing. */
  allowFailure?: boolean;
  /** Stream stdout into this file instead of buffering it. */
  stdoutFile?: string;
}

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/**
 * The seam between the orchestrator and the external tools it drives
 * (git, docker, docker-compose).
 */
export interface CommandRunner {
  run(command: string, args: readonly string[], options?: RunOptions): Promise<CommandResult>;
  exists(command: string): Promise<boolean>;
}

const isExecutable = async (file: string): Promise<boolean> => {
  try {
    await access(file, constants.X_OK);
    return true;
  } catch {
    return false;
  }
};

/**
 * Run commands as child processes. stderr is always captured and ends up in
 * the CommandError message.
 */
export const createProcessRunner = (): CommandRunner => {
  const run = (command: string, args: readonly string[], options: RunOptions = {}): Promise<CommandResult> =>
    new Promise((resolve, reject) => {
      logger.debug({ command, args, cwd: options.cwd }, 'Running command');

      const child = spawn(command, [...args], {
        cwd: options.cwd,
        env: options.env ?? process.env,
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      let stdout = '';
      let stderr = '';
      const { stdoutFile } = options;
      const sink = stdoutFile ? createWriteStream(stdoutFile) : undefined;

      // A failed run leaves no partial stdoutFile behind.
      let failed = false;
      const fail = (error: Error) => {
        if (failed) return;
        failed = true;
        child.kill();
        if (!sink || !stdoutFile) {
          reject(error);
          return;
        }
        const discard = () => {
          rm(stdoutFile, { force: true }).then(
            () => reject(error),
            () => reject(error)
          );
        };
        if (sink.closed) {
          discard();
        } else {
          sink.once('close', discard);
          sink.destroy();
        }
      };
      sink?.on('error', fail);

      if (sink) {
        child.stdout.pipe(sink);
      } else {
        child.stdout.setEncoding('utf8');
        child.stdout.on('data', (chunk: string) => {
          stdout += chunk;
        });
      }
      child.stderr.setEncoding('utf8');
      child.stderr.on('data', (chunk: string) => {
        stderr += chunk;
      });

      child.on('error', fail);
      child.on('close', code => {
        if (failed) return;
        const finish = () => {
          if (failed) return;
          const exitCode = code ?? 1;
          if (exitCode !== 0 && !options.allowFailure) {
            reject(new CommandError(command, args, code, stderr));
            return;
          }
          resolve({ exitCode, stdout, stderr });
        };
        if (sink && !sink.closed) {
          sink.once('close', finish);
        } else {
          finish();
        }
      });
    });

  const exists = async (command: string): Promise<boolean> => {
    if (command.includes(path.sep)) return isExecutable(command);

    const dirs = (process.env.PATH ?? '').split(path.delimiter).filter(Boolean);
    const extensions = process.platform === 'win32' ? (process.env.PATHEXT ?? '.EXE').split(';') : [''];

    for (const dir of dirs) {
      for (const ext of extensions) {
        if (await isExecutable(path.join(dir, command + ext))) return true;
      }
    }
    return false;
  };

  return { run, exists };
};

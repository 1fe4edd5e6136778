import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import pino from 'pino';
import type { CommandResult, CommandRunner, RunOptions } from '../src/command-runner';
import { parseConfig } from '../src/config';
import type { StackConfig, StackConfigInput } from '../src/config';
import { createContext } from '../src/context';
import type { DeployContext } from '../src/context';
import { CommandError } from '../src/errors';
import type { FetchLike } from '../src/health';

export const silentLogger = pino({ level: 'silent' });

export interface RecordedCall {
  command: string;
  args: string[];
  cwd?: string;
}

export type CallHandler = (call: RecordedCall, options: RunOptions) => Partial<CommandResult> | undefined;

export interface FakeRunner extends CommandRunner {
  calls: RecordedCall[];
  /** Calls rendered as `command arg1 arg2`. */
  lines(): string[];
}

/**
 * Records every command instead of running it. `handler` may return a
 * result (stdout is written to `stdoutFile` when one is given) or throw.
 */
export const createFakeRunner = (handler?: CallHandler, missing: string[] = []): FakeRunner => {
  const calls: RecordedCall[] = [];

  return {
    calls,
    lines: () => calls.map(c => [c.command, ...c.args].join(' ')),
    exists: async command => !missing.includes(command),
    run: async (command, args, options = {}) => {
      const call: RecordedCall = { command, args: [...args], cwd: options.cwd };
      calls.push(call);

      const partial = handler?.(call, options) ?? {};
      const result: CommandResult = { exitCode: 0, stdout: '', stderr: '', ...partial };

      if (options.stdoutFile) {
        await writeFile(options.stdoutFile, result.stdout);
        result.stdout = '';
      }
      if (result.exitCode !== 0 && !options.allowFailure) {
        throw new CommandError(command, args, result.exitCode, result.stderr);
      }
      return result;
    },
  };
};

/**
 * Fetch stand-in answering with a fixed status per URL. An Error value
 * makes the request reject.
 */
export const fakeFetch = (responses: Record<string, number | Error>): FetchLike => async url => {
  const response = responses[url];
  if (response === undefined) throw new Error(`connect ECONNREFUSED ${url}`);
  if (response instanceof Error) throw response;
  return { status: response };
};

export const baseConfig = (): StackConfigInput => ({
  org: 'acme',
  repositories: [
    { name: 'core', image: 'acme/core', manifestKey: 'core' },
    { name: 'frontend', image: 'acme/frontend', dependsOn: ['core'], manifestKey: 'frontend' },
    { name: 'plugins', image: 'acme/plugins', dependsOn: ['core'], manifestKey: 'plugins.downloader' },
    { name: 'resources' },
  ],
  services: [
    { name: 'core', url: 'http://localhost:8090/api/health' },
    { name: 'frontend', url: 'http://localhost:80/', critical: false },
  ],
  health: { startupGraceMs: 0, attempts: 1, intervalMs: 0, timeoutMs: 1000 },
});

export const makeConfig = (rootDir: string, overrides: Partial<StackConfigInput> = {}): StackConfig =>
  parseConfig({ ...baseConfig(), ...overrides }, rootDir);

export const FIXED_NOW = new Date(2024, 4, 10, 12, 30, 15);

export const makeContext = (
  config: StackConfig,
  overrides: Partial<Omit<DeployContext, 'config'>> = {}
): DeployContext =>
  createContext(config, {
    runner: createFakeRunner(),
    logger: silentLogger,
    sleep: async () => {},
    now: () => FIXED_NOW,
    fetch: fakeFetch({
      'http://localhost:8090/api/health': 200,
      'http://localhost:80/': 200,
    }),
    ...overrides,
  });

export const makeTempDir = (): Promise<string> => mkdtemp(path.join(os.tmpdir(), 'stackpilot-'));

export const removeDir = (dir: string): Promise<void> => rm(dir, { recursive: true, force: true });

/**
 * A runner that remembers which tag each checkout is on, so `git describe`
 * answers with whatever `git checkout tags/<tag>` last selected.
 * `tags` maps repository directory names to tags such as `v2.1.0`.
 */
export const createFakeGit = (tags: Record<string, string> = {}, handler?: CallHandler): FakeRunner =>
  createFakeRunner((call, options) => {
    const custom = handler?.(call, options);
    if (custom) return custom;
    if (call.command !== 'git' || !call.cwd) return undefined;

    const repo = path.basename(call.cwd);
    if (call.args[0] === 'checkout') tags[repo] = call.args[1].replace(/^tags\//, '');
    if (call.args[0] === 'describe') {
      const tag = tags[repo];
      return tag ? { stdout: `${tag}\n` } : { exitCode: 128, stderr: 'fatal: No names found' };
    }
    return undefined;
  });

import {execFile, type ExecFileException} from 'node:child_process';

import {err, ok, type SharedResult} from './errors.js';

const DEFAULT_TIMEOUT_MS = 15_000;
const MAX_BUFFER_BYTES = 4 * 1024 * 1024;

export type CommandInvocation = {
  command: string;
  args: readonly string[];
  input?: string;
  timeoutMs?: number;
};

export type CommandOutput = {
  exitCode: number;
  stdout: string;
  stderr: string;
};

/**
 * Runs a local executable to completion. A non-zero exit status is a successful
 * run with `exitCode` set; only spawn failures and timeouts are errors.
 */
export type CommandRunner = (invocation: CommandInvocation) => Promise<SharedResult<CommandOutput>>;

const describeInvocation = ({command, args}: CommandInvocation) => [command, ...args].join(' ');

const toExitCode = (error: ExecFileException | null): number | null => {
  if (!error) {
    return 0;
  }

  return typeof error.code === 'number' ? error.code : null;
};

export const createCommandRunner = ({env}: {env?: NodeJS.ProcessEnv} = {}): CommandRunner => invocation =>
  new Promise(resolve => {
    const child = execFile(
      invocation.command,
      [...invocation.args],
      {
        encoding: 'utf8',
        timeout: invocation.timeoutMs ?? DEFAULT_TIMEOUT_MS,
        maxBuffer: MAX_BUFFER_BYTES,
        env: env ?? process.env
      },
      (error, stdout, stderr) => {
        if (error?.killed) {
          resolve(err('command_timed_out', `${describeInvocation(invocation)} did not finish in time`));
          return;
        }

        const exitCode = toExitCode(error);
        if (exitCode === null) {
          resolve(
            err('command_spawn_failed', `${describeInvocation(invocation)} could not be started: ${error?.message ?? 'unknown'}`)
          );
          return;
        }

        resolve(ok({exitCode, stdout, stderr}));
      }
    );

    if (invocation.input !== undefined) {
      child.stdin?.end(invocation.input);
    }
  });

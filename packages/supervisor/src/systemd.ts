import type {CommandRunner} from '@reality-reconciler/shared';

import {ServiceStateSchema, type ListeningSocket, type PortProbe, type ServiceController} from './contracts.js';
import {err, ok, type SupervisorResult} from './errors.js';

export type SystemdServiceControllerOptions = {
  runner: CommandRunner;
  unit: string;
  systemctlPath?: string;
  journalctlPath?: string;
  timeoutMs?: number;
};

const splitLines = (text: string) =>
  text
    .split(/\r?\n/u)
    .map(line => line.trimEnd())
    .filter(line => line.length > 0);

export const createSystemdServiceController = ({
  runner,
  unit,
  systemctlPath = 'systemctl',
  journalctlPath = 'journalctl',
  timeoutMs = 30_000
}: SystemdServiceControllerOptions): ServiceController => {
  const runAction = async (action: 'stop' | 'start'): Promise<SupervisorResult<void>> => {
    const result = await runner({command: systemctlPath, args: [action, unit], timeoutMs});
    if (!result.ok) {
      return err('service_command_failed', result.error.message);
    }
    if (result.value.exitCode !== 0) {
      return err(
        'service_command_failed',
        `systemctl ${action} ${unit} exited with status ${result.value.exitCode}: ${result.value.stderr.trim()}`
      );
    }
    return ok(undefined);
  };

  return {
    stop: () => runAction('stop'),
    start: () => runAction('start'),
    // is-active exits non-zero for anything but active and still prints the state.
    state: async () => {
      const result = await runner({command: systemctlPath, args: ['is-active', unit], timeoutMs});
      if (!result.ok) {
        return err('service_command_failed', result.error.message);
      }
      const parsed = ServiceStateSchema.safeParse(result.value.stdout.trim());
      return ok(parsed.success ? parsed.data : 'unknown');
    },
    recentLogs: async lines => {
      const result = await runner({
        command: journalctlPath,
        args: ['-u', unit, '-n', String(lines), '--no-pager'],
        timeoutMs
      });
      if (!result.ok) {
        return err('service_command_failed', result.error.message);
      }
      return ok(splitLines(result.value.stdout));
    }
  };
};

const USERS_PATTERN = /users:\(\("([^"]+)",pid=(\d+)/u;

/** Parses `ss -Htlnp` output; process details are present only when run privileged. */
export const parseListeningSockets = (output: string): ListeningSocket[] => {
  const sockets: ListeningSocket[] = [];
  for (const line of splitLines(output)) {
    const fields = line.trim().split(/\s+/u);
    const local = fields[3];
    if (fields[0] !== 'LISTEN' || local === undefined) {
      continue;
    }

    const separator = local.lastIndexOf(':');
    const port = Number(local.slice(separator + 1));
    if (separator < 0 || !Number.isInteger(port) || port <= 0) {
      continue;
    }

    const users = USERS_PATTERN.exec(line);
    const processName = users?.[1];
    const pid = users?.[2];
    sockets.push({
      address: local.slice(0, separator),
      port,
      ...(processName !== undefined ? {processName} : {}),
      ...(pid !== undefined ? {pid: Number(pid)} : {})
    });
  }
  return sockets;
};

export const createSocketProbe = ({
  runner,
  ssPath = 'ss',
  timeoutMs = 10_000
}: {
  runner: CommandRunner;
  ssPath?: string;
  timeoutMs?: number;
}): PortProbe => ({
  listening: async () => {
    const result = await runner({command: ssPath, args: ['-Htlnp'], timeoutMs});
    if (!result.ok) {
      return err('probe_failed', result.error.message);
    }
    if (result.value.exitCode !== 0) {
      return err('probe_failed', `ss exited with status ${result.value.exitCode}: ${result.value.stderr.trim()}`);
    }
    return ok(parseListeningSockets(result.value.stdout));
  }
});

import type {CommandInvocation, CommandRunner} from '@reality-reconciler/shared';
import {describe, expect, it} from 'vitest';

import {createSocketProbe, createSystemdServiceController, parseListeningSockets} from '../index.js';

const createScriptedRunner = (respond: (invocation: CommandInvocation) => Awaited<ReturnType<CommandRunner>>) => {
  const calls: CommandInvocation[] = [];
  const runner: CommandRunner = async invocation => {
    calls.push(invocation);
    return respond(invocation);
  };
  return {calls, runner};
};

const completed = (stdout: string, exitCode = 0, stderr = '') => ({ok: true, value: {exitCode, stdout, stderr}}) as const;

describe('parseListeningSockets', () => {
  it('reads ports and owning processes from ss output', () => {
    const output = [
      'LISTEN 0      4096         *:443        *:*    users:(("xray",pid=1234,fd=3))',
      'LISTEN 0      4096     [::]:8443      [::]:*    users:(("nginx",pid=88,fd=6),("nginx",pid=89,fd=6))',
      'LISTEN 0      128   127.0.0.1:50051   0.0.0.0:*',
      ''
    ].join('\n');

    expect(parseListeningSockets(output)).toEqual([
      {address: '*', port: 443, processName: 'xray', pid: 1234},
      {address: '[::]', port: 8443, processName: 'nginx', pid: 88},
      {address: '127.0.0.1', port: 50051}
    ]);
  });

  it('ignores lines that are not listeners', () => {
    expect(parseListeningSockets('State Recv-Q Send-Q Local Peer\nESTAB 0 0 10.0.0.1:22 10.0.0.2:5555\n')).toEqual([]);
  });
});

describe('createSystemdServiceController', () => {
  it('reports the state printed by is-active even on a non-zero exit', async () => {
    const {calls, runner} = createScriptedRunner(() => completed('failed\n', 3));
    const controller = createSystemdServiceController({runner, unit: 'xray'});

    await expect(controller.state()).resolves.toEqual({ok: true, value: 'failed'});
    expect(calls).toEqual([{command: 'systemctl', args: ['is-active', 'xray'], timeoutMs: 30_000}]);
  });

  it('maps unexpected states to unknown', async () => {
    const {runner} = createScriptedRunner(() => completed('reloading\n', 0));
    const controller = createSystemdServiceController({runner, unit: 'xray'});

    await expect(controller.state()).resolves.toEqual({ok: true, value: 'unknown'});
  });

  it('fails a stop that exits non-zero', async () => {
    const {runner} = createScriptedRunner(() => completed('', 5, 'Unit xray.service not loaded.\n'));
    const controller = createSystemdServiceController({runner, unit: 'xray'});

    await expect(controller.stop()).resolves.toEqual({
      ok: false,
      error: {
        code: 'service_command_failed',
        message: 'systemctl stop xray exited with status 5: Unit xray.service not loaded.'
      }
    });
  });

  it('reads the tail of the unit journal', async () => {
    const {calls, runner} = createScriptedRunner(() => completed('line one\n\nline two\n'));
    const controller = createSystemdServiceController({runner, unit: 'xray', journalctlPath: '/bin/journalctl'});

    await expect(controller.recentLogs(15)).resolves.toEqual({ok: true, value: ['line one', 'line two']});
    expect(calls[0]?.args).toEqual(['-u', 'xray', '-n', '15', '--no-pager']);
  });
});

describe('createSocketProbe', () => {
  it('runs ss without a header in numeric listening mode', async () => {
    const {calls, runner} = createScriptedRunner(() => completed('LISTEN 0 4096 *:443 *:*\n'));
    const probe = createSocketProbe({runner});

    await expect(probe.listening()).resolves.toEqual({ok: true, value: [{address: '*', port: 443}]});
    expect(calls[0]).toEqual({command: 'ss', args: ['-Htlnp'], timeoutMs: 10_000});
  });
});

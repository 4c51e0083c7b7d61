import type {StructuredLogger} from '@reality-reconciler/logging';
import {sleep} from '@reality-reconciler/shared';

import type {
  HealthClassification,
  HealthReport,
  ListeningSocket,
  PortProbe,
  ServiceController,
  Unhealthy
} from './contracts.js';

export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_BACKOFF_MS = 2_000;

const BIND_CONFLICT_PATTERN = /address already in use/iu;
const COMPONENT = 'supervisor';

export type HealthSupervisorOptions = {
  controller: ServiceController;
  probe: PortProbe;
  logger: StructuredLogger;
  processName?: string;
  maxAttempts?: number;
  backoffMs?: number;
  logLines?: number;
  clock?: () => number;
};

export type RestartAndVerifyInput = {
  timeoutSeconds: number;
  expectedPorts: readonly number[];
  signal?: AbortSignal;
};

export type HealthSupervisor = {
  restartAndVerify: (input: RestartAndVerifyInput) => Promise<HealthReport>;
};

const findForeignListener = ({
  sockets,
  expectedPorts,
  processName
}: {
  sockets: ListeningSocket[];
  expectedPorts: readonly number[];
  processName: string;
}) =>
  sockets.find(
    socket =>
      expectedPorts.includes(socket.port) && socket.processName !== undefined && socket.processName !== processName
  );

export const createHealthSupervisor = ({
  controller,
  probe,
  logger,
  processName = 'xray',
  maxAttempts = DEFAULT_MAX_ATTEMPTS,
  backoffMs = DEFAULT_BACKOFF_MS,
  logLines = 20,
  clock = Date.now
}: HealthSupervisorOptions): HealthSupervisor => {
  const readLogs = async () => {
    const logs = await controller.recentLogs(logLines);
    if (!logs.ok) {
      logger.warn({event: 'service.logs.unavailable', component: COMPONENT, message: logs.error.message});
      return [];
    }
    return logs.value;
  };

  const unhealthy = async ({
    classification,
    detail,
    attempts,
    cancelled = false,
    lastLogLines
  }: {
    classification: HealthClassification;
    detail: string;
    attempts: number;
    cancelled?: boolean;
    lastLogLines?: string[];
  }): Promise<Unhealthy> => {
    const report: Unhealthy = {
      status: 'unhealthy',
      classification,
      detail,
      lastLogLines: lastLogLines ?? (await readLogs()),
      attempts,
      ...(cancelled ? {cancelled: true as const} : {})
    };
    logger.warn({
      event: 'service.unhealthy',
      component: COMPONENT,
      reason_code: classification,
      message: detail,
      metadata: {attempts, cancelled, lastLogLines: report.lastLogLines}
    });
    return report;
  };

  const classifyFailedUnit = async (attempts: number) => {
    const lastLogLines = await readLogs();
    const bindConflict = lastLogLines.find(line => BIND_CONFLICT_PATTERN.test(line));
    return bindConflict
      ? unhealthy({classification: 'port-conflict', detail: bindConflict.trim(), attempts, lastLogLines})
      : unhealthy({
          classification: 'config-rejected-at-startup',
          detail: 'service entered the failed state after start',
          attempts,
          lastLogLines
        });
  };

  /**
   * Stop (when running), start, then poll a bounded number of times. Always
   * resolves with a terminal report.
   */
  const restartAndVerify = async ({
    timeoutSeconds,
    expectedPorts,
    signal
  }: RestartAndVerifyInput): Promise<HealthReport> => {
    const cancelledReport = (attempts: number) =>
      unhealthy({classification: 'slow-start', detail: 'health verification was cancelled', attempts, cancelled: true});
    if (signal?.aborted) {
      return cancelledReport(0);
    }

    const startedAt = clock();
    const deadline = startedAt + timeoutSeconds * 1_000;
    logger.info({
      event: 'service.restart.started',
      component: COMPONENT,
      metadata: {expectedPorts: [...expectedPorts], timeoutSeconds, maxAttempts}
    });

    const initial = await controller.state();
    if (!initial.ok) {
      return unhealthy({classification: 'control-failed', detail: initial.error.message, attempts: 0});
    }
    if (initial.value !== 'inactive' && initial.value !== 'failed') {
      const stopped = await controller.stop();
      if (!stopped.ok) {
        return unhealthy({classification: 'control-failed', detail: stopped.error.message, attempts: 0});
      }
    }

    const started = await controller.start();
    if (!started.ok) {
      const afterStart = await controller.state();
      if (afterStart.ok && afterStart.value === 'failed') {
        return classifyFailedUnit(0);
      }
      return unhealthy({classification: 'control-failed', detail: started.error.message, attempts: 0});
    }

    let attempts = 0;
    let probeFailure: string | undefined;
    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      const remaining = deadline - clock();
      if (remaining <= 0) {
        break;
      }
      if ((await sleep(Math.min(backoffMs, remaining), signal)) === 'aborted') {
        return cancelledReport(attempts);
      }
      attempts = attempt;

      const state = await controller.state();
      if (!state.ok) {
        logger.warn({event: 'service.state.unavailable', component: COMPONENT, message: state.error.message});
        continue;
      }
      logger.debug({event: 'service.health.poll', component: COMPONENT, metadata: {attempt, state: state.value}});
      if (state.value === 'failed') {
        return classifyFailedUnit(attempt);
      }

      const sockets = await probe.listening();
      if (!sockets.ok) {
        probeFailure = sockets.error.message;
        logger.warn({event: 'service.sockets.unavailable', component: COMPONENT, message: sockets.error.message});
        continue;
      }
      probeFailure = undefined;

      const foreign = findForeignListener({sockets: sockets.value, expectedPorts, processName});
      if (foreign) {
        return unhealthy({
          classification: 'port-conflict',
          detail: `port ${foreign.port} is held by ${foreign.processName ?? 'another process'}${
            foreign.pid !== undefined ? ` (pid ${foreign.pid})` : ''
          }`,
          attempts
        });
      }

      if (state.value !== 'active') {
        continue;
      }
      const missing = expectedPorts.filter(port => !sockets.value.some(socket => socket.port === port));
      if (missing.length === 0) {
        logger.info({
          event: 'service.healthy',
          component: COMPONENT,
          duration_ms: Math.max(0, clock() - startedAt),
          metadata: {attempts}
        });
        return {status: 'healthy', attempts, listeningPorts: [...expectedPorts]};
      }
    }

    const lastLogLines = await readLogs();
    const bindConflict = lastLogLines.find(line => BIND_CONFLICT_PATTERN.test(line));
    if (bindConflict) {
      return unhealthy({classification: 'port-conflict', detail: bindConflict.trim(), attempts, lastLogLines});
    }
    return unhealthy({
      classification: 'slow-start',
      detail:
        probeFailure === undefined
          ? `service was not healthy after ${attempts} of ${maxAttempts} attempts`
          : `listening ports could not be verified after ${attempts} of ${maxAttempts} attempts: ${probeFailure}`,
      attempts,
      lastLogLines
    });
  };

  return {restartAndVerify};
};

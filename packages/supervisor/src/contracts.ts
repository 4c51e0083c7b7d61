import {z} from 'zod';

import type {SupervisorResult} from './errors.js';

export const ServiceStateSchema = z.enum(['active', 'activating', 'deactivating', 'inactive', 'failed', 'unknown']);
export type ServiceState = z.infer<typeof ServiceStateSchema>;

export type ListeningSocket = {
  address: string;
  port: number;
  processName?: string;
  pid?: number;
};

export type ServiceController = {
  stop: () => Promise<SupervisorResult<void>>;
  start: () => Promise<SupervisorResult<void>>;
  state: () => Promise<SupervisorResult<ServiceState>>;
  recentLogs: (lines: number) => Promise<SupervisorResult<string[]>>;
};

export type PortProbe = {
  listening: () => Promise<SupervisorResult<ListeningSocket[]>>;
};

export const HealthClassificationSchema = z.enum([
  'config-rejected-at-startup',
  'port-conflict',
  'slow-start',
  'control-failed'
]);
export type HealthClassification = z.infer<typeof HealthClassificationSchema>;

export type Healthy = {
  status: 'healthy';
  attempts: number;
  listeningPorts: number[];
};

export type Unhealthy = {
  status: 'unhealthy';
  classification: HealthClassification;
  detail: string;
  lastLogLines: string[];
  attempts: number;
  cancelled?: true;
};

export type HealthReport = Healthy | Unhealthy;

/** Whether a failed health check should put the previous revision back. */
export const requiresRollback = (report: Unhealthy) => report.classification !== 'port-conflict';

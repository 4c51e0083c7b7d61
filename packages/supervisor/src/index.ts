export {
  HealthClassificationSchema,
  requiresRollback,
  ServiceStateSchema,
  type HealthClassification,
  type HealthReport,
  type Healthy,
  type ListeningSocket,
  type PortProbe,
  type ServiceController,
  type ServiceState,
  type Unhealthy
} from './contracts.js';
export {
  err,
  ok,
  supervisorErrorCodeSchema,
  type SupervisorError,
  type SupervisorErrorCode,
  type SupervisorFailure,
  type SupervisorResult,
  type SupervisorSuccess
} from './errors.js';
export {
  createHealthSupervisor,
  DEFAULT_BACKOFF_MS,
  DEFAULT_MAX_ATTEMPTS,
  type HealthSupervisor,
  type HealthSupervisorOptions,
  type RestartAndVerifyInput
} from './supervisor.js';
export {
  createSocketProbe,
  createSystemdServiceController,
  parseListeningSockets,
  type SystemdServiceControllerOptions
} from './systemd.js';

export {
  createCommandRunner,
  type CommandInvocation,
  type CommandOutput,
  type CommandRunner
} from './commandRunner.js';
export {
  err,
  ok,
  sharedErrorCodeSchema,
  type SharedError,
  type SharedErrorCode,
  type SharedFailure,
  type SharedResult,
  type SharedSuccess
} from './errors.js';
export {sleep, type SleepOutcome} from './sleep.js';

import {z} from 'zod';

export const supervisorErrorCodeSchema = z.enum(['service_command_failed', 'probe_failed']);

export type SupervisorErrorCode = z.infer<typeof supervisorErrorCodeSchema>;

export type SupervisorError = {
  code: SupervisorErrorCode;
  message: string;
};

export type SupervisorSuccess<T> = {ok: true; value: T};
export type SupervisorFailure = {ok: false; error: SupervisorError};
export type SupervisorResult<T> = SupervisorSuccess<T> | SupervisorFailure;

export const ok = <T>(value: T): SupervisorSuccess<T> => ({ok: true, value});

export const err = (code: SupervisorErrorCode, message: string): SupervisorFailure => ({
  ok: false,
  error: {code, message}
});

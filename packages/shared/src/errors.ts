import {z} from 'zod';

export const sharedErrorCodeSchema = z.enum(['command_spawn_failed', 'command_timed_out']);

export type SharedErrorCode = z.infer<typeof sharedErrorCodeSchema>;

export type SharedError = {
  code: SharedErrorCode;
  message: string;
};

export type SharedSuccess<T> = {ok: true; value: T};
export type SharedFailure = {ok: false; error: SharedError};
export type SharedResult<T> = SharedSuccess<T> | SharedFailure;

export const ok = <T>(value: T): SharedSuccess<T> => ({ok: true, value});

export const err = (code: SharedErrorCode, message: string): SharedFailure => ({
  ok: false,
  error: {code, message}
});

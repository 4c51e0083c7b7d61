import {z} from 'zod';

export const keyMaterialErrorCodeSchema = z.enum([
  'generator_unavailable',
  'generator_failed',
  'unrecognized_output',
  'invalid_private_key',
  'derived_key_mismatch',
  'invalid_short_id_set'
]);

export type KeyMaterialErrorCode = z.infer<typeof keyMaterialErrorCodeSchema>;

/** GenerationError: no valid key material could be obtained. */
export type KeyMaterialError = {
  code: KeyMaterialErrorCode;
  message: string;
  rawOutput?: string;
};

export type KeyMaterialSuccess<T> = {ok: true; value: T};
export type KeyMaterialFailure = {ok: false; error: KeyMaterialError};
export type KeyMaterialResult<T> = KeyMaterialSuccess<T> | KeyMaterialFailure;

export const ok = <T>(value: T): KeyMaterialSuccess<T> => ({ok: true, value});

export const err = (code: KeyMaterialErrorCode, message: string, rawOutput?: string): KeyMaterialFailure => ({
  ok: false,
  error: {code, message, ...(rawOutput !== undefined ? {rawOutput} : {})}
});

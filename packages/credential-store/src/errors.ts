import {z} from 'zod';

export const credentialStoreErrorCodeSchema = z.enum(['invalid_record', 'store_io_failed']);

export type CredentialStoreErrorCode = z.infer<typeof credentialStoreErrorCodeSchema>;

export type CredentialStoreError = {
  code: CredentialStoreErrorCode;
  message: string;
};

export type CredentialStoreSuccess<T> = {ok: true; value: T};
export type CredentialStoreFailure = {ok: false; error: CredentialStoreError};
export type CredentialStoreResult<T> = CredentialStoreSuccess<T> | CredentialStoreFailure;

export const ok = <T>(value: T): CredentialStoreSuccess<T> => ({ok: true, value});

export const err = (code: CredentialStoreErrorCode, message: string): CredentialStoreFailure => ({
  ok: false,
  error: {code, message}
});

import {z} from 'zod';

export const revisionsErrorCodeSchema = z.enum([
  'invalid_transition',
  'revision_not_found',
  'checksum_mismatch',
  'ledger_corrupt',
  'ledger_io_failed',
  'backup_failed',
  'write_failed',
  'no_backup_available',
  'restore_failed',
  'operation_in_progress',
  'lock_io_failed'
]);

export type RevisionsErrorCode = z.infer<typeof revisionsErrorCodeSchema>;

/** Outcome of the automatic rollback attempted after a failed write. */
export type ChainedRollback =
  | {restored: true; generation?: number}
  | {restored: false; code: RevisionsErrorCode; message: string};

export type RevisionsError = {
  code: RevisionsErrorCode;
  message: string;
  rollback?: ChainedRollback;
};

export type RevisionsSuccess<T> = {ok: true; value: T};
export type RevisionsFailure = {ok: false; error: RevisionsError};
export type RevisionsResult<T> = RevisionsSuccess<T> | RevisionsFailure;

export const ok = <T>(value: T): RevisionsSuccess<T> => ({ok: true, value});

export const err = (code: RevisionsErrorCode, message: string, rollback?: ChainedRollback): RevisionsFailure => ({
  ok: false,
  error: {code, message, ...(rollback ? {rollback} : {})}
});

export const describeError = (error: unknown) => (error instanceof Error ? error.message : String(error));

export const errnoCode = (error: unknown): string | undefined =>
  error instanceof Error && 'code' in error && typeof error.code === 'string' ? error.code : undefined;

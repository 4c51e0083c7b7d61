export {mergeEnvContent, parseEnvContent, quoteEnvValue, type EnvMerge} from './envFile.js';
export {
  credentialStoreErrorCodeSchema,
  err,
  ok,
  type CredentialStoreError,
  type CredentialStoreErrorCode,
  type CredentialStoreFailure,
  type CredentialStoreResult,
  type CredentialStoreSuccess
} from './errors.js';
export {
  CREDENTIAL_KEYS,
  CredentialRecordSchema,
  parseStoredShortIds,
  storedValueMatches,
  toManagedEntries,
  type CredentialKey,
  type CredentialRecord,
  type ManagedEntry
} from './record.js';
export {
  createCredentialStoreSynchronizer,
  type CredentialStoreSynchronizer,
  type CredentialStoreSynchronizerOptions,
  type DriftDetected,
  type DriftEntry,
  type StoreInspection,
  type Synced,
  type SyncInput,
  type SyncOutcome
} from './synchronizer.js';

export {DEFAULT_FILE_MODE, readFileMode, replaceFileAtomically, writeDurableCopy, type OpenFile, type RenameFile} from './durableFile.js';
export {
  describeError,
  err,
  errnoCode,
  ok,
  revisionsErrorCodeSchema,
  type ChainedRollback,
  type RevisionsError,
  type RevisionsErrorCode,
  type RevisionsFailure,
  type RevisionsResult,
  type RevisionsSuccess
} from './errors.js';
export {
  ALLOWED_TRANSITIONS,
  canTransition,
  ConfigRevisionSchema,
  emptyLedger,
  findActive,
  findRevision,
  LedgerSchema,
  loadLedger,
  RevisionStatusSchema,
  saveLedger,
  transitionRevision,
  type ConfigRevision,
  type Ledger,
  type RevisionStatus
} from './ledger.js';
export {
  acquireReconcileLock,
  isProcessAlive,
  type AcquireReconcileLockOptions,
  type LockHolder,
  type ReconcileLock
} from './lock.js';
export {
  createRevisionManager,
  type ActiveSnapshot,
  type AppliedRevision,
  type ManagerState,
  type PruneOutcome,
  type RestoredRevision,
  type RevisionManager,
  type RevisionManagerOptions,
  type RevisionReport
} from './manager.js';
export {
  formatStamp,
  listSnapshots,
  nextStamp,
  RETAINED_BACKUP_COUNT,
  snapshotPath,
  STAMP_WIDTH,
  type SnapshotFile,
  type SnapshotKind
} from './stamps.js';

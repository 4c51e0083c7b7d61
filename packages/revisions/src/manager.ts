import {readFile, rm} from 'node:fs/promises';

import type {StructuredLogger} from '@reality-reconciler/logging';
import {checksumContent} from '@reality-reconciler/proxy-config';

import {
  readFileMode,
  replaceFileAtomically,
  writeDurableCopy,
  type OpenFile,
  type RenameFile
} from './durableFile.js';
import {describeError, err, errnoCode, ok, type ChainedRollback, type RevisionsResult} from './errors.js';
import {
  emptyLedger,
  findActive,
  findRevision,
  loadLedger,
  nextGeneration,
  replaceRevision,
  revisionId,
  saveLedger,
  transitionRevision,
  type ConfigRevision,
  type Ledger
} from './ledger.js';
import {
  listSnapshots,
  nextStamp,
  RETAINED_BACKUP_COUNT,
  snapshotPath,
  type SnapshotFile,
  type SnapshotKind
} from './stamps.js';

export type ManagerState = 'idle' | 'backing-up' | 'writing' | 'active' | 'rolling-back' | 'failed';

export type RevisionManagerOptions = {
  activePath: string;
  ledgerPath: string;
  logger: StructuredLogger;
  now?: () => Date;
  retainedBackupCount?: number;
  renameFile?: RenameFile;
  openFile?: OpenFile;
};

export type ActiveSnapshot = {
  revision: ConfigRevision;
  content: string;
};

export type AppliedRevision = {
  revision: ConfigRevision;
  previous?: ConfigRevision;
  backupPath?: string;
};

export type RestoredRevision = {
  revision: ConfigRevision;
  discarded?: ConfigRevision;
  discardedPath?: string;
  reason: string;
};

export type PruneOutcome = {
  removed: string[];
};

export type RevisionReport = {
  state: ManagerState;
  activePath: string;
  revisions: ConfigRevision[];
  snapshots: SnapshotFile[];
};

export type RevisionManager = {
  readonly state: ManagerState;
  loadLedger: () => Promise<RevisionsResult<Ledger>>;
  readActive: () => Promise<RevisionsResult<ActiveSnapshot | undefined>>;
  registerCandidate: (input: {content: string}) => Promise<RevisionsResult<ConfigRevision>>;
  markValidated: (id: string) => Promise<RevisionsResult<ConfigRevision>>;
  discard: (input: {id: string; reason: string}) => Promise<RevisionsResult<ConfigRevision>>;
  apply: (input: {revisionId: string; content: string}) => Promise<RevisionsResult<AppliedRevision>>;
  rollback: (input: {reason: string}) => Promise<RevisionsResult<RestoredRevision>>;
  prune: () => Promise<RevisionsResult<PruneOutcome>>;
  report: () => Promise<RevisionsResult<RevisionReport>>;
};

const COMPONENT = 'revisions.manager';

const readOptionalFile = async (path: string): Promise<Buffer | undefined> => {
  try {
    return await readFile(path);
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') {
      return undefined;
    }
    throw error;
  }
};

export const createRevisionManager = ({
  activePath,
  ledgerPath,
  logger,
  now = () => new Date(),
  retainedBackupCount = RETAINED_BACKUP_COUNT,
  renameFile,
  openFile
}: RevisionManagerOptions): RevisionManager => {
  let state: ManagerState = 'idle';

  const enter = (next: ManagerState) => {
    if (next !== state) {
      logger.debug({
        event: 'revision.manager.state',
        component: COMPONENT,
        metadata: {from: state, to: next}
      });
    }
    state = next;
  };

  const createSnapshot = async ({kind, content}: {kind: SnapshotKind; content: Uint8Array}) => {
    const existing = await listSnapshots(activePath);
    const stamp = nextStamp({existing: existing.map(snapshot => snapshot.stamp), nowMs: now().getTime()});
    const path = snapshotPath({activePath, kind, stamp});
    await writeDurableCopy({path, content, mode: await readFileMode(activePath), openFile});
    return path;
  };

  const persist = async (ledger: Ledger) => saveLedger(ledgerPath, ledger);

  const adopt = async (ledger: Ledger): Promise<RevisionsResult<Ledger>> => {
    let content: Buffer | undefined;
    try {
      content = await readOptionalFile(activePath);
    } catch (error) {
      return err('ledger_io_failed', `could not read active config ${activePath}: ${describeError(error)}`);
    }
    if (!content) {
      return ok(ledger);
    }

    const checksum = checksumContent(content);
    const current = findActive(ledger);
    if (current?.checksum === checksum) {
      return ok(ledger);
    }

    let next = ledger;
    if (current) {
      const superseded = transitionRevision(current, 'discarded', {reason: 'superseded by an edit outside the reconciler'});
      if (!superseded.ok) {
        return superseded;
      }
      next = replaceRevision(next, superseded.value);
    }

    const generation = nextGeneration(next);
    const adopted: ConfigRevision = {
      id: revisionId(generation),
      generation,
      createdAt: now().toISOString(),
      checksum,
      status: 'active',
      reason: 'adopted existing config'
    };
    logger.info({
      event: 'revision.adopted',
      component: COMPONENT,
      revision_id: adopted.id,
      metadata: {generation, checksum, replaced: current?.id ?? null}
    });
    return persist({...next, revisions: [...next.revisions, adopted]});
  };

  const loadCurrentLedger = async (): Promise<RevisionsResult<Ledger>> => {
    const loaded = await loadLedger(ledgerPath);
    if (!loaded.ok) {
      return loaded;
    }
    return adopt(loaded.value ?? emptyLedger());
  };

  const updateRevision = async ({
    id,
    to,
    reason
  }: {
    id: string;
    to: 'validated' | 'discarded';
    reason?: string;
  }): Promise<RevisionsResult<ConfigRevision>> => {
    const ledger = await loadCurrentLedger();
    if (!ledger.ok) {
      return ledger;
    }
    const revision = findRevision(ledger.value, id);
    if (!revision) {
      return err('revision_not_found', `revision ${id} is not in the ledger`);
    }

    const next = transitionRevision(revision, to, reason ? {reason} : {});
    if (!next.ok) {
      return next;
    }
    const saved = await persist(replaceRevision(ledger.value, next.value));
    if (!saved.ok) {
      return saved;
    }

    logger.info({
      event: `revision.${to}`,
      component: COMPONENT,
      revision_id: id,
      metadata: reason ? {reason} : {}
    });
    return ok(next.value);
  };

  /** Puts the pre-apply bytes back after a failed write; the ledger still names them active. */
  const restoreAfterFailedWrite = async ({
    previous,
    priorContent
  }: {
    previous: ConfigRevision | undefined;
    priorContent: Buffer | undefined;
  }): Promise<ChainedRollback> => {
    enter('rolling-back');
    try {
      if (priorContent) {
        await replaceFileAtomically({path: activePath, content: priorContent, renameFile, openFile});
      } else {
        await rm(activePath, {force: true});
      }
      enter(previous ? 'active' : 'idle');
      return previous ? {restored: true, generation: previous.generation} : {restored: true};
    } catch (error) {
      enter('failed');
      return {restored: false, code: 'restore_failed', message: describeError(error)};
    }
  };

  const apply: RevisionManager['apply'] = async ({revisionId: id, content}) => {
    const ledger = await loadCurrentLedger();
    if (!ledger.ok) {
      return ledger;
    }
    const candidate = findRevision(ledger.value, id);
    if (!candidate) {
      return err('revision_not_found', `revision ${id} is not in the ledger`);
    }
    if (candidate.status !== 'validated') {
      return err('invalid_transition', `revision ${id} is ${candidate.status}; only validated revisions can be applied`);
    }
    if (checksumContent(content) !== candidate.checksum) {
      return err('checksum_mismatch', `content does not match revision ${id}`);
    }

    const previous = findActive(ledger.value);
    let priorContent: Buffer | undefined;
    let backupPath: string | undefined;

    enter('backing-up');
    try {
      priorContent = await readOptionalFile(activePath);
      if (priorContent) {
        backupPath = await createSnapshot({kind: 'backup', content: priorContent});
        logger.info({
          event: 'revision.backup.created',
          component: COMPONENT,
          revision_id: previous?.id,
          metadata: {path: backupPath}
        });
      }
    } catch (error) {
      enter(previous ? 'active' : 'idle');
      const message = `could not snapshot ${activePath}: ${describeError(error)}`;
      const discarded = transitionRevision(candidate, 'discarded', {reason: message});
      const saved = discarded.ok ? await persist(replaceRevision(ledger.value, discarded.value)) : discarded;
      logger.error({
        event: 'revision.backup.failed',
        component: COMPONENT,
        revision_id: id,
        reason_code: 'backup_failed',
        message,
        ...(saved.ok ? {} : {metadata: {ledger: saved.error.message}})
      });
      return err('backup_failed', message);
    }

    const failApply = async (code: 'write_failed' | 'ledger_io_failed', message: string) => {
      const rollback = await restoreAfterFailedWrite({previous, priorContent});
      const discarded = transitionRevision(candidate, 'discarded', {reason: message});
      if (discarded.ok) {
        const saved = await persist(replaceRevision(ledger.value, discarded.value));
        if (!saved.ok) {
          logger.error({
            event: 'revision.ledger.write.failed',
            component: COMPONENT,
            revision_id: id,
            message: saved.error.message
          });
        }
      }
      logger.error({
        event: 'revision.apply.failed',
        component: COMPONENT,
        revision_id: id,
        reason_code: code,
        message,
        metadata: {rollback}
      });
      return err(code, message, rollback);
    };

    enter('writing');
    try {
      await replaceFileAtomically({path: activePath, content, renameFile, openFile});
    } catch (error) {
      return failApply('write_failed', `could not write ${activePath}: ${describeError(error)}`);
    }

    const activated = transitionRevision(candidate, 'active', {path: undefined, reason: undefined});
    if (!activated.ok) {
      return failApply('write_failed', activated.error.message);
    }
    let nextLedger = replaceRevision(ledger.value, activated.value);
    let demoted: ConfigRevision | undefined;
    if (previous) {
      const demotion = backupPath
        ? transitionRevision(previous, 'backup', {path: backupPath})
        : transitionRevision(previous, 'discarded', {reason: 'active file was missing at apply time'});
      if (!demotion.ok) {
        return failApply('write_failed', demotion.error.message);
      }
      demoted = demotion.value;
      nextLedger = replaceRevision(nextLedger, demoted);
    }

    const saved = await persist(nextLedger);
    if (!saved.ok) {
      return failApply('ledger_io_failed', saved.error.message);
    }

    enter('active');
    logger.info({
      event: 'revision.applied',
      component: COMPONENT,
      revision_id: id,
      metadata: {generation: candidate.generation, previous: previous?.id ?? null}
    });
    return ok({
      revision: activated.value,
      ...(demoted ? {previous: demoted} : {}),
      ...(backupPath ? {backupPath} : {})
    });
  };

  const rollback: RevisionManager['rollback'] = async ({reason}) => {
    const ledger = await loadCurrentLedger();
    if (!ledger.ok) {
      return ledger;
    }

    const newestBackup = ledger.value.revisions
      .filter(revision => revision.status === 'backup' && revision.path !== undefined)
      .sort((left, right) => right.generation - left.generation)[0];
    if (!newestBackup?.path) {
      return err('no_backup_available', 'there is no backup revision to restore');
    }
    const current = findActive(ledger.value);

    const fail = (message: string) => {
      enter('failed');
      logger.fatal({
        event: 'revision.rollback.failed',
        component: COMPONENT,
        revision_id: newestBackup.id,
        reason_code: 'restore_failed',
        message,
        metadata: {reason}
      });
      return err('restore_failed', message);
    };

    enter('rolling-back');
    let backupContent: Buffer;
    try {
      backupContent = await readFile(newestBackup.path);
    } catch (error) {
      return fail(`could not read backup ${newestBackup.path}: ${describeError(error)}`);
    }
    if (checksumContent(backupContent) !== newestBackup.checksum) {
      return fail(`backup ${newestBackup.path} does not match revision ${newestBackup.id}`);
    }

    let discardedPath: string | undefined;
    try {
      const failedContent = await readOptionalFile(activePath);
      if (failedContent) {
        discardedPath = await createSnapshot({kind: 'discarded', content: failedContent});
      }
    } catch (error) {
      logger.warn({
        event: 'revision.discarded.copy.failed',
        component: COMPONENT,
        revision_id: current?.id,
        message: describeError(error)
      });
    }

    try {
      await replaceFileAtomically({path: activePath, content: backupContent, renameFile, openFile});
    } catch (error) {
      return fail(`could not restore ${activePath}: ${describeError(error)}`);
    }

    const restored = transitionRevision(newestBackup, 'active', {path: undefined, reason: `restored: ${reason}`});
    if (!restored.ok) {
      return fail(restored.error.message);
    }
    let nextLedger = replaceRevision(ledger.value, restored.value);
    let discarded: ConfigRevision | undefined;
    if (current) {
      const discarding = transitionRevision(current, 'discarded', {path: discardedPath, reason});
      if (!discarding.ok) {
        return fail(discarding.error.message);
      }
      discarded = discarding.value;
      nextLedger = replaceRevision(nextLedger, discarded);
    }

    const saved = await persist(nextLedger);
    if (!saved.ok) {
      return fail(saved.error.message);
    }

    enter('active');
    logger.warn({
      event: 'revision.rollback.completed',
      component: COMPONENT,
      revision_id: restored.value.id,
      metadata: {generation: restored.value.generation, discarded: discarded?.id ?? null, reason}
    });
    return ok({
      revision: restored.value,
      ...(discarded ? {discarded} : {}),
      ...(discardedPath ? {discardedPath} : {}),
      reason
    });
  };

  const prune: RevisionManager['prune'] = async () => {
    const ledger = await loadCurrentLedger();
    if (!ledger.ok) {
      return ledger;
    }

    const removed: string[] = [];
    try {
      const snapshots = await listSnapshots(activePath);
      for (const kind of ['backup', 'discarded'] as const) {
        const ofKind = snapshots.filter(snapshot => snapshot.kind === kind);
        for (const snapshot of ofKind.slice(0, Math.max(0, ofKind.length - retainedBackupCount))) {
          await rm(snapshot.path, {force: true});
          removed.push(snapshot.path);
        }
      }
    } catch (error) {
      return err('ledger_io_failed', `could not prune snapshots of ${activePath}: ${describeError(error)}`);
    }

    const removedPaths = new Set(removed);
    const revisions: ConfigRevision[] = [];
    for (const revision of ledger.value.revisions) {
      if (revision.path === undefined || !removedPaths.has(revision.path)) {
        revisions.push(revision);
        continue;
      }
      if (revision.status === 'backup') {
        const pruned = transitionRevision(revision, 'discarded', {path: undefined, reason: 'pruned'});
        if (!pruned.ok) {
          return pruned;
        }
        revisions.push(pruned.value);
        continue;
      }
      const withoutPath: ConfigRevision = {...revision};
      delete withoutPath.path;
      revisions.push(withoutPath);
    }

    const keptDiscarded = new Set(
      revisions
        .filter(revision => revision.status === 'discarded')
        .sort((left, right) => right.generation - left.generation)
        .slice(0, retainedBackupCount)
        .map(revision => revision.id)
    );
    const saved = await persist({
      ...ledger.value,
      revisions: revisions.filter(revision => revision.status !== 'discarded' || keptDiscarded.has(revision.id))
    });
    if (!saved.ok) {
      return saved;
    }

    if (removed.length > 0) {
      logger.info({
        event: 'revision.pruned',
        component: COMPONENT,
        metadata: {removed}
      });
    }
    return ok({removed});
  };

  return {
    get state() {
      return state;
    },
    loadLedger: loadCurrentLedger,
    readActive: async () => {
      const ledger = await loadCurrentLedger();
      if (!ledger.ok) {
        return ledger;
      }
      const revision = findActive(ledger.value);
      if (!revision) {
        return ok(undefined);
      }
      try {
        const content = await readOptionalFile(activePath);
        if (!content) {
          return ok(undefined);
        }
        if (state === 'idle') {
          enter('active');
        }
        return ok({revision, content: content.toString('utf8')});
      } catch (error) {
        return err('ledger_io_failed', `could not read active config ${activePath}: ${describeError(error)}`);
      }
    },
    registerCandidate: async ({content}) => {
      const ledger = await loadCurrentLedger();
      if (!ledger.ok) {
        return ledger;
      }
      const generation = nextGeneration(ledger.value);
      const revision: ConfigRevision = {
        id: revisionId(generation),
        generation,
        createdAt: now().toISOString(),
        checksum: checksumContent(content),
        status: 'draft'
      };
      const saved = await persist({...ledger.value, revisions: [...ledger.value.revisions, revision]});
      if (!saved.ok) {
        return saved;
      }
      logger.debug({
        event: 'revision.registered',
        component: COMPONENT,
        revision_id: revision.id,
        metadata: {generation, checksum: revision.checksum}
      });
      return ok(revision);
    },
    markValidated: id => updateRevision({id, to: 'validated'}),
    discard: ({id, reason}) => updateRevision({id, to: 'discarded', reason}),
    apply,
    rollback,
    prune,
    report: async () => {
      const ledger = await loadCurrentLedger();
      if (!ledger.ok) {
        return ledger;
      }
      try {
        return ok({
          state,
          activePath,
          revisions: ledger.value.revisions,
          snapshots: await listSnapshots(activePath)
        });
      } catch (error) {
        return err('ledger_io_failed', `could not list snapshots of ${activePath}: ${describeError(error)}`);
      }
    }
  };
};

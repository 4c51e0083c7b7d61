import {createHash} from 'node:crypto';
import {mkdtemp, open, readdir, readFile, rename, rm, writeFile} from 'node:fs/promises';
import {tmpdir} from 'node:os';
import {join} from 'node:path';

import {createNoopLogger} from '@reality-reconciler/logging';
import {afterEach, beforeEach, describe, expect, it} from 'vitest';

import {
  createRevisionManager,
  listSnapshots,
  replaceFileAtomically,
  type OpenFile,
  type RenameFile,
  type RevisionManager
} from '../index.js';

const FIXED_NOW = new Date('2026-01-01T00:00:00.000Z');
const FIRST_STAMP = String(FIXED_NOW.getTime()).padStart(15, '0');
const SECOND_STAMP = String(FIXED_NOW.getTime() + 1).padStart(15, '0');

const CONFIG_A = '{\n  "generation": "a"\n}\n';
const CONFIG_B = '{\n  "generation": "b"\n}\n';
const CONFIG_C = '{\n  "generation": "c"\n}\n';
const CONFIG_D = '{\n  "generation": "d"\n}\n';

/** Opens files normally but fails the fsync of any path containing `marker`. */
const failingSyncFor =
  (marker: string): OpenFile =>
  async (path, flags, mode) => {
    const handle = await open(path, flags, mode);
    if (path.includes(marker)) {
      handle.sync = async () => {
        throw new Error('simulated fsync failure');
      };
    }
    return handle;
  };

const sha256 = (content: string) => createHash('sha256').update(content).digest('hex');

describe('createRevisionManager', () => {
  let dir: string;
  let activePath: string;
  let ledgerPath: string;

  const createManager = (options: {renameFile?: RenameFile; openFile?: OpenFile; retainedBackupCount?: number} = {}) =>
    createRevisionManager({
      activePath,
      ledgerPath,
      logger: createNoopLogger(),
      now: () => FIXED_NOW,
      ...options
    });

  const stageCandidate = async (manager: RevisionManager, content: string) => {
    const draft = await manager.registerCandidate({content});
    if (!draft.ok) {
      throw new Error(draft.error.message);
    }
    const validated = await manager.markValidated(draft.value.id);
    if (!validated.ok) {
      throw new Error(validated.error.message);
    }
    return validated.value;
  };

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'revisions-manager-'));
    activePath = join(dir, 'config.json');
    ledgerPath = join(dir, 'revisions.json');
  });

  afterEach(async () => {
    await rm(dir, {recursive: true, force: true});
  });

  it('adopts an existing active file as generation 0', async () => {
    await writeFile(activePath, CONFIG_A, 'utf8');

    const ledger = await createManager().loadLedger();

    expect(ledger).toEqual({
      ok: true,
      value: {
        version: 1,
        revisions: [
          {
            id: 'rev-0000',
            generation: 0,
            createdAt: '2026-01-01T00:00:00.000Z',
            checksum: sha256(CONFIG_A),
            status: 'active',
            reason: 'adopted existing config'
          }
        ]
      }
    });
  });

  it('applies a candidate and rolls back to the byte-identical prior file', async () => {
    await writeFile(activePath, CONFIG_A, 'utf8');
    const manager = createManager();
    const candidate = await stageCandidate(manager, CONFIG_B);

    const applied = await manager.apply({revisionId: candidate.id, content: CONFIG_B});

    const backupPath = `${activePath}.backup.${FIRST_STAMP}`;
    expect(applied).toEqual({
      ok: true,
      value: {
        revision: {...candidate, status: 'active'},
        previous: {
          id: 'rev-0000',
          generation: 0,
          createdAt: '2026-01-01T00:00:00.000Z',
          checksum: sha256(CONFIG_A),
          status: 'backup',
          path: backupPath,
          reason: 'adopted existing config'
        },
        backupPath
      }
    });
    expect(manager.state).toBe('active');
    await expect(readFile(activePath, 'utf8')).resolves.toBe(CONFIG_B);
    await expect(readFile(backupPath, 'utf8')).resolves.toBe(CONFIG_A);

    const restored = await manager.rollback({reason: 'config-rejected-at-startup'});

    const discardedPath = `${activePath}.discarded.${SECOND_STAMP}`;
    expect(restored.ok).toBe(true);
    if (!restored.ok) {
      return;
    }
    expect(restored.value.revision).toMatchObject({id: 'rev-0000', status: 'active', checksum: sha256(CONFIG_A)});
    expect(restored.value.revision.path).toBeUndefined();
    expect(restored.value.discarded).toMatchObject({
      id: candidate.id,
      status: 'discarded',
      path: discardedPath,
      reason: 'config-rejected-at-startup'
    });
    expect(restored.value.discardedPath).toBe(discardedPath);
    await expect(readFile(activePath, 'utf8')).resolves.toBe(CONFIG_A);
    await expect(readFile(discardedPath, 'utf8')).resolves.toBe(CONFIG_B);
  });

  it('skips the snapshot on a first apply', async () => {
    const manager = createManager();
    const candidate = await stageCandidate(manager, CONFIG_A);

    const applied = await manager.apply({revisionId: candidate.id, content: CONFIG_A});

    expect(applied).toEqual({ok: true, value: {revision: {...candidate, status: 'active'}}});
    await expect(listSnapshots(activePath)).resolves.toEqual([]);
    const rollback = await manager.rollback({reason: 'slow-start'});
    expect(!rollback.ok && rollback.error.code).toBe('no_backup_available');
  });

  it('only applies validated revisions with matching content', async () => {
    await writeFile(activePath, CONFIG_A, 'utf8');
    const manager = createManager();
    const draft = await manager.registerCandidate({content: CONFIG_B});
    expect(draft.ok).toBe(true);
    if (!draft.ok) {
      return;
    }

    const notValidated = await manager.apply({revisionId: draft.value.id, content: CONFIG_B});
    expect(!notValidated.ok && notValidated.error.code).toBe('invalid_transition');

    await manager.markValidated(draft.value.id);
    const mismatch = await manager.apply({revisionId: draft.value.id, content: CONFIG_C});
    expect(!mismatch.ok && mismatch.error.code).toBe('checksum_mismatch');

    await expect(readFile(activePath, 'utf8')).resolves.toBe(CONFIG_A);
    await expect(listSnapshots(activePath)).resolves.toEqual([]);
  });

  it('restores the prior file when the rename fails', async () => {
    await writeFile(activePath, CONFIG_A, 'utf8');
    let failuresLeft = 1;
    const renameFile: RenameFile = async (from, to) => {
      if (failuresLeft > 0) {
        failuresLeft -= 1;
        throw new Error('simulated rename failure');
      }
      await rename(from, to);
    };
    const manager = createManager({renameFile});
    const candidate = await stageCandidate(manager, CONFIG_B);

    const applied = await manager.apply({revisionId: candidate.id, content: CONFIG_B});

    expect(applied).toEqual({
      ok: false,
      error: {
        code: 'write_failed',
        message: `could not write ${activePath}: simulated rename failure`,
        rollback: {restored: true, generation: 0}
      }
    });
    expect(manager.state).toBe('active');
    await expect(readFile(activePath, 'utf8')).resolves.toBe(CONFIG_A);

    const ledger = await manager.loadLedger();
    expect(ledger.ok && ledger.value.revisions.map(revision => [revision.id, revision.status])).toEqual([
      ['rev-0000', 'active'],
      [candidate.id, 'discarded']
    ]);
  });

  it('discards the candidate and leaves no partial snapshot when the backup fails', async () => {
    await writeFile(activePath, CONFIG_A, 'utf8');
    const manager = createManager({openFile: failingSyncFor('.backup.')});
    const candidate = await stageCandidate(manager, CONFIG_B);

    const applied = await manager.apply({revisionId: candidate.id, content: CONFIG_B});

    const message = `could not snapshot ${activePath}: simulated fsync failure`;
    expect(applied).toEqual({ok: false, error: {code: 'backup_failed', message}});
    await expect(readFile(activePath, 'utf8')).resolves.toBe(CONFIG_A);
    await expect(listSnapshots(activePath)).resolves.toEqual([]);

    const ledger = await manager.loadLedger();
    expect(ledger.ok && ledger.value.revisions.find(revision => revision.id === candidate.id)).toMatchObject({
      status: 'discarded',
      reason: message
    });
  });

  it('removes the temp file when an atomic replace cannot be written', async () => {
    await writeFile(activePath, CONFIG_A, 'utf8');

    await expect(
      replaceFileAtomically({path: activePath, content: CONFIG_B, openFile: failingSyncFor('.tmp')})
    ).rejects.toThrow('simulated fsync failure');

    await expect(readdir(dir)).resolves.toEqual(['config.json']);
    await expect(readFile(activePath, 'utf8')).resolves.toBe(CONFIG_A);
  });

  it('refuses to restore a backup whose content changed', async () => {
    await writeFile(activePath, CONFIG_A, 'utf8');
    const manager = createManager();
    const candidate = await stageCandidate(manager, CONFIG_B);
    const applied = await manager.apply({revisionId: candidate.id, content: CONFIG_B});
    expect(applied.ok).toBe(true);
    await writeFile(`${activePath}.backup.${FIRST_STAMP}`, CONFIG_C, 'utf8');

    const restored = await manager.rollback({reason: 'slow-start'});

    expect(!restored.ok && restored.error.code).toBe('restore_failed');
    expect(manager.state).toBe('failed');
    await expect(readFile(activePath, 'utf8')).resolves.toBe(CONFIG_B);
  });

  it('adopts an edit made outside the reconciler as a new generation', async () => {
    await writeFile(activePath, CONFIG_A, 'utf8');
    const manager = createManager();
    await manager.loadLedger();
    await writeFile(activePath, CONFIG_B, 'utf8');

    const ledger = await manager.loadLedger();

    expect(ledger.ok && ledger.value.revisions).toEqual([
      {
        id: 'rev-0000',
        generation: 0,
        createdAt: '2026-01-01T00:00:00.000Z',
        checksum: sha256(CONFIG_A),
        status: 'discarded',
        reason: 'superseded by an edit outside the reconciler'
      },
      {
        id: 'rev-0001',
        generation: 1,
        createdAt: '2026-01-01T00:00:00.000Z',
        checksum: sha256(CONFIG_B),
        status: 'active',
        reason: 'adopted existing config'
      }
    ]);
  });

  it('prunes snapshots beyond the retention count', async () => {
    await writeFile(activePath, CONFIG_A, 'utf8');
    const manager = createManager({retainedBackupCount: 2});
    for (const content of [CONFIG_B, CONFIG_C, CONFIG_D]) {
      const candidate = await stageCandidate(manager, content);
      const applied = await manager.apply({revisionId: candidate.id, content});
      expect(applied.ok).toBe(true);
    }
    expect((await listSnapshots(activePath)).map(snapshot => snapshot.kind)).toEqual(['backup', 'backup', 'backup']);

    const pruned = await manager.prune();

    expect(pruned).toEqual({ok: true, value: {removed: [`${activePath}.backup.${FIRST_STAMP}`]}});
    const ledger = await manager.loadLedger();
    expect(ledger.ok && ledger.value.revisions.map(revision => [revision.id, revision.status])).toEqual([
      ['rev-0000', 'discarded'],
      ['rev-0001', 'backup'],
      ['rev-0002', 'backup'],
      ['rev-0003', 'active']
    ]);
  });
});

import {readFile, rm} from 'node:fs/promises';

import {KeyMaterialStringSchema} from '@reality-reconciler/keymaterial';
import type {StructuredLogger} from '@reality-reconciler/logging';
import {
  describeError,
  errnoCode,
  listSnapshots,
  nextStamp,
  readFileMode,
  replaceFileAtomically,
  RETAINED_BACKUP_COUNT,
  snapshotPath,
  writeDurableCopy
} from '@reality-reconciler/revisions';

import {mergeEnvContent, parseEnvContent} from './envFile.js';
import {err, ok, type CredentialStoreResult} from './errors.js';
import {
  CREDENTIAL_KEYS,
  CredentialRecordSchema,
  storedValueMatches,
  toManagedEntries,
  type CredentialKey,
  type CredentialRecord
} from './record.js';

/** One diverged key. Private key values are masked; the rest are shown as stored. */
export type DriftEntry = {
  key: CredentialKey;
  storedValue: string;
  activeValue: string;
  previousValue?: string;
  detail: string;
};

export type Synced = {
  status: 'synced';
  changed: boolean;
  updatedKeys: string[];
  backupPath?: string;
};

export type DriftDetected = {
  status: 'drift';
  drift: DriftEntry[];
};

export type SyncOutcome = Synced | DriftDetected;

export type StoreInspection = {
  present: boolean;
  inSync: boolean;
  drift: DriftEntry[];
};

export type SyncInput = {
  active: CredentialRecord;
  previous?: CredentialRecord;
  force?: boolean;
};

export type CredentialStoreSynchronizer = {
  sync: (input: SyncInput) => Promise<CredentialStoreResult<SyncOutcome>>;
  inspect: (input: {active: CredentialRecord}) => Promise<CredentialStoreResult<StoreInspection>>;
  /** The stored public key, when the store's private key is `privateKey`. */
  storedPublicKey: (input: {privateKey: string}) => Promise<CredentialStoreResult<string | undefined>>;
};

export type CredentialStoreSynchronizerOptions = {
  storePath: string;
  logger: StructuredLogger;
  now?: () => Date;
  retainedBackupCount?: number;
};

const COMPONENT = 'credential-store';
const MASKED_VALUE = '[REDACTED]';

const displayValue = (key: CredentialKey, value: string) =>
  key === CREDENTIAL_KEYS.privateKey ? MASKED_VALUE : value;
const DEFAULT_STORE_MODE = 0o600;

const detectDrift = ({
  stored,
  active,
  previous
}: {
  stored: Record<string, string>;
  active: CredentialRecord;
  previous?: CredentialRecord;
}): DriftEntry[] => {
  const previousValues = new Map(previous ? toManagedEntries(previous) : []);
  const drift: DriftEntry[] = [];

  for (const [key, expected] of toManagedEntries(active)) {
    const current = stored[key];
    if (current === undefined) {
      continue;
    }
    if (storedValueMatches({key, stored: current, expected})) {
      continue;
    }
    const previousValue = previousValues.get(key);
    if (previousValue !== undefined && storedValueMatches({key, stored: current, expected: previousValue})) {
      continue;
    }
    drift.push({
      key,
      storedValue: displayValue(key, current.trim()),
      activeValue: displayValue(key, expected),
      ...(previousValue !== undefined ? {previousValue: displayValue(key, previousValue)} : {}),
      detail: 'stored value matches neither the active nor the previous revision'
    });
  }

  return drift;
};

export const createCredentialStoreSynchronizer = ({
  storePath,
  logger,
  now = () => new Date(),
  retainedBackupCount = RETAINED_BACKUP_COUNT
}: CredentialStoreSynchronizerOptions): CredentialStoreSynchronizer => {
  const readStore = async (): Promise<CredentialStoreResult<{content: string; present: boolean}>> => {
    try {
      return ok({content: await readFile(storePath, 'utf8'), present: true});
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        return ok({content: '', present: false});
      }
      return err('store_io_failed', `could not read ${storePath}: ${describeError(error)}`);
    }
  };

  const validateRecord = (record: CredentialRecord, label: string): CredentialStoreResult<CredentialRecord> => {
    const parsed = CredentialRecordSchema.safeParse(record);
    if (!parsed.success) {
      return err(
        'invalid_record',
        `${label} credentials are invalid: ${parsed.error.issues.map(issue => issue.path.join('.')).join(', ')}`
      );
    }
    return ok(parsed.data);
  };

  const writeWithBackup = async ({
    content,
    original,
    present
  }: {
    content: string;
    original: string;
    present: boolean;
  }): Promise<string | undefined> => {
    const mode = (await readFileMode(storePath)) ?? DEFAULT_STORE_MODE;
    let backupPath: string | undefined;
    if (present) {
      const existing = await listSnapshots(storePath);
      const stamp = nextStamp({existing: existing.map(snapshot => snapshot.stamp), nowMs: now().getTime()});
      backupPath = snapshotPath({activePath: storePath, kind: 'backup', stamp});
      await writeDurableCopy({path: backupPath, content: original, mode});
    }
    await replaceFileAtomically({path: storePath, content, mode});

    const backups = (await listSnapshots(storePath)).filter(snapshot => snapshot.kind === 'backup');
    for (const snapshot of backups.slice(0, Math.max(0, backups.length - retainedBackupCount))) {
      await rm(snapshot.path, {force: true});
    }
    return backupPath;
  };

  const sync: CredentialStoreSynchronizer['sync'] = async ({active, previous, force = false}) => {
    const activeRecord = validateRecord(active, 'active');
    if (!activeRecord.ok) {
      return activeRecord;
    }
    let previousRecord: CredentialRecord | undefined;
    if (previous) {
      const parsedPrevious = validateRecord(previous, 'previous');
      if (!parsedPrevious.ok) {
        return parsedPrevious;
      }
      previousRecord = parsedPrevious.value;
    }

    const store = await readStore();
    if (!store.ok) {
      return store;
    }

    const drift = detectDrift({
      stored: parseEnvContent(store.value.content),
      active: activeRecord.value,
      ...(previousRecord ? {previous: previousRecord} : {})
    });
    if (drift.length > 0 && !force) {
      logger.warn({
        event: 'credentials.drift.detected',
        component: COMPONENT,
        reason_code: 'drift',
        metadata: {keys: drift.map(entry => entry.key), storePath}
      });
      return ok({status: 'drift', drift});
    }

    const merged = mergeEnvContent(store.value.content, toManagedEntries(activeRecord.value));
    if (!merged.changed) {
      logger.debug({event: 'credentials.unchanged', component: COMPONENT, metadata: {storePath}});
      return ok({status: 'synced', changed: false, updatedKeys: []});
    }

    let backupPath: string | undefined;
    try {
      backupPath = await writeWithBackup({
        content: merged.content,
        original: store.value.content,
        present: store.value.present
      });
    } catch (error) {
      return err('store_io_failed', `could not update ${storePath}: ${describeError(error)}`);
    }

    logger.info({
      event: 'credentials.synced',
      component: COMPONENT,
      metadata: {
        storePath,
        updatedKeys: merged.updatedKeys,
        forced: force && drift.length > 0,
        backupPath: backupPath ?? null
      }
    });
    return ok({
      status: 'synced',
      changed: true,
      updatedKeys: merged.updatedKeys,
      ...(backupPath ? {backupPath} : {})
    });
  };

  const inspect: CredentialStoreSynchronizer['inspect'] = async ({active}) => {
    const activeRecord = validateRecord(active, 'active');
    if (!activeRecord.ok) {
      return activeRecord;
    }
    const store = await readStore();
    if (!store.ok) {
      return store;
    }

    return ok({
      present: store.value.present,
      inSync: !mergeEnvContent(store.value.content, toManagedEntries(activeRecord.value)).changed,
      drift: detectDrift({stored: parseEnvContent(store.value.content), active: activeRecord.value})
    });
  };

  const storedPublicKey: CredentialStoreSynchronizer['storedPublicKey'] = async ({privateKey}) => {
    const store = await readStore();
    if (!store.ok) {
      return store;
    }
    const stored = parseEnvContent(store.value.content);
    if (stored[CREDENTIAL_KEYS.privateKey]?.trim() !== privateKey) {
      return ok(undefined);
    }
    const publicKey = KeyMaterialStringSchema.safeParse(stored[CREDENTIAL_KEYS.publicKey]?.trim());
    return ok(publicKey.success ? publicKey.data : undefined);
  };

  return {sync, inspect, storedPublicKey};
};

import {randomUUID} from 'node:crypto';
import {link, readFile, rename, rm, writeFile} from 'node:fs/promises';

import {sleep} from '@reality-reconciler/shared';
import {z} from 'zod';

import {describeError, err, errnoCode, ok, type RevisionsResult} from './errors.js';

const LockContentSchema = z.object({
  pid: z.number().int().positive(),
  acquiredAt: z.string(),
  token: z.string().optional()
});

export type LockHolder = z.infer<typeof LockContentSchema>;

export type ReconcileLock = {
  path: string;
  holder: LockHolder;
  release: () => Promise<void>;
};

export type AcquireReconcileLockOptions = {
  lockPath: string;
  acquireTimeoutMs?: number;
  retryIntervalMs?: number;
  pid?: number;
  now?: () => Date;
  isProcessAlive?: (pid: number) => boolean;
};

export const isProcessAlive = (pid: number) => {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    return errnoCode(error) === 'EPERM';
  }
};

const readHolder = async (lockPath: string): Promise<LockHolder | undefined> => {
  try {
    const parsed = LockContentSchema.safeParse(JSON.parse(await readFile(lockPath, 'utf8')));
    return parsed.success ? parsed.data : undefined;
  } catch (error) {
    if (errnoCode(error) === 'ENOENT' || error instanceof SyntaxError) {
      return undefined;
    }
    throw error;
  }
};

const sameHolder = (left: LockHolder, right: LockHolder) =>
  left.pid === right.pid && left.acquiredAt === right.acquiredAt && left.token === right.token;

/**
 * Moves a dead holder's lock aside. Another contender may have reclaimed it and
 * written a fresh lock in the meantime; a lock that is not `stale` is linked
 * back in place, which never overwrites a newer one.
 */
const reclaimStaleLock = async (lockPath: string, stale: LockHolder) => {
  const parked = `${lockPath}.stale-${randomUUID()}`;
  try {
    await rename(lockPath, parked);
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') {
      return;
    }
    throw error;
  }

  try {
    const parkedHolder = await readHolder(parked);
    if (!parkedHolder || !sameHolder(parkedHolder, stale)) {
      await link(parked, lockPath).catch((error: unknown) => {
        if (errnoCode(error) !== 'EEXIST') {
          throw error;
        }
      });
    }
  } finally {
    await rm(parked, {force: true});
  }
};

/**
 * Exclusive reconcile lock backed by an O_EXCL lock file. A lock left behind by
 * a process that no longer exists is reclaimed.
 */
export const acquireReconcileLock = async ({
  lockPath,
  acquireTimeoutMs = 0,
  retryIntervalMs = 100,
  pid = process.pid,
  now = () => new Date(),
  isProcessAlive: processAlive = isProcessAlive
}: AcquireReconcileLockOptions): Promise<RevisionsResult<ReconcileLock>> => {
  const deadline = Date.now() + acquireTimeoutMs;

  for (;;) {
    const holder: LockHolder = {pid, acquiredAt: now().toISOString(), token: randomUUID()};
    try {
      await writeFile(lockPath, `${JSON.stringify(holder)}\n`, {flag: 'wx', mode: 0o600});
      let released = false;
      return ok({
        path: lockPath,
        holder,
        release: async () => {
          if (released) {
            return;
          }
          released = true;
          const current = await readHolder(lockPath);
          if (current && sameHolder(current, holder)) {
            await rm(lockPath, {force: true});
          }
        }
      });
    } catch (error) {
      if (errnoCode(error) !== 'EEXIST') {
        return err('lock_io_failed', `could not create lock ${lockPath}: ${describeError(error)}`);
      }
    }

    let current: LockHolder | undefined;
    try {
      current = await readHolder(lockPath);
    } catch (error) {
      return err('lock_io_failed', `could not read lock ${lockPath}: ${describeError(error)}`);
    }

    if (current && !processAlive(current.pid)) {
      try {
        await reclaimStaleLock(lockPath, current);
      } catch (error) {
        return err('lock_io_failed', `could not reclaim lock ${lockPath}: ${describeError(error)}`);
      }
      continue;
    }

    if (Date.now() >= deadline) {
      return err(
        'operation_in_progress',
        current
          ? `another reconcile (pid ${current.pid}) holds ${lockPath} since ${current.acquiredAt}`
          : `lock ${lockPath} is held by another operation`
      );
    }
    await sleep(retryIntervalMs);
  }
};

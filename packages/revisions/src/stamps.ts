import {readdir} from 'node:fs/promises';
import {basename, dirname, join} from 'node:path';

export const STAMP_WIDTH = 15;
export const RETAINED_BACKUP_COUNT = 5;

export type SnapshotKind = 'backup' | 'discarded';

export type SnapshotFile = {
  kind: SnapshotKind;
  stamp: string;
  path: string;
};

const escapeRegExp = (value: string) => value.replace(/[.*+?^${}()|[\]\\]/gu, '\\$&');

export const formatStamp = (value: number) => String(value).padStart(STAMP_WIDTH, '0');

/** Millisecond stamp strictly greater than every stamp already present. */
export const nextStamp = ({existing, nowMs}: {existing: readonly string[]; nowMs: number}) => {
  const highest = existing.reduce((max, stamp) => Math.max(max, Number(stamp)), -1);
  return formatStamp(Math.max(Math.trunc(nowMs), highest + 1));
};

export const snapshotPath = ({activePath, kind, stamp}: {activePath: string; kind: SnapshotKind; stamp: string}) =>
  join(dirname(activePath), `${basename(activePath)}.${kind}.${stamp}`);

/** Snapshots of `activePath` in its directory, oldest first. */
export const listSnapshots = async (activePath: string): Promise<SnapshotFile[]> => {
  const directory = dirname(activePath);
  const pattern = new RegExp(`^${escapeRegExp(basename(activePath))}\\.(backup|discarded)\\.(\\d+)$`, 'u');
  const entries = await readdir(directory);

  const snapshots: SnapshotFile[] = [];
  for (const entry of entries) {
    const match = pattern.exec(entry);
    const kind = match?.[1];
    const stamp = match?.[2];
    if ((kind === 'backup' || kind === 'discarded') && stamp !== undefined) {
      snapshots.push({kind, stamp, path: join(directory, entry)});
    }
  }

  return snapshots.sort((left, right) => Number(left.stamp) - Number(right.stamp));
};

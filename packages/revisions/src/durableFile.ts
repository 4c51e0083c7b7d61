import {randomBytes} from 'node:crypto';
import {open, rename, rm, stat, type FileHandle} from 'node:fs/promises';
import {basename, dirname, join} from 'node:path';

import {errnoCode} from './errors.js';

export type RenameFile = (from: string, to: string) => Promise<void>;
export type OpenFile = (path: string, flags: string, mode?: number) => Promise<FileHandle>;

export const DEFAULT_FILE_MODE = 0o644;

const syncDirectory = async (directory: string) => {
  const handle = await open(directory, 'r');
  try {
    await handle.sync();
  } finally {
    await handle.close();
  }
};

/**
 * Writes and fsyncs a new file; fails if `path` already exists. A copy that
 * could not be written completely is removed.
 */
export const writeDurableCopy = async ({
  path,
  content,
  mode = DEFAULT_FILE_MODE,
  openFile = open
}: {
  path: string;
  content: string | Uint8Array;
  mode?: number;
  openFile?: OpenFile;
}) => {
  const handle = await openFile(path, 'wx', mode);
  try {
    await handle.writeFile(content);
    await handle.sync();
  } catch (error) {
    await handle.close();
    await rm(path, {force: true});
    throw error;
  }
  await handle.close();
  await syncDirectory(dirname(path));
};

/**
 * Replaces `path` through a sibling temp file, fsync and rename. Readers see
 * either the old or the new content.
 */
export const replaceFileAtomically = async ({
  path,
  content,
  mode,
  renameFile = rename,
  openFile = open
}: {
  path: string;
  content: string | Uint8Array;
  mode?: number;
  renameFile?: RenameFile;
  openFile?: OpenFile;
}) => {
  const directory = dirname(path);
  const tempPath = join(directory, `.${basename(path)}.${randomBytes(4).toString('hex')}.tmp`);
  const resolvedMode = mode ?? (await readFileMode(path)) ?? DEFAULT_FILE_MODE;

  await writeDurableCopy({path: tempPath, content, mode: resolvedMode, openFile});
  try {
    await renameFile(tempPath, path);
  } catch (error) {
    await rm(tempPath, {force: true});
    throw error;
  }
  await syncDirectory(directory);
};

export const readFileMode = async (path: string): Promise<number | undefined> => {
  try {
    return (await stat(path)).mode & 0o777;
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') {
      return undefined;
    }
    throw error;
  }
};

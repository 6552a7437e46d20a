/**
 * Filesystem port for relocation
 *
 * Every filesystem touch made while relocating goes through this interface so
 * tests can substitute volumes and free-space figures.
 */

import {
  cpSync,
  existsSync,
  lstatSync,
  mkdirSync,
  readdirSync,
  renameSync,
  rmSync,
  statSync,
  statfsSync,
  type Dirent,
} from 'node:fs';
import { dirname, join, resolve } from 'node:path';

/**
 * Opaque identity of a storage volume
 */
export type VolumeId = string;

export interface RelocationFs {
  exists(path: string): boolean;
  /** Volume holding the path, or the nearest existing ancestor */
  volumeOf(path: string): VolumeId;
  /** Total size of regular files below a directory */
  directorySize(path: string): number;
  /** Bytes available to this process on the volume holding the path */
  freeBytes(path: string): number;
  ensureDir(path: string): void;
  rename(source: string, destination: string): void;
  copyTree(source: string, destination: string): void;
  removeTree(path: string): void;
}

/**
 * Walk up until an existing path is found
 */
export function nearestExistingAncestor(path: string): string {
  let current = resolve(path);
  while (!existsSync(current)) {
    const parent = dirname(current);
    if (parent === current) break;
    current = parent;
  }
  return current;
}

/** Lists one directory; throws when it cannot be read */
export type ListDirectory = (dir: string) => Dirent[];

const listDirectory: ListDirectory = (dir) => readdirSync(dir, { withFileTypes: true });

/**
 * Sum file sizes below a directory
 *
 * Directories that cannot be listed and files that cannot be stat'ed are
 * left out of the total. Symlinks are not followed.
 */
export function directorySizeBytes(root: string, list: ListDirectory = listDirectory): number {
  let total = 0;
  const pending = [root];

  while (pending.length > 0) {
    const dir = pending.pop();
    if (dir === undefined) break;

    let entries: Dirent[];
    try {
      entries = list(dir);
    } catch {
      continue;
    }

    for (const entry of entries) {
      const path = join(dir, entry.name);
      if (entry.isDirectory()) {
        pending.push(path);
        continue;
      }
      try {
        const stats = lstatSync(path);
        if (stats.isFile()) total += stats.size;
      } catch {
        continue;
      }
    }
  }

  return total;
}

export const nodeRelocationFs: RelocationFs = {
  exists(path) {
    return existsSync(path);
  },

  volumeOf(path) {
    return String(statSync(nearestExistingAncestor(path)).dev);
  },

  directorySize(path) {
    return directorySizeBytes(path);
  },

  freeBytes(path) {
    const stats = statfsSync(nearestExistingAncestor(path));
    return stats.bavail * stats.bsize;
  },

  ensureDir(path) {
    mkdirSync(path, { recursive: true });
  },

  rename(source, destination) {
    renameSync(source, destination);
  },

  copyTree(source, destination) {
    cpSync(source, destination, {
      recursive: true,
      errorOnExist: true,
      force: false,
      preserveTimestamps: true,
      verbatimSymlinks: true,
    });
  },

  removeTree(path) {
    rmSync(path, { recursive: true });
  },
};

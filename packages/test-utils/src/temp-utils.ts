/**
 * Per-fixture working directories
 *
 * The fixture logs and the relay binaries' logs land here. Only
 * directories handed out by createTempDir are ever removed.
 */

import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { WORKDIR_PREFIX } from '@relaytest/core';

const owned = new Set<string>();

export async function createTempDir(prefix: string = WORKDIR_PREFIX): Promise<string> {
  const dir = await mkdtemp(join(tmpdir(), prefix));
  owned.add(dir);
  return dir;
}

/**
 * Remove a working directory; resolves false for one this module did not create
 */
export async function cleanupTempDir(dir: string): Promise<boolean> {
  if (!owned.delete(dir)) {
    return false;
  }
  await rm(dir, { recursive: true, force: true });
  return true;
}

import fs from 'fs/promises';
import path from 'path';
import { logger } from '../lib/logger';

/**
 * A private temporary directory owned by exactly one voice submission.
 */
export interface Workspace {
  readonly dir: string;
  file(name: string): string;
  release(): Promise<void>;
}

export async function acquireWorkspace(root: string, prefix = 'voice-'): Promise<Workspace> {
  await fs.mkdir(root, { recursive: true });
  const dir = await fs.mkdtemp(path.join(root, prefix));

  return {
    dir,
    file: (name: string) => path.join(dir, name),
    release: async () => {
      try {
        await fs.rm(dir, { recursive: true, force: true });
      } catch (error) {
        logger.error({ dir, error: error instanceof Error ? error.message : String(error) }, 'Failed to remove workspace');
      }
    },
  };
}

/**
 * Run `fn` with a fresh workspace. The directory is removed when `fn`
 * settles unless `fn` called `handOff()` to transfer ownership elsewhere.
 */
export async function withWorkspace<T>(
  root: string,
  fn: (workspace: Workspace, handOff: () => void) => Promise<T>
): Promise<T> {
  const workspace = await acquireWorkspace(root);
  let owned = true;

  try {
    return await fn(workspace, () => {
      owned = false;
    });
  } finally {
    if (owned) {
      await workspace.release();
    }
  }
}

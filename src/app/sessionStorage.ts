import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

/** Byte-level persistence for the resumable session. */
export interface SessionStorage {
  read(): Promise<Uint8Array | null>;
  write(bytes: Uint8Array): Promise<void>;
  clear(): Promise<void>;
}

function isMissingFile(err: unknown): boolean {
  return (
    typeof err === 'object' &&
    err !== null &&
    'code' in err &&
    err.code === 'ENOENT'
  );
}

/**
 * Writes go to a sibling temp file that is renamed over the target, so a
 * reader sees either the old bytes or the new ones.
 */
export function createFileSessionStorage(path: string): SessionStorage {
  const tmp = `${path}.tmp`;

  return {
    async read() {
      try {
        return new Uint8Array(await readFile(path));
      } catch (err) {
        if (isMissingFile(err)) return null;
        throw err;
      }
    },
    async write(bytes) {
      await mkdir(dirname(path), { recursive: true });
      await writeFile(tmp, bytes);
      try {
        await rename(tmp, path);
      } catch (err) {
        await rm(tmp, { force: true });
        throw err;
      }
    },
    async clear() {
      await rm(path, { force: true });
    },
  };
}

export function createMemorySessionStorage(
  initial: Uint8Array | null = null,
): SessionStorage & { peek: () => Uint8Array | null } {
  let stored = initial;
  return {
    peek: () => stored,
    read: async () => stored,
    write: async (bytes) => {
      stored = bytes.slice();
    },
    clear: async () => {
      stored = null;
    },
  };
}

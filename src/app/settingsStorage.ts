import { mkdirSync, readFileSync, renameSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import type { KeyValueStorage } from '../core/settings';

function readEntries(path: string): Map<string, string> {
  let text: string;
  try {
    text = readFileSync(path, 'utf8');
  } catch (err) {
    if (
      typeof err === 'object' &&
      err !== null &&
      'code' in err &&
      err.code === 'ENOENT'
    ) {
      return new Map();
    }
    throw err;
  }
  const parsed: unknown = JSON.parse(text);
  const entries = new Map<string, string>();
  if (typeof parsed !== 'object' || parsed === null) return entries;
  for (const [key, value] of Object.entries(parsed)) {
    if (typeof value === 'string') entries.set(key, value);
  }
  return entries;
}

/**
 * Key/value storage kept as one JSON object on disk. The file is read once;
 * every change rewrites it through a temp file.
 */
export function createFileKeyValueStorage(path: string): KeyValueStorage {
  let entries: Map<string, string> | null = null;
  const load = () => {
    entries ??= readEntries(path);
    return entries;
  };

  const flush = (items: Map<string, string>) => {
    mkdirSync(dirname(path), { recursive: true });
    const tmp = `${path}.tmp`;
    writeFileSync(tmp, JSON.stringify(Object.fromEntries(items), null, 2));
    renameSync(tmp, path);
  };

  return {
    getItem: (key) => load().get(key) ?? null,
    setItem: (key, value) => {
      const items = load();
      items.set(key, value);
      flush(items);
    },
    removeItem: (key) => {
      const items = load();
      if (items.delete(key)) flush(items);
    },
  };
}

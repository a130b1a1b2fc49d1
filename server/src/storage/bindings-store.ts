import { promises as fs } from 'fs';
import path from 'path';
import { BindingsSnapshotSchema, type BindingsSnapshot } from '@reaction-roles/shared';
import type { BindingsPersistence } from '../react-roles/types.js';

export interface JsonBindingsStoreConfig {
  /** Path of the JSON file holding the snapshot */
  file: string;
}

/**
 * Filesystem persistence for reaction-role bindings
 * Keeps the whole snapshot in one JSON file, rewritten on every change
 */
export class JsonBindingsStore implements BindingsPersistence {
  private file: string;

  constructor(config: JsonBindingsStoreConfig) {
    this.file = path.resolve(config.file);
  }

  async load(): Promise<BindingsSnapshot> {
    let content: string;
    try {
      content = await fs.readFile(this.file, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        console.log(`[BindingsStore] No bindings file at ${this.file}, starting empty`);
        return { bindings: {}, links: {} };
      }
      throw error;
    }

    const parsed = BindingsSnapshotSchema.safeParse(JSON.parse(content));
    if (!parsed.success) {
      throw new Error(`Invalid bindings file ${this.file}: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  async save(snapshot: BindingsSnapshot): Promise<void> {
    await fs.mkdir(path.dirname(this.file), { recursive: true });
    // Write beside the target, then rename into place
    const temp = `${this.file}.tmp`;
    await fs.writeFile(temp, JSON.stringify(snapshot, null, 2), 'utf-8');
    await fs.rename(temp, this.file);
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

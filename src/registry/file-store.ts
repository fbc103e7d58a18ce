/**
 * File-based keyword store.
 * Persists `{ "keywords": [...] }` as pretty-printed JSON; writes go through a
 * temporary file and a rename so a reader never sees half a list.
 */

import { mkdir, readFile, rename, writeFile } from 'fs/promises';
import { dirname, resolve } from 'path';
import { KeywordFileSchema } from '../schemas/index.js';
import { DEFAULT_KEYWORDS_FILE } from '../utils/constants.js';
import type { KeywordStore } from './store.js';

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class FileKeywordStore implements KeywordStore {
  private filePath: string;

  constructor(filePath: string = DEFAULT_KEYWORDS_FILE) {
    this.filePath = resolve(filePath);
  }

  async load(): Promise<string[] | null> {
    let data: string;
    try {
      data = await readFile(this.filePath, 'utf-8');
    } catch (err) {
      if (isMissingFile(err)) {
        return null;
      }
      throw err;
    }

    const parsed = KeywordFileSchema.safeParse(JSON.parse(data));
    if (!parsed.success) {
      throw new Error(`Invalid keyword file ${this.filePath}: expected { "keywords": string[] }`);
    }
    return parsed.data.keywords;
  }

  async save(keywords: readonly string[]): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    const tmpPath = `${this.filePath}.tmp`;
    await writeFile(tmpPath, `${JSON.stringify({ keywords }, null, 2)}\n`, 'utf-8');
    await rename(tmpPath, this.filePath);
  }

  getFilePath(): string {
    return this.filePath;
  }
}

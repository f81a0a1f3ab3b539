import { writeFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';

import { fileExists } from '../utils/fs.js';

/**
 * Writes files and remembers which ones it created and which it replaced, so
 * a command can print a summary at the end.
 */
export class FileWriter {
  private created: Set<string> = new Set();
  private modified: Set<string> = new Set();

  async write(filePath: string, content: string): Promise<void> {
    const existed = await fileExists(filePath);
    await mkdir(dirname(filePath), { recursive: true });
    await writeFile(filePath, content, 'utf-8');

    if (existed) {
      if (!this.created.has(filePath)) this.modified.add(filePath);
    } else {
      this.created.add(filePath);
    }
  }

  /**
   * Creates `filePath` with `content` unless something is already there.
   * Returns whether a file was created; existing content is never touched.
   */
  async createIfMissing(filePath: string, content = ''): Promise<boolean> {
    await mkdir(dirname(filePath), { recursive: true });
    try {
      await writeFile(filePath, content, { encoding: 'utf-8', flag: 'wx' });
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'EEXIST') return false;
      throw error;
    }
    this.created.add(filePath);
    return true;
  }

  /** Returns whether the directory had to be created. */
  async ensureDir(dirPath: string): Promise<boolean> {
    const existed = await fileExists(dirPath);
    await mkdir(dirPath, { recursive: true });
    if (!existed) this.created.add(dirPath);
    return !existed;
  }

  getCreatedFiles(): string[] {
    return [...this.created];
  }

  getModifiedFiles(): string[] {
    return [...this.modified];
  }

  getSummary(): { created: string[]; modified: string[] } {
    return {
      created: this.getCreatedFiles(),
      modified: this.getModifiedFiles(),
    };
  }
}

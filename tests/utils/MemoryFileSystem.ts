import * as path from 'path';
import type { IFileSystemService } from '@services/fs/IFileSystemService';

/**
 * In-memory file system for testing.
 * Paths are normalized to absolute POSIX form; directories exist implicitly
 * when a file lives under them.
 */
export class MemoryFileSystem implements IFileSystemService {
  private files = new Map<string, string>();

  constructor(initial: Record<string, string> = {}) {
    for (const [filePath, content] of Object.entries(initial)) {
      this.files.set(this.normalizePath(filePath), content);
    }
  }

  async readFile(filePath: string): Promise<string> {
    const content = this.files.get(this.normalizePath(filePath));
    if (content === undefined) {
      throw Object.assign(new Error(`ENOENT: no such file or directory, open '${filePath}'`), {
        code: 'ENOENT',
        path: filePath
      });
    }
    return content;
  }

  async exists(filePath: string): Promise<boolean> {
    const normalizedPath = this.normalizePath(filePath);
    return this.files.has(normalizedPath) || this.hasEntriesUnder(normalizedPath);
  }

  async isDirectory(filePath: string): Promise<boolean> {
    const normalizedPath = this.normalizePath(filePath);
    return normalizedPath === '/' || this.hasEntriesUnder(normalizedPath);
  }

  // Test helpers
  write(filePath: string, content: string): void {
    this.files.set(this.normalizePath(filePath), content);
  }

  private hasEntriesUnder(dirPath: string): boolean {
    const prefix = dirPath === '/' ? '/' : dirPath + '/';
    for (const key of this.files.keys()) {
      if (key.startsWith(prefix)) {
        return true;
      }
    }
    return false;
  }

  private normalizePath(filePath: string): string {
    if (!filePath || filePath === '.') return '/';
    return path.posix.resolve('/', filePath);
  }
}

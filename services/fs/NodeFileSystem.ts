import * as fs from 'fs/promises';
import type { Stats } from 'fs';
import type { IFileSystemService } from './IFileSystemService';

const MISSING_CODES = new Set(['ENOENT', 'ENOTDIR']);

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && typeof error.code === 'string' && MISSING_CODES.has(error.code);
}

/**
 * Reads startup scripts and databases from disk. A path that does not exist
 * is reported as absent; any other failure (permissions, I/O) propagates.
 */
export class NodeFileSystem implements IFileSystemService {
  async readFile(filePath: string): Promise<string> {
    return fs.readFile(filePath, 'utf-8');
  }

  async exists(filePath: string): Promise<boolean> {
    return (await this.statIfPresent(filePath)) !== undefined;
  }

  async isDirectory(filePath: string): Promise<boolean> {
    const stats = await this.statIfPresent(filePath);
    return stats?.isDirectory() ?? false;
  }

  private async statIfPresent(filePath: string): Promise<Stats | undefined> {
    try {
      return await fs.stat(filePath);
    } catch (error) {
      if (isMissing(error)) {
        return undefined;
      }
      throw error;
    }
  }
}

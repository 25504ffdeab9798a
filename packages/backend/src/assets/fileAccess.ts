/**
 * @description: File-system capability used by the resolver for on-disk lookups.
 * @scope: backend
 * @module: FileAccess
 * @risk: low - Thin wrapper over node:fs/promises.
 */
import fs from 'node:fs/promises';

type FileKind = 'file' | 'directory' | 'other';

/**
 * The two disk operations resolution needs. Tests swap in fakes to
 * simulate failures between stat and read.
 */
interface FileAccess {
  /** Follows symlinks. Rejects with an errno error when the path is absent. */
  stat(filePath: string): Promise<FileKind>;
  readFile(filePath: string): Promise<Buffer>;
}

const nodeFileAccess: FileAccess = {
  stat: async (filePath) => {
    const stats = await fs.stat(filePath);
    if (stats.isFile()) {
      return 'file';
    }
    return stats.isDirectory() ? 'directory' : 'other';
  },
  readFile: (filePath) => fs.readFile(filePath)
};

// Codes that mean "nothing usable at this path" rather than a disk problem.
const MISSING_FILE_CODES = new Set(['ENOENT', 'ENOTDIR', 'ENAMETOOLONG']);

const isMissingFileError = (error: unknown): boolean => {
  if (!(error instanceof Error) || !('code' in error)) {
    return false;
  }
  return typeof error.code === 'string' && MISSING_FILE_CODES.has(error.code);
};

export { isMissingFileError, nodeFileAccess };
export type { FileAccess, FileKind };

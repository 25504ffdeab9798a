/**
 * @description: Error classes for static asset resolution failures.
 * @scope: backend
 * @module: AssetErrors
 * @risk: moderate - Misclassified errors can hide disk problems behind 404s.
 */

// --- Base error ---
class AssetResolverError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'AssetResolverError';
  }
}

// No embedded or on-disk asset matched. Rejected paths land here too.
class AssetNotFoundError extends AssetResolverError {
  constructor(requestPath: string) {
    super(`Static asset not found: ${requestPath}`, 'ASSET_NOT_FOUND', { requestPath });
    this.name = 'AssetNotFoundError';
  }
}

/**
 * A candidate file exists but could not be inspected or read.
 */
class AssetReadError extends AssetResolverError {
  constructor(filePath: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to read asset ${filePath}: ${reason}`, 'ASSET_READ_FAILED', { filePath }, { cause });
    this.name = 'AssetReadError';
  }
}

class AliasLimitExceededError extends AssetResolverError {
  constructor(path: string, toggleCount: number, limit: number) {
    super(
      `Path has ${toggleCount} hyphen/underscore positions; alias expansion allows at most ${limit}`,
      'ALIAS_LIMIT_EXCEEDED',
      { path, toggleCount, limit }
    );
    this.name = 'AliasLimitExceededError';
  }
}

export { AssetResolverError, AssetNotFoundError, AssetReadError, AliasLimitExceededError };

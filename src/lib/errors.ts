/**
 * Error taxonomy for the resolver pipeline.
 *
 * ValidationError and TransientEnrichmentError are recovered locally (row dropped,
 * cluster downgraded to "error"). ConfigurationError and ResumeConflictError are
 * thrown before any work starts and surface to the caller.
 */

export class ResolverError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** A malformed or empty input row. The row is dropped and counted. */
export class ValidationError extends ResolverError {
  constructor(
    message: string,
    readonly rowNumber: number,
  ) {
    super(message);
  }
}

/** Search timed out or hit a network / 429 / 5xx failure after all retries. */
export class TransientEnrichmentError extends ResolverError {
  constructor(
    message: string,
    readonly attempts: number,
    readonly lastError?: unknown,
  ) {
    super(message);
  }
}

/** Invalid threshold, weights or batch size. */
export class ConfigurationError extends ResolverError {
  constructor(
    message: string,
    readonly issues: string[] = [],
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
  }
}

/**
 * The enrichment checkpoint holds clusters the current clustering does not, or
 * clusters whose members changed since they were checkpointed.
 */
export class ResumeConflictError extends ResolverError {
  constructor(
    readonly unknownClusterIds: string[],
    readonly changedClusterIds: string[] = [],
  ) {
    const parts: string[] = [];
    if (unknownClusterIds.length > 0) {
      parts.push(`${unknownClusterIds.length} unknown cluster id(s) (${unknownClusterIds.slice(0, 5).join(", ")})`);
    }
    if (changedClusterIds.length > 0) {
      parts.push(`${changedClusterIds.length} changed cluster(s) (${changedClusterIds.slice(0, 5).join(", ")})`);
    }
    super(`Checkpoint does not match the current clustering: ${parts.join(", ")}`);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

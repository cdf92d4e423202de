export type RagErrorCode =
  | "INGESTION_FAILED"
  | "SERVICE_FAILED"
  | "INDEX_CORRUPT"
  | "INVALID_CONFIG";

export type ServiceKind = "embedding" | "generation";

/** A document (or the whole collection) could not be turned into text. */
export class IngestionError extends Error {
  readonly code: RagErrorCode = "INGESTION_FAILED";

  constructor(
    message: string,
    public readonly sourceId: string | null,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "IngestionError";
  }
}

/** The embedding or generation service failed (network, auth, quota, bad payload). */
export class ServiceError extends Error {
  readonly code: RagErrorCode = "SERVICE_FAILED";

  constructor(
    message: string,
    public readonly service: ServiceKind,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "ServiceError";
  }
}

/** A persisted index is missing an artifact, is malformed, or belongs to another model. */
export class IndexCorruptionError extends Error {
  readonly code: RagErrorCode = "INDEX_CORRUPT";

  constructor(
    message: string,
    public readonly location: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "IndexCorruptionError";
  }
}

export class ConfigError extends Error {
  readonly code: RagErrorCode = "INVALID_CONFIG";

  constructor(
    message: string,
    public readonly key: string,
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

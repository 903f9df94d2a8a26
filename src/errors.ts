export type RegistryErrorCode =
  | "IDENTITY_PERSIST"
  | "SCHEMA_MIGRATION"
  | "DUPLICATE_PATH"
  | "STORE_BUSY"
  | "ENRICHMENT"
  | "ARTIFACT_WRITE"
  | "PROJECT_NOT_FOUND"
  | "INVALID_TAG"
  | "INVALID_DIRECTORY"
  | "CONFIG";

export class RegistryError extends Error {
  readonly code: RegistryErrorCode;
  readonly cause?: unknown;

  constructor(code: RegistryErrorCode, message: string, cause?: unknown) {
    super(message);
    this.name = "RegistryError";
    this.code = code;
    this.cause = cause;
  }
}

/**
 * The sentinel file could not be written. Carries the minted UUID so a caller
 * can keep going with an in-memory identity for the current operation.
 */
export class IdentityPersistError extends RegistryError {
  constructor(
    readonly directory: string,
    readonly uuid: string,
    cause?: unknown,
  ) {
    super("IDENTITY_PERSIST", `Failed to persist project identity in ${directory}: ${errorMessage(cause)}`, cause);
    this.name = "IdentityPersistError";
  }
}

/** Fatal: the store must not be used with a partially migrated schema. */
export class SchemaMigrationError extends RegistryError {
  constructor(message: string, cause?: unknown) {
    super("SCHEMA_MIGRATION", message, cause);
    this.name = "SchemaMigrationError";
  }
}

export class DuplicatePathError extends RegistryError {
  constructor(
    readonly rootPath: string,
    cause?: unknown,
  ) {
    super("DUPLICATE_PATH", `A live project is already registered at ${rootPath}`, cause);
    this.name = "DuplicatePathError";
  }
}

export class StoreBusyError extends RegistryError {
  constructor(message: string, cause?: unknown) {
    super("STORE_BUSY", message, cause);
    this.name = "StoreBusyError";
  }
}

export class EnrichmentError extends RegistryError {
  constructor(message: string, cause?: unknown) {
    super("ENRICHMENT", message, cause);
    this.name = "EnrichmentError";
  }
}

export class ArtifactWriteError extends RegistryError {
  constructor(
    readonly artifactPath: string,
    cause?: unknown,
  ) {
    super("ARTIFACT_WRITE", `Failed to write ${artifactPath}: ${errorMessage(cause)}`, cause);
    this.name = "ArtifactWriteError";
  }
}

export class ProjectNotFoundError extends RegistryError {
  constructor(readonly uuid: string) {
    super("PROJECT_NOT_FOUND", `Project not found: ${uuid}`);
    this.name = "ProjectNotFoundError";
  }
}

export class InvalidTagError extends RegistryError {
  constructor(readonly input: string) {
    super("INVALID_TAG", `'${input}' has no letters or digits to form a tag`);
    this.name = "InvalidTagError";
  }
}

export class InvalidDirectoryError extends RegistryError {
  constructor(
    readonly directory: string,
    cause?: unknown,
  ) {
    super("INVALID_DIRECTORY", `Not a directory: ${directory}`, cause);
    this.name = "InvalidDirectoryError";
  }
}

export class ConfigError extends RegistryError {
  constructor(message: string, cause?: unknown) {
    super("CONFIG", message, cause);
    this.name = "ConfigError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

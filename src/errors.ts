import type { DirectoryId, EntityKind, Principal } from "./types.js";

export class KbError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "KbError";
  }
}

export class DatabaseNotInitializedError extends KbError {
  constructor() {
    super("Database is not initialized. Call db_init first.", "DB_NOT_INITIALIZED");
    this.name = "DatabaseNotInitializedError";
  }
}

export class DatabaseAlreadyInitializedError extends KbError {
  constructor() {
    super("Database is already initialized.", "DB_ALREADY_INITIALIZED");
    this.name = "DatabaseAlreadyInitializedError";
  }
}

export class EntityNotFoundError extends KbError {
  constructor(entity: string, id: number | string) {
    super(`${entity} not found: ${id}`, "NOT_FOUND");
    this.name = "EntityNotFoundError";
  }
}

export class UnknownParentError extends KbError {
  constructor(parentId: DirectoryId) {
    super(`Parent directory does not exist: ${parentId}`, "UNKNOWN_PARENT");
    this.name = "UnknownParentError";
  }
}

export class DuplicateNameError extends KbError {
  constructor(
    public readonly parentId: DirectoryId,
    public readonly childName: string,
    public readonly kind: EntityKind,
  ) {
    super(`A ${kind} named '${childName}' already exists in directory ${parentId}`, "DUPLICATE_NAME");
    this.name = "DuplicateNameError";
  }
}

export class SelfParentError extends KbError {
  constructor(directoryId: DirectoryId) {
    super(`Directory ${directoryId} cannot be its own parent`, "SELF_PARENT");
    this.name = "SelfParentError";
  }
}

export class AlreadyParentedError extends KbError {
  constructor(kind: EntityKind, id: number, parentId: DirectoryId) {
    super(`The ${kind} ${id} already belongs to directory ${parentId}`, "ALREADY_PARENTED");
    this.name = "AlreadyParentedError";
  }
}

export class CycleRejectedError extends KbError {
  constructor(directoryId: DirectoryId, destinationId: DirectoryId) {
    super(
      `Moving directory ${directoryId} into ${destinationId} would create a directory loop`,
      "CYCLE_REJECTED",
    );
    this.name = "CycleRejectedError";
  }
}

export class RootUndeletableError extends KbError {
  constructor() {
    super("Cannot delete the root directory", "ROOT_UNDELETABLE");
    this.name = "RootUndeletableError";
  }
}

export class RootImmutableError extends KbError {
  constructor(operation: string) {
    super(`Cannot ${operation} the root directory`, "ROOT_IMMUTABLE");
    this.name = "RootImmutableError";
  }
}

export class PermissionDeniedError extends KbError {
  constructor(principal: Principal) {
    super(`Permission denied: '${principal}' may not edit the knowledge base`, "PERMISSION_DENIED");
    this.name = "PermissionDeniedError";
  }
}

export class StorageFailureError extends KbError {
  constructor(message: string, options?: ErrorOptions) {
    super(`Storage failure: ${message}`, "STORAGE_FAILURE", options);
    this.name = "StorageFailureError";
  }
}

export class InvalidParameterError extends KbError {
  constructor(message: string) {
    super(message, "INVALID_PARAMETER");
    this.name = "InvalidParameterError";
  }
}

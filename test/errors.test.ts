import { describe, it } from "node:test";
import assert from "node:assert/strict";
import {
  CycleRejectedError,
  DuplicateNameError,
  KbError,
  PermissionDeniedError,
  RootUndeletableError,
  StorageFailureError,
} from "../src/errors.js";

describe("DuplicateNameError", () => {
  it("should carry name, code and the conflicting child", () => {
    const error = new DuplicateNameError(3, "guides", "directory");
    assert.equal(error.name, "DuplicateNameError");
    assert.equal(error.code, "DUPLICATE_NAME");
    assert.equal(error.message, "A directory named 'guides' already exists in directory 3");
    assert.equal(error.parentId, 3);
    assert.equal(error.childName, "guides");
    assert.equal(error.kind, "directory");
  });

  it("should extend KbError", () => {
    const error = new DuplicateNameError(0, "x", "note");
    assert.ok(error instanceof KbError);
    assert.ok(error instanceof Error);
  });
});

describe("CycleRejectedError", () => {
  it("should format message correctly", () => {
    const error = new CycleRejectedError(1, 2);
    assert.equal(error.code, "CYCLE_REJECTED");
    assert.equal(error.message, "Moving directory 1 into 2 would create a directory loop");
  });
});

describe("RootUndeletableError", () => {
  it("should be catchable as KbError", () => {
    assert.throws(
      () => {
        throw new RootUndeletableError();
      },
      KbError,
    );
  });
});

describe("PermissionDeniedError", () => {
  it("should name the principal", () => {
    const error = new PermissionDeniedError("alice");
    assert.equal(error.code, "PERMISSION_DENIED");
    assert.equal(error.message, "Permission denied: 'alice' may not edit the knowledge base");
  });
});

describe("StorageFailureError", () => {
  it("should keep the underlying error as cause", () => {
    const cause = new Error("disk I/O error");
    const error = new StorageFailureError(cause.message, { cause });
    assert.equal(error.code, "STORAGE_FAILURE");
    assert.equal(error.message, "Storage failure: disk I/O error");
    assert.equal(error.cause, cause);
  });
});

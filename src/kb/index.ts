export { DatabaseManager, type OpenOptions } from "../db/database.js";
export { EventRepository } from "../db/repositories/event-repository.js";
export { PermissionRepository } from "../db/repositories/permission-repository.js";
export { TreeRepository } from "../db/repositories/tree-repository.js";
export { AncestryOracle } from "./ancestry.js";
export { IdentityAllocator } from "./identity-allocator.js";
export { PermissionGate } from "./permission-gate.js";
export {
  KnowledgeBase,
  validateName,
  type KnowledgeBaseComponents,
  type NoteWithContent,
} from "./mutation-engine.js";
export * from "../errors.js";
export * from "../types.js";

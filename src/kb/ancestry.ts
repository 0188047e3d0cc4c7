import type { TreeRepository } from "../db/repositories/tree-repository.js";
import type { ChildEdge, DirectoryId, NoteId } from "../types.js";
import { StorageFailureError } from "../errors.js";

/**
 * Closure queries over the directory→directory edges. All walks use an
 * explicit worklist, so tree depth is never limited by the call stack.
 */
export class AncestryOracle {
  constructor(private tree: TreeRepository) {}

  /** True iff `candidate` lies on the path from `target` up to the root, `target` included. */
  isAncestor(candidate: DirectoryId, target: DirectoryId): boolean {
    const seen = new Set<DirectoryId>();
    let current: DirectoryId | null = target;

    while (current !== null) {
      if (current === candidate) return true;
      if (seen.has(current)) {
        throw new StorageFailureError(`directory loop detected at ${current}`);
      }
      seen.add(current);
      current = this.tree.getDirectoryEdge(current)?.parent_id ?? null;
    }
    return false;
  }

  /** Edges from `dir` up to the root, nearest first. Empty for the root itself. */
  pathToRoot(dir: DirectoryId): ChildEdge[] {
    const edges: ChildEdge[] = [];
    const seen = new Set<DirectoryId>([dir]);
    let edge = this.tree.getDirectoryEdge(dir);
    while (edge) {
      edges.push(edge);
      if (seen.has(edge.parent_id)) {
        throw new StorageFailureError(`directory loop detected at ${edge.parent_id}`);
      }
      seen.add(edge.parent_id);
      edge = this.tree.getDirectoryEdge(edge.parent_id);
    }
    return edges;
  }

  /** Number of edges between `dir` and the root. */
  depth(dir: DirectoryId): number {
    return this.pathToRoot(dir).length;
  }

  /** `root` and every directory below it, breadth-first. Empty if `root` does not exist. */
  descendants(root: DirectoryId): DirectoryId[] {
    if (!this.tree.directoryExists(root)) return [];

    const result: DirectoryId[] = [root];
    const seen = new Set<DirectoryId>(result);
    for (let i = 0; i < result.length; i++) {
      for (const child of this.tree.listChildDirectoryIds(result[i])) {
        if (seen.has(child)) {
          throw new StorageFailureError(`directory ${child} reached twice below ${root}`);
        }
        seen.add(child);
        result.push(child);
      }
    }
    return result;
  }

  /** Notes parented anywhere in `descendants(root)`. */
  ownedNotes(root: DirectoryId): NoteId[] {
    return this.descendants(root).flatMap((dir) => this.tree.listNoteIdsIn(dir));
  }
}

import type { PermissionRepository } from "../db/repositories/permission-repository.js";
import type { Principal } from "../types.js";
import { PermissionDeniedError } from "../errors.js";

export class PermissionGate {
  constructor(private permissions: PermissionRepository) {}

  canEdit(principal: Principal): boolean {
    return this.permissions.get(principal)?.can_edit ?? false;
  }

  canReceiveFeedback(principal: Principal): boolean {
    return this.permissions.get(principal)?.can_receive_feedback ?? false;
  }

  requireEdit(principal: Principal): void {
    if (!this.canEdit(principal)) throw new PermissionDeniedError(principal);
  }
}

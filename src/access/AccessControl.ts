import { PermissionError } from "../errors.js";

export const TRAINER_ROLE = "trainer";
export const ADMIN_ROLE = "admin";

/**
 * Capability predicates consulted at the classifier's entry points. The
 * engine itself never inspects identities.
 */
export interface AccessControl {
  isPaused(): boolean;
  hasRole(role: string, account: string): boolean;
}

/** Allows every caller and is never paused. */
export const openAccess: AccessControl = {
  isPaused: () => false,
  hasRole: () => true,
};

/**
 * Role table plus a pause switch, both administered by accounts holding
 * {@link ADMIN_ROLE}.
 */
export class InMemoryAccessControl implements AccessControl {
  private readonly roles = new Map<string, Set<string>>();
  private paused = false;

  constructor(admin: string) {
    this.roles.set(ADMIN_ROLE, new Set([admin]));
  }

  isPaused(): boolean {
    return this.paused;
  }

  hasRole(role: string, account: string): boolean {
    return this.roles.get(role)?.has(account) ?? false;
  }

  grantRole(sender: string, role: string, account: string): void {
    this.requireAdmin(sender);
    const holders = this.roles.get(role) ?? new Set<string>();
    holders.add(account);
    this.roles.set(role, holders);
  }

  revokeRole(sender: string, role: string, account: string): void {
    this.requireAdmin(sender);
    this.roles.get(role)?.delete(account);
  }

  pause(sender: string): void {
    this.requireAdmin(sender);
    this.paused = true;
  }

  unpause(sender: string): void {
    this.requireAdmin(sender);
    this.paused = false;
  }

  private requireAdmin(sender: string): void {
    if (!this.hasRole(ADMIN_ROLE, sender)) {
      throw new PermissionError(ADMIN_ROLE, sender);
    }
  }
}

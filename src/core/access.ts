import type { Identity } from "../types/brands";
import { AuthorizationError, PausedError } from "./errors";

/**
 * Capability check consumed by every entry point. Passed in explicitly so the
 * reducer never touches ambient role state.
 */
export interface AccessControl {
  isAdmin(who: Identity): boolean;
  isProvider(who: Identity): boolean;
  isOracle(who: Identity): boolean;
  isPaused(): boolean;
}

export type Role = "admin" | "provider" | "oracle";

/**
 * In-memory role table with a pause switch.
 */
export class RoleRegistry implements AccessControl {
  private readonly members: Record<Role, Set<Identity>> = {
    admin: new Set(),
    provider: new Set(),
    oracle: new Set(),
  };
  private paused = false;

  constructor(initial: Partial<Record<Role, Identity[]>> = {}) {
    for (const role of ["admin", "provider", "oracle"] as const) {
      for (const who of initial[role] ?? []) this.members[role].add(who);
    }
  }

  grant(role: Role, who: Identity): void {
    this.members[role].add(who);
  }

  revoke(role: Role, who: Identity): void {
    this.members[role].delete(who);
  }

  pause(): void {
    this.paused = true;
  }

  unpause(): void {
    this.paused = false;
  }

  isAdmin(who: Identity): boolean {
    return this.members.admin.has(who);
  }

  isProvider(who: Identity): boolean {
    return this.members.provider.has(who);
  }

  isOracle(who: Identity): boolean {
    return this.members.oracle.has(who);
  }

  isPaused(): boolean {
    return this.paused;
  }
}

/* ── guards ──────────────────────────────────────────────── */
export const requireAdmin = (ac: AccessControl, who: Identity): void => {
  if (!ac.isAdmin(who)) throw new AuthorizationError("NotAdmin", `${who} is not an admin`);
};

export const requireProvider = (ac: AccessControl, who: Identity): void => {
  if (!ac.isProvider(who))
    throw new AuthorizationError("NotProvider", `${who} is not a data provider`);
};

export const requireOracle = (ac: AccessControl, who: Identity): void => {
  if (!ac.isOracle(who))
    throw new AuthorizationError("NotOracle", `${who} is not the decryption oracle`);
};

export const requireNotPaused = (ac: AccessControl): void => {
  if (ac.isPaused()) throw new PausedError();
};

import type { ConsentCommandType } from "../services/consentEngine";
import type { Role, ShareState } from "./types";

export type TokenFailure = "missing" | "malformed" | "expired" | "wrong_type" | "stale" | "unknown_subject";

export type PolicyError =
  | { kind: "InvalidCredentials" }
  | { kind: "AccountInactive" }
  | { kind: "AccountLocked"; retryAfterSeconds: number }
  | { kind: "TokenInvalid"; reason: TokenFailure }
  | { kind: "Forbidden.Role"; required: Role[] }
  | { kind: "Forbidden.Consent" }
  | { kind: "Forbidden.AdminExcluded" }
  | { kind: "Conflict.AlreadyPending" }
  | { kind: "Conflict.InvalidTransition"; from: ShareState; attempted: ConsentCommandType }
  | { kind: "Conflict.EmailInUse" }
  | { kind: "Conflict.SelfDeactivation" }
  | { kind: "NotFound"; resource: string };

export type Result<T, E = PolicyError> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function fail(error: PolicyError): { ok: false; error: PolicyError } {
  return { ok: false, error };
}

/**
 * Failures of the infrastructure (storage, model runtime) rather than policy
 * denials. These are thrown, never returned, and surface as HTTP 500.
 */
export class InfrastructureError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "InfrastructureError";
  }
}

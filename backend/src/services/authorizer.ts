import { DataStore } from "../data/repositories";
import { fail, ok, Result } from "../models/errors";
import { Account, Identity, Role } from "../models/types";
import { AuditService } from "./auditService";
import { canAccess } from "./consentEngine";

export interface GuardContext {
  identity: Identity;
  target?: Account;
}

export type Guard = (context: GuardContext) => Result<void>;

const allow: Result<void> = ok(undefined);

export const anyAuthenticated: Guard = ({ identity }) =>
  identity.active ? allow : fail({ kind: "AccountInactive" });

export function requireRole(...roles: Role[]): Guard {
  return ({ identity }) => (roles.includes(identity.role) ? allow : fail({ kind: "Forbidden.Role", required: roles }));
}

export const requireAdmin: Guard = requireRole("Admin");

/** Admins are disjoint from clinical data, whatever else the operation requires. */
export const rejectAdmin: Guard = ({ identity }) =>
  identity.role === "Admin" ? fail({ kind: "Forbidden.AdminExcluded" }) : allow;

export const isSelf = ({ identity, target }: GuardContext): boolean =>
  target !== undefined && target.id === identity.accountId;

export const requireConsent: Guard = ({ identity, target }) => {
  if (!target || target.role !== "Patient") {
    return fail({ kind: "NotFound", resource: "patient" });
  }
  return canAccess(identity, target) ? allow : fail({ kind: "Forbidden.Consent" });
};

export function chain(...guards: Guard[]): Guard {
  return (context) => {
    for (const guard of guards) {
      const result = guard(context);
      if (!result.ok) {
        return result;
      }
    }
    return allow;
  };
}

export function selfOr(guard: Guard): Guard {
  return (context) => (isSelf(context) ? allow : guard(context));
}

/** Clinician role with the admin exclusion evaluated first. */
export const requireClinicianRole: Guard = chain(anyAuthenticated, rejectAdmin, requireRole("Clinician"));

/** Patient-only self-service on clinical data. */
export const requirePatientRole: Guard = chain(anyAuthenticated, rejectAdmin, requireRole("Patient"));

/** Clinician reading another account's protected data. */
export const requireClinician: Guard = chain(requireClinicianRole, requireConsent);

export class Authorizer {
  constructor(
    private readonly store: DataStore,
    private readonly audit: AuditService
  ) {}

  check(identity: Identity, guard: Guard, action: string, target?: Account): Result<void> {
    const result = guard({ identity, target });
    if (!result.ok) {
      this.audit.logDenial({ actorId: identity.accountId, action, targetId: target?.id ?? null, error: result.error });
    }
    return result;
  }

  /**
   * Resolves the subject whose clinical data is requested. Self access always
   * passes; anyone else must be a clinician the patient currently shares with.
   * Role is checked before the subject is looked up, so non-clinicians cannot
   * learn which accounts exist.
   */
  authorizeSubjectAccess(identity: Identity, subjectId: string, action: string): Result<Account> {
    const roleCheck = this.check(
      identity,
      chain(anyAuthenticated, rejectAdmin, (context) => (subjectId === identity.accountId ? allow : requireClinicianRole(context))),
      action
    );
    if (!roleCheck.ok) {
      return roleCheck;
    }

    const target = this.store.accounts.findById(subjectId);
    if (!target) {
      const error = { kind: "NotFound", resource: "patient" } as const;
      this.audit.logDenial({ actorId: identity.accountId, action, targetId: subjectId, error });
      return fail(error);
    }

    const access = this.check(identity, selfOr(requireConsent), action, target);
    if (!access.ok) {
      return access;
    }

    if (!isSelf({ identity, target })) {
      this.audit.logAccess({ actorId: identity.accountId, action, targetId: target.id });
    }
    return ok(target);
  }
}

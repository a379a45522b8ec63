import { DataStore } from "../data/repositories";
import { Logger } from "../logger";
import { fail, ok, PolicyError, Result } from "../models/errors";
import { Account, ConsentRecord, Identity, ShareState } from "../models/types";
import { Clock } from "../utils/time";
import type { AlertEngine } from "./alertEngine";
import { AuditService } from "./auditService";

export type ConsentCommand =
  | { type: "request_disable"; reason: string | null }
  | { type: "approve"; reason: string | null }
  | { type: "reject"; reason: string | null }
  | { type: "enable" };

export type ConsentCommandType = ConsentCommand["type"];

export function initialConsent(): ConsentRecord {
  return {
    shareState: "On",
    requestedAt: null,
    requestedBy: null,
    reviewedAt: null,
    reviewedBy: null,
    decision: null,
    reason: null
  };
}

export function shareStateOf(patient: Account): ShareState {
  return patient.consent?.shareState ?? "On";
}

/**
 * A pending disable request keeps access open; only an approved request closes it.
 */
export function canAccess(clinician: Identity, patient: Account): boolean {
  if (clinician.role !== "Clinician" || patient.role !== "Patient") {
    return false;
  }
  return shareStateOf(patient) !== "Off";
}

function checkActor(command: ConsentCommand, actor: Identity, patient: Account): PolicyError | null {
  if (command.type === "request_disable" || command.type === "enable") {
    if (actor.role !== "Patient" || actor.accountId !== patient.id) {
      return { kind: "Forbidden.Role", required: ["Patient"] };
    }
    return null;
  }
  if (actor.role === "Admin") {
    return { kind: "Forbidden.AdminExcluded" };
  }
  if (actor.role !== "Clinician") {
    return { kind: "Forbidden.Role", required: ["Clinician"] };
  }
  return null;
}

/** Pure transition function of the share-state machine. */
export function transition(
  current: ConsentRecord,
  command: ConsentCommand,
  actorId: string,
  at: string
): Result<ConsentRecord> {
  const from = current.shareState;
  const invalid = (): Result<ConsentRecord> =>
    fail({ kind: "Conflict.InvalidTransition", from, attempted: command.type });

  switch (command.type) {
    case "request_disable":
      if (from === "DisableRequested") {
        return fail({ kind: "Conflict.AlreadyPending" });
      }
      if (from !== "On") {
        return invalid();
      }
      return ok({
        shareState: "DisableRequested",
        requestedAt: at,
        requestedBy: actorId,
        reviewedAt: null,
        reviewedBy: null,
        decision: null,
        reason: command.reason
      });

    case "approve":
      if (from !== "DisableRequested") {
        return invalid();
      }
      return ok({
        ...current,
        shareState: "Off",
        reviewedAt: at,
        reviewedBy: actorId,
        decision: "Approve",
        reason: command.reason ?? current.reason
      });

    case "reject":
      if (from !== "DisableRequested") {
        return invalid();
      }
      return ok({
        shareState: "On",
        requestedAt: null,
        requestedBy: null,
        reviewedAt: at,
        reviewedBy: actorId,
        decision: "Reject",
        reason: command.reason ?? current.reason
      });

    case "enable":
      if (from !== "Off") {
        return invalid();
      }
      return ok(initialConsent());
  }
}

export interface ConsentEngineDeps {
  store: DataStore;
  alerts: AlertEngine;
  audit: AuditService;
  clock: Clock;
  logger: Logger;
}

export class ConsentEngine {
  constructor(private readonly deps: ConsentEngineDeps) {}

  status(patientId: string): Result<ConsentRecord> {
    const patient = this.deps.store.accounts.findById(patientId);
    if (!patient || patient.role !== "Patient") {
      return fail({ kind: "NotFound", resource: "patient" });
    }
    return ok(patient.consent ?? initialConsent());
  }

  canAccess(clinician: Identity, patientId: string): boolean {
    const patient = this.deps.store.accounts.findById(patientId);
    return patient !== undefined && canAccess(clinician, patient);
  }

  listPending(): Account[] {
    return this.deps.store.accounts
      .list({ role: "Patient", shareState: "DisableRequested" })
      .sort((left, right) => (left.consent?.requestedAt ?? "").localeCompare(right.consent?.requestedAt ?? ""));
  }

  /**
   * Applies one command as a compare-and-set on the share state it was
   * evaluated against. The disable-request alert is written in the same
   * transaction as the state change.
   */
  apply(patientId: string, command: ConsentCommand, actor: Identity): Result<ConsentRecord> {
    const { store, clock, logger, audit } = this.deps;
    const action = `consent_${command.type}`;

    const result = store.transaction((): Result<ConsentRecord> => {
      const patient = store.accounts.findById(patientId);
      if (!patient || patient.role !== "Patient") {
        return fail({ kind: "NotFound", resource: "patient" });
      }

      const actorError = checkActor(command, actor, patient);
      if (actorError) {
        return fail(actorError);
      }

      const current = patient.consent ?? initialConsent();
      const next = transition(current, command, actor.accountId, clock.now().toISOString());
      if (!next.ok) {
        return next;
      }

      if (!store.accounts.compareAndSetConsent(patient.id, current.shareState, next.value)) {
        return fail({ kind: "Conflict.InvalidTransition", from: current.shareState, attempted: command.type });
      }

      if (command.type === "request_disable") {
        this.deps.alerts.recordConsentDisableRequest(patient);
      }
      return ok(next.value);
    });

    if (!result.ok) {
      audit.logDenial({ actorId: actor.accountId, action, targetId: patientId, error: result.error });
      return result;
    }

    logger.info(
      { patientId, actorId: actor.accountId, command: command.type, shareState: result.value.shareState },
      "Consent state changed"
    );
    return result;
  }
}

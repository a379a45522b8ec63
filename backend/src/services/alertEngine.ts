import { v4 as uuidv4 } from "uuid";
import { AlertQuery, DataStore } from "../data/repositories";
import { Logger } from "../logger";
import { fail, ok, Result } from "../models/errors";
import { Account, AlertRecord, AlertSeverity, Identity, VitalReading } from "../models/types";
import { ALERT_DEDUP_WINDOW_MINUTES, ALERT_THRESHOLDS, AlertThreshold, VitalMetric } from "../policy";
import { addMinutes, Clock, daysBefore } from "../utils/time";
import { AuditService } from "./auditService";
import { canAccess } from "./consentEngine";

export type AlertDraft = Pick<
  AlertRecord,
  | "type"
  | "severity"
  | "title"
  | "message"
  | "actionRequired"
  | "triggerMetric"
  | "triggerValue"
  | "thresholdValue"
  | "sentToClinician"
>;

export interface AlertStats {
  periodDays: number;
  severityBreakdown: Record<AlertSeverity, number>;
  unacknowledgedCount: number;
}

function metricValue(reading: VitalReading, metric: VitalMetric): number | null {
  switch (metric) {
    case "heart_rate":
      return reading.heartRate;
    case "spo2":
      return reading.spo2;
    case "systolic_bp":
      return reading.systolicBp;
  }
}

function breaches(rule: AlertThreshold, value: number): boolean {
  return rule.comparison === "above" ? value > rule.threshold : value < rule.threshold;
}

/** Threshold evaluation only; nothing is persisted. */
export function evaluateReading(reading: VitalReading): AlertDraft[] {
  const drafts: AlertDraft[] = [];
  for (const rule of ALERT_THRESHOLDS) {
    const value = metricValue(reading, rule.metric);
    if (value === null || !breaches(rule, value)) {
      continue;
    }
    drafts.push({
      type: rule.type,
      severity: rule.severity,
      title: rule.title,
      message: rule.describe(value),
      actionRequired: rule.actionRequired,
      triggerMetric: rule.metric,
      triggerValue: value,
      thresholdValue: rule.threshold,
      sentToClinician: true
    });
  }
  return drafts;
}

export interface AlertEngineDeps {
  store: DataStore;
  audit: AuditService;
  clock: Clock;
  logger: Logger;
}

export class AlertEngine {
  constructor(private readonly deps: AlertEngineDeps) {}

  /**
   * Evaluates a reading and persists the resulting alerts atomically. Callers
   * that also write the reading wrap both in one outer transaction.
   */
  evaluate(subjectId: string, reading: VitalReading): AlertRecord[] {
    const drafts = evaluateReading(reading);
    if (drafts.length === 0) {
      return [];
    }
    return this.deps.store.transaction(() => drafts.map((draft) => this.persist(subjectId, draft)));
  }

  recordConsentDisableRequest(patient: Account): AlertRecord {
    return this.persist(patient.id, {
      type: "ConsentDisableRequest",
      severity: "Warning",
      title: "Patient Opt-Out Request",
      message: `Patient ${patient.fullName ?? patient.email} has requested to disable data sharing.`,
      actionRequired: "Review and approve/reject this consent request.",
      triggerMetric: null,
      triggerValue: null,
      thresholdValue: null,
      sentToClinician: true
    });
  }

  /** Inserts one alert, superseding active alerts of the same type inside the dedup window. */
  persist(subjectId: string, draft: AlertDraft): AlertRecord {
    const { store, clock, logger } = this.deps;
    const now = clock.now();
    const since = addMinutes(now, -ALERT_DEDUP_WINDOW_MINUTES).toISOString();

    return store.transaction(() => {
      const record: AlertRecord = {
        ...draft,
        id: uuidv4(),
        subjectId,
        active: true,
        supersededBy: null,
        acknowledged: false,
        acknowledgedAt: null,
        acknowledgedBy: null,
        resolvedAt: null,
        resolvedBy: null,
        resolutionNotes: null,
        createdAt: now.toISOString()
      };

      for (const previous of store.alerts.findActiveSince(subjectId, draft.type, since)) {
        store.alerts.update(previous.id, { active: false, supersededBy: record.id });
      }
      const saved = store.alerts.insert(record);
      logger.info({ alertId: saved.id, subjectId, type: saved.type, severity: saved.severity }, "Alert created");
      return saved;
    });
  }

  list(subjectId: string, query: AlertQuery = {}): AlertRecord[] {
    return this.deps.store.alerts.listBySubject(subjectId, query);
  }

  /** The subject patient, or a clinician the patient shares with, may acknowledge. */
  acknowledge(alertId: string, actor: Identity): Result<AlertRecord> {
    const access = this.resolveForActor(alertId, actor, "acknowledge_alert", ["Patient", "Clinician"]);
    if (!access.ok) {
      return access;
    }
    const updated = this.deps.store.alerts.update(alertId, {
      acknowledged: true,
      acknowledgedAt: this.deps.clock.now().toISOString(),
      acknowledgedBy: actor.accountId
    });
    return updated ? ok(updated) : fail({ kind: "NotFound", resource: "alert" });
  }

  resolve(alertId: string, actor: Identity, notes: string | null): Result<AlertRecord> {
    const access = this.resolveForActor(alertId, actor, "resolve_alert", ["Clinician"]);
    if (!access.ok) {
      return access;
    }
    const at = this.deps.clock.now().toISOString();
    const alert = access.value;
    const updated = this.deps.store.alerts.update(alertId, {
      active: false,
      resolvedAt: at,
      resolvedBy: actor.accountId,
      resolutionNotes: notes,
      acknowledged: true,
      acknowledgedAt: alert.acknowledgedAt ?? at,
      acknowledgedBy: alert.acknowledgedBy ?? actor.accountId
    });
    return updated ? ok(updated) : fail({ kind: "NotFound", resource: "alert" });
  }

  /** Alerts created in the last `days` for patients the clinician may currently see. */
  stats(clinician: Identity, days: number): AlertStats {
    const { store, clock } = this.deps;
    const since = daysBefore(clock.now(), days).toISOString();
    const severityBreakdown: Record<AlertSeverity, number> = { Info: 0, Warning: 0, Critical: 0, Emergency: 0 };
    let unacknowledgedCount = 0;

    const visible = new Map<string, boolean>();
    for (const alert of store.alerts.listCreatedSince(since)) {
      let allowed = visible.get(alert.subjectId);
      if (allowed === undefined) {
        const patient = store.accounts.findById(alert.subjectId);
        allowed = patient !== undefined && canAccess(clinician, patient);
        visible.set(alert.subjectId, allowed);
      }
      if (!allowed) {
        continue;
      }
      severityBreakdown[alert.severity] += 1;
      if (!alert.acknowledged) {
        unacknowledgedCount += 1;
      }
    }
    return { periodDays: days, severityBreakdown, unacknowledgedCount };
  }

  private resolveForActor(
    alertId: string,
    actor: Identity,
    action: string,
    roles: Array<"Patient" | "Clinician">
  ): Result<AlertRecord> {
    const { store, audit } = this.deps;
    const denied = (result: Result<AlertRecord>): Result<AlertRecord> => {
      if (!result.ok) {
        audit.logDenial({ actorId: actor.accountId, action, targetId: alertId, error: result.error });
      }
      return result;
    };

    if (actor.role === "Admin") {
      return denied(fail({ kind: "Forbidden.AdminExcluded" }));
    }
    if (actor.role === "Patient" && !roles.includes("Patient")) {
      return denied(fail({ kind: "Forbidden.Role", required: roles }));
    }

    const alert = store.alerts.findById(alertId);
    if (!alert) {
      return denied(fail({ kind: "NotFound", resource: "alert" }));
    }

    if (actor.role === "Patient") {
      return alert.subjectId === actor.accountId ? ok(alert) : denied(fail({ kind: "NotFound", resource: "alert" }));
    }

    const patient = store.accounts.findById(alert.subjectId);
    if (!patient || !canAccess(actor, patient)) {
      return denied(fail({ kind: "Forbidden.Consent" }));
    }
    audit.logAccess({ actorId: actor.accountId, action, targetId: patient.id, metadata: { alertId } });
    return ok(alert);
  }
}

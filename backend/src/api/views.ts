import type {
  AccountView,
  AlertStatsResponse,
  AlertView,
  ConsentStatusResponse,
  PendingConsentRequest,
  TokenResponse,
  VitalReadingView,
  VitalsSummaryResponse
} from "@careguard/shared";
import { Account, AlertRecord, ConsentRecord, IssuedTokens, VitalRecord } from "../models/types";
import { AlertStats } from "../services/alertEngine";
import { VitalsSummary } from "../services/vitalsService";

export function toAccountView(account: Account): AccountView {
  return {
    id: account.id,
    email: account.email,
    full_name: account.fullName,
    role: account.role,
    is_active: account.active,
    is_verified: account.verified,
    created_at: account.createdAt
  };
}

export function toTokenResponse(tokens: IssuedTokens): TokenResponse {
  return {
    access_token: tokens.accessToken,
    refresh_token: tokens.refreshToken,
    token_type: "bearer",
    expires_in: tokens.expiresIn,
    user: toAccountView(tokens.account)
  };
}

export function toConsentStatus(consent: ConsentRecord): ConsentStatusResponse {
  return {
    share_state: consent.shareState,
    requested_at: consent.requestedAt,
    requested_by: consent.requestedBy,
    reviewed_at: consent.reviewedAt,
    reviewed_by: consent.reviewedBy,
    decision: consent.decision,
    reason: consent.reason
  };
}

export function toPendingRequest(patient: Account): PendingConsentRequest {
  return {
    patient_id: patient.id,
    email: patient.email,
    full_name: patient.fullName,
    requested_at: patient.consent?.requestedAt ?? null,
    reason: patient.consent?.reason ?? null
  };
}

export function toVitalView(record: VitalRecord): VitalReadingView {
  return {
    id: record.id,
    user_id: record.subjectId,
    heart_rate: record.heartRate,
    spo2: record.spo2,
    blood_pressure: record.systolicBp === null ? null : { systolic: record.systolicBp, diastolic: record.diastolicBp },
    timestamp: record.timestamp,
    created_at: record.createdAt
  };
}

export function toVitalsSummary(summary: VitalsSummary): VitalsSummaryResponse {
  return {
    period_days: summary.periodDays,
    total_readings: summary.totalReadings,
    avg_heart_rate: summary.avgHeartRate,
    min_heart_rate: summary.minHeartRate,
    max_heart_rate: summary.maxHeartRate,
    avg_spo2: summary.avgSpo2,
    min_spo2: summary.minSpo2,
    alerts_triggered: summary.alertsTriggered
  };
}

export function toAlertView(alert: AlertRecord): AlertView {
  return {
    id: alert.id,
    user_id: alert.subjectId,
    alert_type: alert.type,
    severity: alert.severity,
    title: alert.title,
    message: alert.message,
    action_required: alert.actionRequired,
    trigger_metric: alert.triggerMetric,
    trigger_value: alert.triggerValue,
    threshold_value: alert.thresholdValue,
    is_active: alert.active,
    superseded_by: alert.supersededBy,
    acknowledged: alert.acknowledged,
    acknowledged_at: alert.acknowledgedAt,
    acknowledged_by: alert.acknowledgedBy,
    resolved_at: alert.resolvedAt,
    resolved_by: alert.resolvedBy,
    resolution_notes: alert.resolutionNotes,
    created_at: alert.createdAt
  };
}

export function toAlertStats(stats: AlertStats, generatedAt: string): AlertStatsResponse {
  return {
    period_days: stats.periodDays,
    severity_breakdown: stats.severityBreakdown,
    unacknowledged_count: stats.unacknowledgedCount,
    generated_at: generatedAt
  };
}

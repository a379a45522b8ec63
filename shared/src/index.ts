export type Role = "Patient" | "Clinician" | "Admin";

export type ShareState = "On" | "DisableRequested" | "Off";

export type ConsentDecision = "Approve" | "Reject";

export type AlertSeverity = "Info" | "Warning" | "Critical" | "Emergency";

export type AlertType = "HighHeartRate" | "LowSpo2" | "HighBloodPressure" | "ConsentDisableRequest";

export type PolicyErrorCode =
  | "InvalidCredentials"
  | "AccountInactive"
  | "AccountLocked"
  | "TokenInvalid"
  | "Forbidden.Role"
  | "Forbidden.Consent"
  | "Forbidden.AdminExcluded"
  | "Conflict.AlreadyPending"
  | "Conflict.InvalidTransition"
  | "Conflict.EmailInUse"
  | "Conflict.SelfDeactivation"
  | "NotFound";

export type ErrorCode = PolicyErrorCode | "ValidationFailed" | "RateLimited" | "InternalError";

export interface ErrorResponse {
  error: {
    code: ErrorCode;
    message: string;
    retry_after_seconds?: number;
    details?: unknown;
  };
}

export interface AccountView {
  id: string;
  email: string;
  full_name: string | null;
  role: Role;
  is_active: boolean;
  is_verified: boolean;
  created_at: string;
}

export interface TokenResponse {
  access_token: string;
  refresh_token: string;
  token_type: "bearer";
  expires_in: number;
  user: AccountView;
}

export interface ConsentStatusResponse {
  share_state: ShareState;
  requested_at: string | null;
  requested_by: string | null;
  reviewed_at: string | null;
  reviewed_by: string | null;
  decision: ConsentDecision | null;
  reason: string | null;
}

export interface PendingConsentRequest {
  patient_id: string;
  email: string;
  full_name: string | null;
  requested_at: string | null;
  reason: string | null;
}

export interface VitalReadingView {
  id: string;
  user_id: string;
  heart_rate: number;
  spo2: number | null;
  blood_pressure: { systolic: number; diastolic: number | null } | null;
  timestamp: string;
  created_at: string;
}

export interface VitalSubmissionResponse {
  reading: VitalReadingView;
  alerts_created: number;
}

export interface VitalBatchResponse {
  records_created: number;
  alerts_created: number;
}

export interface VitalsSummaryResponse {
  period_days: number;
  total_readings: number;
  avg_heart_rate: number | null;
  min_heart_rate: number | null;
  max_heart_rate: number | null;
  avg_spo2: number | null;
  min_spo2: number | null;
  alerts_triggered: number;
}

export interface AlertView {
  id: string;
  user_id: string;
  alert_type: AlertType;
  severity: AlertSeverity;
  title: string;
  message: string;
  action_required: string | null;
  trigger_metric: string | null;
  trigger_value: number | null;
  threshold_value: number | null;
  is_active: boolean;
  superseded_by: string | null;
  acknowledged: boolean;
  acknowledged_at: string | null;
  acknowledged_by: string | null;
  resolved_at: string | null;
  resolved_by: string | null;
  resolution_notes: string | null;
  created_at: string;
}

export interface AlertStatsResponse {
  period_days: number;
  severity_breakdown: Partial<Record<AlertSeverity, number>>;
  unacknowledged_count: number;
  generated_at: string;
}

export interface RiskAssessmentResponse {
  patient_id: string;
  risk_score: number;
  risk_level: "low" | "moderate" | "high";
  readings_used: number;
  generated_at: string;
}

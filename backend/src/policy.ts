import type { AlertSeverity, AlertType } from "@careguard/shared";

// Security and clinical policy constants. Not configurable through the environment.

export const MAX_FAILED_LOGIN_ATTEMPTS = 3;
export const LOCKOUT_DURATION_MINUTES = 15;

export const PASSWORD_RESET_TOKEN_TTL_MINUTES = 60;

export const ALERT_DEDUP_WINDOW_MINUTES = 5;

// Allowance for device clocks running ahead of the server.
export const READING_CLOCK_SKEW_MINUTES = 5;

export const CONSENT_REASON_MAX_LENGTH = 500;

export type VitalMetric = "heart_rate" | "spo2" | "systolic_bp";

export interface AlertThreshold {
  metric: VitalMetric;
  comparison: "above" | "below";
  threshold: number;
  type: AlertType;
  severity: AlertSeverity;
  title: string;
  describe: (value: number) => string;
  actionRequired: string;
}

export const ALERT_THRESHOLDS: readonly AlertThreshold[] = [
  {
    metric: "heart_rate",
    comparison: "above",
    threshold: 180,
    type: "HighHeartRate",
    severity: "Critical",
    title: "High Heart Rate",
    describe: (value) => `Heart rate of ${value} BPM exceeds the safe limit of 180 BPM.`,
    actionRequired: "Stop activity and rest. Contact your care team if it does not settle."
  },
  {
    metric: "spo2",
    comparison: "below",
    threshold: 90,
    type: "LowSpo2",
    severity: "Critical",
    title: "Low Blood Oxygen",
    describe: (value) => `Blood oxygen of ${value}% is below the safe minimum of 90%.`,
    actionRequired: "Sit upright and breathe slowly. Seek medical help if it stays low."
  },
  {
    metric: "systolic_bp",
    comparison: "above",
    threshold: 160,
    type: "HighBloodPressure",
    severity: "Warning",
    title: "High Blood Pressure",
    describe: (value) => `Systolic blood pressure of ${value} mmHg exceeds 160 mmHg.`,
    actionRequired: "Rest and recheck in 15 minutes. Contact your clinician if it stays high."
  }
];

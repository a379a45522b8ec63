import type { AlertSeverity, AlertType, ConsentDecision, Role, ShareState } from "@careguard/shared";

export type { AlertSeverity, AlertType, ConsentDecision, Role, ShareState };

export interface ConsentRecord {
  shareState: ShareState;
  requestedAt: string | null;
  requestedBy: string | null;
  reviewedAt: string | null;
  reviewedBy: string | null;
  decision: ConsentDecision | null;
  reason: string | null;
}

export interface Account {
  id: string;
  email: string;
  fullName: string | null;
  role: Role;
  active: boolean;
  verified: boolean;
  createdAt: string;
  // Present for Patient accounts only.
  consent: ConsentRecord | null;
}

export interface Credential {
  accountId: string;
  passwordHash: string;
  failedAttempts: number;
  lockedUntil: string | null;
  passwordChangedAt: string | null;
  lastLoginAt: string | null;
}

export interface VitalReading {
  heartRate: number;
  spo2: number | null;
  systolicBp: number | null;
  diastolicBp: number | null;
  timestamp: string;
}

export interface VitalRecord extends VitalReading {
  id: string;
  subjectId: string;
  createdAt: string;
}

export interface AlertRecord {
  id: string;
  subjectId: string;
  type: AlertType;
  severity: AlertSeverity;
  title: string;
  message: string;
  actionRequired: string | null;
  triggerMetric: string | null;
  triggerValue: number | null;
  thresholdValue: number | null;
  sentToClinician: boolean;
  active: boolean;
  supersededBy: string | null;
  acknowledged: boolean;
  acknowledgedAt: string | null;
  acknowledgedBy: string | null;
  resolvedAt: string | null;
  resolvedBy: string | null;
  resolutionNotes: string | null;
  createdAt: string;
}

export interface AuditLogItem {
  id: string;
  actorId: string | null;
  action: string;
  targetId: string | null;
  outcome: "allowed" | "denied";
  reason: string | null;
  timestamp: string;
  metadata?: Record<string, string | number | boolean | null>;
}

export type TokenType = "access" | "refresh" | "password_reset";

export interface TokenClaims {
  sub: string;
  role: Role;
  type: TokenType;
  jti: string;
  iat: number;
  exp: number;
  // Binds a password reset token to the credential state it was minted for.
  pwd?: string;
}

export interface Identity {
  accountId: string;
  role: Role;
  active: boolean;
  tokenId: string;
}

export interface IssuedTokens {
  accessToken: string;
  refreshToken: string;
  expiresIn: number;
  account: Account;
}

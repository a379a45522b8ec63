import {
  Account,
  AlertRecord,
  AlertType,
  AuditLogItem,
  ConsentRecord,
  Credential,
  Role,
  ShareState,
  VitalRecord
} from "../models/types";

export interface AccountRepository {
  findById(id: string): Account | undefined;
  findByEmail(email: string): Account | undefined;
  list(filter?: { role?: Role; shareState?: ShareState }): Account[];
  insert(account: Account): Account;
  update(id: string, patch: Partial<Pick<Account, "active" | "verified" | "fullName">>): Account | undefined;
  /** Replaces the consent record only if the stored share state still equals `expected`. */
  compareAndSetConsent(id: string, expected: ShareState, next: ConsentRecord): boolean;
}

export interface CredentialRepository {
  find(accountId: string): Credential | undefined;
  insert(credential: Credential): Credential;
  /** Applies a failed-login update only if the stored counter still equals `expectedAttempts`. */
  compareAndSetFailures(
    accountId: string,
    expectedAttempts: number,
    next: Pick<Credential, "failedAttempts" | "lockedUntil">
  ): boolean;
  recordSuccessfulLogin(accountId: string, at: string): void;
  /** Stores a new hash and clears the failure counter and lockout. */
  replacePassword(accountId: string, passwordHash: string, changedAt: string): void;
}

export interface VitalRepository {
  insert(record: VitalRecord): VitalRecord;
  /** Newest reading taken at or before `asOf`. */
  latest(subjectId: string, asOf: string): VitalRecord | undefined;
  /** Readings taken in `[since, until]`, oldest first. */
  listBetween(subjectId: string, since: string, until: string): VitalRecord[];
}

export interface AlertQuery {
  includeInactive?: boolean;
  unacknowledgedOnly?: boolean;
  limit?: number;
}

export interface AlertRepository {
  insert(alert: AlertRecord): AlertRecord;
  findById(id: string): AlertRecord | undefined;
  findActiveSince(subjectId: string, type: AlertType, since: string): AlertRecord[];
  listBySubject(subjectId: string, query?: AlertQuery): AlertRecord[];
  listCreatedSince(since: string): AlertRecord[];
  update(
    id: string,
    patch: Partial<
      Pick<
        AlertRecord,
        | "active"
        | "supersededBy"
        | "acknowledged"
        | "acknowledgedAt"
        | "acknowledgedBy"
        | "resolvedAt"
        | "resolvedBy"
        | "resolutionNotes"
      >
    >
  ): AlertRecord | undefined;
}

export interface AuditRepository {
  append(entry: AuditLogItem): void;
  list(filter?: { actorId?: string; outcome?: AuditLogItem["outcome"] }): AuditLogItem[];
}

export interface DataStore {
  accounts: AccountRepository;
  credentials: CredentialRepository;
  vitals: VitalRepository;
  alerts: AlertRepository;
  audit: AuditRepository;
  /**
   * Runs `work` atomically: either every write it makes is kept or, when it
   * throws, none are. Nested calls join the outer transaction.
   */
  transaction<T>(work: () => T): T;
  close(): Promise<void>;
}

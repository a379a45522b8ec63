import { InfrastructureError } from "../models/errors";
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
import {
  AccountRepository,
  AlertQuery,
  AlertRepository,
  AuditRepository,
  CredentialRepository,
  DataStore,
  VitalRepository
} from "./repositories";

// Records are replaced on every write and copied on every read, so a shallow
// copy of the maps is a complete snapshot.
interface MemoryState {
  accounts: Map<string, Account>;
  credentials: Map<string, Credential>;
  vitals: Map<string, VitalRecord>;
  alerts: Map<string, AlertRecord>;
}

function copyAccount(account: Account): Account {
  return { ...account, consent: account.consent ? { ...account.consent } : null };
}

function byCreatedDesc<T extends { createdAt: string }>(left: T, right: T): number {
  return Date.parse(right.createdAt) - Date.parse(left.createdAt);
}

class MemoryAccountRepository implements AccountRepository {
  constructor(private readonly state: MemoryState) {}

  findById(id: string): Account | undefined {
    const account = this.state.accounts.get(id);
    return account ? copyAccount(account) : undefined;
  }

  findByEmail(email: string): Account | undefined {
    const normalized = email.trim().toLowerCase();
    for (const account of this.state.accounts.values()) {
      if (account.email.toLowerCase() === normalized) {
        return copyAccount(account);
      }
    }
    return undefined;
  }

  list(filter: { role?: Role; shareState?: ShareState } = {}): Account[] {
    return [...this.state.accounts.values()]
      .filter((account) => !filter.role || account.role === filter.role)
      .filter((account) => !filter.shareState || account.consent?.shareState === filter.shareState)
      .map(copyAccount);
  }

  insert(account: Account): Account {
    if (this.state.accounts.has(account.id)) {
      throw new InfrastructureError(`Duplicate account id ${account.id}.`);
    }
    if (this.findByEmail(account.email)) {
      throw new InfrastructureError("Unique constraint violated on account email.");
    }
    this.state.accounts.set(account.id, copyAccount(account));
    return copyAccount(account);
  }

  update(id: string, patch: Partial<Pick<Account, "active" | "verified" | "fullName">>): Account | undefined {
    const existing = this.state.accounts.get(id);
    if (!existing) {
      return undefined;
    }
    const updated = { ...existing, ...patch };
    this.state.accounts.set(id, updated);
    return copyAccount(updated);
  }

  compareAndSetConsent(id: string, expected: ShareState, next: ConsentRecord): boolean {
    const existing = this.state.accounts.get(id);
    if (!existing || !existing.consent || existing.consent.shareState !== expected) {
      return false;
    }
    this.state.accounts.set(id, { ...existing, consent: { ...next } });
    return true;
  }
}

class MemoryCredentialRepository implements CredentialRepository {
  constructor(private readonly state: MemoryState) {}

  find(accountId: string): Credential | undefined {
    const credential = this.state.credentials.get(accountId);
    return credential ? { ...credential } : undefined;
  }

  insert(credential: Credential): Credential {
    this.state.credentials.set(credential.accountId, { ...credential });
    return { ...credential };
  }

  compareAndSetFailures(
    accountId: string,
    expectedAttempts: number,
    next: Pick<Credential, "failedAttempts" | "lockedUntil">
  ): boolean {
    const existing = this.state.credentials.get(accountId);
    if (!existing || existing.failedAttempts !== expectedAttempts) {
      return false;
    }
    this.state.credentials.set(accountId, { ...existing, ...next });
    return true;
  }

  recordSuccessfulLogin(accountId: string, at: string): void {
    const existing = this.state.credentials.get(accountId);
    if (!existing) {
      throw new InfrastructureError(`Credential for ${accountId} disappeared during login.`);
    }
    this.state.credentials.set(accountId, { ...existing, failedAttempts: 0, lockedUntil: null, lastLoginAt: at });
  }

  replacePassword(accountId: string, passwordHash: string, changedAt: string): void {
    const existing = this.state.credentials.get(accountId);
    if (!existing) {
      throw new InfrastructureError(`Credential for ${accountId} not found.`);
    }
    this.state.credentials.set(accountId, {
      ...existing,
      passwordHash,
      passwordChangedAt: changedAt,
      failedAttempts: 0,
      lockedUntil: null
    });
  }
}

class MemoryVitalRepository implements VitalRepository {
  constructor(private readonly state: MemoryState) {}

  insert(record: VitalRecord): VitalRecord {
    this.state.vitals.set(record.id, { ...record });
    return { ...record };
  }

  latest(subjectId: string, asOf: string): VitalRecord | undefined {
    const asOfMs = Date.parse(asOf);
    let latest: VitalRecord | undefined;
    for (const record of this.state.vitals.values()) {
      if (record.subjectId !== subjectId || Date.parse(record.timestamp) > asOfMs) {
        continue;
      }
      if (!latest || Date.parse(record.timestamp) >= Date.parse(latest.timestamp)) {
        latest = record;
      }
    }
    return latest ? { ...latest } : undefined;
  }

  listBetween(subjectId: string, since: string, until: string): VitalRecord[] {
    const sinceMs = Date.parse(since);
    const untilMs = Date.parse(until);
    return [...this.state.vitals.values()]
      .filter((record) => {
        const takenAt = Date.parse(record.timestamp);
        return record.subjectId === subjectId && takenAt >= sinceMs && takenAt <= untilMs;
      })
      .sort((left, right) => Date.parse(left.timestamp) - Date.parse(right.timestamp))
      .map((record) => ({ ...record }));
  }
}

class MemoryAlertRepository implements AlertRepository {
  constructor(private readonly state: MemoryState) {}

  insert(alert: AlertRecord): AlertRecord {
    this.state.alerts.set(alert.id, { ...alert });
    return { ...alert };
  }

  findById(id: string): AlertRecord | undefined {
    const alert = this.state.alerts.get(id);
    return alert ? { ...alert } : undefined;
  }

  findActiveSince(subjectId: string, type: AlertType, since: string): AlertRecord[] {
    const sinceMs = Date.parse(since);
    return [...this.state.alerts.values()]
      .filter(
        (alert) =>
          alert.subjectId === subjectId &&
          alert.type === type &&
          alert.active &&
          Date.parse(alert.createdAt) >= sinceMs
      )
      .map((alert) => ({ ...alert }));
  }

  listBySubject(subjectId: string, query: AlertQuery = {}): AlertRecord[] {
    const matches = [...this.state.alerts.values()]
      .filter((alert) => alert.subjectId === subjectId)
      .filter((alert) => query.includeInactive || alert.active)
      .filter((alert) => !query.unacknowledgedOnly || !alert.acknowledged)
      .sort(byCreatedDesc);
    return (query.limit ? matches.slice(0, query.limit) : matches).map((alert) => ({ ...alert }));
  }

  listCreatedSince(since: string): AlertRecord[] {
    const sinceMs = Date.parse(since);
    return [...this.state.alerts.values()]
      .filter((alert) => Date.parse(alert.createdAt) >= sinceMs)
      .sort(byCreatedDesc)
      .map((alert) => ({ ...alert }));
  }

  update(id: string, patch: Partial<AlertRecord>): AlertRecord | undefined {
    const existing = this.state.alerts.get(id);
    if (!existing) {
      return undefined;
    }
    const updated = { ...existing, ...patch, id: existing.id };
    this.state.alerts.set(id, updated);
    return { ...updated };
  }
}

class MemoryAuditRepository implements AuditRepository {
  private readonly entries: AuditLogItem[] = [];

  append(entry: AuditLogItem): void {
    this.entries.unshift({ ...entry });
    if (this.entries.length > 5000) {
      this.entries.length = 5000;
    }
  }

  list(filter: { actorId?: string; outcome?: AuditLogItem["outcome"] } = {}): AuditLogItem[] {
    return this.entries
      .filter((entry) => !filter.actorId || entry.actorId === filter.actorId)
      .filter((entry) => !filter.outcome || entry.outcome === filter.outcome)
      .map((entry) => ({ ...entry }));
  }
}

/**
 * Process-local store used in development and tests. Audit entries are kept
 * outside of transactions, so a rolled-back write still leaves its audit trail.
 */
export class InMemoryStore implements DataStore {
  private readonly state: MemoryState = {
    accounts: new Map(),
    credentials: new Map(),
    vitals: new Map(),
    alerts: new Map()
  };

  private transactionDepth = 0;

  readonly accounts = new MemoryAccountRepository(this.state);
  readonly credentials = new MemoryCredentialRepository(this.state);
  readonly vitals = new MemoryVitalRepository(this.state);
  readonly alerts = new MemoryAlertRepository(this.state);
  readonly audit = new MemoryAuditRepository();

  transaction<T>(work: () => T): T {
    if (this.transactionDepth > 0) {
      return work();
    }

    const snapshot: MemoryState = {
      accounts: new Map(this.state.accounts),
      credentials: new Map(this.state.credentials),
      vitals: new Map(this.state.vitals),
      alerts: new Map(this.state.alerts)
    };

    this.transactionDepth += 1;
    try {
      return work();
    } catch (error) {
      this.state.accounts = snapshot.accounts;
      this.state.credentials = snapshot.credentials;
      this.state.vitals = snapshot.vitals;
      this.state.alerts = snapshot.alerts;
      throw error;
    } finally {
      this.transactionDepth -= 1;
    }
  }

  async close(): Promise<void> {
    this.state.accounts.clear();
    this.state.credentials.clear();
    this.state.vitals.clear();
    this.state.alerts.clear();
  }
}

import { v4 as uuidv4 } from "uuid";
import { PasswordHasher } from "../auth/password";
import { DataStore } from "../data/repositories";
import { Logger } from "../logger";
import { fail, ok, Result } from "../models/errors";
import { Account, Identity, Role, ShareState } from "../models/types";
import { Clock } from "../utils/time";
import { AuditService } from "./auditService";
import { initialConsent } from "./consentEngine";

export interface ProvisionAccountInput {
  email: string;
  password: string;
  fullName: string | null;
  role: Role;
}

export interface AccountServiceDeps {
  store: DataStore;
  passwords: PasswordHasher;
  audit: AuditService;
  clock: Clock;
  logger: Logger;
}

export class AccountService {
  constructor(private readonly deps: AccountServiceDeps) {}

  async provision(input: ProvisionAccountInput): Promise<Result<Account>> {
    const { store, passwords, clock, logger } = this.deps;
    const email = input.email.trim().toLowerCase();
    if (store.accounts.findByEmail(email)) {
      return fail({ kind: "Conflict.EmailInUse" });
    }

    const passwordHash = await passwords.hash(input.password);

    // Another request may have taken the email while the password was hashed.
    if (store.accounts.findByEmail(email)) {
      return fail({ kind: "Conflict.EmailInUse" });
    }

    const now = clock.now().toISOString();
    const account: Account = {
      id: uuidv4(),
      email,
      fullName: input.fullName,
      role: input.role,
      active: true,
      verified: true,
      createdAt: now,
      consent: input.role === "Patient" ? initialConsent() : null
    };

    const created = store.transaction(() => {
      const saved = store.accounts.insert(account);
      store.credentials.insert({
        accountId: saved.id,
        passwordHash,
        failedAttempts: 0,
        lockedUntil: null,
        passwordChangedAt: now,
        lastLoginAt: null
      });
      return saved;
    });

    logger.info({ accountId: created.id, role: created.role }, "Account provisioned");
    return ok(created);
  }

  find(id: string): Result<Account> {
    const account = this.deps.store.accounts.findById(id);
    return account ? ok(account) : fail({ kind: "NotFound", resource: "account" });
  }

  list(filter: { role?: Role; shareState?: ShareState } = {}): Account[] {
    return this.deps.store.accounts
      .list(filter)
      .sort((left, right) => left.createdAt.localeCompare(right.createdAt));
  }

  /** Soft deactivation; the account and its clinical history are kept. */
  deactivate(id: string, actor: Identity): Result<Account> {
    const { store, audit, logger } = this.deps;
    if (id === actor.accountId) {
      const error = { kind: "Conflict.SelfDeactivation" } as const;
      audit.logDenial({ actorId: actor.accountId, action: "deactivate_account", targetId: id, error });
      return fail(error);
    }

    const updated = store.accounts.update(id, { active: false });
    if (!updated) {
      return fail({ kind: "NotFound", resource: "account" });
    }
    logger.info({ accountId: id, actorId: actor.accountId }, "Account deactivated");
    return ok(updated);
  }

  /** Sets a new password chosen by an administrator and clears any lockout. */
  async adminResetPassword(id: string, newPassword: string, actor: Identity): Promise<Result<Account>> {
    const { store, passwords, clock, logger } = this.deps;
    const account = store.accounts.findById(id);
    if (!account || !store.credentials.find(id)) {
      return fail({ kind: "NotFound", resource: "account" });
    }

    const passwordHash = await passwords.hash(newPassword);
    store.credentials.replacePassword(id, passwordHash, clock.now().toISOString());
    logger.info({ accountId: id, actorId: actor.accountId }, "Password reset by administrator; lockout cleared");
    return ok(account);
  }

  /** Creates the first administrator when none exists yet. */
  async bootstrapAdmin(email: string, password: string): Promise<Account | null> {
    if (!email || !password) {
      return null;
    }
    if (this.deps.store.accounts.list({ role: "Admin" }).length > 0) {
      return null;
    }
    const created = await this.provision({ email, password, fullName: "Administrator", role: "Admin" });
    if (!created.ok) {
      this.deps.logger.warn({ reason: created.error.kind }, "Bootstrap administrator was not created");
      return null;
    }
    return created.value;
  }
}

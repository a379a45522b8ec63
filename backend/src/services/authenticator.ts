import { PasswordHasher } from "../auth/password";
import { TokenService } from "../auth/jwt";
import { DataStore } from "../data/repositories";
import { Logger } from "../logger";
import { fail, ok, PolicyError, Result } from "../models/errors";
import { Account, Credential, IssuedTokens } from "../models/types";
import { LOCKOUT_DURATION_MINUTES, MAX_FAILED_LOGIN_ATTEMPTS, PASSWORD_RESET_TOKEN_TTL_MINUTES } from "../policy";
import { addMinutes, Clock, isAfter, secondsUntil } from "../utils/time";
import { AuditService } from "./auditService";

export interface PasswordResetMessage {
  accountId: string;
  email: string;
  token: string;
  expiresAt: string;
}

/** Out-of-band channel (email, SMS) that hands reset tokens to account owners. */
export interface ResetTokenDelivery {
  deliver(message: PasswordResetMessage): Promise<void>;
}

export interface AuthenticatorDeps {
  store: DataStore;
  tokens: TokenService;
  passwords: PasswordHasher;
  audit: AuditService;
  resetDelivery: ResetTokenDelivery;
  clock: Clock;
  logger: Logger;
}

function lockoutExpired(credential: Credential, now: Date): boolean {
  return credential.lockedUntil !== null && !isAfter(credential.lockedUntil, now);
}

export class Authenticator {
  constructor(private readonly deps: AuthenticatorDeps) {}

  async authenticate(email: string, password: string): Promise<Result<IssuedTokens>> {
    const { store, passwords, clock } = this.deps;
    const account = store.accounts.findByEmail(email);
    const credential = account ? store.credentials.find(account.id) : undefined;

    if (!account || !credential) {
      await passwords.verifyAgainstDecoy(password);
      return this.deny(null, { kind: "InvalidCredentials" });
    }

    if (!account.active) {
      return this.deny(account.id, { kind: "AccountInactive" });
    }

    const lockout = this.checkLockout(credential);
    if (!lockout.ok) {
      return this.deny(account.id, lockout.error);
    }

    const valid = await passwords.verify(password, credential.passwordHash);

    if (!valid) {
      this.recordFailure(account.id, credential.failedAttempts);
      return this.deny(account.id, { kind: "InvalidCredentials" });
    }

    // A concurrent failure may have locked the account while the hash was compared.
    const current = store.credentials.find(account.id);
    if (current) {
      const recheck = this.checkLockout(current);
      if (!recheck.ok) {
        return this.deny(account.id, recheck.error);
      }
    }

    store.credentials.recordSuccessfulLogin(account.id, clock.now().toISOString());
    this.deps.logger.info({ accountId: account.id }, "Login succeeded");
    return ok(this.deps.tokens.issuePair(account));
  }

  refresh(refreshToken: string): Result<IssuedTokens> {
    const verified = this.deps.tokens.verify(refreshToken, "refresh");
    if (!verified.ok) {
      return this.deny(null, verified.error, "refresh");
    }

    const account = this.deps.store.accounts.findById(verified.value.sub);
    if (!account) {
      return this.deny(verified.value.sub, { kind: "TokenInvalid", reason: "unknown_subject" }, "refresh");
    }
    if (!account.active) {
      return this.deny(account.id, { kind: "AccountInactive" }, "refresh");
    }

    return ok(this.deps.tokens.issuePair(account));
  }

  /** Always resolves; whether the email exists is never observable by the caller. */
  async requestReset(email: string): Promise<void> {
    const { store, tokens, clock, logger } = this.deps;
    const account = store.accounts.findByEmail(email);
    const credential = account ? store.credentials.find(account.id) : undefined;

    if (!account || !credential || !account.active) {
      logger.info("Password reset requested for an unknown or inactive account");
      return;
    }

    const token = tokens.issuePasswordResetToken(account, credential.passwordHash);
    await this.deps.resetDelivery.deliver({
      accountId: account.id,
      email: account.email,
      token,
      expiresAt: addMinutes(clock.now(), PASSWORD_RESET_TOKEN_TTL_MINUTES).toISOString()
    });
    logger.info({ accountId: account.id }, "Password reset token issued");
  }

  async confirmReset(token: string, newPassword: string): Promise<Result<Account>> {
    const { store, tokens, passwords, clock, logger } = this.deps;
    const verified = tokens.verify(token, "password_reset");
    if (!verified.ok) {
      return this.deny(null, verified.error, "confirm_password_reset");
    }

    const account = store.accounts.findById(verified.value.sub);
    const credential = account ? store.credentials.find(account.id) : undefined;
    if (!account || !credential) {
      return this.deny(verified.value.sub, { kind: "TokenInvalid", reason: "unknown_subject" }, "confirm_password_reset");
    }
    if (verified.value.pwd !== tokens.fingerprint(credential.passwordHash)) {
      return this.deny(account.id, { kind: "TokenInvalid", reason: "stale" }, "confirm_password_reset");
    }

    const passwordHash = await passwords.hash(newPassword);

    // The hash may have changed while the new one was computed; the token is single-use.
    const current = store.credentials.find(account.id);
    if (!current || current.passwordHash !== credential.passwordHash) {
      return this.deny(account.id, { kind: "TokenInvalid", reason: "stale" }, "confirm_password_reset");
    }

    store.credentials.replacePassword(account.id, passwordHash, clock.now().toISOString());
    logger.info({ accountId: account.id }, "Password reset completed; lockout cleared");
    return ok(account);
  }

  private checkLockout(credential: Credential): Result<void> {
    const now = this.deps.clock.now();
    if (credential.lockedUntil !== null && isAfter(credential.lockedUntil, now)) {
      return fail({ kind: "AccountLocked", retryAfterSeconds: secondsUntil(credential.lockedUntil, now) });
    }
    return ok(undefined);
  }

  /**
   * Compare-and-set on the failure counter, retried against fresh state so that
   * concurrent guesses cannot overwrite each other's increments.
   */
  private recordFailure(accountId: string, observedAttempts: number): void {
    const { store, clock, logger } = this.deps;
    let expected = observedAttempts;

    for (;;) {
      const current = store.credentials.find(accountId);
      if (!current) {
        return;
      }
      const now = clock.now();
      if (current.lockedUntil !== null && isAfter(current.lockedUntil, now)) {
        return;
      }

      // Counting restarts once a previous lockout has run out.
      const base = lockoutExpired(current, now) ? 0 : expected;
      const failedAttempts = base + 1;
      const lockedUntil =
        failedAttempts >= MAX_FAILED_LOGIN_ATTEMPTS ? addMinutes(now, LOCKOUT_DURATION_MINUTES).toISOString() : null;

      if (store.credentials.compareAndSetFailures(accountId, expected, { failedAttempts, lockedUntil })) {
        if (lockedUntil) {
          logger.warn({ accountId, failedAttempts, lockedUntil }, "Account locked after repeated failed logins");
        }
        return;
      }
      expected = current.failedAttempts;
    }
  }

  private deny<T>(accountId: string | null, error: PolicyError, action = "login"): Result<T> {
    this.deps.audit.logDenial({ actorId: accountId, action, targetId: accountId, error });
    return fail(error);
  }
}

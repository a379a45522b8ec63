import { TokenService } from "./auth/jwt";
import { PasswordHasher } from "./auth/password";
import { AppConfig, loadConfig } from "./config";
import { DataStore } from "./data/repositories";
import { InMemoryStore } from "./data/store";
import { createLogger, Logger } from "./logger";
import { AccountService } from "./services/accountService";
import { AlertEngine } from "./services/alertEngine";
import { AuditService } from "./services/auditService";
import { Authenticator, PasswordResetMessage, ResetTokenDelivery } from "./services/authenticator";
import { Authorizer } from "./services/authorizer";
import { ConsentEngine } from "./services/consentEngine";
import { HeuristicRiskModel, RiskModel } from "./services/riskModel";
import { VitalsService } from "./services/vitalsService";
import { Clock, systemClock } from "./utils/time";

/** Everything a request handler needs, created once per process (or per test). */
export interface AppContext {
  config: AppConfig;
  clock: Clock;
  logger: Logger;
  store: DataStore;
  tokens: TokenService;
  passwords: PasswordHasher;
  audit: AuditService;
  authenticator: Authenticator;
  authorizer: Authorizer;
  consent: ConsentEngine;
  alerts: AlertEngine;
  vitals: VitalsService;
  accounts: AccountService;
  riskModel: RiskModel;
  start(): Promise<void>;
  stop(): Promise<void>;
}

export interface AppContextOptions {
  config?: Partial<AppConfig>;
  clock?: Clock;
  store?: DataStore;
  riskModel?: RiskModel;
  resetDelivery?: ResetTokenDelivery;
  logger?: Logger;
}

// No mail transport is configured; the token itself is never written to the log.
function loggingResetDelivery(logger: Logger): ResetTokenDelivery {
  return {
    async deliver(message: PasswordResetMessage): Promise<void> {
      logger.info({ accountId: message.accountId, expiresAt: message.expiresAt }, "Password reset token ready for delivery");
    }
  };
}

export function createAppContext(options: AppContextOptions = {}): AppContext {
  const config: AppConfig = { ...loadConfig(), ...options.config };
  const clock = options.clock ?? systemClock;
  const logger = options.logger ?? createLogger(config);
  const store = options.store ?? new InMemoryStore();
  const riskModel = options.riskModel ?? new HeuristicRiskModel();

  const tokens = new TokenService({
    secret: config.jwtSecret,
    accessTtlMinutes: config.accessTokenTtlMinutes,
    refreshTtlDays: config.refreshTokenTtlDays,
    clock
  });
  const passwords = new PasswordHasher(config.bcryptRounds);
  const audit = new AuditService(store.audit, logger.child({ component: "audit" }), clock);
  const alerts = new AlertEngine({ store, audit, clock, logger: logger.child({ component: "alerts" }) });

  let started = false;

  return {
    config,
    clock,
    logger,
    store,
    tokens,
    passwords,
    audit,
    alerts,
    riskModel,
    authenticator: new Authenticator({
      store,
      tokens,
      passwords,
      audit,
      resetDelivery: options.resetDelivery ?? loggingResetDelivery(logger.child({ component: "reset-delivery" })),
      clock,
      logger: logger.child({ component: "authenticator" })
    }),
    authorizer: new Authorizer(store, audit),
    consent: new ConsentEngine({ store, alerts, audit, clock, logger: logger.child({ component: "consent" }) }),
    vitals: new VitalsService({ store, alerts, clock, logger: logger.child({ component: "vitals" }) }),
    accounts: new AccountService({ store, passwords, audit, clock, logger: logger.child({ component: "accounts" }) }),

    async start(): Promise<void> {
      if (started) {
        return;
      }
      await riskModel.load();
      started = true;
      logger.info({ riskModel: riskModel.name }, "Application context started");
    },

    async stop(): Promise<void> {
      if (!started) {
        return;
      }
      started = false;
      await riskModel.unload();
      await store.close();
      logger.info("Application context stopped");
    }
  };
}

import dotenv from "dotenv";

dotenv.config();

const DEV_JWT_SECRET = "dev-only-jwt-secret-change-me";

export interface AppConfig {
  nodeEnv: string;
  port: number;
  jwtSecret: string;
  accessTokenTtlMinutes: number;
  refreshTokenTtlDays: number;
  bcryptRounds: number;
  logLevel: string;
  logPretty: boolean;
  jsonBodyLimit: string;
  resetRateLimitWindowMs: number;
  resetRateLimitMax: number;
  bootstrapAdminEmail: string;
  bootstrapAdminPassword: string;
}

function parseBooleanEnv(value: string | undefined, defaultValue: boolean): boolean {
  if (!value) {
    return defaultValue;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "true" || normalized === "1" || normalized === "yes") {
    return true;
  }
  if (normalized === "false" || normalized === "0" || normalized === "no") {
    return false;
  }
  return defaultValue;
}

function parseNumberEnv(value: string | undefined, defaultValue: number): number {
  if (!value) {
    return defaultValue;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : defaultValue;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const nodeEnv = env.NODE_ENV ?? "development";
  const jwtSecret = env.JWT_SECRET ?? DEV_JWT_SECRET;

  if (nodeEnv === "production" && (jwtSecret === DEV_JWT_SECRET || jwtSecret.length < 32)) {
    throw new Error("JWT_SECRET must be set to at least 32 characters in production.");
  }

  return {
    nodeEnv,
    port: parseNumberEnv(env.PORT, 4000),
    jwtSecret,
    accessTokenTtlMinutes: parseNumberEnv(env.ACCESS_TOKEN_TTL_MINUTES, 30),
    refreshTokenTtlDays: parseNumberEnv(env.REFRESH_TOKEN_TTL_DAYS, 7),
    bcryptRounds: parseNumberEnv(env.BCRYPT_ROUNDS, 12),
    logLevel: env.LOG_LEVEL ?? (nodeEnv === "test" ? "silent" : "info"),
    logPretty: parseBooleanEnv(env.LOG_PRETTY, nodeEnv === "development"),
    jsonBodyLimit: env.JSON_BODY_LIMIT ?? "1mb",
    resetRateLimitWindowMs: parseNumberEnv(env.RESET_RATE_LIMIT_WINDOW_MS, 15 * 60_000),
    resetRateLimitMax: parseNumberEnv(env.RESET_RATE_LIMIT_MAX, 12),
    bootstrapAdminEmail: env.BOOTSTRAP_ADMIN_EMAIL ?? "",
    bootstrapAdminPassword: env.BOOTSTRAP_ADMIN_PASSWORD ?? ""
  };
}

import { createHmac } from "crypto";
import jwt, { JwtPayload } from "jsonwebtoken";
import { v4 as uuidv4 } from "uuid";
import { z } from "zod";
import { fail, ok, Result } from "../models/errors";
import { Account, IssuedTokens, TokenClaims, TokenType } from "../models/types";
import { PASSWORD_RESET_TOKEN_TTL_MINUTES } from "../policy";
import { Clock } from "../utils/time";

const claimsSchema = z.object({
  sub: z.string().min(1),
  role: z.enum(["Patient", "Clinician", "Admin"]),
  type: z.enum(["access", "refresh", "password_reset"]),
  jti: z.string().min(1),
  iat: z.number(),
  exp: z.number(),
  pwd: z.string().optional()
});

export interface TokenServiceOptions {
  secret: string;
  accessTtlMinutes: number;
  refreshTtlDays: number;
  clock: Clock;
}

export class TokenService {
  private readonly accessTtlSeconds: number;
  private readonly refreshTtlSeconds: number;

  constructor(private readonly options: TokenServiceOptions) {
    this.accessTtlSeconds = Math.round(options.accessTtlMinutes * 60);
    this.refreshTtlSeconds = Math.round(options.refreshTtlDays * 24 * 60 * 60);
  }

  issuePair(account: Account): IssuedTokens {
    return {
      accessToken: this.sign(account, "access", this.accessTtlSeconds),
      refreshToken: this.sign(account, "refresh", this.refreshTtlSeconds),
      expiresIn: this.accessTtlSeconds,
      account
    };
  }

  issuePasswordResetToken(account: Account, passwordHash: string): string {
    return this.sign(account, "password_reset", PASSWORD_RESET_TOKEN_TTL_MINUTES * 60, {
      pwd: this.fingerprint(passwordHash)
    });
  }

  /** Short keyed digest of a password hash; changes whenever the password does. */
  fingerprint(passwordHash: string): string {
    return createHmac("sha256", this.options.secret).update(passwordHash).digest("base64url").slice(0, 22);
  }

  verify(token: string, expectedType: TokenType): Result<TokenClaims> {
    let decoded: string | JwtPayload;
    try {
      decoded = jwt.verify(token, this.options.secret, {
        algorithms: ["HS256"],
        clockTimestamp: this.nowSeconds()
      });
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        return fail({ kind: "TokenInvalid", reason: "expired" });
      }
      if (error instanceof jwt.JsonWebTokenError) {
        return fail({ kind: "TokenInvalid", reason: "malformed" });
      }
      throw error;
    }

    const parsed = claimsSchema.safeParse(decoded);
    if (!parsed.success) {
      return fail({ kind: "TokenInvalid", reason: "malformed" });
    }
    if (parsed.data.type !== expectedType) {
      return fail({ kind: "TokenInvalid", reason: "wrong_type" });
    }
    return ok(parsed.data);
  }

  private sign(account: Account, type: TokenType, ttlSeconds: number, extra: { pwd?: string } = {}): string {
    return jwt.sign(
      {
        sub: account.id,
        role: account.role,
        type,
        jti: uuidv4(),
        iat: this.nowSeconds(),
        ...extra
      },
      this.options.secret,
      { algorithm: "HS256", expiresIn: ttlSeconds }
    );
  }

  private nowSeconds(): number {
    return Math.floor(this.options.clock.now().getTime() / 1000);
  }
}

import { NextFunction, Request, RequestHandler, Response } from "express";
import { sendPolicyError } from "../api/respond";
import type { AppContext } from "../context";
import { InfrastructureError } from "../models/errors";
import { Identity } from "../models/types";

/**
 * Verifies the bearer access token and attaches the caller's identity. The
 * account is re-read on every request so deactivation takes effect at once.
 */
export function createRequireAuth(ctx: AppContext): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const header = req.headers.authorization;
    if (!header || !header.startsWith("Bearer ")) {
      sendPolicyError(res, { kind: "TokenInvalid", reason: "missing" });
      return;
    }

    const verified = ctx.tokens.verify(header.slice("Bearer ".length), "access");
    if (!verified.ok) {
      sendPolicyError(res, verified.error);
      return;
    }

    const account = ctx.store.accounts.findById(verified.value.sub);
    if (!account) {
      sendPolicyError(res, { kind: "TokenInvalid", reason: "unknown_subject" });
      return;
    }
    if (!account.active) {
      sendPolicyError(res, { kind: "AccountInactive" });
      return;
    }

    req.auth = {
      accountId: account.id,
      role: account.role,
      active: account.active,
      tokenId: verified.value.jti
    };
    next();
  };
}

export function requireIdentity(req: Request): Identity {
  if (!req.auth) {
    throw new InfrastructureError("Route reached without an authenticated identity.");
  }
  return req.auth;
}

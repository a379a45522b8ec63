import { Router } from "express";
import type { AppContext } from "../context";
import { asyncHandler } from "../middleware/asyncHandler";
import { createRequireAuth, requireIdentity } from "../middleware/auth";
import { createRateLimiter } from "../middleware/rateLimit";
import { sendPolicyError, sendValidationError } from "./respond";
import { loginSchema, refreshSchema, resetConfirmSchema, resetRequestSchema } from "./validators";
import { toAccountView, toTokenResponse } from "./views";

const RESET_REQUEST_MESSAGE = "If an account exists for this email, a reset link has been sent.";

export function createAuthRoutes(ctx: AppContext): Router {
  const authRoutes = Router();
  const requireAuth = createRequireAuth(ctx);
  const resetRateLimiter = createRateLimiter(ctx.config.resetRateLimitWindowMs, ctx.config.resetRateLimitMax, ctx.clock);

  authRoutes.post(
    "/login",
    asyncHandler(async (req, res) => {
      const parsed = loginSchema.safeParse(req.body);
      if (!parsed.success) {
        sendValidationError(res, parsed.error, "Invalid login payload.");
        return;
      }

      const result = await ctx.authenticator.authenticate(parsed.data.email, parsed.data.password);
      if (!result.ok) {
        sendPolicyError(res, result.error);
        return;
      }
      res.json(toTokenResponse(result.value));
    })
  );

  authRoutes.post("/refresh", (req, res) => {
    const parsed = refreshSchema.safeParse(req.body);
    if (!parsed.success) {
      sendValidationError(res, parsed.error, "Invalid refresh payload.");
      return;
    }

    const result = ctx.authenticator.refresh(parsed.data.refresh_token);
    if (!result.ok) {
      sendPolicyError(res, result.error);
      return;
    }
    res.json(toTokenResponse(result.value));
  });

  authRoutes.get("/me", requireAuth, (req, res) => {
    const account = ctx.store.accounts.findById(requireIdentity(req).accountId);
    if (!account) {
      sendPolicyError(res, { kind: "NotFound", resource: "account" });
      return;
    }
    res.json({ user: toAccountView(account) });
  });

  authRoutes.post(
    "/reset-password",
    resetRateLimiter,
    asyncHandler(async (req, res) => {
      const parsed = resetRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        sendValidationError(res, parsed.error, "Invalid reset payload.");
        return;
      }

      await ctx.authenticator.requestReset(parsed.data.email);
      res.json({ message: RESET_REQUEST_MESSAGE });
    })
  );

  authRoutes.post(
    "/reset-password/confirm",
    resetRateLimiter,
    asyncHandler(async (req, res) => {
      const parsed = resetConfirmSchema.safeParse(req.body);
      if (!parsed.success) {
        sendValidationError(res, parsed.error, "Invalid reset confirmation payload.");
        return;
      }

      const result = await ctx.authenticator.confirmReset(parsed.data.token, parsed.data.new_password);
      if (!result.ok) {
        // A bad reset token is a bad request, not an authentication failure.
        sendPolicyError(res, result.error, result.error.kind === "TokenInvalid" ? 400 : undefined);
        return;
      }
      res.json({ message: "Password has been reset." });
    })
  );

  return authRoutes;
}

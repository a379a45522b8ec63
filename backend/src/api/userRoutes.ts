import { Router } from "express";
import type { AppContext } from "../context";
import { asyncHandler } from "../middleware/asyncHandler";
import { createRequireAuth, requireIdentity } from "../middleware/auth";
import { authorize } from "../middleware/authorize";
import { anyAuthenticated, requireAdmin } from "../services/authorizer";
import { routeParam, sendPolicyError, sendValidationError } from "./respond";
import { adminResetSchema, provisionSchema } from "./validators";
import { toAccountView } from "./views";

/** Account administration. Responses carry account metadata only, never clinical data. */
export function createUserRoutes(ctx: AppContext): Router {
  const userRoutes = Router();
  const requireAuth = createRequireAuth(ctx);

  userRoutes.get("/me", requireAuth, authorize(ctx, "read_own_account", anyAuthenticated), (req, res) => {
    const result = ctx.accounts.find(requireIdentity(req).accountId);
    if (!result.ok) {
      sendPolicyError(res, result.error);
      return;
    }
    res.json({ user: toAccountView(result.value) });
  });

  userRoutes.post(
    "/",
    requireAuth,
    authorize(ctx, "provision_account", requireAdmin),
    asyncHandler(async (req, res) => {
      const parsed = provisionSchema.safeParse(req.body);
      if (!parsed.success) {
        sendValidationError(res, parsed.error, "Invalid account payload.");
        return;
      }

      const result = await ctx.accounts.provision({
        email: parsed.data.email,
        password: parsed.data.password,
        fullName: parsed.data.full_name,
        role: parsed.data.role
      });
      if (!result.ok) {
        sendPolicyError(res, result.error);
        return;
      }
      res.status(201).json({ user: toAccountView(result.value) });
    })
  );

  userRoutes.get("/", requireAuth, authorize(ctx, "list_accounts", requireAdmin), (_req, res) => {
    res.json({ users: ctx.accounts.list().map(toAccountView) });
  });

  userRoutes.get("/:id", requireAuth, authorize(ctx, "read_account", requireAdmin), (req, res) => {
    const result = ctx.accounts.find(routeParam(req, "id"));
    if (!result.ok) {
      sendPolicyError(res, result.error);
      return;
    }
    res.json({ user: toAccountView(result.value) });
  });

  userRoutes.delete("/:id", requireAuth, authorize(ctx, "deactivate_account", requireAdmin), (req, res) => {
    const result = ctx.accounts.deactivate(routeParam(req, "id"), requireIdentity(req));
    if (!result.ok) {
      sendPolicyError(res, result.error);
      return;
    }
    res.json({ user: toAccountView(result.value) });
  });

  userRoutes.post(
    "/:id/reset-password",
    requireAuth,
    authorize(ctx, "admin_reset_password", requireAdmin),
    asyncHandler(async (req, res) => {
      const parsed = adminResetSchema.safeParse(req.body);
      if (!parsed.success) {
        sendValidationError(res, parsed.error, "Invalid password payload.");
        return;
      }

      const result = await ctx.accounts.adminResetPassword(routeParam(req, "id"), parsed.data.new_password, requireIdentity(req));
      if (!result.ok) {
        sendPolicyError(res, result.error);
        return;
      }
      res.json({ message: "Password has been reset." });
    })
  );

  return userRoutes;
}

import { Request, Response, Router } from "express";
import type { AppContext } from "../context";
import { createRequireAuth, requireIdentity } from "../middleware/auth";
import { authorize } from "../middleware/authorize";
import { requireClinicianRole, requirePatientRole } from "../services/authorizer";
import { historyQuerySchema, alertListQuerySchema, resolveAlertSchema } from "./validators";
import { routeParam, sendPolicyError, sendValidationError } from "./respond";
import { toAlertStats, toAlertView } from "./views";

export function createAlertRoutes(ctx: AppContext): Router {
  const alertRoutes = Router();
  const requireAuth = createRequireAuth(ctx);

  function sendAlertList(req: Request, res: Response, subjectId: string): void {
    const parsed = alertListQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      sendValidationError(res, parsed.error, "Invalid alert query.");
      return;
    }
    const alerts = ctx.alerts.list(subjectId, {
      includeInactive: parsed.data.include_inactive === "true",
      unacknowledgedOnly: parsed.data.unacknowledged_only === "true",
      limit: parsed.data.limit
    });
    res.json({ alerts: alerts.map(toAlertView) });
  }

  alertRoutes.get("/", requireAuth, authorize(ctx, "read_own_alerts", requirePatientRole), (req, res) => {
    sendAlertList(req, res, requireIdentity(req).accountId);
  });

  // Registered before "/user/:id" and "/:id" so the literal path wins.
  alertRoutes.get("/stats", requireAuth, authorize(ctx, "alert_stats", requireClinicianRole), (req, res) => {
    const parsed = historyQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      sendValidationError(res, parsed.error, "Invalid stats query.");
      return;
    }
    const stats = ctx.alerts.stats(requireIdentity(req), parsed.data.days);
    res.json(toAlertStats(stats, ctx.clock.now().toISOString()));
  });

  alertRoutes.get("/user/:id", requireAuth, (req, res) => {
    const access = ctx.authorizer.authorizeSubjectAccess(requireIdentity(req), routeParam(req, "id"), "read_alerts");
    if (!access.ok) {
      sendPolicyError(res, access.error);
      return;
    }
    sendAlertList(req, res, access.value.id);
  });

  alertRoutes.patch("/:id/acknowledge", requireAuth, (req, res) => {
    const result = ctx.alerts.acknowledge(routeParam(req, "id"), requireIdentity(req));
    if (!result.ok) {
      sendPolicyError(res, result.error);
      return;
    }
    res.json({ alert: toAlertView(result.value) });
  });

  alertRoutes.patch("/:id/resolve", requireAuth, authorize(ctx, "resolve_alert", requireClinicianRole), (req, res) => {
    const parsed = resolveAlertSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      sendValidationError(res, parsed.error, "Invalid resolution payload.");
      return;
    }
    const result = ctx.alerts.resolve(routeParam(req, "id"), requireIdentity(req), parsed.data.notes);
    if (!result.ok) {
      sendPolicyError(res, result.error);
      return;
    }
    res.json({ alert: toAlertView(result.value) });
  });

  return alertRoutes;
}

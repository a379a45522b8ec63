import { Router } from "express";
import type { AppContext } from "../context";
import { createRequireAuth, requireIdentity } from "../middleware/auth";
import { authorize } from "../middleware/authorize";
import { requireClinicianRole, requirePatientRole } from "../services/authorizer";
import { ConsentCommand } from "../services/consentEngine";
import { routeParam, sendPolicyError, sendValidationError } from "./respond";
import { consentReasonSchema, consentReviewSchema } from "./validators";
import { toConsentStatus, toPendingRequest } from "./views";

export function createConsentRoutes(ctx: AppContext): Router {
  const consentRoutes = Router();
  const requireAuth = createRequireAuth(ctx);

  consentRoutes.get("/status", requireAuth, authorize(ctx, "consent_status", requirePatientRole), (req, res) => {
    const result = ctx.consent.status(requireIdentity(req).accountId);
    if (!result.ok) {
      sendPolicyError(res, result.error);
      return;
    }
    res.json(toConsentStatus(result.value));
  });

  consentRoutes.post("/disable", requireAuth, authorize(ctx, "consent_request_disable", requirePatientRole), (req, res) => {
    const parsed = consentReasonSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      sendValidationError(res, parsed.error, "Invalid consent payload.");
      return;
    }

    const identity = requireIdentity(req);
    const result = ctx.consent.apply(identity.accountId, { type: "request_disable", reason: parsed.data.reason }, identity);
    if (!result.ok) {
      sendPolicyError(res, result.error);
      return;
    }
    res.json(toConsentStatus(result.value));
  });

  consentRoutes.post("/enable", requireAuth, authorize(ctx, "consent_enable", requirePatientRole), (req, res) => {
    const identity = requireIdentity(req);
    const result = ctx.consent.apply(identity.accountId, { type: "enable" }, identity);
    if (!result.ok) {
      sendPolicyError(res, result.error);
      return;
    }
    res.json(toConsentStatus(result.value));
  });

  consentRoutes.get("/pending", requireAuth, authorize(ctx, "consent_list_pending", requireClinicianRole), (_req, res) => {
    res.json({ requests: ctx.consent.listPending().map(toPendingRequest) });
  });

  consentRoutes.post(
    "/:patientId/review",
    requireAuth,
    authorize(ctx, "consent_review", requireClinicianRole),
    (req, res) => {
      const parsed = consentReviewSchema.safeParse(req.body);
      if (!parsed.success) {
        sendValidationError(res, parsed.error, "Invalid review payload.");
        return;
      }

      const command: ConsentCommand =
        parsed.data.decision === "Approve"
          ? { type: "approve", reason: parsed.data.reason }
          : { type: "reject", reason: parsed.data.reason };
      const result = ctx.consent.apply(routeParam(req, "patientId"), command, requireIdentity(req));
      if (!result.ok) {
        sendPolicyError(res, result.error);
        return;
      }
      res.json(toConsentStatus(result.value));
    }
  );

  return consentRoutes;
}

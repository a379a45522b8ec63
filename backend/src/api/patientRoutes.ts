import type { RiskAssessmentResponse } from "@careguard/shared";
import { Router } from "express";
import type { AppContext } from "../context";
import { createRequireAuth, requireIdentity } from "../middleware/auth";
import { authorize } from "../middleware/authorize";
import { requireClinicianRole } from "../services/authorizer";
import { shareStateOf } from "../services/consentEngine";
import { buildRiskFeatures, riskLevel } from "../services/riskModel";
import { routeParam, sendPolicyError } from "./respond";
import { toAccountView } from "./views";

// Vitals window the risk score is computed over.
const RISK_WINDOW_DAYS = 7;

export function createPatientRoutes(ctx: AppContext): Router {
  const patientRoutes = Router();
  const requireAuth = createRequireAuth(ctx);

  patientRoutes.get("/", requireAuth, authorize(ctx, "list_patients", requireClinicianRole), (_req, res) => {
    const patients = ctx.accounts.list({ role: "Patient" }).filter((patient) => patient.active);
    res.json({
      patients: patients.map((patient) => ({ ...toAccountView(patient), share_state: shareStateOf(patient) }))
    });
  });

  patientRoutes.get("/:id/risk", requireAuth, (req, res) => {
    const access = ctx.authorizer.authorizeSubjectAccess(requireIdentity(req), routeParam(req, "id"), "read_risk");
    if (!access.ok) {
      sendPolicyError(res, access.error);
      return;
    }

    const features = buildRiskFeatures(ctx.vitals.history(access.value.id, RISK_WINDOW_DAYS));
    const score = ctx.riskModel.predict(features);
    const body: RiskAssessmentResponse = {
      patient_id: access.value.id,
      risk_score: score,
      risk_level: riskLevel(score),
      readings_used: features.readingsUsed,
      generated_at: ctx.clock.now().toISOString()
    };
    res.json(body);
  });

  return patientRoutes;
}

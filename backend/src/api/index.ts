import { Router } from "express";
import type { AppContext } from "../context";
import { createAlertRoutes } from "./alertRoutes";
import { createAuthRoutes } from "./authRoutes";
import { createConsentRoutes } from "./consentRoutes";
import { createPatientRoutes } from "./patientRoutes";
import { createUserRoutes } from "./userRoutes";
import { createVitalRoutes } from "./vitalRoutes";

export function createApiRouter(ctx: AppContext): Router {
  const apiRouter = Router();

  apiRouter.get("/health", (_req, res) => {
    res.json({
      status: "ok",
      service: "careguard backend",
      risk_model: ctx.riskModel.name
    });
  });

  apiRouter.use("/auth", createAuthRoutes(ctx));
  apiRouter.use("/users", createUserRoutes(ctx));
  apiRouter.use("/consent", createConsentRoutes(ctx));
  apiRouter.use("/vitals", createVitalRoutes(ctx));
  apiRouter.use("/alerts", createAlertRoutes(ctx));
  apiRouter.use("/patients", createPatientRoutes(ctx));

  return apiRouter;
}

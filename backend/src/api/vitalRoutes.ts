import type { VitalBatchResponse, VitalSubmissionResponse } from "@careguard/shared";
import { Request, Response, Router } from "express";
import type { AppContext } from "../context";
import { createRequireAuth, requireIdentity } from "../middleware/auth";
import { authorize } from "../middleware/authorize";
import { VitalReading } from "../models/types";
import { requirePatientRole } from "../services/authorizer";
import { routeParam, sendError, sendPolicyError, sendValidationError } from "./respond";
import { historyQuerySchema, isFutureReading, toVitalReading, vitalBatchSchema, vitalReadingSchema } from "./validators";
import { toVitalsSummary, toVitalView } from "./views";

export function createVitalRoutes(ctx: AppContext): Router {
  const vitalRoutes = Router();
  const requireAuth = createRequireAuth(ctx);

  function rejectFutureReadings(res: Response, readings: VitalReading[], now: Date): boolean {
    if (!readings.some((reading) => isFutureReading(reading, now))) {
      return false;
    }
    sendError(res, 400, "ValidationFailed", "Reading timestamps cannot be in the future.");
    return true;
  }

  function sendLatest(res: Response, subjectId: string): void {
    const record = ctx.vitals.latest(subjectId);
    if (!record) {
      sendPolicyError(res, { kind: "NotFound", resource: "vital reading" });
      return;
    }
    res.json({ reading: toVitalView(record) });
  }

  function sendHistory(req: Request, res: Response, subjectId: string): void {
    const parsed = historyQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      sendValidationError(res, parsed.error, "Invalid history query.");
      return;
    }
    const readings = ctx.vitals.history(subjectId, parsed.data.days);
    res.json({ days: parsed.data.days, readings: readings.map(toVitalView) });
  }

  function sendSummary(req: Request, res: Response, subjectId: string): void {
    const parsed = historyQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      sendValidationError(res, parsed.error, "Invalid summary query.");
      return;
    }
    res.json(toVitalsSummary(ctx.vitals.summary(subjectId, parsed.data.days)));
  }

  vitalRoutes.post("/", requireAuth, authorize(ctx, "submit_vitals", requirePatientRole), (req, res) => {
    const parsed = vitalReadingSchema.safeParse(req.body);
    if (!parsed.success) {
      sendValidationError(res, parsed.error, "Invalid vital reading.");
      return;
    }

    const now = ctx.clock.now();
    const reading = toVitalReading(parsed.data, now);
    if (rejectFutureReadings(res, [reading], now)) {
      return;
    }

    const result = ctx.vitals.ingest(requireIdentity(req).accountId, reading);
    const body: VitalSubmissionResponse = { reading: toVitalView(result.record), alerts_created: result.alerts.length };
    res.status(201).json(body);
  });

  vitalRoutes.post("/batch", requireAuth, authorize(ctx, "submit_vitals_batch", requirePatientRole), (req, res) => {
    const parsed = vitalBatchSchema.safeParse(req.body);
    if (!parsed.success) {
      sendValidationError(res, parsed.error, "Invalid vital batch.");
      return;
    }

    const now = ctx.clock.now();
    const readings = parsed.data.readings.map((reading) => toVitalReading(reading, now));
    if (rejectFutureReadings(res, readings, now)) {
      return;
    }

    const result = ctx.vitals.ingestBatch(requireIdentity(req).accountId, readings);
    const body: VitalBatchResponse = { records_created: result.recordsCreated, alerts_created: result.alertsCreated };
    res.status(201).json(body);
  });

  vitalRoutes.get("/latest", requireAuth, authorize(ctx, "read_own_vitals", requirePatientRole), (req, res) => {
    sendLatest(res, requireIdentity(req).accountId);
  });

  vitalRoutes.get("/history", requireAuth, authorize(ctx, "read_own_vitals", requirePatientRole), (req, res) => {
    sendHistory(req, res, requireIdentity(req).accountId);
  });

  vitalRoutes.get("/summary", requireAuth, authorize(ctx, "read_own_vitals", requirePatientRole), (req, res) => {
    sendSummary(req, res, requireIdentity(req).accountId);
  });

  vitalRoutes.get("/user/:id/latest", requireAuth, (req, res) => {
    const access = ctx.authorizer.authorizeSubjectAccess(requireIdentity(req), routeParam(req, "id"), "read_vitals");
    if (!access.ok) {
      sendPolicyError(res, access.error);
      return;
    }
    sendLatest(res, access.value.id);
  });

  vitalRoutes.get("/user/:id/history", requireAuth, (req, res) => {
    const access = ctx.authorizer.authorizeSubjectAccess(requireIdentity(req), routeParam(req, "id"), "read_vitals");
    if (!access.ok) {
      sendPolicyError(res, access.error);
      return;
    }
    sendHistory(req, res, access.value.id);
  });

  vitalRoutes.get("/user/:id/summary", requireAuth, (req, res) => {
    const access = ctx.authorizer.authorizeSubjectAccess(requireIdentity(req), routeParam(req, "id"), "read_vitals_summary");
    if (!access.ok) {
      sendPolicyError(res, access.error);
      return;
    }
    sendSummary(req, res, access.value.id);
  });

  return vitalRoutes;
}

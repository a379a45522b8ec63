import request from "supertest";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { AlertRecord, Account } from "../src/models/types";
import { InfrastructureError } from "../src/models/errors";
import { evaluateReading } from "../src/services/alertEngine";
import { createAccount, createHarness, login, TestHarness } from "./helpers";

describe("threshold evaluation", () => {
  const base = { heartRate: 72, spo2: 98, systolicBp: 120, diastolicBp: 80, timestamp: "2026-01-15T09:00:00.000Z" };

  it("raises a single critical heart rate alert for 190 bpm", () => {
    const drafts = evaluateReading({ ...base, heartRate: 190, spo2: 99 });

    expect(drafts).toHaveLength(1);
    expect(drafts[0]).toMatchObject({
      type: "HighHeartRate",
      severity: "Critical",
      triggerMetric: "heart_rate",
      triggerValue: 190,
      thresholdValue: 180,
      message: "Heart rate of 190 BPM exceeds the safe limit of 180 BPM."
    });
  });

  it("treats the thresholds themselves as normal", () => {
    expect(evaluateReading({ ...base, heartRate: 180, spo2: 90, systolicBp: 160 })).toEqual([]);
  });

  it("raises one alert per breached threshold", () => {
    const types = evaluateReading({ ...base, heartRate: 181, spo2: 89, systolicBp: 161 }).map((draft) => draft.type);
    expect(types).toEqual(["HighHeartRate", "LowSpo2", "HighBloodPressure"]);
  });

  it("skips metrics the reading does not carry", () => {
    expect(evaluateReading({ ...base, spo2: null, systolicBp: null, diastolicBp: null })).toEqual([]);
  });
});

describe("vital ingestion and alerts", () => {
  let harness: TestHarness;
  let patient: Account;
  let patientToken: string;
  let clinicianToken: string;

  beforeEach(async () => {
    harness = await createHarness();
    patient = await createAccount(harness.ctx, "Patient", "patient@example.test", "Pat Example");
    await createAccount(harness.ctx, "Clinician", "clinician@example.test");
    patientToken = await login(harness, "patient@example.test");
    clinicianToken = await login(harness, "clinician@example.test");
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await harness.ctx.stop();
  });

  const submit = (body: object) =>
    request(harness.app).post("/api/vitals").set("Authorization", `Bearer ${patientToken}`).send(body);

  const submitBatch = (readings: object[]) =>
    request(harness.app).post("/api/vitals/batch").set("Authorization", `Bearer ${patientToken}`).send({ readings });

  const ownAlerts = (query = "") =>
    request(harness.app).get(`/api/alerts${query}`).set("Authorization", `Bearer ${patientToken}`);

  it("stores a reading and reports how many alerts it raised", async () => {
    const res = await submit({ heart_rate: 190, spo2: 99, blood_pressure: { systolic: 120, diastolic: 80 } });

    expect(res.status).toBe(201);
    expect(res.body.alerts_created).toBe(1);
    expect(res.body.reading).toMatchObject({
      user_id: patient.id,
      heart_rate: 190,
      spo2: 99,
      blood_pressure: { systolic: 120, diastolic: 80 },
      timestamp: "2026-01-15T09:00:00.000Z"
    });

    const alerts = await ownAlerts();
    expect(alerts.body.alerts).toHaveLength(1);
    expect(alerts.body.alerts[0]).toMatchObject({
      alert_type: "HighHeartRate",
      severity: "Critical",
      trigger_value: 190,
      threshold_value: 180,
      is_active: true
    });
  });

  it("supersedes an alert of the same type raised two minutes earlier", async () => {
    await submit({ heart_rate: 190 });
    harness.clock.advanceMinutes(2);
    await submit({ heart_rate: 195 });

    const active = await ownAlerts();
    expect(active.body.alerts).toHaveLength(1);
    expect(active.body.alerts[0].trigger_value).toBe(195);

    const all = await ownAlerts("?include_inactive=true");
    expect(all.body.alerts).toHaveLength(2);
    const [newer, older] = all.body.alerts;
    expect(older.is_active).toBe(false);
    expect(older.superseded_by).toBe(newer.id);
  });

  it("keeps both alerts when they are further apart than the dedup window", async () => {
    await submit({ heart_rate: 190 });
    harness.clock.advanceMinutes(6);
    await submit({ heart_rate: 195 });

    const active = await ownAlerts();
    expect(active.body.alerts).toHaveLength(2);
  });

  it("does not supersede alerts of a different type", async () => {
    await submit({ heart_rate: 190 });
    harness.clock.advanceMinutes(1);
    await submit({ heart_rate: 80, spo2: 85 });

    const active = await ownAlerts();
    expect(active.body.alerts.map((alert: { alert_type: string }) => alert.alert_type).sort()).toEqual([
      "HighHeartRate",
      "LowSpo2"
    ]);
  });

  it("ingests a batch in one transaction and counts created records", async () => {
    const res = await submitBatch([
      { heart_rate: 70, spo2: 98, timestamp: "2026-01-15T08:50:00Z" },
      { heart_rate: 190, spo2: 98, timestamp: "2026-01-15T08:55:00Z" },
      { heart_rate: 88, spo2: 85, timestamp: "2026-01-15T08:58:00Z" }
    ]);

    expect(res.status).toBe(201);
    expect(res.body).toEqual({ records_created: 3, alerts_created: 2 });
  });

  it("writes neither readings nor alerts when an alert insert fails mid-batch", async () => {
    const alertsRepository = harness.ctx.store.alerts;
    const insert = alertsRepository.insert.bind(alertsRepository);
    let calls = 0;
    vi.spyOn(alertsRepository, "insert").mockImplementation((alert: AlertRecord) => {
      calls += 1;
      if (calls === 2) {
        throw new InfrastructureError("alert store unavailable");
      }
      return insert(alert);
    });

    const res = await submitBatch([{ heart_rate: 190 }, { heart_rate: 200 }]);

    expect(res.status).toBe(500);
    expect(res.body.error.code).toBe("InternalError");
    expect(harness.ctx.vitals.latest(patient.id)).toBeUndefined();
    expect(harness.ctx.store.alerts.listBySubject(patient.id, { includeInactive: true })).toEqual([]);
  });

  it("discards a single reading whose alert could not be stored", async () => {
    vi.spyOn(harness.ctx.store.alerts, "insert").mockImplementation(() => {
      throw new InfrastructureError("alert store unavailable");
    });

    const res = await submit({ heart_rate: 190 });

    expect(res.status).toBe(500);
    expect(harness.ctx.vitals.latest(patient.id)).toBeUndefined();
  });

  it("discards a reading when the second of its two alerts cannot be stored", async () => {
    const alertsRepository = harness.ctx.store.alerts;
    const insert = alertsRepository.insert.bind(alertsRepository);
    let calls = 0;
    vi.spyOn(alertsRepository, "insert").mockImplementation((alert: AlertRecord) => {
      calls += 1;
      if (calls === 2) {
        throw new InfrastructureError("alert store unavailable");
      }
      return insert(alert);
    });

    const res = await submit({ heart_rate: 190, spo2: 85 });

    expect(res.status).toBe(500);
    expect(calls).toBe(2);
    expect(harness.ctx.vitals.latest(patient.id)).toBeUndefined();
    expect(harness.ctx.store.alerts.listBySubject(patient.id, { includeInactive: true })).toEqual([]);
  });

  it("refuses readings stamped in the future", async () => {
    const single = await submit({ heart_rate: 70, timestamp: "2099-01-01T00:00:00Z" });
    expect(single.status).toBe(400);
    expect(single.body.error.code).toBe("ValidationFailed");

    const batch = await submitBatch([
      { heart_rate: 70, timestamp: "2026-01-15T08:00:00Z" },
      { heart_rate: 72, timestamp: "2099-01-01T00:00:00Z" }
    ]);
    expect(batch.status).toBe(400);
    expect(harness.ctx.vitals.latest(patient.id)).toBeUndefined();
  });

  it("accepts readings within the device clock allowance", async () => {
    const res = await submit({ heart_rate: 70, timestamp: "2026-01-15T09:04:00Z" });
    expect(res.status).toBe(201);
  });

  it("does not let a stored future reading hide newer ones", async () => {
    harness.ctx.vitals.ingest(patient.id, {
      heartRate: 70,
      spo2: null,
      systolicBp: null,
      diastolicBp: null,
      timestamp: "2099-01-01T00:00:00.000Z"
    });
    await submit({ heart_rate: 95 });

    const latest = await request(harness.app).get("/api/vitals/latest").set("Authorization", `Bearer ${patientToken}`);
    expect(latest.status).toBe(200);
    expect(latest.body.reading.heart_rate).toBe(95);

    const history = await request(harness.app).get("/api/vitals/history").set("Authorization", `Bearer ${patientToken}`);
    expect(history.body.readings.map((reading: { heart_rate: number }) => reading.heart_rate)).toEqual([95]);
  });

  it("summarises the patient's own readings over the window", async () => {
    await submitBatch([
      { heart_rate: 70, spo2: 96, timestamp: "2026-01-15T08:00:00Z" },
      { heart_rate: 90, spo2: 98, timestamp: "2026-01-15T08:30:00Z" },
      { heart_rate: 190, spo2: 97, timestamp: "2026-01-01T08:00:00Z" }
    ]);

    const res = await request(harness.app).get("/api/vitals/summary?days=7").set("Authorization", `Bearer ${patientToken}`);

    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      period_days: 7,
      total_readings: 2,
      avg_heart_rate: 80,
      min_heart_rate: 70,
      max_heart_rate: 90,
      avg_spo2: 97,
      min_spo2: 96,
      alerts_triggered: 1
    });
  });

  it("reports an empty summary with null statistics", async () => {
    const res = await request(harness.app).get("/api/vitals/summary").set("Authorization", `Bearer ${patientToken}`);

    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      period_days: 7,
      total_readings: 0,
      avg_heart_rate: null,
      min_heart_rate: null,
      max_heart_rate: null,
      avg_spo2: null,
      min_spo2: null,
      alerts_triggered: 0
    });
  });

  it("validates reading ranges", async () => {
    const res = await submit({ heart_rate: 20 });

    expect(res.status).toBe(400);
    expect(res.body.error.code).toBe("ValidationFailed");
  });

  it("caps batches at 1000 readings", async () => {
    const res = await submitBatch(Array.from({ length: 1001 }, () => ({ heart_rate: 70 })));
    expect(res.status).toBe(400);
  });

  it("returns history inside the requested window, oldest first", async () => {
    await submitBatch([
      { heart_rate: 70, timestamp: "2026-01-13T09:00:00Z" },
      { heart_rate: 75, timestamp: "2026-01-15T08:00:00Z" },
      { heart_rate: 74, timestamp: "2026-01-14T12:00:00Z" }
    ]);

    const res = await request(harness.app)
      .get("/api/vitals/history?days=1")
      .set("Authorization", `Bearer ${patientToken}`);

    expect(res.status).toBe(200);
    expect(res.body.readings.map((reading: { heart_rate: number }) => reading.heart_rate)).toEqual([74, 75]);

    const latest = await request(harness.app).get("/api/vitals/latest").set("Authorization", `Bearer ${patientToken}`);
    expect(latest.body.reading.heart_rate).toBe(75);
  });

  it("lets a consenting clinician read a patient's alerts", async () => {
    await submit({ heart_rate: 190 });

    const res = await request(harness.app)
      .get(`/api/alerts/user/${patient.id}`)
      .set("Authorization", `Bearer ${clinicianToken}`);

    expect(res.status).toBe(200);
    expect(res.body.alerts).toHaveLength(1);

    const [access] = harness.ctx.store.audit.list({ outcome: "allowed" });
    expect(access?.action).toBe("read_alerts");
    expect(access?.targetId).toBe(patient.id);
  });

  it("lets the patient acknowledge their own alert", async () => {
    await submit({ heart_rate: 190 });
    const [alert] = harness.ctx.store.alerts.listBySubject(patient.id);

    const res = await request(harness.app)
      .patch(`/api/alerts/${alert?.id}/acknowledge`)
      .set("Authorization", `Bearer ${patientToken}`);

    expect(res.status).toBe(200);
    expect(res.body.alert.acknowledged).toBe(true);
    expect(res.body.alert.acknowledged_by).toBe(patient.id);
  });

  it("hides other patients' alerts from acknowledgement", async () => {
    await submit({ heart_rate: 190 });
    const [alert] = harness.ctx.store.alerts.listBySubject(patient.id);
    await createAccount(harness.ctx, "Patient", "other@example.test");
    const otherToken = await login(harness, "other@example.test");

    const res = await request(harness.app)
      .patch(`/api/alerts/${alert?.id}/acknowledge`)
      .set("Authorization", `Bearer ${otherToken}`);

    expect(res.status).toBe(404);
  });

  it("lets clinicians resolve alerts with notes", async () => {
    await submit({ heart_rate: 190 });
    const [alert] = harness.ctx.store.alerts.listBySubject(patient.id);

    const res = await request(harness.app)
      .patch(`/api/alerts/${alert?.id}/resolve`)
      .set("Authorization", `Bearer ${clinicianToken}`)
      .send({ notes: "Called the patient; resting now." });

    expect(res.status).toBe(200);
    expect(res.body.alert).toMatchObject({
      is_active: false,
      acknowledged: true,
      resolution_notes: "Called the patient; resting now.",
      resolved_at: "2026-01-15T09:00:00.000Z"
    });
  });

  it("does not let patients resolve alerts", async () => {
    await submit({ heart_rate: 190 });
    const [alert] = harness.ctx.store.alerts.listBySubject(patient.id);

    const res = await request(harness.app)
      .patch(`/api/alerts/${alert?.id}/resolve`)
      .set("Authorization", `Bearer ${patientToken}`)
      .send({});

    expect(res.status).toBe(403);
    expect(res.body.error.code).toBe("Forbidden.Role");
  });

  it("summarises recent alerts for clinicians", async () => {
    await submit({ heart_rate: 190, blood_pressure: { systolic: 170, diastolic: 95 } });

    const res = await request(harness.app).get("/api/alerts/stats?days=7").set("Authorization", `Bearer ${clinicianToken}`);

    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      period_days: 7,
      severity_breakdown: { Info: 0, Warning: 1, Critical: 1, Emergency: 0 },
      unacknowledged_count: 2,
      generated_at: "2026-01-15T09:00:00.000Z"
    });
  });

  it("does not accept vitals from clinicians", async () => {
    const res = await request(harness.app)
      .post("/api/vitals")
      .set("Authorization", `Bearer ${clinicianToken}`)
      .send({ heart_rate: 70 });

    expect(res.status).toBe(403);
    expect(res.body.error.code).toBe("Forbidden.Role");
  });
});

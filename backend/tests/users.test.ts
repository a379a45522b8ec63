import request from "supertest";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { Account } from "../src/models/types";
import { createAccount, createHarness, login, TEST_PASSWORD, TestHarness } from "./helpers";

describe("account administration", () => {
  let harness: TestHarness;
  let admin: Account;
  let patient: Account;
  let adminToken: string;

  beforeEach(async () => {
    harness = await createHarness();
    admin = await createAccount(harness.ctx, "Admin", "admin@example.test");
    patient = await createAccount(harness.ctx, "Patient", "patient@example.test");
    adminToken = await login(harness, "admin@example.test");
  });

  afterEach(async () => {
    await harness.ctx.stop();
  });

  const asAdmin = (method: "get" | "post" | "delete", path: string) =>
    request(harness.app)[method](`/api/users${path}`).set("Authorization", `Bearer ${adminToken}`);

  it("provisions clinicians", async () => {
    const res = await asAdmin("post", "/").send({
      email: "New.Clinician@Example.test",
      password: "clinician-pass-1",
      full_name: "Dr New",
      role: "Clinician"
    });

    expect(res.status).toBe(201);
    expect(res.body.user).toMatchObject({ email: "new.clinician@example.test", role: "Clinician", is_active: true });

    const loginRes = await request(harness.app)
      .post("/api/auth/login")
      .send({ email: "new.clinician@example.test", password: "clinician-pass-1" });
    expect(loginRes.status).toBe(200);
  });

  it("refuses duplicate emails", async () => {
    const res = await asAdmin("post", "/").send({ email: "patient@example.test", password: "another-pass-1", role: "Patient" });

    expect(res.status).toBe(400);
    expect(res.body.error.code).toBe("Conflict.EmailInUse");
  });

  it("rejects weak passwords", async () => {
    const res = await asAdmin("post", "/").send({ email: "weak@example.test", password: "lettersonly", role: "Patient" });

    expect(res.status).toBe(400);
    expect(res.body.error.code).toBe("ValidationFailed");
  });

  it("lists account metadata without consent or clinical fields", async () => {
    const res = await asAdmin("get", "/");

    expect(res.status).toBe(200);
    expect(res.body.users).toHaveLength(2);
    expect(Object.keys(res.body.users[1]).sort()).toEqual([
      "created_at",
      "email",
      "full_name",
      "id",
      "is_active",
      "is_verified",
      "role"
    ]);
  });

  it("keeps user administration away from other roles", async () => {
    const patientToken = await login(harness, "patient@example.test");
    const res = await request(harness.app).get("/api/users").set("Authorization", `Bearer ${patientToken}`);

    expect(res.status).toBe(403);
    expect(res.body.error.code).toBe("Forbidden.Role");
  });

  it("deactivates accounts and invalidates their sessions", async () => {
    const patientToken = await login(harness, "patient@example.test");

    const res = await asAdmin("delete", `/${patient.id}`);
    expect(res.status).toBe(200);
    expect(res.body.user.is_active).toBe(false);

    const me = await request(harness.app).get("/api/auth/me").set("Authorization", `Bearer ${patientToken}`);
    expect(me.status).toBe(401);
    expect(me.body.error.code).toBe("AccountInactive");
  });

  it("does not let an administrator deactivate themselves", async () => {
    const res = await asAdmin("delete", `/${admin.id}`);

    expect(res.status).toBe(400);
    expect(res.body.error.code).toBe("Conflict.SelfDeactivation");
  });

  it("reports unknown accounts as not found", async () => {
    const res = await asAdmin("get", "/missing-id");
    expect(res.status).toBe(404);
  });

  it("resets a password and clears the lockout", async () => {
    for (let i = 0; i < 3; i += 1) {
      await request(harness.app).post("/api/auth/login").send({ email: "patient@example.test", password: "wrong-pass-1" });
    }
    const locked = await request(harness.app)
      .post("/api/auth/login")
      .send({ email: "patient@example.test", password: TEST_PASSWORD });
    expect(locked.status).toBe(423);

    const res = await asAdmin("post", `/${patient.id}/reset-password`).send({ new_password: "fresh-pass-2" });
    expect(res.status).toBe(200);

    const relogin = await request(harness.app)
      .post("/api/auth/login")
      .send({ email: "patient@example.test", password: "fresh-pass-2" });
    expect(relogin.status).toBe(200);
  });

  it("returns the caller's own account on /me", async () => {
    const res = await asAdmin("get", "/me");

    expect(res.status).toBe(200);
    expect(res.body.user.id).toBe(admin.id);
  });

  it("creates a bootstrap administrator only when none exists", async () => {
    const skipped = await harness.ctx.accounts.bootstrapAdmin("second-admin@example.test", "bootstrap-pass-1");
    expect(skipped).toBeNull();

    const fresh = await createHarness();
    const created = await fresh.ctx.accounts.bootstrapAdmin("root@example.test", "bootstrap-pass-1");
    expect(created?.role).toBe("Admin");
    await fresh.ctx.stop();
  });
});

import request from "supertest";
import { expect } from "vitest";
import { createApp } from "../src/app";
import { AppContext, AppContextOptions, createAppContext } from "../src/context";
import { Account, Role } from "../src/models/types";
import { PasswordResetMessage, ResetTokenDelivery } from "../src/services/authenticator";
import { Clock } from "../src/utils/time";

export const TEST_PASSWORD = "test-password-1";

export class MutableClock implements Clock {
  private current: Date;

  constructor(start = "2026-01-15T09:00:00.000Z") {
    this.current = new Date(start);
  }

  now(): Date {
    return new Date(this.current.getTime());
  }

  advanceMinutes(minutes: number): void {
    this.current = new Date(this.current.getTime() + minutes * 60_000);
  }
}

export class CapturingResetDelivery implements ResetTokenDelivery {
  readonly messages: PasswordResetMessage[] = [];

  async deliver(message: PasswordResetMessage): Promise<void> {
    this.messages.push(message);
  }

  last(): PasswordResetMessage {
    const message = this.messages[this.messages.length - 1];
    if (!message) {
      throw new Error("No reset token was delivered.");
    }
    return message;
  }
}

export interface TestHarness {
  ctx: AppContext;
  app: ReturnType<typeof createApp>;
  clock: MutableClock;
  delivery: CapturingResetDelivery;
}

export async function createHarness(options: AppContextOptions = {}): Promise<TestHarness> {
  const clock = new MutableClock();
  const delivery = new CapturingResetDelivery();
  const ctx = createAppContext({
    clock,
    resetDelivery: delivery,
    ...options,
    config: { jwtSecret: "test-secret", bcryptRounds: 4, logLevel: "silent", logPretty: false, ...options.config }
  });
  await ctx.start();
  return { ctx, app: createApp(ctx), clock, delivery };
}

export async function createAccount(ctx: AppContext, role: Role, email: string, fullName: string | null = null): Promise<Account> {
  const result = await ctx.accounts.provision({ email, password: TEST_PASSWORD, fullName, role });
  if (!result.ok) {
    throw new Error(`Could not provision ${email}: ${result.error.kind}`);
  }
  return result.value;
}

export async function login(harness: TestHarness, email: string, password = TEST_PASSWORD): Promise<string> {
  const res = await request(harness.app).post("/api/auth/login").send({ email, password });
  expect(res.status).toBe(200);
  return res.body.access_token;
}

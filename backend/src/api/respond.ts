import type { ErrorCode, ErrorResponse } from "@careguard/shared";
import { Request, Response } from "express";
import { ZodError } from "zod";
import { PolicyError } from "../models/errors";

function statusFor(error: PolicyError): number {
  switch (error.kind) {
    case "InvalidCredentials":
    case "AccountInactive":
    case "TokenInvalid":
      return 401;
    case "AccountLocked":
      return 423;
    case "Forbidden.Role":
    case "Forbidden.Consent":
    case "Forbidden.AdminExcluded":
      return 403;
    case "Conflict.AlreadyPending":
    case "Conflict.InvalidTransition":
    case "Conflict.EmailInUse":
    case "Conflict.SelfDeactivation":
      return 400;
    case "NotFound":
      return 404;
  }
}

// Messages never say whether an email or account exists.
function messageFor(error: PolicyError): string {
  switch (error.kind) {
    case "InvalidCredentials":
      return "Invalid email or password.";
    case "AccountInactive":
      return "Account is inactive.";
    case "AccountLocked":
      return "Account is temporarily locked after repeated failed logins.";
    case "TokenInvalid":
      return "Token is invalid or expired.";
    case "Forbidden.Role":
      return `This operation requires one of: ${error.required.join(", ")}.`;
    case "Forbidden.Consent":
      return "Patient has disabled data sharing.";
    case "Forbidden.AdminExcluded":
      return "Administrators cannot access clinical data.";
    case "Conflict.AlreadyPending":
      return "A disable request is already pending.";
    case "Conflict.InvalidTransition":
      return `Cannot ${error.attempted.replace("_", " ")} while sharing is ${error.from}.`;
    case "Conflict.EmailInUse":
      return "Email is already registered.";
    case "Conflict.SelfDeactivation":
      return "Administrators cannot deactivate their own account.";
    case "NotFound":
      return `The requested ${error.resource} was not found.`;
  }
}

export function sendError(res: Response, status: number, code: ErrorCode, message: string, details?: unknown): void {
  const body: ErrorResponse = { error: { code, message } };
  if (details !== undefined) {
    body.error.details = details;
  }
  res.status(status).json(body);
}

export function sendPolicyError(res: Response, error: PolicyError, overrideStatus?: number): void {
  const body: ErrorResponse = { error: { code: error.kind, message: messageFor(error) } };
  if (error.kind === "AccountLocked") {
    res.setHeader("Retry-After", error.retryAfterSeconds.toString());
    body.error.retry_after_seconds = error.retryAfterSeconds;
  }
  res.status(overrideStatus ?? statusFor(error)).json(body);
}

export function sendValidationError(res: Response, error: ZodError, message = "Invalid request payload."): void {
  sendError(res, 400, "ValidationFailed", message, error.flatten());
}

export function getParamAsString(value: string | string[] | undefined): string {
  if (Array.isArray(value)) {
    return value[0] ?? "";
  }
  return value ?? "";
}

export function routeParam(req: Request, name: string): string {
  return getParamAsString(req.params[name]);
}

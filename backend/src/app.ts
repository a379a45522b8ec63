import cors from "cors";
import express, { Express, NextFunction, Request, Response } from "express";
import { createApiRouter } from "./api";
import { sendError } from "./api/respond";
import type { AppContext } from "./context";

// Credentials and contact details belong in the body, never in a logged URL.
const BLOCKED_QUERY_KEYS = ["password", "new_password", "token", "refresh_token", "email"];

function isBodyParseError(error: unknown): boolean {
  return error instanceof SyntaxError && "body" in error;
}

export function createApp(ctx: AppContext): Express {
  const app = express();

  app.use(
    cors({
      origin: true,
      credentials: true
    })
  );
  app.use(express.json({ limit: ctx.config.jsonBodyLimit }));

  app.use((req, res, next) => {
    const hasBlockedQueryKey = Object.keys(req.query).some((key) => BLOCKED_QUERY_KEYS.includes(key));
    if (hasBlockedQueryKey) {
      sendError(res, 400, "ValidationFailed", "Sensitive values are not allowed in query parameters.");
      return;
    }
    next();
  });

  app.use("/api", createApiRouter(ctx));

  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (isBodyParseError(error)) {
      sendError(res, 400, "ValidationFailed", "Request body is not valid JSON.");
      return;
    }
    ctx.logger.error({ err: error, method: req.method, path: req.path }, "Unhandled request error");
    if (res.headersSent) {
      return;
    }
    sendError(res, 500, "InternalError", "An unexpected error occurred.");
  });

  return app;
}

import { NextFunction, Request, RequestHandler, Response } from "express";
import { sendPolicyError } from "../api/respond";
import type { AppContext } from "../context";
import { chain, Guard } from "../services/authorizer";
import { requireIdentity } from "./auth";

export function authorize(ctx: AppContext, action: string, ...guards: Guard[]): RequestHandler {
  const guard = chain(...guards);
  return (req: Request, res: Response, next: NextFunction): void => {
    const result = ctx.authorizer.check(requireIdentity(req), guard, action);
    if (!result.ok) {
      sendPolicyError(res, result.error);
      return;
    }
    next();
  };
}

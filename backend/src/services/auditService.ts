import { v4 as uuidv4 } from "uuid";
import { AuditRepository } from "../data/repositories";
import { Logger } from "../logger";
import { PolicyError } from "../models/errors";
import { Clock } from "../utils/time";

export class AuditService {
  constructor(
    private readonly repository: AuditRepository,
    private readonly logger: Logger,
    private readonly clock: Clock
  ) {}

  logDenial(params: { actorId: string | null; action: string; targetId?: string | null; error: PolicyError }): void {
    const reason = params.error.kind;
    this.repository.append({
      id: uuidv4(),
      actorId: params.actorId,
      action: params.action,
      targetId: params.targetId ?? null,
      outcome: "denied",
      reason,
      timestamp: this.clock.now().toISOString()
    });
    this.logger.warn(
      { actorId: params.actorId, targetId: params.targetId ?? null, action: params.action, reason },
      "Request denied"
    );
  }

  logAccess(params: {
    actorId: string;
    action: string;
    targetId: string;
    metadata?: Record<string, string | number | boolean | null>;
  }): void {
    this.repository.append({
      id: uuidv4(),
      actorId: params.actorId,
      action: params.action,
      targetId: params.targetId,
      outcome: "allowed",
      reason: null,
      timestamp: this.clock.now().toISOString(),
      metadata: params.metadata
    });
    this.logger.info({ actorId: params.actorId, targetId: params.targetId, action: params.action }, "PHI accessed");
  }
}

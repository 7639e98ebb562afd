import { randomUUID } from "crypto";
import { EventStore } from "../../event-store/src";
import { ActorContext, DomainEvent, EventFilter, RiskTag } from "../../shared/src";

export const AUDIT_EVENT_TYPE = "audit.record";

export type AuditStatus = "approved" | "rejected" | "suggested" | "succeeded" | "failed" | "skipped" | "cancelled";

export type AuditRecordPayload = {
  action: string;
  target: string;
  status: AuditStatus;
  risk: RiskTag;
  message?: string;
  data?: Record<string, unknown>;
};

export type AuditRecordInput = {
  action: string;
  target: string;
  status: AuditStatus;
  risk?: RiskTag;
  message?: string;
  data?: Record<string, unknown>;
  actor: ActorContext;
  source?: "system" | "user" | "translator";
  planId?: string;
};

export class AuditLogger {
  constructor(private readonly store: EventStore) {}

  async record(input: AuditRecordInput): Promise<DomainEvent<AuditRecordPayload>> {
    const event: DomainEvent<AuditRecordPayload> = {
      id: randomUUID(),
      aggregateId: input.planId ?? input.actor.userId,
      type: AUDIT_EVENT_TYPE,
      timestamp: new Date().toISOString(),
      payload: {
        action: input.action,
        target: input.target,
        status: input.status,
        risk: input.risk ?? "requires-confirmation",
        message: input.message,
        data: input.data,
      },
      meta: {
        actor: input.actor,
        source: input.source ?? "system",
        planId: input.planId,
      },
    };

    await this.store.append(event);
    return event;
  }
}

const isAuditEvent = (event: DomainEvent): event is DomainEvent<AuditRecordPayload> =>
  event.type === AUDIT_EVENT_TYPE && typeof event.payload === "object" && event.payload !== null;

export class AuditQueryService {
  constructor(private readonly store: EventStore) {}

  async list(filter?: EventFilter): Promise<DomainEvent<AuditRecordPayload>[]> {
    const mergedFilter: EventFilter = {
      ...(filter ?? {}),
      types: [AUDIT_EVENT_TYPE],
    };
    const events = await this.store.query(mergedFilter);
    return events.filter(isAuditEvent);
  }
}

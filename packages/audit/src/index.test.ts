import { describe, expect, it } from "vitest";
import { InMemoryEventStore } from "../../event-store/src";
import { AuditLogger, AuditQueryService, AUDIT_EVENT_TYPE } from "./index";

describe("AuditLogger", () => {
  it("records audit events and queries them", async () => {
    const store = new InMemoryEventStore();
    const logger = new AuditLogger(store);
    const query = new AuditQueryService(store);

    await logger.record({
      action: "step.run",
      target: "sudo pacman -S firefox",
      status: "succeeded",
      risk: "requires-confirmation",
      message: "installing firefox",
      actor: { userId: "u1" },
      planId: "plan-123",
    });

    const events = await query.list();
    expect(events).toHaveLength(1);
    expect(events[0].type).toBe(AUDIT_EVENT_TYPE);
    expect(events[0].payload.target).toBe("sudo pacman -S firefox");
    expect(events[0].meta.planId).toBe("plan-123");
  });

  it("defaults risk to requires-confirmation and keys events by plan", async () => {
    const store = new InMemoryEventStore();
    const logger = new AuditLogger(store);

    const event = await logger.record({
      action: "plan.validate",
      target: "upgrade",
      status: "rejected",
      actor: { userId: "u1" },
      planId: "plan-9",
    });

    expect(event.payload.risk).toBe("requires-confirmation");
    expect(event.aggregateId).toBe("plan-9");
    expect((await store.query({ planId: "plan-9" })).map((e) => e.aggregateId)).toEqual(["plan-9"]);
  });

  it("lists only audit records", async () => {
    const store = new InMemoryEventStore();
    await store.append({
      id: "e1",
      aggregateId: "plan-1",
      type: "plan.requested",
      timestamp: new Date().toISOString(),
      payload: { text: "install vim" },
      meta: { actor: { userId: "u1" }, source: "user", planId: "plan-1" },
    });
    await new AuditLogger(store).record({
      action: "plan.validate",
      target: "install vim",
      status: "approved",
      actor: { userId: "u1" },
      planId: "plan-1",
    });

    const records = await new AuditQueryService(store).list({ planId: "plan-1" });
    expect(records.map((r) => r.payload.action)).toEqual(["plan.validate"]);
  });
});

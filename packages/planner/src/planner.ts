import { randomUUID } from "crypto";
import { AuditLogger } from "../../audit/src";
import { EventStore } from "../../event-store/src";
import { IntentTranslator, createResolver } from "../../resolver/src";
import { ApprovedPlan, SafetyGate, ValidationResult } from "../../safety/src";
import {
  ActorContext,
  CommandPlan,
  Configuration,
  describeIntent,
  DomainEvent,
  Intent,
  Logger,
  silentLogger,
  UnresolvedIntentError,
  ValidationRejectedError,
} from "../../shared/src";
import { synthesize, SynthesisContext } from "./synthesizer";

export const EVENT_PLAN_REQUESTED = "plan.requested";
export const EVENT_PLAN_RESOLVED = "plan.resolved";
export const EVENT_PLAN_SYNTHESIZED = "plan.synthesized";
export const EVENT_PLAN_APPROVED = "plan.approved";
export const EVENT_PLAN_REJECTED = "plan.rejected";

const LOCAL_ACTOR: ActorContext = { userId: "local" };

type PlannerDeps = {
  eventStore: EventStore;
  audit: AuditLogger;
  translator?: IntentTranslator;
  logger?: Logger;
};

export type PlanRequest = {
  text: string;
  config: Configuration;
  context?: SynthesisContext;
  actor?: ActorContext;
  planId?: string;
};

export type CommandRequest = Omit<PlanRequest, "text" | "context"> & {
  command: string;
};

export type PlanResult =
  | { status: "approved"; planId: string; intent: Intent; plan: ApprovedPlan; explain: string[] }
  | { status: "rejected"; planId: string; intent?: Intent; reason: string; command: string; explain: string[] };

export class Planner {
  private store: EventStore;
  private audit: AuditLogger;
  private translator?: IntentTranslator;
  private logger: Logger;

  constructor(deps: PlannerDeps) {
    this.store = deps.eventStore;
    this.audit = deps.audit;
    this.translator = deps.translator;
    this.logger = deps.logger ?? silentLogger();
  }

  private async emit(planId: string, actor: ActorContext, type: string, payload: Record<string, unknown>): Promise<void> {
    const event: DomainEvent = {
      id: randomUUID(),
      aggregateId: planId,
      type,
      timestamp: new Date().toISOString(),
      payload,
      meta: {
        actor,
        source: type === EVENT_PLAN_RESOLVED && payload.source === "translator" ? "translator" : "system",
        planId,
      },
    };
    await this.store.append(event);
  }

  /** Why a plan ended up empty, in words a user can act on. */
  private explainEmpty(intent: Intent): string[] {
    switch (intent.kind) {
      case "unknown":
        return [`could not understand "${intent.text}"`];
      case "test-ai":
        return this.translator?.available()
          ? [`translator "${this.translator.name}" is configured`]
          : ["no translator configured (set OPENAI_API_KEY)"];
      case "fix":
        return ["say what to fix: sound, internet, bluetooth or time"];
      default:
        return [`${intent.kind} needs a target`];
    }
  }

  private explain(plan: CommandPlan, approved: ApprovedPlan): string[] {
    const notes = plan.notes ?? [];
    if (approved.steps.length > 0) return [...notes, ...approved.steps.map((s) => s.reason)];
    return notes.length > 0 ? notes : this.explainEmpty(plan.intent);
  }

  private async finish(
    planId: string,
    actor: ActorContext,
    plan: CommandPlan,
    validation: ValidationResult,
    config: Configuration
  ): Promise<PlanResult> {
    const label = describeIntent(plan.intent);
    if (validation.status === "rejected") {
      await this.emit(planId, actor, EVENT_PLAN_REJECTED, { reason: validation.reason, command: validation.command });
      await this.audit.record({
        action: "plan.validate",
        target: validation.command,
        status: "rejected",
        risk: "forbidden",
        message: validation.reason,
        actor,
        planId,
      });
      const error = new ValidationRejectedError(validation.reason, validation.command);
      this.logger.info({ planId, error: error.toSafe() }, "plan rejected");
      return {
        status: "rejected",
        planId,
        intent: plan.intent,
        reason: validation.reason,
        command: validation.command,
        explain: [`${label}: rejected`],
      };
    }

    const approved = validation.plan;
    await this.emit(planId, actor, EVENT_PLAN_APPROVED, { steps: approved.steps.map((s) => ({ ...s })) });
    await this.audit.record({
      action: "plan.validate",
      target: label,
      status: config.mode === "apply" ? "approved" : "suggested",
      risk: approved.steps.some((s) => s.risk === "requires-confirmation") ? "requires-confirmation" : "safe",
      actor,
      planId,
      data: { commands: approved.commands },
    });
    this.logger.debug({ planId, commands: approved.commands }, "plan approved");
    return {
      status: "approved",
      planId,
      intent: plan.intent,
      plan: approved,
      explain: this.explain(plan, approved),
    };
  }

  /** Free text → intent → plan → gate. */
  async plan(request: PlanRequest): Promise<PlanResult> {
    const planId = request.planId ?? randomUUID();
    const actor = request.actor ?? LOCAL_ACTOR;
    const gate = new SafetyGate({ offline: request.config.offline });

    await this.emit(planId, actor, EVENT_PLAN_REQUESTED, { text: request.text, mode: request.config.mode });

    const screened = gate.screen(request.text);
    if (screened) {
      const plan: CommandPlan = { intent: { kind: "unknown", text: request.text }, steps: [] };
      return this.finish(planId, actor, plan, screened, request.config);
    }

    const resolver = createResolver(this.translator, { offline: request.config.offline, logger: this.logger });
    const intent = await resolver.resolve(request.text);
    if (intent.kind === "unknown") {
      this.logger.info({ planId, error: new UnresolvedIntentError(request.text).toSafe() }, "intent unresolved");
    }
    await this.emit(planId, actor, EVENT_PLAN_RESOLVED, {
      intent,
      source: intent.kind === "unknown" ? "none" : intent.source,
    });

    const plan = synthesize(intent, request.config, request.context);
    await this.emit(planId, actor, EVENT_PLAN_SYNTHESIZED, { steps: plan.steps.map((s) => ({ ...s })) });

    return this.finish(planId, actor, plan, gate.validate(plan), request.config);
  }

  /**
   * A literal command, never translated. It enters as safe so the gate
   * decides whether it needs confirmation.
   */
  async planCommand(request: CommandRequest): Promise<PlanResult> {
    const planId = request.planId ?? randomUUID();
    const actor = request.actor ?? LOCAL_ACTOR;
    const gate = new SafetyGate({ offline: request.config.offline });

    await this.emit(planId, actor, EVENT_PLAN_REQUESTED, { text: request.command, mode: request.config.mode });
    const plan: CommandPlan = {
      intent: { kind: "unknown", text: request.command },
      steps: [{ command: request.command.trim(), risk: "safe", reason: "entered directly" }],
    };
    await this.emit(planId, actor, EVENT_PLAN_SYNTHESIZED, { steps: plan.steps.map((s) => ({ ...s })) });
    return this.finish(planId, actor, plan, gate.validate(plan), request.config);
  }
}

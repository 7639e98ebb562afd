import { CommandPlan, Intent, maxRisk, PlanStep } from "../../shared/src";
import { checkGrammar } from "./grammar";
import { findForbidden, METACHARACTERS } from "./patterns";

export { FORBIDDEN_PATTERNS, METACHARACTERS } from "./patterns";
export type { ForbiddenPattern } from "./patterns";
export { checkGrammar } from "./grammar";
export type { GrammarVerdict } from "./grammar";

/**
 * A plan that passed the gate. Only the type leaves this module and the
 * private brand keeps look-alike objects out, so nothing but the gate can
 * produce one.
 */
class ApprovedPlan {
  private readonly approvedBy = "safety-gate";
  readonly intent: Intent;
  readonly steps: readonly PlanStep[];

  constructor(plan: CommandPlan) {
    this.intent = plan.intent;
    this.steps = Object.freeze(plan.steps.map((step) => Object.freeze({ ...step })));
  }

  get commands(): string[] {
    return this.steps.map((step) => step.command);
  }
}

export type { ApprovedPlan };

export type Rejection = { status: "rejected"; reason: string; command: string };

export type ValidationResult = { status: "approved"; plan: ApprovedPlan } | Rejection;

export type SafetyGateOptions = {
  offline: boolean;
};

const reject = (reason: string, command: string): Rejection => ({ status: "rejected", reason, command });

const tokenize = (command: string) => command.trim().split(/\s+/).filter(Boolean);

export class SafetyGate {
  constructor(private readonly options: SafetyGateOptions = { offline: false }) {}

  /** Checks one step; returns the step as approved (risk possibly raised) or the rejection. */
  check(step: PlanStep): PlanStep | Rejection {
    const { command } = step;
    if (step.risk === "forbidden") return reject(step.reason, command);
    if (METACHARACTERS.test(command)) return reject("shell metacharacters are not allowed", command);

    const forbidden = findForbidden(command);
    if (forbidden) return reject(forbidden.reason, command);

    const verdict = checkGrammar(tokenize(command));
    if (!verdict.ok) return reject(verdict.reason, command);
    if (this.options.offline && verdict.networkSync) return reject("network required", command);

    // never lowers: safe only survives on read-only commands
    const risk = verdict.readOnly ? step.risk : maxRisk(step.risk, "requires-confirmation");
    return { ...step, risk };
  }

  validate(plan: CommandPlan): ValidationResult {
    const steps: PlanStep[] = [];
    for (const step of plan.steps) {
      const checked = this.check(step);
      if ("status" in checked) return checked;
      steps.push(checked);
    }
    return { status: "approved", plan: new ApprovedPlan({ intent: plan.intent, steps }) };
  }

  /** Rejects raw user text that names a destructive operation, before any resolution. */
  screen(text: string): Rejection | undefined {
    const forbidden = findForbidden(text.toLowerCase(), true);
    return forbidden ? reject(forbidden.reason, text) : undefined;
  }
}

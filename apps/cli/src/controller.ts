import { AuditLogger, AuditStatus } from "../../../packages/audit/src";
import { ApprovedPlan } from "../../../packages/safety/src";
import {
  ActorContext,
  Configuration,
  Logger,
  PlanStep,
  silentLogger,
  SubsystemFailureError,
} from "../../../packages/shared/src";
import { CommandRunner } from "../../../packages/tools/src";

export const EXIT_CODES = {
  ok: 0,
  failure: 1,
  "config-conflict": 2,
  rejected: 3,
  "scenario-not-found": 4,
  cancelled: 5,
} as const;

export type ExitReason = Exclude<keyof typeof EXIT_CODES, "ok">;

const STEP_FAILURE_BASE = 10;

/** Detailed exit codes are only used with --verbose; otherwise every failure is 1. */
export const exitCodeFor = (reason: ExitReason, verbose: boolean): number =>
  verbose ? EXIT_CODES[reason] : EXIT_CODES.failure;

export const stepFailureCode = (stepNumber: number, verbose: boolean): number =>
  verbose ? STEP_FAILURE_BASE + stepNumber : EXIT_CODES.failure;

export type Confirmer = (question: string) => Promise<boolean>;

export type ControllerDeps = {
  runner: CommandRunner;
  confirm: Confirmer;
  out: (line: string) => void;
  audit?: AuditLogger;
  logger?: Logger;
  actor?: ActorContext;
};

export class ExecutionController {
  private readonly logger: Logger;
  private readonly actor: ActorContext;

  constructor(private readonly deps: ControllerDeps) {
    this.logger = deps.logger ?? silentLogger();
    this.actor = deps.actor ?? { userId: "local" };
  }

  private async record(
    planId: string | undefined,
    action: string,
    status: AuditStatus,
    step: PlanStep,
    data?: Record<string, unknown>
  ): Promise<void> {
    if (!this.deps.audit) return;
    await this.deps.audit.record({
      action,
      target: step.command,
      status,
      risk: step.risk,
      message: step.reason,
      actor: this.actor,
      planId,
      data,
    });
  }

  private async skipFrom(plan: ApprovedPlan, index: number, planId?: string): Promise<void> {
    for (const step of plan.steps.slice(index)) {
      await this.record(planId, "step.skipped", "skipped", step);
    }
  }

  print(plan: ApprovedPlan, config: Configuration): void {
    for (const step of plan.steps) {
      this.deps.out(step.command);
      if (config.verbose) this.deps.out(`  # ${step.risk}: ${step.reason}`);
    }
  }

  async run(plan: ApprovedPlan, config: Configuration, planId?: string): Promise<number> {
    if (config.mode === "suggest") {
      this.print(plan, config);
      return EXIT_CODES.ok;
    }

    for (const [index, step] of plan.steps.entries()) {
      if (step.risk === "requires-confirmation" && !config.autoConfirm) {
        const confirmed = await this.deps.confirm(`Run "${step.command}"?`);
        if (!confirmed) {
          this.deps.out("cancelled");
          await this.record(planId, "plan.cancelled", "cancelled", step);
          await this.skipFrom(plan, index + 1, planId);
          return exitCodeFor("cancelled", config.verbose);
        }
      }

      this.deps.out(`$ ${step.command}`);
      const outcome = await this.deps.runner.run(plan, index);
      if (outcome.output) this.deps.out(outcome.output);

      if (outcome.status === "failure") {
        const error = new SubsystemFailureError(step.command, outcome.output, outcome.code);
        this.logger.error({ planId, step: index + 1, error: error.toSafe() }, "step failed");
        await this.record(planId, "step.failed", "failed", step, { exitCode: outcome.code });
        await this.skipFrom(plan, index + 1, planId);
        return stepFailureCode(index + 1, config.verbose);
      }
      await this.record(planId, "step.succeeded", "succeeded", step);
    }
    return EXIT_CODES.ok;
  }
}

import { AuditLogger, AuditQueryService } from "../../../packages/audit/src";
import { EventStore, InMemoryEventStore } from "../../../packages/event-store/src";
import { Planner, PlanResult } from "../../../packages/planner/src";
import { IntentTranslator } from "../../../packages/resolver/src";
import {
  Configuration,
  DEFAULT_CONFIGURATION,
  Logger,
  Outcome,
  ScenarioNotFoundError,
  silentLogger,
} from "../../../packages/shared/src";
import { describeScenario, listScenarios, SimulatorSession } from "../../../packages/simulator/src";
import { SimulatorRunner } from "../../../packages/tools/src";
import { ExecutionController } from "../../cli/src/controller";

export const AI_PREFIX = "ai ";

export const HELP = [
  "ai <text>          plan and run a request",
  "scenario [name]    list scenarios or load one",
  "history            commands run so far",
  "audit [plan]       recent audit records, or those of one plan",
  "exit, quit         leave",
  "anything else is checked and run as a single command",
];

export type ReplReply = {
  lines: string[];
  /** Exit code of the plan, when one ran. */
  code?: number;
  done?: boolean;
};

export type ReplOptions = {
  session?: SimulatorSession;
  translator?: IntentTranslator;
  eventStore?: EventStore;
  logger?: Logger;
  offline?: boolean;
  verbose?: boolean;
};

/** Records shown by a bare `audit`. */
export const AUDIT_TAIL = 20;

const formatOutcome = (outcome: Outcome): string => (outcome.status === "success" ? "ok" : `exit ${outcome.code}`);

/** One REPL over one simulated machine. Every command passes the safety gate first. */
export class ReplSession {
  readonly session: SimulatorSession;
  private readonly planner: Planner;
  private readonly audit: AuditLogger;
  private readonly auditQuery: AuditQueryService;
  private readonly logger: Logger;
  private readonly runner: SimulatorRunner;

  constructor(private readonly options: ReplOptions = {}) {
    this.session = options.session ?? new SimulatorSession();
    this.logger = options.logger ?? silentLogger();
    const eventStore = options.eventStore ?? new InMemoryEventStore();
    this.audit = new AuditLogger(eventStore);
    this.auditQuery = new AuditQueryService(eventStore);
    this.runner = new SimulatorRunner(this.session);
    this.planner = new Planner({
      eventStore,
      audit: this.audit,
      translator: options.translator,
      logger: this.logger.child({ component: "planner" }),
    });
  }

  private config(): Configuration {
    return {
      ...DEFAULT_CONFIGURATION,
      mode: "apply",
      autoConfirm: true,
      paruAvailable: this.session.paruAvailable,
      offline: this.options.offline ?? false,
      verbose: this.options.verbose ?? false,
    };
  }

  private async execute(result: PlanResult, config: Configuration): Promise<ReplReply> {
    if (result.status === "rejected") {
      return { lines: [`rejected: ${result.reason}`, `  command: ${result.command}`], code: 1 };
    }
    if (result.plan.steps.length === 0) return { lines: result.explain, code: 0 };

    const lines: string[] = [];
    const controller = new ExecutionController({
      runner: this.runner,
      confirm: async () => true,
      out: (line) => lines.push(line),
      audit: this.audit,
      logger: this.logger.child({ component: "controller" }),
    });
    const code = await controller.run(result.plan, config, result.planId);
    return { lines, code };
  }

  private scenario(name: string | undefined): ReplReply {
    if (!name) {
      return { lines: listScenarios().map((known) => `${known.padEnd(16)}${describeScenario(known) ?? ""}`) };
    }
    try {
      this.session.loadScenario(name);
    } catch (error) {
      if (error instanceof ScenarioNotFoundError) return { lines: [error.message] };
      throw error;
    }
    this.logger.info({ scenario: name }, "scenario loaded");
    return { lines: [`scenario loaded: ${name}`] };
  }

  private history(): ReplReply {
    const entries = this.session.history();
    if (entries.length === 0) return { lines: ["no commands yet"] };
    return { lines: entries.map((entry) => `${String(entry.seq).padStart(3)}  ${entry.command}  (${formatOutcome(entry.outcome)})`) };
  }

  private async auditTrail(planId: string | undefined): Promise<ReplReply> {
    const records = await this.auditQuery.list(planId ? { planId } : undefined);
    if (records.length === 0) return { lines: [planId ? `no audit records for ${planId}` : "no audit records"] };
    const shown = planId ? records : records.slice(-AUDIT_TAIL);
    return {
      lines: shown.map(
        ({ meta, payload }) => `${meta.planId ?? "-"}  ${payload.action} ${payload.status}  ${payload.target}`
      ),
    };
  }

  async handle(input: string): Promise<ReplReply> {
    const line = input.trim();
    if (!line) return { lines: [] };

    const [word, ...rest] = line.split(/\s+/);
    switch (word) {
      case "exit":
      case "quit":
        return { lines: [], done: true };
      case "help":
        return { lines: HELP };
      case "history":
        return this.history();
      case "scenario":
        return this.scenario(rest[0]);
      case "audit":
        return this.auditTrail(rest[0]);
    }

    const config = this.config();
    if (line.startsWith(AI_PREFIX)) {
      const text = line.slice(AI_PREFIX.length).trim();
      const result = await this.planner.plan({
        text,
        config,
        context: { isInstalled: (name) => this.session.isInstalled(name) },
      });
      return this.execute(result, config);
    }
    return this.execute(await this.planner.planCommand({ command: line, config }), config);
  }
}

import { ZodError } from "zod";
import { AuditLogger } from "../../../packages/audit/src";
import { EventStore, InMemoryEventStore, JsonFileEventStore } from "../../../packages/event-store/src";
import { Planner, PlanResult } from "../../../packages/planner/src";
import { IntentTranslator, translatorFromEnv } from "../../../packages/resolver/src";
import {
  ConfigConflictError,
  createLogger,
  Env,
  loadEnv,
  Logger,
  PacwardenError,
  ScenarioNotFoundError,
} from "../../../packages/shared/src";
import { SimulatorSession } from "../../../packages/simulator/src";
import { CommandRunner, ShellRunner, SimulatorRunner } from "../../../packages/tools/src";
import { assertNoConflicts, buildConfiguration, CliFlags, parseCli, USAGE, UsageError } from "./config";
import { Confirmer, EXIT_CODES, exitCodeFor, ExecutionController } from "./controller";

export { EXIT_CODES } from "./controller";

export type CliDeps = {
  env?: NodeJS.ProcessEnv;
  out?: (line: string) => void;
  err?: (line: string) => void;
  confirm?: Confirmer;
  /** Replaces the runner chosen from the flags. */
  runner?: CommandRunner;
  translator?: IntentTranslator;
  eventStore?: EventStore;
  logger?: Logger;
};

const createRunnerFor = (flags: CliFlags, env: Env): CommandRunner =>
  flags.simulate
    ? new SimulatorRunner(new SimulatorSession({ scenarios: flags.scenario ? [flags.scenario] : [] }))
    : new ShellRunner({ paru: env.PACWARDEN_PARU });

const reportRejection = (result: Extract<PlanResult, { status: "rejected" }>, err: (line: string) => void) => {
  err(`rejected: ${result.reason}`);
  err(`  command: ${result.command}`);
};

/** Runs one CLI invocation and returns the process exit code. */
export const runCli = async (argv: string[], deps: CliDeps = {}): Promise<number> => {
  const out = deps.out ?? ((line: string) => process.stdout.write(`${line}\n`));
  const err = deps.err ?? ((line: string) => process.stderr.write(`${line}\n`));
  let verbose = false;

  try {
    const env = loadEnv(deps.env);
    const invocation = parseCli(argv);
    if (invocation.kind === "help") {
      out(USAGE);
      return EXIT_CODES.ok;
    }
    const { flags } = invocation;
    verbose = flags.verbose;

    const logger = deps.logger ?? createLogger(env.PACWARDEN_LOG_LEVEL);
    // before the runner: --scenario without --simulate is a conflict, not a missing scenario
    assertNoConflicts(flags);
    const runner = deps.runner ?? createRunnerFor(flags, env);
    const config = buildConfiguration(flags, runner.paruAvailable());

    const eventStore =
      deps.eventStore ?? (env.PACWARDEN_AUDIT_PATH ? new JsonFileEventStore(env.PACWARDEN_AUDIT_PATH) : new InMemoryEventStore());
    const audit = new AuditLogger(eventStore);
    const planner = new Planner({
      eventStore,
      audit,
      translator: deps.translator ?? translatorFromEnv(env),
      logger: logger.child({ component: "planner" }),
    });

    const result =
      invocation.kind === "ai"
        ? await planner.plan({
            text: invocation.text,
            config,
            context: { isInstalled: (name) => runner.isInstalled(name) },
          })
        : await planner.planCommand({ command: invocation.text, config });

    if (result.status === "rejected") {
      reportRejection(result, err);
      return exitCodeFor("rejected", verbose);
    }

    if (result.plan.steps.length === 0) {
      result.explain.forEach((line) => out(line));
      return EXIT_CODES.ok;
    }

    const controller = new ExecutionController({
      runner,
      confirm: deps.confirm ?? (async () => false),
      out,
      audit,
      logger: logger.child({ component: "controller" }),
    });
    return await controller.run(result.plan, config, result.planId);
  } catch (error) {
    if (error instanceof UsageError) {
      err(error.message);
      err(USAGE);
      return EXIT_CODES.failure;
    }
    if (error instanceof ZodError) {
      err(`invalid environment: ${error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ")}`);
      return EXIT_CODES.failure;
    }
    if (error instanceof PacwardenError) {
      err(error.message);
      if (error instanceof ConfigConflictError) return exitCodeFor("config-conflict", verbose);
      if (error instanceof ScenarioNotFoundError) return exitCodeFor("scenario-not-found", verbose);
      return EXIT_CODES.failure;
    }
    throw error;
  }
};

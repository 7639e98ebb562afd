import { ApprovedPlan } from "../../safety/src";
import { failure, Outcome, success } from "../../shared/src";
import { SimulatorSession } from "../../simulator/src";
import { AppLauncher, launchDetached, onPath, Spawner, spawnProgram } from "./shell";

export * from "./shell";

/**
 * Executes the steps of an approved plan. Runners only ever see commands
 * through an ApprovedPlan, never a bare string.
 */
export interface CommandRunner {
  readonly name: string;
  run(plan: ApprovedPlan, index: number): Promise<Outcome>;
  /** `undefined` when the runner cannot tell. */
  isInstalled(pkg: string): boolean | undefined;
  paruAvailable(): boolean;
}

const commandAt = (plan: ApprovedPlan, index: number): string | undefined => plan.steps[index]?.command;

export class SimulatorRunner implements CommandRunner {
  readonly name = "simulator";

  constructor(readonly session: SimulatorSession) {}

  async run(plan: ApprovedPlan, index: number): Promise<Outcome> {
    const command = commandAt(plan, index);
    if (command === undefined) return failure(`no step ${index + 1} in plan`, 1);
    return this.session.apply(command);
  }

  isInstalled(pkg: string): boolean {
    return this.session.isInstalled(pkg);
  }

  paruAvailable(): boolean {
    return this.session.paruAvailable;
  }
}

export type ShellRunnerOptions = {
  spawn?: Spawner;
  launch?: AppLauncher;
  paru?: "auto" | "yes" | "no";
  pathEnv?: string;
};

export class ShellRunner implements CommandRunner {
  readonly name = "shell";
  private readonly spawn: Spawner;
  private readonly launch: AppLauncher;

  constructor(private readonly options: ShellRunnerOptions = {}) {
    this.spawn = options.spawn ?? spawnProgram;
    this.launch = options.launch ?? launchDetached;
  }

  async run(plan: ApprovedPlan, index: number): Promise<Outcome> {
    const command = commandAt(plan, index);
    if (command === undefined) return failure(`no step ${index + 1} in plan`, 1);

    const [program, ...args] = command.trim().split(/\s+/);
    // launch is our own verb, not a binary
    if (program === "launch") return this.launch(args.join(" "));

    const result = await this.spawn(program, args);
    if ("error" in result) {
      return result.error === "not-found" ? failure(`${program}: command not found`, 127) : failure(result.message, 1);
    }
    return result.code === 0 ? success(result.output) : failure(result.output, result.code);
  }

  isInstalled(): undefined {
    return undefined;
  }

  paruAvailable(): boolean {
    switch (this.options.paru ?? "auto") {
      case "yes":
        return true;
      case "no":
        return false;
      case "auto":
        return onPath("paru", this.options.pathEnv);
    }
  }
}

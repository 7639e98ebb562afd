import { failure, Outcome, success } from "../../../shared/src";
import { appendJournal, findUnit, ServiceScope, ServiceUnit, setLinksUp, SystemState } from "../state";
import { Emulator, unknownSubcommand } from "./types";

const SUBCOMMANDS = ["start", "stop", "restart", "status", "enable", "disable", "is-active"] as const;

type Subcommand = (typeof SUBCOMMANDS)[number];

type Mutation = Exclude<Subcommand, "status" | "is-active">;

const isSubcommand = (value: string | undefined): value is Subcommand =>
  SUBCOMMANDS.some((sub) => sub === value);

const USER_BUS_ERROR =
  "Failed to connect to user scope bus via local transport: $DBUS_SESSION_BUS_ADDRESS and $XDG_RUNTIME_DIR not defined";

export const unitName = (arg: string): string => (arg.endsWith(".service") ? arg.slice(0, -".service".length) : arg);

const lookup = (state: SystemState, name: string, scope: ServiceScope): ServiceUnit | undefined => {
  const unit = findUnit(state, name);
  return unit && unit.scope === scope ? unit : undefined;
};

const unitPath = (name: string, scope: ServiceScope) => `/usr/lib/systemd/${scope}/${name}.service`;

const wantsPath = (name: string, scope: ServiceScope) =>
  scope === "system"
    ? `/etc/systemd/system/multi-user.target.wants/${name}.service`
    : `~/.config/systemd/user/default.target.wants/${name}.service`;

const activeText = (unit: ServiceUnit): string => {
  switch (unit.status) {
    case "running":
      return "active (running)";
    case "stopped":
      return "inactive (dead)";
    case "failed":
      return "failed (Result: exit-code)";
  }
};

// NetworkManager owns the links: bringing it up or down moves reachability with it
// (an unplugged cable keeps them down)
const onTransition = (state: SystemState, name: string, unit: ServiceUnit): void => {
  if (name === "NetworkManager") setLinksUp(state, unit.status === "running");
};

const start = (state: SystemState, name: string, unit: ServiceUnit): string | undefined => {
  if (unit.startFault) {
    unit.status = "failed";
    appendJournal(state, name, `${name}.service: Main process exited, code=exited, status=1/FAILURE`);
    appendJournal(state, name, `Failed to start ${name}.service.`);
    onTransition(state, name, unit);
    return `Job for ${name}.service failed because the control process exited with error code.`;
  }
  if (unit.status === "running") return undefined;
  unit.status = "running";
  appendJournal(state, name, `Started ${name}.service.`);
  onTransition(state, name, unit);
  return undefined;
};

const stop = (state: SystemState, name: string, unit: ServiceUnit): void => {
  if (unit.status === "stopped") return;
  unit.status = "stopped";
  appendJournal(state, name, `Stopped ${name}.service.`);
  onTransition(state, name, unit);
};

type MutationResult = { line?: string; error?: string };

const mutate = (state: SystemState, sub: Mutation, name: string, unit: ServiceUnit): MutationResult => {
  switch (sub) {
    case "start":
      return { error: start(state, name, unit) };
    case "stop":
      stop(state, name, unit);
      return {};
    case "restart":
      if (unit.status === "running") {
        unit.status = "stopped";
        appendJournal(state, name, `Stopped ${name}.service.`);
      }
      return { error: start(state, name, unit) };
    case "enable":
      if (unit.enabled) return {};
      unit.enabled = true;
      return { line: `Created symlink '${wantsPath(name, unit.scope)}' → '${unitPath(name, unit.scope)}'.` };
    case "disable":
      if (!unit.enabled) return {};
      unit.enabled = false;
      return { line: `Removed '${wantsPath(name, unit.scope)}'.` };
  }
};

const status = (state: SystemState, names: string[], scope: ServiceScope): Outcome => {
  const blocks: string[] = [];
  let code = 0;
  for (const name of names) {
    const unit = lookup(state, name, scope);
    if (!unit) {
      blocks.push(`Unit ${name}.service could not be found.`);
      code = 4;
      continue;
    }
    blocks.push(
      [
        `● ${name}.service`,
        `     Loaded: loaded (${unitPath(name, scope)}; ${unit.enabled ? "enabled" : "disabled"})`,
        `     Active: ${activeText(unit)}`,
      ].join("\n")
    );
    if (unit.status !== "running" && code === 0) code = 3;
  }
  const output = blocks.join("\n\n");
  return code === 0 ? success(output) : failure(output, code);
};

const isActive = (state: SystemState, names: string[], scope: ServiceScope): Outcome => {
  const states = names.map((name) => {
    const unit = lookup(state, name, scope);
    if (!unit || unit.status === "stopped") return "inactive";
    return unit.status === "running" ? "active" : "failed";
  });
  const output = states.join("\n");
  return states.every((s) => s === "active") ? success(output) : failure(output, 3);
};

export const systemctlEmulator: Emulator = (invocation, state) => {
  const scope: ServiceScope = invocation.args.includes("--user") ? "user" : "system";
  const [sub, ...units] = invocation.args.filter((arg) => arg !== "--user");
  if (!isSubcommand(sub)) return unknownSubcommand("systemctl", sub);
  if (units.length === 0) return failure("Too few arguments.", 1);
  if (scope === "user" && invocation.elevated) return failure(USER_BUS_ERROR, 1);

  const names = units.map(unitName);
  if (sub === "status") return status(state, names, scope);
  if (sub === "is-active") return isActive(state, names, scope);

  const resolved: Array<[string, ServiceUnit]> = [];
  for (const name of names) {
    const unit = lookup(state, name, scope);
    if (!unit) return failure(`Failed to ${sub} ${name}.service: Unit ${name}.service not found.`, 5);
    if (scope === "system" && !invocation.elevated) {
      return failure(`Failed to ${sub} ${name}.service: Interactive authentication required.`, 1);
    }
    resolved.push([name, unit]);
  }

  const lines: string[] = [];
  for (const [name, unit] of resolved) {
    const { line, error } = mutate(state, sub, name, unit);
    if (error) return failure([...lines, error].join("\n"), 1);
    if (line) lines.push(line);
  }
  return success(lines.join("\n"));
};

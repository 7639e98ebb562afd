import { failure, Outcome } from "../../shared/src";
import { journalctlEmulator } from "./emulators/journalctl";
import { launcherEmulator } from "./emulators/launcher";
import { ipEmulator, nmcliEmulator } from "./emulators/network";
import { pacmanEmulator } from "./emulators/pacman";
import { paruEmulator } from "./emulators/paru";
import { systemctlEmulator } from "./emulators/systemctl";
import { Invocation } from "./emulators/types";
import { isInstalled, recordHistory, SystemState } from "./state";

export type Subsystem =
  | { kind: "package-manager" }
  | { kind: "aur-helper" }
  | { kind: "service-manager"; tool: "systemctl" | "journalctl" }
  | { kind: "network"; tool: "ip" | "nmcli" }
  | { kind: "launcher" };

export const classify = (program: string): Subsystem | undefined => {
  switch (program) {
    case "pacman":
      return { kind: "package-manager" };
    case "paru":
      return { kind: "aur-helper" };
    case "systemctl":
    case "journalctl":
      return { kind: "service-manager", tool: program };
    case "ip":
    case "nmcli":
      return { kind: "network", tool: program };
    case "launch":
      return { kind: "launcher" };
    default:
      return undefined;
  }
};

// Package that has to be installed for the program binary to exist
const PROVIDED_BY: Record<string, string> = {
  pacman: "pacman",
  paru: "paru",
  systemctl: "systemd",
  journalctl: "systemd",
  ip: "iproute2",
  nmcli: "networkmanager",
};

export const tokenize = (command: string): string[] => command.trim().split(/\s+/).filter(Boolean);

/** Splits a command line into program and arguments; a leading sudo marks it elevated. */
export const parseInvocation = (command: string): Invocation | undefined => {
  const tokens = tokenize(command);
  const elevated = tokens[0] === "sudo";
  const [program, ...args] = elevated ? tokens.slice(1) : tokens;
  if (!program) return undefined;
  return { program, args, elevated };
};

const assertNever = (value: never): never => {
  throw new Error(`unhandled subsystem: ${JSON.stringify(value)}`);
};

const dispatch = (subsystem: Subsystem, invocation: Invocation, state: SystemState): Outcome => {
  switch (subsystem.kind) {
    case "package-manager":
      return pacmanEmulator(invocation, state);
    case "aur-helper":
      return paruEmulator(invocation, state);
    case "service-manager":
      return subsystem.tool === "systemctl"
        ? systemctlEmulator(invocation, state)
        : journalctlEmulator(invocation, state);
    case "network":
      return subsystem.tool === "ip" ? ipEmulator(invocation, state) : nmcliEmulator(invocation, state);
    case "launcher":
      return launcherEmulator(invocation, state);
    default:
      return assertNever(subsystem);
  }
};

const execute = (command: string, state: SystemState): Outcome => {
  const invocation = parseInvocation(command);
  if (!invocation) return failure("empty command", 1);

  const subsystem = classify(invocation.program);
  const provider = Object.hasOwn(PROVIDED_BY, invocation.program) ? PROVIDED_BY[invocation.program] : undefined;
  if (!subsystem || (provider !== undefined && !isInstalled(state, provider))) {
    return failure(`${invocation.program}: command not found`, 127);
  }
  return dispatch(subsystem, invocation, state);
};

/** Runs one command line against the emulated system and records it in the history. */
export const applyCommand = (command: string, state: SystemState): Outcome => {
  const outcome = execute(command, state);
  recordHistory(state, command, outcome);
  return outcome;
};

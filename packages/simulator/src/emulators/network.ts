import { failure, success } from "../../../shared/src";
import { InterfaceState, SystemState } from "../state";
import { Emulator, unknownSubcommand } from "./types";

const linkFlags = (name: string, status: InterfaceState) => {
  const base = name === "lo" ? "LOOPBACK" : "BROADCAST,MULTICAST";
  return status === "UP" ? `${base},UP` : base;
};

const linkLines = (state: SystemState, withAddresses: boolean): string[] =>
  [...state.network.interfaces.entries()].flatMap(([name, status], index) => {
    const line = `${index + 1}: ${name}: <${linkFlags(name, status)}> state ${status}`;
    if (!withAddresses || status === "DOWN") return [line];
    const address = name === "lo" ? "127.0.0.1/8" : `192.168.1.${22 + index}/24`;
    return [line, `    inet ${address}`];
  });

export const ipEmulator: Emulator = (invocation, state) => {
  const [object, action, ...rest] = invocation.args;
  if (rest.length > 0 || (action !== undefined && action !== "show")) {
    return failure(`ip: unknown arguments '${invocation.args.slice(1).join(" ")}'`, 1);
  }
  switch (object) {
    case "link":
      return success(linkLines(state, false).join("\n"));
    case "addr":
      return success(linkLines(state, true).join("\n"));
    default:
      return unknownSubcommand("ip", object);
  }
};

// Reachability comes from network state alone, whatever the services report
export const nmcliEmulator: Emulator = (invocation, state) => {
  const [object, action, extra, ...rest] = invocation.args;
  const reachable = state.network.reachable;

  if (object === "networking" && action === "connectivity" && (extra === undefined || extra === "check") && rest.length === 0) {
    return success(reachable ? "full" : "none");
  }
  if (object === "general" && action === "status" && extra === undefined) {
    return success(["STATE         CONNECTIVITY", reachable ? "connected     full" : "disconnected  none"].join("\n"));
  }
  if (object === "device" && action === "status" && extra === undefined) {
    const rows = [...state.network.interfaces.entries()].map(([name, status]) =>
      name === "lo"
        ? `${name.padEnd(8)}loopback  unmanaged`
        : `${name.padEnd(8)}wifi      ${status === "UP" ? "connected" : "disconnected"}`
    );
    return success(["DEVICE  TYPE      STATE", ...rows].join("\n"));
  }
  return unknownSubcommand("nmcli", object);
};

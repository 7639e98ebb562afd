import { Outcome } from "../../shared/src";
import { loadCatalog, lookupPackage, PackageCatalog, PackageOrigin } from "./catalog";

export type InstalledPackage = {
  version: string;
  origin: PackageOrigin;
};

export type ServiceStatus = "stopped" | "running" | "failed";

export type ServiceScope = "system" | "user";

export type ServiceUnit = {
  status: ServiceStatus;
  enabled: boolean;
  scope: ServiceScope;
  providedBy: string;
  /** The unit fails whenever it is started. */
  startFault?: boolean;
};

export type InterfaceState = "UP" | "DOWN";

export type NetworkState = {
  reachable: boolean;
  interfaces: Map<string, InterfaceState>;
};

export type Fault = "pacman-broken" | "network-unplugged";

export type HistoryEntry = {
  seq: number;
  command: string;
  outcome: Outcome;
};

/**
 * Everything the emulators can observe or change. A session owns exactly one
 * of these and threads it through every emulator call.
 */
export type SystemState = {
  catalog: PackageCatalog;
  packages: Map<string, InstalledPackage>;
  services: Map<string, ServiceUnit>;
  network: NetworkState;
  faults: Set<Fault>;
  journal: Map<string, string[]>;
  history: HistoryEntry[];
};

const BASE_PACKAGES = [
  "base",
  "bash",
  "bluez",
  "iproute2",
  "linux",
  "networkmanager",
  "openssh",
  "pacman",
  "paru",
  "pipewire",
  "systemd",
  "wireplumber",
];

const BASE_SERVICES: Array<[string, ServiceUnit]> = [
  ["NetworkManager", { status: "running", enabled: true, scope: "system", providedBy: "networkmanager" }],
  ["bluetooth", { status: "running", enabled: true, scope: "system", providedBy: "bluez" }],
  ["systemd-timesyncd", { status: "running", enabled: true, scope: "system", providedBy: "systemd" }],
  ["sshd", { status: "stopped", enabled: false, scope: "system", providedBy: "openssh" }],
  ["pipewire", { status: "running", enabled: true, scope: "user", providedBy: "pipewire" }],
  ["wireplumber", { status: "running", enabled: true, scope: "user", providedBy: "wireplumber" }],
];

export const createSystemState = (catalog: PackageCatalog = loadCatalog()): SystemState => {
  const packages = new Map<string, InstalledPackage>();
  for (const name of BASE_PACKAGES) {
    const entry = lookupPackage(catalog, name);
    if (!entry) {
      throw new Error(`base package ${name} is missing from the catalog`);
    }
    packages.set(name, { version: entry.version, origin: entry.origin });
  }

  const services = new Map<string, ServiceUnit>();
  const journal = new Map<string, string[]>();
  for (const [name, unit] of BASE_SERVICES) {
    services.set(name, { ...unit });
    if (unit.status === "running") journal.set(name, [`Started ${name}.service.`]);
  }

  return {
    catalog,
    packages,
    services,
    network: {
      reachable: true,
      interfaces: new Map<string, InterfaceState>([
        ["lo", "UP"],
        ["wlp2s0", "UP"],
      ]),
    },
    faults: new Set<Fault>(),
    journal,
    history: [],
  };
};

export const isInstalled = (state: SystemState, name: string): boolean => state.packages.has(name);

export const installedNames = (state: SystemState): string[] => [...state.packages.keys()].sort();

/** A unit is visible only while the package providing it is installed. */
export const findUnit = (state: SystemState, name: string): ServiceUnit | undefined => {
  const unit = state.services.get(name);
  if (!unit || !isInstalled(state, unit.providedBy)) return undefined;
  return unit;
};

export const appendJournal = (state: SystemState, unit: string, line: string): void => {
  const lines = state.journal.get(unit) ?? [];
  lines.push(line);
  state.journal.set(unit, lines);
};

export const recordHistory = (state: SystemState, command: string, outcome: Outcome): HistoryEntry => {
  const entry: HistoryEntry = { seq: state.history.length + 1, command, outcome };
  state.history.push(entry);
  return entry;
};

export const setLinksUp = (state: SystemState, up: boolean): void => {
  if (up && state.faults.has("network-unplugged")) return;
  for (const name of state.network.interfaces.keys()) {
    if (name === "lo") continue;
    state.network.interfaces.set(name, up ? "UP" : "DOWN");
  }
  state.network.reachable = up;
};

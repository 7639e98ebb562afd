import { ScenarioNotFoundError } from "../../shared/src";
import { appendJournal, setLinksUp, SystemState } from "./state";

type Scenario = {
  description: string;
  apply: (state: SystemState) => void;
};

const failUnit = (state: SystemState, name: string): void => {
  const unit = state.services.get(name);
  if (!unit) return;
  unit.status = "failed";
  appendJournal(state, name, `${name}.service: Main process exited, code=exited, status=1/FAILURE`);
  appendJournal(state, name, `${name}.service: Failed with result 'exit-code'.`);
};

const STALE_VERSIONS: Array<[string, string]> = [
  ["linux", "6.10.10.arch1-1"],
  ["networkmanager", "1.48.8-1"],
  ["systemd", "256.5-1"],
];

const SCENARIOS = new Map<string, Scenario>([
  [
    "network-down",
    {
      description: "links down, NetworkManager failed",
      apply: (state) => {
        failUnit(state, "NetworkManager");
        setLinksUp(state, false);
      },
    },
  ],
  ["audio-broken", { description: "pipewire failed", apply: (state) => failUnit(state, "pipewire") }],
  [
    "audio-missing",
    {
      description: "pipewire package and unit gone",
      apply: (state) => {
        state.packages.delete("pipewire");
        const unit = state.services.get("pipewire");
        if (unit) unit.status = "stopped";
      },
    },
  ],
  [
    "pacman-broken",
    {
      description: "libalpm missing",
      apply: (state) => {
        state.faults.add("pacman-broken");
      },
    },
  ],
  [
    "network-unplugged",
    {
      description: "cable pulled, links stay down even after a restart",
      apply: (state) => {
        state.faults.add("network-unplugged");
        setLinksUp(state, false);
      },
    },
  ],
  [
    "bluetooth-broken",
    {
      description: "bluetooth failed and fails again on start",
      apply: (state) => {
        failUnit(state, "bluetooth");
        const unit = state.services.get("bluetooth");
        if (unit) unit.startFault = true;
      },
    },
  ],
  [
    "clock-drift",
    {
      description: "systemd-timesyncd stopped",
      apply: (state) => {
        const unit = state.services.get("systemd-timesyncd");
        if (unit) unit.status = "stopped";
      },
    },
  ],
  [
    "stale-packages",
    {
      description: "installed packages behind the repositories",
      apply: (state) => {
        for (const [name, version] of STALE_VERSIONS) {
          const pkg = state.packages.get(name);
          if (pkg) pkg.version = version;
        }
      },
    },
  ],
  [
    "no-aur-helper",
    {
      description: "paru not installed",
      apply: (state) => {
        state.packages.delete("paru");
      },
    },
  ],
]);

export const listScenarios = (): string[] => [...SCENARIOS.keys()];

export const describeScenario = (name: string): string | undefined => SCENARIOS.get(name)?.description;

export const applyScenario = (name: string, state: SystemState): void => {
  const scenario = SCENARIOS.get(name);
  if (!scenario) throw new ScenarioNotFoundError(name, listScenarios());
  scenario.apply(state);
};

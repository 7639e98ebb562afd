import { Outcome } from "../../shared/src";
import { PackageCatalog } from "./catalog";
import { applyCommand } from "./dispatch";
import { applyScenario } from "./scenarios";
import { createSystemState, HistoryEntry, isInstalled, SystemState } from "./state";

/**
 * One simulated machine. Owns its SystemState; nothing else holds a
 * reference to it.
 */
export class SimulatorSession {
  private readonly state: SystemState;

  constructor(options: { catalog?: PackageCatalog; scenarios?: string[] } = {}) {
    this.state = createSystemState(options.catalog);
    for (const name of options.scenarios ?? []) applyScenario(name, this.state);
  }

  apply(command: string): Outcome {
    return applyCommand(command, this.state);
  }

  loadScenario(name: string): void {
    applyScenario(name, this.state);
  }

  isInstalled(name: string): boolean {
    return isInstalled(this.state, name);
  }

  get paruAvailable(): boolean {
    return isInstalled(this.state, "paru");
  }

  history(): readonly HistoryEntry[] {
    return this.state.history;
  }

  /** The live state, for inspection. */
  inspect(): SystemState {
    return this.state;
  }
}

import { CommandPlan, Configuration, FixSubsystem, Intent, PlanStep } from "../../shared/src";
import { looksLikeAurPackage } from "../../simulator/src";

/**
 * What the synthesizer may know about the machine. On a real system nothing
 * is known and every answer is `undefined`.
 */
export type SynthesisContext = {
  isInstalled?: (name: string) => boolean | undefined;
  isAurOnly?: (name: string) => boolean;
};

export const LOG_LINES = 50;

const step = (command: string, reason: string, risk: PlanStep["risk"] = "requires-confirmation"): PlanStep => ({
  command,
  risk,
  reason,
});

const sudo = (config: Configuration) => (config.noSudo ? "" : "sudo ");

const noconfirm = (config: Configuration) => (config.autoConfirm ? " --noconfirm" : "");

const packageStep = (
  operation: "-S" | "-R",
  packages: string[],
  config: Configuration,
  context: SynthesisContext,
  reason: string
): PlanStep => {
  const isAurOnly = context.isAurOnly ?? ((name: string) => looksLikeAurPackage(name));
  const useParu = config.paruAvailable && (config.preferParu || packages.some(isAurOnly));
  const command = useParu
    ? `paru ${operation}${noconfirm(config)} ${packages.join(" ")}`
    : `${sudo(config)}pacman ${operation}${noconfirm(config)} ${packages.join(" ")}`;
  return step(command, reason);
};

const serviceRestart = (config: Configuration, unit: string, reason: string) =>
  step(`${sudo(config)}systemctl restart ${unit}`, reason);

const fixSteps = (subsystem: FixSubsystem, config: Configuration, context: SynthesisContext): PlanStep[] => {
  switch (subsystem) {
    case "sound": {
      const restart = step("systemctl --user restart pipewire wireplumber", "restart the audio services");
      return context.isInstalled?.("pipewire") === false
        ? [packageStep("-S", ["pipewire"], config, context, "pipewire is not installed"), restart]
        : [restart];
    }
    case "internet":
      return [
        serviceRestart(config, "NetworkManager", "restart the network manager"),
        step("nmcli networking connectivity check", "check connectivity", "safe"),
      ];
    case "bluetooth":
      return [serviceRestart(config, "bluetooth", "restart the bluetooth service")];
    case "time":
      return [serviceRestart(config, "systemd-timesyncd", "restart time synchronisation")];
  }
};

const targetsOf = (target: string | undefined): string[] => (target ?? "").split(/\s+/).filter(Boolean);

/**
 * Targets the machine already satisfies: installed ones for an install,
 * absent ones for a removal. Only a definite answer counts.
 */
const satisfied = (intent: Intent, context: SynthesisContext): string[] => {
  if (intent.kind !== "install" && intent.kind !== "remove") return [];
  const wanted = intent.kind === "install";
  return targetsOf(intent.target).filter((name) => context.isInstalled?.(name) === wanted);
};

const notesFor = (intent: Intent, context: SynthesisContext): string[] =>
  satisfied(intent, context).map((name) =>
    intent.kind === "install" ? `${name} is already installed` : `${name} is not installed`
  );


const stepsFor = (intent: Intent, config: Configuration, context: SynthesisContext): PlanStep[] => {
  switch (intent.kind) {
    case "install": {
      const skip = satisfied(intent, context);
      const packages = targetsOf(intent.target).filter((name) => !skip.includes(name));
      return packages.length > 0 ? [packageStep("-S", packages, config, context, `install ${packages.join(", ")}`)] : [];
    }
    case "remove": {
      const skip = satisfied(intent, context);
      const packages = targetsOf(intent.target).filter((name) => !skip.includes(name));
      return packages.length > 0 ? [packageStep("-R", packages, config, context, `remove ${packages.join(", ")}`)] : [];
    }
    case "open": {
      if (!intent.target) return [];
      const app = intent.target;
      const launch = step(`launch ${app}`, `launch ${app}`, "safe");
      const needsInstall = context.isInstalled?.(app) !== true && !config.offline;
      return needsInstall
        ? [packageStep("-S", [app], config, context, `${app} may not be installed`), launch]
        : [launch];
    }
    case "logs":
      return intent.target
        ? [step(`journalctl -u ${intent.target} --no-pager -n ${LOG_LINES}`, `show logs for ${intent.target}`, "safe")]
        : [];
    case "fix":
      return intent.subsystem ? fixSteps(intent.subsystem, config, context) : [];
    case "upgrade":
      if (config.offline) return [step("pacman -Syu", "network required", "forbidden")];
      return config.preferParu && config.paruAvailable
        ? [step(`paru -Syu${noconfirm(config)}`, "upgrade the system")]
        : [step(`${sudo(config)}pacman -Syu${noconfirm(config)}`, "upgrade the system")];
    case "clean-cache":
      return [step(`${sudo(config)}pacman -Sc${noconfirm(config)}`, "clean the package cache")];
    case "network-status":
      return [step("nmcli general status", "show network status", "safe")];
    case "test-ai":
    case "unknown":
      return [];
  }
};

/** Maps an intent to an ordered, risk-tagged plan. Pure. */
export const synthesize = (intent: Intent, config: Configuration, context: SynthesisContext = {}): CommandPlan => {
  const notes = notesFor(intent, context);
  const steps = stepsFor(intent, config, context);
  return notes.length > 0 ? { intent, steps, notes } : { intent, steps };
};

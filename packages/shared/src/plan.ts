export type RiskTag = "safe" | "requires-confirmation" | "forbidden";

const riskOrder: Record<RiskTag, number> = {
  safe: 0,
  "requires-confirmation": 1,
  forbidden: 2,
};

export const maxRisk = (a: RiskTag, b: RiskTag): RiskTag => (riskOrder[a] >= riskOrder[b] ? a : b);

export type FixSubsystem = "sound" | "internet" | "bluetooth" | "time";

export type IntentSource = "rules" | "translator";

export type TargetedIntentKind = "install" | "remove" | "open" | "logs";

export type Intent =
  | { kind: TargetedIntentKind; target?: string; source: IntentSource }
  | { kind: "fix"; subsystem?: FixSubsystem; source: IntentSource }
  | { kind: "upgrade" | "clean-cache" | "network-status" | "test-ai"; source: IntentSource }
  | { kind: "unknown"; text: string };

export type IntentKind = Intent["kind"];

export type ExecutionMode = "suggest" | "apply";

export type Configuration = {
  mode: ExecutionMode;
  preferParu: boolean;
  paruAvailable: boolean;
  noSudo: boolean;
  offline: boolean;
  autoConfirm: boolean;
  verbose: boolean;
};

export const DEFAULT_CONFIGURATION: Readonly<Configuration> = Object.freeze({
  mode: "suggest",
  preferParu: false,
  paruAvailable: false,
  noSudo: false,
  offline: false,
  autoConfirm: false,
  verbose: false,
});

export type PlanStep = {
  command: string;
  risk: RiskTag;
  reason: string;
};

export type CommandPlan = {
  intent: Intent;
  steps: PlanStep[];
  /** Targets left out because the machine already satisfies them. */
  notes?: string[];
};

export type Outcome =
  | { status: "success"; output: string }
  | { status: "failure"; output: string; code: number };

export const success = (output: string): Outcome => ({ status: "success", output });

export const failure = (output: string, code = 1): Outcome => ({ status: "failure", output, code });

export const describeIntent = (intent: Intent): string => {
  switch (intent.kind) {
    case "install":
    case "remove":
    case "open":
    case "logs":
      return intent.target ? `${intent.kind} ${intent.target}` : intent.kind;
    case "fix":
      return intent.subsystem ? `fix ${intent.subsystem}` : "fix";
    case "upgrade":
    case "clean-cache":
    case "network-status":
    case "test-ai":
      return intent.kind;
    case "unknown":
      return "unknown";
  }
};

import { FixSubsystem, Intent, IntentSource, TargetedIntentKind } from "../../shared/src";

const VERBS: ReadonlyArray<[TargetedIntentKind, readonly string[]]> = [
  ["install", ["install", "get", "add"]],
  ["remove", ["remove", "uninstall", "delete"]],
  ["open", ["open", "launch", "start"]],
  ["logs", ["logs", "log", "journal"]],
];

// checked before the single-word verbs: "get rid of x" is not "get x"
const VERB_PHRASES: ReadonlyArray<[TargetedIntentKind, readonly string[]]> = [["remove", ["get rid of", "get rid"]]];

const SUBSYSTEM_WORDS = new Map<string, FixSubsystem>([
  ["sound", "sound"],
  ["audio", "sound"],
  ["internet", "internet"],
  ["network", "internet"],
  ["wifi", "internet"],
  ["bluetooth", "bluetooth"],
  ["time", "time"],
  ["clock", "time"],
]);

const FILLER = new Set(["the", "for", "of", "my", "a"]);

const UPGRADE_PHRASES = new Set(["upgrade", "update", "upgrade system", "update system", "system upgrade", "system update"]);
const CLEAN_PHRASES = new Set(["clean cache", "clear cache", "cleanup", "clean up"]);
const STATUS_SUBJECTS = new Set(["wifi", "network", "internet", "connection"]);

/** Drops filler words but keeps the original casing of what remains. */
const targetOf = (words: string[]): string | undefined => {
  const kept = words.filter((word) => !FILLER.has(word.toLowerCase()));
  return kept.length > 0 ? kept.join(" ") : undefined;
};

const subsystemIn = (words: string[]): FixSubsystem | undefined => {
  for (const word of words) {
    const subsystem = SUBSYSTEM_WORDS.get(word.replace(/[^a-z]/g, ""));
    if (subsystem) return subsystem;
  }
  return undefined;
};

/**
 * Ordered rules over lowercased text; the first one that matches wins.
 * Package and app names are lowercased, service names keep their case.
 */
export const matchRules = (text: string, source: IntentSource = "rules"): Intent | undefined => {
  const words = text.trim().split(/\s+/).filter(Boolean);
  const lower = words.map((word) => word.toLowerCase());
  const phrase = lower.join(" ");
  if (!phrase) return undefined;

  if (phrase === "test ai") return { kind: "test-ai", source };

  for (const [kind, phrases] of VERB_PHRASES) {
    const matched = phrases.find((candidate) => phrase === candidate || phrase.startsWith(`${candidate} `));
    if (!matched) continue;
    const target = targetOf(lower.slice(matched.split(" ").length));
    return target === undefined ? { kind, source } : { kind, target, source };
  }

  const [verb, ...rest] = lower;
  for (const [kind, verbs] of VERBS) {
    if (!verbs.includes(verb)) continue;
    const target = targetOf(kind === "logs" ? words.slice(1) : rest);
    return target === undefined ? { kind, source } : { kind, target, source };
  }

  if (UPGRADE_PHRASES.has(phrase)) return { kind: "upgrade", source };
  if (CLEAN_PHRASES.has(phrase)) return { kind: "clean-cache", source };

  if (verb === "fix" || verb === "repair") {
    const subsystem = subsystemIn(rest);
    return subsystem ? { kind: "fix", subsystem, source } : { kind: "fix", source };
  }

  // "wifi status" asks, it does not ask for a repair
  const bare = lower.map((word) => word.replace(/[^a-z]/g, ""));
  const statusAt = bare.indexOf("status");
  if (statusAt > 0 && STATUS_SUBJECTS.has(bare[statusAt - 1])) return { kind: "network-status", source };

  // bare mentions: "no sound", "wifi is broken"
  const mentioned = subsystemIn(lower);
  if (mentioned) return { kind: "fix", subsystem: mentioned, source };

  return undefined;
};

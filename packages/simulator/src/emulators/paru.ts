import { failure, Outcome } from "../../../shared/src";
import {
  cleanCache,
  installTargets,
  LIBALPM_ERROR,
  parsePackageArgs,
  queryPackages,
  removeTargets,
  upgradeSystem,
} from "./transactions";
import { Emulator } from "./types";

const notFound = (missing: string[]): Outcome =>
  failure(
    ["error: could not find all required packages:", ...missing.map((name) => `    ${name} (target)`)].join("\n"),
    1
  );

// paru escalates through sudo on its own and refuses to be started as root
export const paruEmulator: Emulator = (invocation, state) => {
  if (invocation.elevated) return failure("error: can't run paru as root", 1);
  if (state.faults.has("pacman-broken")) return failure(`paru: ${LIBALPM_ERROR}`, 127);

  if (invocation.args.length === 0) return upgradeSystem(state, ["repo", "aur"]);

  const parsed = parsePackageArgs(invocation);
  if (!parsed.ok) return parsed.outcome;
  const { operation, targets, needed } = parsed.args;

  switch (operation) {
    case "sync":
      return installTargets(state, targets, { needed, origins: ["repo", "aur"], notFound });
    case "remove":
      return removeTargets(state, targets);
    case "upgrade":
      return upgradeSystem(state, ["repo", "aur"]);
    case "clean":
      return cleanCache(false);
    case "clean-all":
      return cleanCache(true);
    case "query":
      return queryPackages(state, targets, { quiet: false, foreignOnly: false });
    case "query-quiet":
      return queryPackages(state, targets, { quiet: true, foreignOnly: false });
    case "query-foreign":
      return queryPackages(state, targets, { quiet: false, foreignOnly: true });
    case "query-foreign-quiet":
      return queryPackages(state, targets, { quiet: true, foreignOnly: true });
  }
};

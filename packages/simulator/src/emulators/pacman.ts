import { failure, Outcome } from "../../../shared/src";
import {
  cleanCache,
  installTargets,
  LIBALPM_ERROR,
  PackageOperation,
  parsePackageArgs,
  queryPackages,
  removeTargets,
  upgradeSystem,
} from "./transactions";
import { Emulator } from "./types";

const MUTATING: PackageOperation[] = ["sync", "remove", "upgrade", "clean", "clean-all"];

const notFound = (missing: string[]): Outcome =>
  failure(missing.map((name) => `error: target not found: ${name}`).join("\n"), 1);

/**
 * pacman only sees the official repositories: AUR-only names are "target not
 * found" here and must go through the AUR helper.
 */
export const pacmanEmulator: Emulator = (invocation, state) => {
  if (state.faults.has("pacman-broken")) return failure(`pacman: ${LIBALPM_ERROR}`, 127);

  const parsed = parsePackageArgs(invocation);
  if (!parsed.ok) return parsed.outcome;
  const { operation, targets, needed } = parsed.args;

  if (MUTATING.includes(operation) && !invocation.elevated) {
    return failure("error: you cannot perform this operation unless you are root.", 1);
  }

  switch (operation) {
    case "sync":
      return installTargets(state, targets, { needed, origins: ["repo"], notFound });
    case "remove":
      return removeTargets(state, targets);
    case "upgrade":
      return upgradeSystem(state, ["repo"]);
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

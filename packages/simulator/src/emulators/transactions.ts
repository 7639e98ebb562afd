import { failure, Outcome, success } from "../../../shared/src";
import { CatalogEntry, lookupPackage, PackageOrigin, versionOf } from "../catalog";
import { appendJournal, isInstalled, SystemState } from "../state";
import { Invocation, unknownSubcommand } from "./types";

const MIRROR = "geo.mirror.pkgbuild.com";
const REQUIRED_BY_BASE = ["bash", "iproute2", "pacman", "systemd"];

export const LIBALPM_ERROR =
  "error while loading shared libraries: libalpm.so.15: cannot open shared object file: No such file or directory";

export type PackageOperation =
  | "sync"
  | "remove"
  | "upgrade"
  | "clean"
  | "clean-all"
  | "query"
  | "query-quiet"
  | "query-foreign"
  | "query-foreign-quiet";

const OPERATIONS = new Map<string, PackageOperation>([
  ["-S", "sync"],
  ["-R", "remove"],
  ["-Rs", "remove"],
  ["-Rns", "remove"],
  ["-Syu", "upgrade"],
  ["-Sc", "clean"],
  ["-Scc", "clean-all"],
  ["-Q", "query"],
  ["-Qq", "query-quiet"],
  ["-Qm", "query-foreign"],
  ["-Qmq", "query-foreign-quiet"],
]);

const OPTIONS = new Set(["--noconfirm", "--needed"]);

export type PackageArgs = {
  operation: PackageOperation;
  targets: string[];
  needed: boolean;
};

export type ParsedPackageArgs = { ok: true; args: PackageArgs } | { ok: false; outcome: Outcome };

export const parsePackageArgs = (invocation: Invocation): ParsedPackageArgs => {
  const [flag, ...rest] = invocation.args;
  const operation = flag === undefined ? undefined : OPERATIONS.get(flag);
  if (!operation) {
    return { ok: false, outcome: unknownSubcommand(invocation.program, flag) };
  }
  const unknownOption = rest.find((arg) => arg.startsWith("-") && !OPTIONS.has(arg));
  if (unknownOption) {
    return { ok: false, outcome: failure(`${invocation.program}: unknown option '${unknownOption}'`, 1) };
  }
  return {
    ok: true,
    args: {
      operation,
      targets: rest.filter((arg) => !arg.startsWith("-")),
      needed: rest.includes("--needed"),
    },
  };
};

const packageFile = (entry: CatalogEntry) => `${entry.name}-${entry.version}-x86_64.pkg.tar.zst`;

const retrievalFailure = (entries: CatalogEntry[]): Outcome =>
  failure(
    [
      ...entries.map(
        (entry) =>
          `error: failed retrieving file '${packageFile(entry)}' from ${MIRROR} : Could not resolve host: ${MIRROR}`
      ),
      "error: failed to commit transaction (failed to retrieve some files)",
    ].join("\n"),
    1
  );

/** User units that are enabled come up as soon as their package lands (socket activation). */
const activateUnits = (state: SystemState, pkg: string): void => {
  for (const [name, unit] of state.services) {
    if (unit.providedBy !== pkg || unit.scope !== "user" || !unit.enabled) continue;
    if (unit.status !== "running") {
      unit.status = "running";
      appendJournal(state, name, `Started ${name}.service.`);
    }
  }
};

const deactivateUnits = (state: SystemState, pkg: string): void => {
  for (const [name, unit] of state.services) {
    if (unit.providedBy !== pkg || unit.status === "stopped") continue;
    unit.status = "stopped";
    appendJournal(state, name, `Stopped ${name}.service.`);
  }
};

export type InstallOptions = {
  needed: boolean;
  origins: PackageOrigin[];
  notFound: (missing: string[]) => Outcome;
};

/** Resolves, downloads and installs all targets, or none of them. */
export const installTargets = (state: SystemState, targets: string[], options: InstallOptions): Outcome => {
  if (targets.length === 0) return failure("error: no targets specified (use -h for help)", 1);

  const entries: CatalogEntry[] = [];
  const missing: string[] = [];
  for (const target of targets) {
    const entry = lookupPackage(state.catalog, target, options.origins);
    if (entry) entries.push(entry);
    else missing.push(target);
  }
  if (missing.length > 0) return options.notFound(missing);

  const lines: string[] = [];
  const pending: CatalogEntry[] = [];
  for (const entry of entries) {
    const installed = state.packages.get(entry.name);
    if (installed && installed.version === entry.version) {
      if (options.needed) {
        lines.push(`warning: ${entry.name}-${installed.version} is up to date -- skipping`);
        continue;
      }
      lines.push(`warning: ${entry.name}-${installed.version} is up to date -- reinstalling`);
    }
    pending.push(entry);
  }
  if (pending.length === 0) return success([...lines, " there is nothing to do"].join("\n"));
  if (!state.network.reachable) return retrievalFailure(pending);

  lines.push(
    "resolving dependencies...",
    "looking for conflicting packages...",
    `Packages (${pending.length}) ${pending.map((entry) => `${entry.name}-${entry.version}`).join("  ")}`
  );
  pending.forEach((entry, index) => {
    if (entry.origin === "aur") lines.push(`==> Making package: ${entry.name} ${entry.version}`);
    state.packages.set(entry.name, { version: entry.version, origin: entry.origin });
    activateUnits(state, entry.name);
    lines.push(`(${index + 1}/${pending.length}) installing ${entry.name}`);
  });
  return success(lines.join("\n"));
};

export const removeTargets = (state: SystemState, targets: string[]): Outcome => {
  if (targets.length === 0) return failure("error: no targets specified (use -h for help)", 1);

  const missing = targets.filter((target) => !isInstalled(state, target));
  if (missing.length > 0) {
    return failure(missing.map((target) => `error: target not found: ${target}`).join("\n"), 1);
  }

  const removingBase = targets.includes("base");
  const broken = isInstalled(state, "base") && !removingBase ? targets.filter((t) => REQUIRED_BY_BASE.includes(t)) : [];
  if (broken.length > 0) {
    return failure(
      [
        "error: failed to prepare transaction (could not satisfy dependencies)",
        ...broken.map((target) => `:: removing ${target} breaks dependency '${target}' required by base`),
      ].join("\n"),
      1
    );
  }

  const lines = [
    "checking dependencies...",
    `Packages (${targets.length}) ${targets
      .map((target) => `${target}-${state.packages.get(target)?.version ?? "unknown"}`)
      .join("  ")}`,
  ];
  targets.forEach((target, index) => {
    state.packages.delete(target);
    deactivateUnits(state, target);
    lines.push(`(${index + 1}/${targets.length}) removing ${target}`);
  });
  return success(lines.join("\n"));
};

export const upgradeSystem = (state: SystemState, origins: PackageOrigin[]): Outcome => {
  if (!state.network.reachable) {
    return failure(
      [
        ":: Synchronizing package databases...",
        `error: failed retrieving file 'core.db' from ${MIRROR} : Could not resolve host: ${MIRROR}`,
        "error: failed to synchronize all databases (download library error)",
      ].join("\n"),
      1
    );
  }

  const lines = [
    ":: Synchronizing package databases...",
    " core is up to date",
    " extra is up to date",
    ":: Starting full system upgrade...",
  ];
  if (origins.includes("aur")) lines.push(":: Looking for AUR upgrades...");

  const outdated = [...state.packages.entries()]
    .filter(([name, pkg]) => {
      if (!origins.includes(pkg.origin)) return false;
      const latest = versionOf(state.catalog, pkg.origin, name);
      return latest !== undefined && latest !== pkg.version;
    })
    .map(([name, pkg]) => ({ name, origin: pkg.origin, version: versionOf(state.catalog, pkg.origin, name) ?? pkg.version }))
    .sort((a, b) => a.name.localeCompare(b.name));

  if (outdated.length === 0) {
    lines.push(" there is nothing to do");
    return success(lines.join("\n"));
  }

  lines.push(`Packages (${outdated.length}) ${outdated.map((pkg) => `${pkg.name}-${pkg.version}`).join("  ")}`);
  outdated.forEach((pkg, index) => {
    state.packages.set(pkg.name, { version: pkg.version, origin: pkg.origin });
    lines.push(`(${index + 1}/${outdated.length}) upgrading ${pkg.name}`);
  });
  return success(lines.join("\n"));
};

export const cleanCache = (all: boolean): Outcome =>
  success(
    all
      ? ["Cache directory: /var/cache/pacman/pkg/", ":: removing all files from cache..."].join("\n")
      : [
          "Packages to keep:",
          "  All locally installed packages",
          "Cache directory: /var/cache/pacman/pkg/",
          ":: removing old packages from cache...",
        ].join("\n")
  );

export const queryPackages = (
  state: SystemState,
  targets: string[],
  options: { quiet: boolean; foreignOnly: boolean }
): Outcome => {
  const format = (name: string, version: string) => (options.quiet ? name : `${name} ${version}`);

  if (targets.length > 0) {
    const lines: string[] = [];
    let missing = false;
    for (const target of targets) {
      const pkg = state.packages.get(target);
      if (pkg && (!options.foreignOnly || pkg.origin === "aur")) {
        lines.push(format(target, pkg.version));
      } else {
        missing = true;
        lines.push(`error: package '${target}' was not found`);
      }
    }
    return missing ? failure(lines.join("\n"), 1) : success(lines.join("\n"));
  }

  const lines = [...state.packages.entries()]
    .filter(([, pkg]) => !options.foreignOnly || pkg.origin === "aur")
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([name, pkg]) => format(name, pkg.version));
  return success(lines.join("\n"));
};

/**
 * Allowlist grammar: a leading program plus a closed argument grammar per
 * program. Anything not described here is rejected.
 */

export type GrammarVerdict = { ok: true; readOnly: boolean; networkSync: boolean } | { ok: false; reason: string };

const PACKAGE_NAME = /^[a-z0-9@_+][a-z0-9@._+-]*$/;
const UNIT_NAME = /^[A-Za-z0-9@_:][A-Za-z0-9@._:-]*$/;

const PACKAGE_OPERATIONS = new Set(["-S", "-R", "-Rs", "-Rns", "-Syu", "-Sc", "-Scc", "-Q", "-Qq", "-Qm", "-Qmq"]);
const PACKAGE_OPTIONS = new Set(["--noconfirm", "--needed"]);
const SYNC_OPERATIONS = new Set(["-S", "-Syu"]);

const SYSTEMCTL_SUBCOMMANDS = new Set(["start", "stop", "restart", "status", "enable", "disable", "is-active"]);
const SYSTEMCTL_READ_ONLY = new Set(["status", "is-active"]);

const SUDO_PROGRAMS = new Set(["pacman", "systemctl", "journalctl"]);

const NMCLI_FORMS = ["networking connectivity", "networking connectivity check", "general status", "device status"];
const IP_FORMS = ["link", "addr", "link show", "addr show"];

const allow = (readOnly: boolean, networkSync = false): GrammarVerdict => ({ ok: true, readOnly, networkSync });
const deny = (reason: string): GrammarVerdict => ({ ok: false, reason });

const packageCommand = (program: string, args: string[]): GrammarVerdict => {
  // bare paru is a full upgrade
  if (program === "paru" && args.length === 0) return allow(false, true);

  const [operation, ...rest] = args;
  if (operation === undefined || !PACKAGE_OPERATIONS.has(operation)) {
    return deny(`${program} operation not allowed: ${operation ?? "(none)"}`);
  }
  for (const arg of rest) {
    if (arg.startsWith("-")) {
      if (!PACKAGE_OPTIONS.has(arg)) return deny(`${program} option not allowed: ${arg}`);
    } else if (!PACKAGE_NAME.test(arg)) {
      return deny(`invalid package name: ${arg}`);
    }
  }
  return allow(operation.startsWith("-Q"), SYNC_OPERATIONS.has(operation));
};

const systemctlCommand = (args: string[]): GrammarVerdict => {
  const rest = args[0] === "--user" ? args.slice(1) : args;
  const [subcommand, ...units] = rest;
  if (subcommand === undefined || !SYSTEMCTL_SUBCOMMANDS.has(subcommand)) {
    return deny(`systemctl subcommand not allowed: ${subcommand ?? "(none)"}`);
  }
  if (units.length === 0) return deny("systemctl needs a unit");
  const bad = units.find((unit) => !UNIT_NAME.test(unit));
  if (bad !== undefined) return deny(`invalid unit name: ${bad}`);
  return allow(SYSTEMCTL_READ_ONLY.has(subcommand));
};

const journalctlCommand = (args: string[]): GrammarVerdict => {
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--no-pager" || arg === "--user") continue;
    if (arg === "-u") {
      const unit = args[++i];
      if (unit === undefined || !UNIT_NAME.test(unit)) return deny("journalctl -u needs a unit name");
      continue;
    }
    if (arg === "-n") {
      const count = args[++i];
      if (count === undefined || !/^\d+$/.test(count)) return deny("journalctl -n needs a line count");
      continue;
    }
    return deny(`journalctl option not allowed: ${arg}`);
  }
  return allow(true);
};

const fixedForms = (program: string, forms: string[], args: string[]): GrammarVerdict =>
  forms.includes(args.join(" ")) ? allow(true) : deny(`${program} arguments not allowed: ${args.join(" ")}`);

const launchCommand = (args: string[]): GrammarVerdict => {
  const [app, ...rest] = args;
  if (app === undefined || rest.length > 0 || !PACKAGE_NAME.test(app)) return deny("launch takes exactly one app name");
  return allow(true);
};

export const checkGrammar = (tokens: string[]): GrammarVerdict => {
  const [first, ...afterFirst] = tokens;
  const elevated = first === "sudo";
  const [program, ...args] = elevated ? afterFirst : tokens;

  if (program === undefined) return deny("empty command");
  if (elevated && !SUDO_PROGRAMS.has(program)) return deny(`sudo is not allowed before ${program}`);

  switch (program) {
    case "pacman":
    case "paru":
      return packageCommand(program, args);
    case "systemctl":
      return systemctlCommand(args);
    case "journalctl":
      return journalctlCommand(args);
    case "nmcli":
      return fixedForms(program, NMCLI_FORMS, args);
    case "ip":
      return fixedForms(program, IP_FORMS, args);
    case "launch":
      return launchCommand(args);
    default:
      return deny(`command not in allowlist: ${program}`);
  }
};

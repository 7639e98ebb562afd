import { parseArgs } from "util";
import { z } from "zod";
import { ConfigConflictError, Configuration, PacwardenError } from "../../../packages/shared/src";

export class UsageError extends PacwardenError {
  readonly code = "usage";

  constructor(message: string) {
    super(message);
  }
}

export const USAGE = `usage: pacwarden <ai|run> "<text>" [flags]

  ai "<free text>"     turn a request into a checked plan
  run "<command>"      check a single literal command

flags:
  --dry-run            print the plan only (default)
  --apply, --auto      execute the plan
  -y, --yes            do not ask before each step
  --prefer-paru        use paru for repository packages too
  --no-sudo            never prefix commands with sudo
  --offline            no translator, no downloads
  -v, --verbose        reasons, risk tags and detailed exit codes
  --simulate           run against the simulated system
  --scenario <name>    preset for --simulate
  -h, --help           show this help`;

export type CliFlags = {
  dryRun: boolean;
  apply: boolean;
  yes: boolean;
  preferParu: boolean;
  noSudo: boolean;
  offline: boolean;
  verbose: boolean;
  simulate: boolean;
  scenario?: string;
};

export type CliInvocation =
  | { kind: "help" }
  | { kind: "ai" | "run"; text: string; flags: CliFlags };

const invocationSchema = z.object({
  command: z.enum(["ai", "run"], { message: 'expected "ai" or "run"' }),
  text: z.string().trim().min(1, { message: "nothing to do: text is empty" }),
});

const readArgs = (argv: string[]) => {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      strict: true,
      options: {
        "dry-run": { type: "boolean" },
        apply: { type: "boolean" },
        auto: { type: "boolean" },
        yes: { type: "boolean", short: "y" },
        "prefer-paru": { type: "boolean" },
        "no-sudo": { type: "boolean" },
        offline: { type: "boolean" },
        verbose: { type: "boolean", short: "v" },
        simulate: { type: "boolean" },
        scenario: { type: "string" },
        help: { type: "boolean", short: "h" },
      },
    });
  } catch (err) {
    throw new UsageError(err instanceof Error ? err.message : String(err));
  }
};

export const parseCli = (argv: string[]): CliInvocation => {
  const parsed = readArgs(argv);
  const { values, positionals } = parsed;
  if (values.help === true) return { kind: "help" };

  const [command, ...words] = positionals;
  const checked = invocationSchema.safeParse({ command, text: words.join(" ") });
  if (!checked.success) {
    throw new UsageError(checked.error.issues.map((issue) => issue.message).join("; "));
  }

  return {
    kind: checked.data.command,
    text: checked.data.text,
    flags: {
      dryRun: values["dry-run"] === true,
      apply: values.apply === true || values.auto === true,
      yes: values.yes === true,
      preferParu: values["prefer-paru"] === true,
      noSudo: values["no-sudo"] === true,
      offline: values.offline === true,
      verbose: values.verbose === true,
      simulate: values.simulate === true,
      scenario: values.scenario,
    },
  };
};

export const assertNoConflicts = (flags: CliFlags): void => {
  if (flags.dryRun && flags.apply) throw new ConfigConflictError("--dry-run cannot be combined with --apply/--auto");
  if (flags.yes && !flags.apply) throw new ConfigConflictError("--yes only makes sense with --apply/--auto");
  if (flags.scenario !== undefined && !flags.simulate) throw new ConfigConflictError("--scenario needs --simulate");
};

/** Flags → Configuration. Conflicting flags are reported before anything is planned. */
export const buildConfiguration = (flags: CliFlags, paruAvailable: boolean): Configuration => {
  assertNoConflicts(flags);
  return {
    mode: flags.apply ? "apply" : "suggest",
    preferParu: flags.preferParu,
    paruAvailable,
    noSudo: flags.noSudo,
    offline: flags.offline,
    autoConfirm: flags.yes,
    verbose: flags.verbose,
  };
};

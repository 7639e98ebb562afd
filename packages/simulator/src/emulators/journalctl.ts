import { failure, success } from "../../../shared/src";
import { Emulator } from "./types";
import { unitName } from "./systemctl";

const HOST_PREFIX = "localhost systemd[1]:";

export const journalctlEmulator: Emulator = (invocation, state) => {
  const units: string[] = [];
  let limit: number | undefined;

  const args = [...invocation.args];
  while (args.length > 0) {
    const arg = args.shift();
    switch (arg) {
      case "-u": {
        const unit = args.shift();
        if (!unit) return failure("journalctl: option requires an argument -- 'u'", 1);
        units.push(unitName(unit));
        break;
      }
      case "-n": {
        const count = Number(args.shift());
        if (!Number.isInteger(count) || count <= 0) return failure("journalctl: invalid number of lines", 1);
        limit = count;
        break;
      }
      case "--no-pager":
      case "--user":
        break;
      default:
        return failure(`journalctl: unknown option '${arg ?? ""}'`, 1);
    }
  }

  const selected = units.length > 0 ? units : [...state.journal.keys()].sort();
  const lines = selected.flatMap((unit) => (state.journal.get(unit) ?? []).map((line) => `${HOST_PREFIX} ${line}`));
  const shown = limit === undefined ? lines : lines.slice(-limit);
  return success(shown.length > 0 ? shown.join("\n") : "-- No entries --");
};

import { failure, success } from "../../../shared/src";
import { isInstalled } from "../state";
import { Emulator } from "./types";

export const launcherEmulator: Emulator = (invocation, state) => {
  const [app, ...rest] = invocation.args;
  if (!app || rest.length > 0) return failure("usage: launch <app>", 2);
  if (!isInstalled(state, app)) return failure(`${app}: command not found`, 127);
  return success(`launching ${app}`);
};

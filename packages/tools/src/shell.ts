import { spawn } from "child_process";
import { accessSync, constants } from "fs";
import { delimiter, join } from "path";
import { failure, Outcome, success } from "../../shared/src";

export type SpawnResult = { code: number; output: string } | { error: "not-found" | "failed"; message: string };

/** Runs a program with arguments, no shell in between. */
export type Spawner = (program: string, args: string[]) => Promise<SpawnResult>;

/** Starts an app detached from this process. */
export type AppLauncher = (app: string) => Promise<Outcome>;

const isNotFound = (err: Error): boolean => "code" in err && err.code === "ENOENT";

export const spawnProgram: Spawner = (program, args) =>
  new Promise((resolve) => {
    const chunks: Buffer[] = [];
    const child = spawn(program, args, { stdio: ["inherit", "pipe", "pipe"] });
    child.stdout.on("data", (chunk: Buffer) => chunks.push(chunk));
    child.stderr.on("data", (chunk: Buffer) => chunks.push(chunk));
    child.on("error", (err) =>
      resolve({ error: isNotFound(err) ? "not-found" : "failed", message: err.message })
    );
    child.on("close", (code) =>
      resolve({ code: code ?? 1, output: Buffer.concat(chunks).toString("utf8").trimEnd() })
    );
  });

export const launchDetached: AppLauncher = (app) =>
  new Promise((resolve) => {
    const child = spawn(app, [], { detached: true, stdio: "ignore" });
    child.on("error", (err) =>
      resolve(isNotFound(err) ? failure(`${app}: command not found`, 127) : failure(err.message, 1))
    );
    child.on("spawn", () => {
      child.unref();
      resolve(success(`launching ${app}`));
    });
  });

/** True when an executable with this name is on PATH. */
export const onPath = (program: string, pathEnv = process.env.PATH ?? ""): boolean =>
  pathEnv
    .split(delimiter)
    .filter(Boolean)
    .some((dir) => {
      try {
        accessSync(join(dir, program), constants.X_OK);
        return true;
      } catch {
        return false;
      }
    });

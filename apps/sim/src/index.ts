#!/usr/bin/env node
import "dotenv/config";
import { createInterface } from "readline";
import { parseArgs } from "util";
import { createLogger, loadEnv } from "../../../packages/shared/src";
import { translatorFromEnv } from "../../../packages/resolver/src";
import { SimulatorSession } from "../../../packages/simulator/src";
import { ReplSession } from "./session";

const main = async (): Promise<void> => {
  const env = loadEnv();
  const { values } = parseArgs({
    options: {
      scenario: { type: "string", multiple: true },
      offline: { type: "boolean" },
      verbose: { type: "boolean", short: "v" },
    },
  });
  const logger = createLogger(env.PACWARDEN_LOG_LEVEL, "pacwarden-sim");
  const repl = new ReplSession({
    session: new SimulatorSession({ scenarios: values.scenario ?? [] }),
    translator: translatorFromEnv(env),
    logger,
    offline: values.offline === true,
    verbose: values.verbose === true,
  });

  const rl = createInterface({ input: process.stdin, output: process.stdout, prompt: "sim> " });
  rl.prompt();
  for await (const line of rl) {
    const reply = await repl.handle(line);
    reply.lines.forEach((out) => console.log(out));
    if (reply.done) break;
    rl.prompt();
  }
  rl.close();
};

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});

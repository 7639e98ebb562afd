import { failure, Outcome } from "../../../shared/src";
import { SystemState } from "../state";

export type Invocation = {
  program: string;
  args: string[];
  elevated: boolean;
};

export type Emulator = (invocation: Invocation, state: SystemState) => Outcome;

export const unknownSubcommand = (program: string, subcommand: string | undefined): Outcome =>
  failure(`${program}: unknown subcommand '${subcommand ?? ""}'`, 1);

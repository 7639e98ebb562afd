export * from "./catalog";
export * from "./state";
export * from "./dispatch";
export * from "./scenarios";
export * from "./session";
export type { Emulator, Invocation } from "./emulators/types";

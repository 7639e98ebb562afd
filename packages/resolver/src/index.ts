export * from "./rules";
export * from "./translator";
export * from "./resolver";

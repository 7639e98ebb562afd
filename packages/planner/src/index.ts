export * from "./synthesizer";
export * from "./planner";

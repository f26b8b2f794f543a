export * from "./cluster";
export * from "./report";
export * from "./stats";

export * from "./calendar";
export * from "./computer-stats";
export * from "./concurrency";
export * from "./occupancy";
export * from "./report";
export * from "./weekday";
export * from "./window";

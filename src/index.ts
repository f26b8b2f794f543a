export * from "./cluster";
export * from "./config";
export * from "./feed";
export * from "./stats";
export * from "./types";
export { formatDuration, parseWindow, roundHalfEven, roundTo } from "./utils";

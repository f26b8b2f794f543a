export * from "./fetch";
export * from "./payload";
export * from "./read";

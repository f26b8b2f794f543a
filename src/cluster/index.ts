export * from "./build";
export * from "./cluster";
export * from "./computer";
export * from "./host";
export * from "./session";

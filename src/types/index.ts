export * from "./models";
export * from "./errors";

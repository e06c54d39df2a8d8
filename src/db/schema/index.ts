export * from "./logs.js";
export * from "./system.js";

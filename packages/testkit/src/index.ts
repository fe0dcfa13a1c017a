export * from "./http.js";
export * from "./logs.js";
export * from "./text.js";
export * from "./cli.js";

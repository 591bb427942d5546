export * from "./plan.js";
export * from "./error.js";

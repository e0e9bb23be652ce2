export * from "./types.js";
export * from "./schemas.js";
export * from "./two-factor.js";
export * from "./rate-limit.js";

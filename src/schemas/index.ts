export * from "./bundle.js";
export * from "./config.js";

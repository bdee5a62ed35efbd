export * from "./composer.js";

export * from "./logger/index.js";

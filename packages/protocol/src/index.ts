export * from "./identifiers.js";
export * from "./protocol.js";

export * from "./code.js";
export * from "./event.js";
export * from "./errors.js";
export * from "./scanner.js";
export * from "./subnegotiation.js";
export * from "./negotiation.js";
export * from "./encoder.js";
export * from "./connection.js";
export * from "./stream.js";

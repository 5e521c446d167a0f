export * from "./geometry.js";
export * from "./options.js";
export * from "./quantity.js";

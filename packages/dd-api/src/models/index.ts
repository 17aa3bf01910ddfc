export * from "./audit.js";
export * from "./ciVisibility.js";
export * from "./common.js";
export * from "./events.js";
export * from "./incidents.js";
export * from "./logs.js";
export * from "./rum.js";
export * from "./securityMonitoring.js";

export * from "./types.js";
export * from "./errors.js";
export * from "./schemas.js";
export { HOME_CARRIER, createRoute, deriveInterchange, deriveInterchanges } from "./route.js";
export type { RouteFields } from "./route.js";

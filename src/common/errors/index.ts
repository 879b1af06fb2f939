/**
 * Central export for the failure model shared by every resource module.
 */
export * from "./app.exception";
export * from "./error-mapper";
export * from "./failure";
export type * from "./problem-details.interface";

/**
 * ZeroNorth Infrastructure Layer - Public API
 *
 * Typed access to the ZeroNorth REST API for operator scripts
 */

export * from "./types";
export * from "./errors";
export * from "./client";
export * from "./resolvers";
export * from "./jobs/job-driver";
export * from "./payloads";
export * from "./repositories";

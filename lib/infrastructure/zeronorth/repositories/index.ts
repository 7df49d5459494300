/**
 * ZeroNorth Repositories - Public API
 */

export * from "./resource-repository.interface";
export * from "./resource-repository.impl";
export * from "./factory";

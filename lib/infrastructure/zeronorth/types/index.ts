export * from "./api-responses";
export * from "./domain-models";

export * from "./name-resolver";
export * from "./resource-upsert";

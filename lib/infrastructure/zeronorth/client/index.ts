export * from "./http-client";
export * from "./list-api-client";
export * from "./response-classifier";

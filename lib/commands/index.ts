export * from "./run-script";
export * from "./create-target-and-policy";
export * from "./upload-issues";
export * from "./run-policy";
export * from "./fail-job";
export * from "./rename-resource";
export * from "./apply-target-tags";
export * from "./create-application-with-target";
export * from "./export-targets";
export * from "./export-policies";
export * from "./export-synthetic-issues";
export * from "./list-users";
export * from "./manage-secret";
export * from "./delete-schedules";
export * from "./clean-onprem-jobs";
export * from "./list-jobs";
export * from "./replay-notifications";

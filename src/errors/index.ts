export * from "./configuration.error";
export * from "./directory-operation.error";
export * from "./invalid-usage.error";
export * from "./missing-data-source.error";
export * from "./model-not-found.error";
export * from "./multiple-objects-found.error";

// Configuration
export * from "./config";
export * from "./types";

// Contracts
export * from "./contracts";

// Errors
export * from "./errors";

// Data Source
export * from "./data-source/data-source";
export * from "./data-source/data-source-registry";

// Query
export * from "./query/escaped-value";
export * from "./query/filter-grammar";
export * from "./query/model-query-builder";
export * from "./query/query-builder";

// Model
export * from "./model/collection";
export * from "./model/directory-capabilities";
export * from "./model/guid";
export * from "./model/model";
export * from "./model/timestamp";

// Relations
export * from "./relations";

// Bundled models
export * from "./models";

// LDAP Driver
export * from "./drivers/ldap";

// Utils
export * from "./utils/connect-to-directory";
export * from "./utils/debug-log";

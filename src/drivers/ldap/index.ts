export * from "./ldap-driver";
export * from "./types";
export * from "./validate-options";

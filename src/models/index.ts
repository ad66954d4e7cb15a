export * as ActiveDirectory from "./active-directory";
export * from "./entry";
export * as OpenLdap from "./openldap";

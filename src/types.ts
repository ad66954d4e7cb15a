import type { DirectoryErrorKind } from "./errors/directory-operation.error";

/**
 * Debug level
 * Could be one of the following values: `error`, `warn`, `info`
 */
export type DebugLevel = "error" | "warn" | "info";

/**
 * Rule describing which directory errors a relation mutation treats as
 * "already satisfied" instead of a failure.
 */
export type BypassRule = {
  /**
   * Structured error kinds reported by the driver
   */
  kinds: DirectoryErrorKind[];
  /**
   * Case-insensitive substrings of the server error message
   */
  messages: string[];
};

export type DirectoryConfigurations = {
  /**
   * Debug level
   * @default `warn`
   */
  debugLevel: DebugLevel;
  /**
   * Default page size used by relations when fetching related entries
   *
   * @default 1000
   */
  pageSize: number;
  /**
   * Benign error rules for relation mutations
   */
  bypass: {
    attach: BypassRule;
    detach: BypassRule;
  };
};

/**
 * A single attribute value as returned by the directory.
 * Binary attributes (GUIDs, SIDs) are kept as buffers.
 */
export type AttributeValue = string | Buffer;

/**
 * Attribute map of an entry, keyed by attribute name.
 */
export type EntryAttributes = Record<string, AttributeValue[]>;

/**
 * Raw entry returned by a driver search.
 */
export type DirectoryEntry = {
  dn: string;
  attributes: EntryAttributes;
};

/**
 * Directory server family a model talks to.
 */
export type DirectoryType = "active-directory" | "openldap" | "generic";

/**
 * Capabilities that differ between directory server families.
 */
export type DirectoryCapabilities = {
  /**
   * Server implements the ambiguous name resolution matching rule
   */
  anr: boolean;
  /**
   * Server stores the GUID key as binary and expects it hex-escaped in filters
   */
  binaryGuid: boolean;
};

/**
 * How a date attribute is stored on the server.
 *
 * - `ldap`: generalized time, `20240131093000Z`
 * - `windows`: generalized time with fraction, `20240131093000.0Z`
 * - `windows-int`: 100-nanosecond intervals since 1601-01-01
 */
export type DateType = "ldap" | "windows" | "windows-int";

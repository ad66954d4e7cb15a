import type { AttributeValue, DirectoryEntry } from "../types";

/** Supported driver lifecycle events. */
export type DriverEvent = "connected" | "disconnected" | string;

/** Listener signature for driver lifecycle events. */
export type DriverEventListener = (...args: unknown[]) => void;

/**
 * Search depth relative to the base DN.
 *
 * - `base`: only the base entry itself
 * - `one`: direct children of the base entry
 * - `sub`: the base entry and its whole subtree
 */
export type SearchScope = "base" | "one" | "sub";

/** Options of a single directory search. */
export type SearchOptions = {
  /** DN the search is rooted at. */
  baseDn: string;
  /** Search depth. */
  scope: SearchScope;
  /** Compiled, escaped LDAP filter. */
  filter: string;
  /** Attributes to return, `*` for all user attributes. */
  attributes: string[];
  /** Maximum number of entries the server should return (0 = unlimited). */
  sizeLimit?: number;
  /** Request the results through the paged results control. */
  paged?: {
    pageSize: number;
  };
};

/** A single attribute modification. */
export type AttributeChange = {
  operation: "add" | "delete" | "replace";
  attribute: string;
  values: AttributeValue[];
};

/**
 * Contract every directory driver must implement.
 *
 * Failures are reported as `DirectoryOperationError` so callers can match
 * on the structured error kind.
 */
export interface DirectoryDriverContract {
  /** Driver name (e.g. "ldap"). */
  readonly name: string;

  /** Whether the driver holds a bound connection. */
  readonly isConnected: boolean;

  /** Open and bind the connection. */
  connect(): Promise<void>;

  /** Unbind and close the connection. */
  disconnect(): Promise<void>;

  /** Execute a search and return the matched entries in server order. */
  search(options: SearchOptions): Promise<DirectoryEntry[]>;

  /** Apply attribute modifications to an existing entry. */
  modify(dn: string, changes: AttributeChange[]): Promise<void>;

  /** Register a lifecycle listener. */
  on(event: DriverEvent, listener: DriverEventListener): void;
}

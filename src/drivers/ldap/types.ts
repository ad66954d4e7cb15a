import type { ConnectionOptions as TlsOptions } from "node:tls";

/**
 * LDAP driver options.
 */
export type LdapDriverOptions = {
  /**
   * Full server URL, takes precedence over `host` / `port` / `useTls`.
   *
   * @example "ldaps://dc01.acme.test:636"
   */
  url?: string;
  /**
   * @default "localhost"
   */
  host?: string;
  /**
   * @default 389, or 636 with `useTls`
   */
  port?: number;
  /**
   * Connect over `ldaps://`.
   */
  useTls?: boolean;
  /**
   * Upgrade a plain connection with StartTLS before binding.
   */
  useStartTls?: boolean;
  /**
   * DN to bind with, an anonymous bind is used when omitted.
   */
  username?: string | null;
  password?: string | null;
  /**
   * Operation timeout in milliseconds.
   */
  timeout?: number;
  /**
   * Options passed to the TLS socket.
   */
  tlsOptions?: TlsOptions;
  /**
   * Attributes returned as raw bytes.
   *
   * @default ["objectguid", "objectsid"]
   */
  binaryAttributes?: string[];
};

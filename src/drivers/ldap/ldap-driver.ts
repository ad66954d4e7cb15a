import { colors } from "@mongez/copper";
import { log } from "@warlock.js/logger";
import { Attribute, Change, Client, ResultCodeError } from "ldapts";
import { EventEmitter } from "node:events";
import type {
  AttributeChange,
  DirectoryDriverContract,
  DriverEvent,
  DriverEventListener,
  SearchOptions,
} from "../../contracts";
import { DirectoryOperationError } from "../../errors/directory-operation.error";
import type { AttributeValue, DirectoryEntry, EntryAttributes } from "../../types";
import type { LdapDriverOptions } from "./types";
import { validateConnectionOptions } from "./validate-options";

const DEFAULT_BINARY_ATTRIBUTES = ["objectguid", "objectsid"];

/**
 * Convert a raw attribute value of a search entry into a value list.
 */
function toAttributeValues(value: string | string[] | Buffer | Buffer[]): AttributeValue[] {
  return Array.isArray(value) ? [...value] : [value];
}

/**
 * Build the attribute of a modification. Values are sent as buffers as
 * soon as one of them is binary.
 */
function toAttribute(type: string, values: AttributeValue[]): Attribute {
  const strings = values.filter((value): value is string => typeof value === "string");

  if (strings.length === values.length) {
    return new Attribute({ type, values: strings });
  }

  return new Attribute({
    type,
    values: values.map((value) => (typeof value === "string" ? Buffer.from(value) : value)),
  });
}

/**
 * Directory driver speaking LDAP through the `ldapts` client.
 *
 * @example
 * ```typescript
 * const driver = new LdapDriver({
 *   url: "ldaps://dc01.acme.test",
 *   username: "cn=reader,dc=acme,dc=test",
 *   password: "test-secret",
 * });
 *
 * await driver.connect();
 * ```
 */
export class LdapDriver implements DirectoryDriverContract {
  public readonly name = "ldap";

  private readonly events = new EventEmitter();

  private client?: Client;

  private connected = false;

  public constructor(private readonly options: LdapDriverOptions = {}) {
    validateConnectionOptions(options);
  }

  public get isConnected(): boolean {
    return this.connected;
  }

  /**
   * Connect and bind with the configured credentials.
   */
  public async connect(): Promise<void> {
    if (this.connected) {
      return;
    }

    const url = this.resolveUrl();

    const client = new Client({
      url,
      timeout: this.options.timeout,
      connectTimeout: this.options.timeout,
      tlsOptions: this.options.tlsOptions,
    });

    try {
      log.info(
        "directory.ldap",
        "connection",
        `Connecting to ${colors.bold(colors.yellowBright(url))}`,
      );

      if (this.options.useStartTls) {
        await client.startTLS(this.options.tlsOptions ?? {});
      }

      if (this.options.username) {
        await client.bind(this.options.username, this.options.password ?? "");
      }

      this.client = client;
      this.connected = true;

      log.success("directory.ldap", "connection", "Bound to directory");

      this.emit("connected");
    } catch (error) {
      await client.unbind().catch(() => undefined);
      this.emit("disconnected");

      const failure = this.toDirectoryError(error);

      log.error("directory.ldap", "connection", `Failed to bind: ${failure.message}`);

      throw failure;
    }
  }

  /**
   * Unbind and close the connection.
   */
  public async disconnect(): Promise<void> {
    if (!this.client) {
      return;
    }

    try {
      await this.client.unbind();
    } finally {
      this.client = undefined;
      this.connected = false;
      this.emit("disconnected");
      log.warn("directory.ldap", "connection", "Disconnected from directory");
    }
  }

  public on(event: DriverEvent, listener: DriverEventListener): void {
    this.events.on(event, listener);
  }

  /**
   * Run a search. A search rooted at a missing entry has no results.
   */
  public async search(options: SearchOptions): Promise<DirectoryEntry[]> {
    try {
      return await this.runSearch(options);
    } catch (error) {
      if (error instanceof DirectoryOperationError && error.isKind("no-such-object")) {
        return [];
      }

      throw error;
    }
  }

  public async modify(dn: string, changes: AttributeChange[]): Promise<void> {
    const client = this.getClient();

    await this.attempt(() =>
      client.modify(
        dn,
        changes.map(
          (change) =>
            new Change({
              operation: change.operation,
              modification: toAttribute(change.attribute, change.values),
            }),
        ),
      ),
    );
  }

  private async runSearch(options: SearchOptions): Promise<DirectoryEntry[]> {
    const client = this.getClient();

    const { searchEntries } = await this.attempt(() =>
      client.search(options.baseDn, {
        scope: options.scope,
        filter: options.filter,
        attributes: options.attributes,
        sizeLimit: options.sizeLimit ?? 0,
        paged: options.paged ? { pageSize: options.paged.pageSize } : false,
        explicitBufferAttributes: this.options.binaryAttributes ?? DEFAULT_BINARY_ATTRIBUTES,
      }),
    );

    return searchEntries.map((entry) => {
      const attributes: EntryAttributes = {};

      for (const [key, value] of Object.entries(entry)) {
        if (key === "dn") continue;

        attributes[key.toLowerCase()] = toAttributeValues(value);
      }

      return { dn: entry.dn, attributes };
    });
  }

  /**
   * Run a client call, reporting failures as directory errors.
   */
  private async attempt<T>(operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      throw this.toDirectoryError(error);
    }
  }

  private toDirectoryError(error: unknown): DirectoryOperationError {
    if (error instanceof DirectoryOperationError) {
      return error;
    }

    if (error instanceof ResultCodeError) {
      return new DirectoryOperationError(error.message, { code: error.code, cause: error });
    }

    const message = error instanceof Error ? error.message : String(error);

    return new DirectoryOperationError(message, { cause: error });
  }

  private getClient(): Client {
    if (!this.client || !this.connected) {
      throw new DirectoryOperationError("The LDAP driver is not connected.");
    }

    return this.client;
  }

  private resolveUrl(): string {
    if (this.options.url) {
      return this.options.url;
    }

    const protocol = this.options.useTls ? "ldaps" : "ldap";
    const host = this.options.host ?? "localhost";
    const port = this.options.port ?? (this.options.useTls ? 636 : 389);

    return `${protocol}://${host}:${port}`;
  }

  private emit(event: DriverEvent, ...args: unknown[]): void {
    this.events.emit(event, ...args);
  }
}

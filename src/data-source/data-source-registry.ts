import { EventEmitter } from "node:events";
import { MissingDataSourceError } from "../errors/missing-data-source.error";
import { DataSource, type DataSourceOptions } from "./data-source";

/**
 * Registry events.
 *
 * `connected` and `disconnected` are re-emitted from the driver of each
 * registered data source.
 */
export type DataSourceRegistryEvent =
  | "registered"
  | "unregistered"
  | "default-registered"
  | "connected"
  | "disconnected";

export type DataSourceRegistryListener = (dataSource: DataSource) => void;

/**
 * Reference to a data source as models declare it: an instance, a
 * registered name, or nothing for the default one.
 */
export type DataSourceReference = DataSource | string | undefined;

/**
 * Named directory connections shared by every model.
 */
class DataSourceRegistry {
  private readonly sources = new Map<string, DataSource>();

  private defaultName?: string;

  private readonly events = new EventEmitter();

  /**
   * Register a directory connection.
   *
   * The first registered source becomes the default unless a later one is
   * flagged with `isDefault`. Registering an existing name replaces it.
   */
  public register(options: DataSourceOptions): DataSource {
    const dataSource = new DataSource(options);
    const becomesDefault = dataSource.isDefault || this.defaultName === undefined;

    this.sources.set(dataSource.name, dataSource);

    if (becomesDefault) {
      this.defaultName = dataSource.name;
    }

    dataSource.driver.on("connected", () => this.events.emit("connected", dataSource));
    dataSource.driver.on("disconnected", () => this.events.emit("disconnected", dataSource));

    this.events.emit("registered", dataSource);

    if (becomesDefault) {
      this.events.emit("default-registered", dataSource);
    }

    return dataSource;
  }

  /**
   * Remove a data source, disconnecting its driver first.
   *
   * When the default one is removed, the earliest remaining source takes
   * its place.
   */
  public async unregister(name: string): Promise<void> {
    const dataSource = this.get(name);

    if (dataSource.driver.isConnected) {
      await dataSource.driver.disconnect();
    }

    this.sources.delete(name);

    if (this.defaultName === name) {
      this.defaultName = this.sources.keys().next().value;
    }

    this.events.emit("unregistered", dataSource);
  }

  /**
   * Forget every data source without touching their connections.
   */
  public clear(): void {
    this.defaultName = undefined;
    this.sources.clear();
  }

  /**
   * @example
   * ```typescript
   * dataSourceRegistry.on("connected", (dataSource) => {
   *   log.info("directory", "connection", `${dataSource.name} is bound to ${dataSource.baseDn}`);
   * });
   * ```
   */
  public on(event: DataSourceRegistryEvent, listener: DataSourceRegistryListener): void {
    this.events.on(event, listener);
  }

  public once(event: DataSourceRegistryEvent, listener: DataSourceRegistryListener): void {
    this.events.once(event, listener);
  }

  public off(event: DataSourceRegistryEvent, listener: DataSourceRegistryListener): void {
    this.events.off(event, listener);
  }

  /**
   * Get a data source by name, or the default one.
   *
   * @throws MissingDataSourceError
   */
  public get(name?: string): DataSource {
    const lookup = name ?? this.defaultName;

    if (lookup === undefined) {
      throw new MissingDataSourceError("No default data source registered.");
    }

    const dataSource = this.sources.get(lookup);

    if (!dataSource) {
      throw new MissingDataSourceError(`Data source "${lookup}" is not registered.`, lookup);
    }

    return dataSource;
  }

  /**
   * Resolve a model's data source reference.
   */
  public resolve(reference: DataSourceReference): DataSource {
    return reference instanceof DataSource ? reference : this.get(reference);
  }

  public has(name: string): boolean {
    return this.sources.has(name);
  }

  public getAllDataSources(): DataSource[] {
    return [...this.sources.values()];
  }

  /**
   * Connect every driver that is not connected yet.
   */
  public async connectAll(): Promise<void> {
    for (const dataSource of this.sources.values()) {
      if (!dataSource.driver.isConnected) {
        await dataSource.driver.connect();
      }
    }
  }

  /**
   * Disconnect every connected driver.
   */
  public async disconnectAll(): Promise<void> {
    for (const dataSource of this.sources.values()) {
      if (dataSource.driver.isConnected) {
        await dataSource.driver.disconnect();
      }
    }
  }
}

export const dataSourceRegistry = new DataSourceRegistry();

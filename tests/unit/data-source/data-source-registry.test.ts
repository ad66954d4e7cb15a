import { beforeEach, describe, expect, it, vi } from "vitest";
import { DataSource } from "../../../src/data-source/data-source";
import { dataSourceRegistry } from "../../../src/data-source/data-source-registry";
import { MissingDataSourceError } from "../../../src/errors/missing-data-source.error";
import { InMemoryDirectoryDriver } from "../../helpers/in-memory-directory-driver";

describe("DataSourceRegistry", () => {
  beforeEach(() => {
    dataSourceRegistry.clear();
  });

  describe("register()", () => {
    it("should add the data source", () => {
      const dataSource = dataSourceRegistry.register({
        name: "primary",
        driver: new InMemoryDirectoryDriver(),
      });

      expect(dataSource).toBeInstanceOf(DataSource);
      expect(dataSourceRegistry.has("primary")).toBe(true);
      expect(dataSourceRegistry.get("primary")).toBe(dataSource);
    });

    it("should use the first source as default", () => {
      const first = dataSourceRegistry.register({
        name: "first",
        driver: new InMemoryDirectoryDriver(),
      });

      dataSourceRegistry.register({ name: "second", driver: new InMemoryDirectoryDriver() });

      expect(dataSourceRegistry.get()).toBe(first);
    });

    it("should respect an explicit default", () => {
      dataSourceRegistry.register({ name: "first", driver: new InMemoryDirectoryDriver() });

      const second = dataSourceRegistry.register({
        name: "second",
        driver: new InMemoryDirectoryDriver(),
        isDefault: true,
      });

      expect(dataSourceRegistry.get()).toBe(second);
    });

    it("should emit registration events", () => {
      const registered = vi.fn();
      const defaultRegistered = vi.fn();

      dataSourceRegistry.once("registered", registered);
      dataSourceRegistry.once("default-registered", defaultRegistered);

      const dataSource = dataSourceRegistry.register({
        name: "primary",
        driver: new InMemoryDirectoryDriver(),
      });

      expect(registered).toHaveBeenCalledWith(dataSource);
      expect(defaultRegistered).toHaveBeenCalledWith(dataSource);
    });

    it("should re-emit driver connection events", async () => {
      const driver = new InMemoryDirectoryDriver();
      const connected = vi.fn();
      const disconnected = vi.fn();

      dataSourceRegistry.on("connected", connected);
      dataSourceRegistry.on("disconnected", disconnected);

      const dataSource = dataSourceRegistry.register({ name: "primary", driver });

      await driver.connect();
      await driver.disconnect();

      dataSourceRegistry.off("connected", connected);
      dataSourceRegistry.off("disconnected", disconnected);

      expect(connected).toHaveBeenCalledWith(dataSource);
      expect(disconnected).toHaveBeenCalledWith(dataSource);
    });
  });

  describe("get()", () => {
    it("should throw for an unknown name", () => {
      expect(() => dataSourceRegistry.get("missing")).toThrow(MissingDataSourceError);
      expect(() => dataSourceRegistry.get("missing")).toThrow(
        'Data source "missing" is not registered.',
      );
    });

    it("should throw without a default source", () => {
      expect(() => dataSourceRegistry.get()).toThrow("No default data source registered.");
    });
  });

  it("should list every data source", () => {
    const first = dataSourceRegistry.register({
      name: "first",
      driver: new InMemoryDirectoryDriver(),
    });
    const second = dataSourceRegistry.register({
      name: "second",
      driver: new InMemoryDirectoryDriver(),
    });

    expect(dataSourceRegistry.getAllDataSources()).toEqual([first, second]);
  });

  it("should disconnect connected drivers", async () => {
    const connectedDriver = new InMemoryDirectoryDriver();
    const idleDriver = new InMemoryDirectoryDriver();
    const disconnect = vi.spyOn(idleDriver, "disconnect");

    dataSourceRegistry.register({ name: "connected", driver: connectedDriver });
    dataSourceRegistry.register({ name: "idle", driver: idleDriver });

    await connectedDriver.connect();
    await dataSourceRegistry.disconnectAll();

    expect(connectedDriver.isConnected).toBe(false);
    expect(disconnect).not.toHaveBeenCalled();
  });

  it("should resolve model references", () => {
    const primary = dataSourceRegistry.register({
      name: "primary",
      driver: new InMemoryDirectoryDriver(),
    });
    const detached = new DataSource({ name: "detached", driver: new InMemoryDirectoryDriver() });

    expect(dataSourceRegistry.resolve(undefined)).toBe(primary);
    expect(dataSourceRegistry.resolve("primary")).toBe(primary);
    expect(dataSourceRegistry.resolve(detached)).toBe(detached);
  });

  describe("unregister()", () => {
    it("should disconnect and hand the default over", async () => {
      const driver = new InMemoryDirectoryDriver();
      const unregistered = vi.fn();

      dataSourceRegistry.register({ name: "first", driver });

      const second = dataSourceRegistry.register({
        name: "second",
        driver: new InMemoryDirectoryDriver(),
      });

      dataSourceRegistry.once("unregistered", unregistered);

      await driver.connect();
      await dataSourceRegistry.unregister("first");

      expect(driver.isConnected).toBe(false);
      expect(dataSourceRegistry.has("first")).toBe(false);
      expect(dataSourceRegistry.get()).toBe(second);
      expect(unregistered).toHaveBeenCalledTimes(1);
    });

    it("should leave no default once the last source is gone", async () => {
      dataSourceRegistry.register({ name: "only", driver: new InMemoryDirectoryDriver() });

      await dataSourceRegistry.unregister("only");

      expect(() => dataSourceRegistry.get()).toThrow("No default data source registered.");
    });

    it("should reject unknown names", async () => {
      await expect(dataSourceRegistry.unregister("missing")).rejects.toThrow(
        MissingDataSourceError,
      );
    });
  });

  it("should connect idle drivers", async () => {
    const connectedDriver = new InMemoryDirectoryDriver();
    const idleDriver = new InMemoryDirectoryDriver();
    const connect = vi.spyOn(connectedDriver, "connect");

    dataSourceRegistry.register({ name: "connected", driver: connectedDriver });
    dataSourceRegistry.register({ name: "idle", driver: idleDriver });

    await connectedDriver.connect();
    await dataSourceRegistry.connectAll();

    expect(idleDriver.isConnected).toBe(true);
    expect(connect).toHaveBeenCalledTimes(1);
  });
});

import { describe, expect, it } from "vitest";
import { ConfigurationError } from "../../../src/errors/configuration.error";
import {
  DirectoryOperationError,
  kindFromResultCode,
} from "../../../src/errors/directory-operation.error";
import { InvalidUsageError } from "../../../src/errors/invalid-usage.error";
import { MissingDataSourceError } from "../../../src/errors/missing-data-source.error";
import { ModelNotFoundError } from "../../../src/errors/model-not-found.error";
import { MultipleObjectsFoundError } from "../../../src/errors/multiple-objects-found.error";

describe("DirectoryOperationError", () => {
  it("should resolve the kind from the result code", () => {
    const error = new DirectoryOperationError("Attribute or value exists", { code: 20 });

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe("DirectoryOperationError");
    expect(error.code).toBe(20);
    expect(error.kind).toBe("already-exists");
  });

  it("should prefer an explicit kind", () => {
    const error = new DirectoryOperationError("Busy", { code: 51, kind: "unwilling-to-perform" });

    expect(error.kind).toBe("unwilling-to-perform");
  });

  it("should keep the cause", () => {
    const cause = new Error("socket closed");
    const error = new DirectoryOperationError("socket closed", { cause });

    expect(error.cause).toBe(cause);
    expect(error.kind).toBe("unknown");
  });

  it("should match any of the given kinds", () => {
    const error = new DirectoryOperationError("Server is unwilling to perform", { code: 53 });

    expect(error.isKind("already-exists", "unwilling-to-perform")).toBe(true);
    expect(error.isKind("no-such-object")).toBe(false);
  });

  it("should map known result codes", () => {
    expect(kindFromResultCode(4)).toBe("size-limit-exceeded");
    expect(kindFromResultCode(16)).toBe("no-such-attribute");
    expect(kindFromResultCode(32)).toBe("no-such-object");
    expect(kindFromResultCode(49)).toBe("invalid-credentials");
    expect(kindFromResultCode(68)).toBe("already-exists");
    expect(kindFromResultCode(80)).toBe("unknown");
    expect(kindFromResultCode()).toBe("unknown");
  });
});

describe("ModelNotFoundError", () => {
  it("should have a default message", () => {
    const error = new ModelNotFoundError();

    expect(error.message).toBe("No directory entry was found.");
    expect(error.name).toBe("ModelNotFoundError");
  });

  it("should describe the failed query", () => {
    const error = ModelNotFoundError.forQuery("(cn=jdoe)", "dc=acme,dc=test");

    expect(error.message).toBe(
      "No directory results for filter: [(cn=jdoe)] in: [dc=acme,dc=test]",
    );
    expect(error.query).toBe("(cn=jdoe)");
    expect(error.baseDn).toBe("dc=acme,dc=test");
  });

  it("should describe a query without a base", () => {
    expect(ModelNotFoundError.forQuery("(cn=jdoe)").message).toBe(
      "No directory results for filter: [(cn=jdoe)] in: []",
    );
  });
});

describe("MultipleObjectsFoundError", () => {
  it("should describe the query when given", () => {
    const error = new MultipleObjectsFoundError("(sn=Doe)", "dc=acme,dc=test");

    expect(error.message).toBe(
      "Multiple directory results for filter: [(sn=Doe)] in: [dc=acme,dc=test]",
    );
    expect(error.name).toBe("MultipleObjectsFoundError");
  });

  it("should have a generic message otherwise", () => {
    expect(new MultipleObjectsFoundError().message).toBe("Multiple directory entries were found.");
  });
});

describe("ConfigurationError", () => {
  it("should name the invalid option", () => {
    const error = new ConfigurationError("Option port must be a positive integer.", "port");

    expect(error.option).toBe("port");
    expect(error.name).toBe("ConfigurationError");
  });
});

describe("InvalidUsageError", () => {
  it("should keep the message", () => {
    const error = new InvalidUsageError("Attribute cn is not a date.");

    expect(error).toBeInstanceOf(Error);
    expect(error.message).toBe("Attribute cn is not a date.");
    expect(error.name).toBe("InvalidUsageError");
  });
});

describe("MissingDataSourceError", () => {
  it("should name the missing data source", () => {
    const error = new MissingDataSourceError('Data source "primary" is not registered.', "primary");

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe("MissingDataSourceError");
    expect(error.dataSourceName).toBe("primary");
    expect(error.stack).toContain("MissingDataSourceError");
  });

  it("should have no name when the default one is missing", () => {
    expect(new MissingDataSourceError("No default data source registered.").dataSourceName)
      .toBeUndefined();
  });
});

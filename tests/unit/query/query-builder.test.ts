import { beforeEach, describe, expect, it } from "vitest";
import type { DataSource } from "../../../src/data-source/data-source";
import { InvalidUsageError } from "../../../src/errors/invalid-usage.error";
import { QueryBuilder } from "../../../src/query/query-builder";
import { BASE_DN, setupDirectory } from "../../helpers/directory";
import type { InMemoryDirectoryDriver } from "../../helpers/in-memory-directory-driver";

const USERS_OU = `ou=Users,${BASE_DN}`;

describe("QueryBuilder", () => {
  let driver: InMemoryDirectoryDriver;
  let dataSource: DataSource;

  beforeEach(() => {
    ({ driver, dataSource } = setupDirectory());

    driver
      .seed(USERS_OU, { objectclass: ["top", "organizationalunit"], ou: "Users" })
      .seed(`cn=John Doe,${USERS_OU}`, {
        objectclass: ["top", "person"],
        cn: "John Doe",
        sn: "Doe",
        mail: "john@acme.test",
      })
      .seed(`cn=Jane Doe,${USERS_OU}`, {
        objectclass: ["top", "person"],
        cn: "Jane Doe",
        sn: "Doe",
      })
      .seed(`cn=Nested,cn=John Doe,${USERS_OU}`, { objectclass: ["top", "person"], cn: "Nested" });
  });

  const query = () => new QueryBuilder(dataSource);

  describe("where clauses", () => {
    it("should escape every byte of where values", () => {
      const builder = query().whereEquals("cn", "John");

      expect(builder.getQuery()).toBe("(cn=\\4a\\6f\\68\\6e)");
      expect(builder.getUnescapedQuery()).toBe("(cn=John)");
    });

    it("should treat two arguments as an equality", () => {
      expect(query().where("cn", "John").getUnescapedQuery()).toBe("(cn=John)");
    });

    it("should treat presence operators as taking no value", () => {
      expect(query().where("mail", "*").getUnescapedQuery()).toBe("(mail=*)");
      expect(query().whereNotHas("mail").getUnescapedQuery()).toBe("(!(mail=*))");
    });

    it("should add one equality per condition", () => {
      const builder = query().where({ cn: "John", sn: "Doe" });

      expect(builder.getUnescapedQuery()).toBe("(&(cn=John)(sn=Doe))");
    });

    it("should normalize booleans and numbers", () => {
      const builder = query().whereEquals("enabled", true).whereEquals("uidnumber", 1000);

      expect(builder.getUnescapedQuery()).toBe("(&(enabled=TRUE)(uidnumber=1000))");
    });

    it("should fold a single where into the OR group", () => {
      const builder = query().whereStartsWith("cn", "Jo").orWhereEquals("sn", "Doe");

      expect(builder.getUnescapedQuery()).toBe("(|(cn=Jo*)(sn=Doe))");
    });

    it("should keep raw values as they are", () => {
      expect(query().whereRaw("cn", "=", "\\4a*").getQuery()).toBe("(cn=\\4a*)");
    });

    it("should build nested groups", () => {
      expect(query().whereIn("cn", ["a", "b"]).getUnescapedQuery()).toBe("(|(cn=a)(cn=b))");

      const negated = query().notFilter((nested) => {
        nested.whereEquals("cn", "a").whereEquals("sn", "b");
      });

      expect(negated.getUnescapedQuery()).toBe("(!(&(cn=a)(sn=b)))");
      expect(query().notFilter((nested) => nested.whereEquals("cn", "a")).getUnescapedQuery()).toBe(
        "(!(cn=a))",
      );
    });

    it("should skip empty nested groups", () => {
      expect(query().andFilter(() => undefined).hasFilters()).toBe(false);
    });

    it("should match between bounds", () => {
      const builder = query().whereBetween("uidnumber", [1000, 2000]);

      expect(builder.getUnescapedQuery()).toBe("(&(uidnumber>=1000)(uidnumber<=2000))");
    });

    it("should reject unknown operators", () => {
      expect(() => query().addWhere("and", "cn", "like", "John")).toThrow(InvalidUsageError);
    });

    it("should require a value for comparisons", () => {
      expect(() => query().addWhere("and", "cn", undefined, undefined)).toThrow(
        "Filter operator [=] on [cn] requires a value.",
      );
    });
  });

  describe("search root and selects", () => {
    it("should default to the base DN", () => {
      expect(query().getDn()).toBe(BASE_DN);
    });

    it("should replace the base placeholder", () => {
      expect(query().setDn("ou=Users,{base}").getDn()).toBe(USERS_OU);
      expect(query().in({ getDn: () => USERS_OU }).getDn()).toBe(USERS_OU);
    });

    it("should always request object classes", () => {
      expect(query().getSelects()).toEqual(["*"]);
      expect(query().select(["cn", "mail"]).getSelects()).toEqual(["cn", "mail", "objectclass"]);
    });

    it("should not duplicate added selects", () => {
      const builder = query().select("cn").addSelect(["cn", "mail"]);

      expect(builder.columns).toEqual(["cn", "mail"]);
    });
  });

  describe("execution", () => {
    it("should search the subtree by default", async () => {
      const entries = await query().whereEquals("objectclass", "person").get();

      expect(entries.map((entry) => entry.dn)).toEqual([
        `cn=John Doe,${USERS_OU}`,
        `cn=Jane Doe,${USERS_OU}`,
        `cn=Nested,cn=John Doe,${USERS_OU}`,
      ]);
      expect(driver.searches[0].scope).toBe("sub");
    });

    it("should list direct children only", async () => {
      const entries = await query()
        .setDn(USERS_OU)
        .listing()
        .whereEquals("objectclass", "person")
        .get(["cn"]);

      expect(entries).toEqual([
        {
          dn: `cn=John Doe,${USERS_OU}`,
          attributes: { objectclass: ["top", "person"], cn: ["John Doe"] },
        },
        {
          dn: `cn=Jane Doe,${USERS_OU}`,
          attributes: { objectclass: ["top", "person"], cn: ["Jane Doe"] },
        },
      ]);
      expect(driver.searches[0]).toMatchObject({
        baseDn: USERS_OU,
        scope: "one",
        attributes: ["cn", "objectclass"],
      });
    });

    it("should only use the given columns for one call", async () => {
      const builder = query();

      await builder.get(["cn"]);

      expect(builder.columns).toBeNull();
    });

    it("should read a single entry", async () => {
      const entry = await query().setDn(`cn=Jane Doe,${USERS_OU}`).read().first();

      expect(entry?.attributes.sn).toEqual(["Doe"]);
      expect(driver.searches[0]).toMatchObject({ scope: "base", sizeLimit: 1 });
    });

    it("should request pages of the given size", async () => {
      await query().whereEquals("sn", "Doe").paginate(50);

      expect(driver.searches[0].paged).toEqual({ pageSize: 50 });
    });

    it("should check existence without limiting the query", async () => {
      const builder = query().whereEquals("sn", "Doe");

      expect(await builder.exists()).toBe(true);
      expect(await query().whereEquals("sn", "Nobody").doesntExist()).toBe(true);
      expect(await query().whereEquals("sn", "Nobody").existsOr(() => "missing")).toBe("missing");
      expect(builder.getLimit()).toBe(0);
    });
  });

  describe("modifications", () => {
    it("should send attribute changes to the driver", async () => {
      await query().insertAttributes(`cn=Jane Doe,${USERS_OU}`, { mail: ["jane@acme.test"] });
      await query().updateAttributes(`cn=Jane Doe,${USERS_OU}`, { sn: ["Smith"] });
      await query().deleteAttributes(`cn=Jane Doe,${USERS_OU}`, { mail: [] });

      expect(driver.modifications.map(({ changes }) => changes[0].operation)).toEqual([
        "add",
        "replace",
        "delete",
      ]);
      expect(driver.entry(`cn=Jane Doe,${USERS_OU}`)?.attributes).toEqual({
        objectclass: ["top", "person"],
        cn: ["Jane Doe"],
        sn: ["Smith"],
      });
    });
  });

  it("should clone the query state", () => {
    const original = query().setDn(USERS_OU).whereEquals("cn", "a");
    const cloned = original.clone().whereEquals("sn", "b");

    expect(original.getUnescapedQuery()).toBe("(cn=a)");
    expect(cloned.getUnescapedQuery()).toBe("(&(cn=a)(sn=b))");
    expect(cloned.getDn()).toBe(USERS_OU);
  });
});

import { beforeEach, describe, expect, it } from "vitest";
import { Group, User } from "../../../src/models/openldap";
import { setupDirectory } from "../../helpers/directory";
import type { InMemoryDirectoryDriver } from "../../helpers/in-memory-directory-driver";

const UUID = "4f2c1a3e-8b7d-4c6e-9f10-2a3b4c5d6e7f";
const USER_DN = "uid=jdoe,ou=People,dc=acme,dc=test";
const GROUP_DN = "cn=developers,ou=Groups,dc=acme,dc=test";

describe("OpenLDAP models", () => {
  let driver: InMemoryDirectoryDriver;

  beforeEach(() => {
    ({ driver } = setupDirectory());

    driver
      .seed(USER_DN, {
        objectclass: ["top", "person", "organizationalperson", "inetorgperson"],
        uid: "jdoe",
        cn: "John Doe",
        entryuuid: UUID,
      })
      .seed(GROUP_DN, {
        objectclass: ["top", "groupofnames"],
        cn: "developers",
        member: USER_DN,
      });
  });

  it("should select the entry UUID", () => {
    expect(User.query().getSelects()).toEqual(["entryuuid", "*"]);
  });

  it("should find users by their string UUID", async () => {
    const user = await User.findByGuid(UUID);

    expect(user?.getDn()).toBe(USER_DN);
    expect(driver.searches[0].filter).toContain(`(entryuuid=${UUID})`);
  });

  it("should fall back to the ANR attributes", async () => {
    const user = await User.query().findByAnr("jdoe");

    expect(user?.getDn()).toBe(USER_DN);
    expect(user?.getCapabilities()).toEqual({ anr: false, binaryGuid: false });
  });

  it("should link users and groups through the group's member attribute", async () => {
    const user = await User.query().findOrFail(USER_DN);

    expect((await user.groups().get()).dns()).toEqual([GROUP_DN]);

    const group = await Group.query().findOrFail(GROUP_DN);

    await user.groups().detach(group);

    expect(driver.entry(GROUP_DN)?.attributes.member).toBeUndefined();
    expect(await user.groups().exists()).toBe(false);
  });
});

import { Model } from "../../model/model";
import type { HasMany } from "../../relations/has-many";
import type { DateType, DirectoryType } from "../../types";
import { Group } from "./group";

/**
 * Active Directory user account.
 *
 * @example
 * ```typescript
 * const user = await User.query().findByAnrOrFail("jdoe");
 *
 * for (const group of await user.groups().get()) {
 *   console.log(group.getName());
 * }
 * ```
 */
export class User extends Model {
  public static objectClasses = ["top", "person", "organizationalperson", "user"];

  public static directoryType: DirectoryType = "active-directory";

  public static dates: Record<string, DateType> = {
    whenchanged: "windows",
    whencreated: "windows",
    accountexpires: "windows-int",
    lastlogon: "windows-int",
    lastlogontimestamp: "windows-int",
    pwdlastset: "windows-int",
  };

  /**
   * Groups listing the user in their `member` attribute.
   */
  public groups(): HasMany<Group> {
    return this.hasMany(Group, "member");
  }
}

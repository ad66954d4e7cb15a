import { Model } from "../../model/model";
import type { HasMany } from "../../relations/has-many";
import type { DateType, DirectoryType } from "../../types";
import { User } from "./user";

/**
 * Active Directory security or distribution group.
 */
export class Group extends Model {
  public static objectClasses = ["top", "group"];

  public static directoryType: DirectoryType = "active-directory";

  public static dates: Record<string, DateType> = {
    whenchanged: "windows",
    whencreated: "windows",
  };

  /**
   * Users and groups whose `memberof` lists this group.
   *
   * `memberof` is maintained by the server, so links are written on the
   * group's `member` attribute.
   */
  public members(): HasMany<Model> {
    return this.hasMany<Model>([Group, User], "memberof").using(this, "member");
  }

  /**
   * Groups this group is nested in.
   */
  public groups(): HasMany<Group> {
    return this.hasMany(Group, "member");
  }
}

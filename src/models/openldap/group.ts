import { Model } from "../../model/model";
import type { HasMany } from "../../relations/has-many";
import type { DateType, DirectoryType } from "../../types";

export class Group extends Model {
  public static objectClasses = ["top", "groupofnames"];

  public static guidKey = "entryuuid";

  public static directoryType: DirectoryType = "openldap";

  public static dates: Record<string, DateType> = {
    createtimestamp: "ldap",
    modifytimestamp: "ldap",
  };

  /**
   * Groups listing this group's DN in their `member` attribute.
   */
  public groups(): HasMany<Group> {
    return this.hasMany(Group, "member");
  }
}

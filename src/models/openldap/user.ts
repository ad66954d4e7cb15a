import { Model } from "../../model/model";
import type { HasMany } from "../../relations/has-many";
import type { DateType, DirectoryType } from "../../types";
import { Group } from "./group";

export class User extends Model {
  public static objectClasses = ["top", "person", "organizationalperson", "inetorgperson"];

  public static guidKey = "entryuuid";

  public static directoryType: DirectoryType = "openldap";

  public static dates: Record<string, DateType> = {
    createtimestamp: "ldap",
    modifytimestamp: "ldap",
  };

  /**
   * Groups listing the user's DN in their `member` attribute.
   */
  public groups(): HasMany<Group> {
    return this.hasMany(Group, "member");
  }
}

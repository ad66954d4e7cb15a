import { Model } from "../../src/model/model";
import type { HasMany } from "../../src/relations/has-many";
import type { DateType } from "../../src/types";

export class Person extends Model {
  public static objectClasses = ["top", "person"];

  public static dates: Record<string, DateType> = {
    whenCreated: "ldap",
    accountExpires: "windows-int",
  };

  public teams(): HasMany<Team> {
    return this.hasMany(Team, "member");
  }
}

export class Team extends Model {
  public static objectClasses = ["top", "groupofnames"];

  public members(): HasMany<Person> {
    return this.hasMany(Person, "memberof").using(this, "member");
  }

  /**
   * Teams listing this team in their `member` attribute.
   */
  public parents(): HasMany<Team> {
    return this.hasMany(Team, "member");
  }
}

/**
 * Employees linked to their manager through the `manager` attribute holding
 * the manager's `employeeid`.
 */
export class Employee extends Model {
  public static objectClasses = ["top", "person"];

  public reports(): HasMany<Employee> {
    return this.hasMany(Employee, "manager", "employeeid");
  }
}

export const USERS_OU = "ou=Users,dc=acme,dc=test";
export const TEAMS_OU = "ou=Teams,dc=acme,dc=test";

export const JOHN_DN = `cn=John Doe,${USERS_OU}`;
export const JANE_DN = `cn=Jane Doe,${USERS_OU}`;
export const BOB_DN = `cn=Bob Stone,${USERS_OU}`;
export const SALES_DN = `cn=Sales,${TEAMS_OU}`;
export const ALL_STAFF_DN = `cn=All Staff,${TEAMS_OU}`;

/**
 * Relationships resolved through attribute values.
 *
 * @example
 * ```typescript
 * import { HasMany, Model } from "ldap-directory-orm";
 *
 * class Group extends Model {
 *   public members(): HasMany {
 *     return this.hasMany([User, Group], "memberof").using(this, "member");
 *   }
 * }
 * ```
 */

export * from "./has-many";
export * from "./relation";
export * from "./types";

import type { DirectoryDriverContract } from "../contracts";

/**
 * Placeholder standing for the base DN inside query DNs.
 */
export const BASE_DN_PLACEHOLDER = "{base}";

export type DataSourceOptions = {
  name: string;
  driver: DirectoryDriverContract;
  /**
   * Whether queries without an explicit data source use this one.
   */
  isDefault?: boolean;
  /**
   * DN every query of this data source is rooted at, unless the query
   * sets its own.
   *
   * @default ""
   */
  baseDn?: string;
};

/**
 * A named directory connection: the driver talking to the server and the
 * base DN queries start from.
 *
 * @example
 * ```typescript
 * const dataSource = new DataSource({
 *   name: "primary",
 *   driver: new LdapDriver({ url: "ldaps://dc01.acme.test" }),
 *   baseDn: "dc=acme,dc=test",
 * });
 *
 * dataSource.expandDn("ou=Users,{base}"); // ou=Users,dc=acme,dc=test
 * ```
 */
export class DataSource {
  public readonly name: string;

  public readonly driver: DirectoryDriverContract;

  public readonly isDefault: boolean;

  public readonly baseDn: string;

  public constructor({ name, driver, isDefault = false, baseDn = "" }: DataSourceOptions) {
    this.name = name;
    this.driver = driver;
    this.isDefault = isDefault;
    this.baseDn = baseDn;
  }

  /**
   * Replace the base DN placeholder of the given DN.
   */
  public expandDn(dn: string): string {
    return dn.replace(BASE_DN_PLACEHOLDER, this.baseDn);
  }
}

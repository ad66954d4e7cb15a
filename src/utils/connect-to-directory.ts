import type { DataSource } from "../data-source/data-source";
import { dataSourceRegistry } from "../data-source/data-source-registry";
import { LdapDriver } from "../drivers/ldap/ldap-driver";
import type { LdapDriverOptions } from "../drivers/ldap/types";
import { validateConnectionOptions } from "../drivers/ldap/validate-options";

/**
 * Connection options for registering and binding a directory data source.
 *
 * @example
 * ```typescript
 * const dataSource = await connectToDirectory({
 *   name: "primary",
 *   url: "ldaps://dc01.acme.test",
 *   baseDn: "dc=acme,dc=test",
 *   username: "cn=reader,dc=acme,dc=test",
 *   password: "test-secret",
 * });
 * ```
 */
export type DirectoryConnectionOptions = LdapDriverOptions & {
  /**
   * Unique name for this data source.
   * @default "default"
   */
  name?: string;
  /**
   * Whether this data source should be the default one.
   * @default true
   */
  isDefault?: boolean;
  /**
   * Base DN queries are rooted at.
   */
  baseDn?: string | null;
};

/**
 * Register an LDAP data source and bind its connection.
 */
export async function connectToDirectory(options: DirectoryConnectionOptions): Promise<DataSource> {
  validateConnectionOptions(options);

  const { name = "default", isDefault = true, baseDn, ...driverOptions } = options;

  const driver = new LdapDriver(driverOptions);

  const dataSource = dataSourceRegistry.register({
    name,
    driver,
    isDefault,
    baseDn: baseDn ?? "",
  });

  await driver.connect();

  return dataSource;
}

import type { LocalScopeCallback, Scope, ScopeContract } from "../contracts";
import type { DataSource } from "../data-source/data-source";
import { dataSourceRegistry } from "../data-source/data-source-registry";
import { InvalidUsageError } from "../errors/invalid-usage.error";
import { ModelQueryBuilder } from "../query/model-query-builder";
import { QueryBuilder } from "../query/query-builder";
import { HasMany } from "../relations/has-many";
import type {
  AttributeValue,
  DateType,
  DirectoryCapabilities,
  DirectoryEntry,
  DirectoryType,
  EntryAttributes,
} from "../types";
import { ModelCollection } from "./collection";
import { getDirectoryCapabilities } from "./directory-capabilities";
import { Guid } from "./guid";
import { fromDateTime, isResetInteger, toDateTime } from "./timestamp";

export type ModelClass<TModel extends Model = Model> = (new (
  attributes?: EntryAttributes,
  dn?: string | null,
) => TModel) &
  Pick<
    typeof Model,
    | "dataSource"
    | "objectClasses"
    | "guidKey"
    | "directoryType"
    | "anrAttributes"
    | "dates"
    | "getDataSource"
    | "getGlobalScopes"
    | "getLocalScopes"
    | "addGlobalScope"
    | "removeGlobalScope"
    | "addScope"
    | "removeScope"
    | "query"
  >;

/**
 * Value accepted when setting an attribute.
 *
 * Dates are converted for declared date attributes, numbers are only
 * accepted as reset integers (`0`, `-1`) on date attributes.
 */
export type AttributeInput = AttributeValue | AttributeValue[] | Date | number;

/**
 * WeakMap registries holding the scopes of each model constructor, so a
 * child model never writes into its parent's scopes.
 */
const globalScopesRegistry = new WeakMap<object, Map<string, Scope>>();
const localScopesRegistry = new WeakMap<object, Map<string, LocalScopeCallback>>();

function scopesOf<T>(registry: WeakMap<object, Map<string, T>>, owner: object): Map<string, T> {
  let scopes = registry.get(owner);

  if (!scopes) {
    scopes = new Map();
    registry.set(owner, scopes);
  }

  return scopes;
}

/**
 * Collect the scopes of the given constructor and its ancestors, parents first.
 */
function inheritedScopes<T>(
  registry: WeakMap<object, Map<string, T>>,
  owner: object,
): Map<string, T> {
  const chain: object[] = [];

  for (let current: object | null = owner; current && current !== Function.prototype; ) {
    chain.unshift(current);
    current = Object.getPrototypeOf(current);
  }

  const scopes = new Map<string, T>();

  for (const constructor of chain) {
    for (const [name, scope] of registry.get(constructor) ?? []) {
      scopes.set(name, scope);
    }
  }

  return scopes;
}

function wrapValues(value: AttributeValue | AttributeValue[]): AttributeValue[] {
  return Array.isArray(value) ? [...value] : [value];
}

function valuesEqual(left: AttributeValue, right: AttributeValue): boolean {
  if (typeof left === "string" || typeof right === "string") {
    return left === right;
  }

  return left.equals(right);
}

/**
 * Base class of every directory model.
 *
 * A model wraps one directory entry: its distinguished name and its
 * attributes, whose keys are always lower-cased.
 *
 * @example
 * ```typescript
 * class User extends Model {
 *   public static objectClasses = ["top", "person", "organizationalperson", "user"];
 *   public static directoryType: DirectoryType = "active-directory";
 *
 *   public groups() {
 *     return this.hasMany(Group, "member");
 *   }
 * }
 *
 * const user = await User.query().findByAnr("jdoe");
 * ```
 */
export class Model {
  /**
   * Data source name or instance, the default data source when omitted.
   */
  public static dataSource?: string | DataSource;

  /**
   * Object classes every entry of this model carries.
   * Queries are filtered on each of them.
   */
  public static objectClasses: string[] = [];

  /**
   * Attribute holding the directory-assigned unique identifier.
   */
  public static guidKey = "objectguid";

  /**
   * Directory server family, drives ANR and GUID handling.
   */
  public static directoryType: DirectoryType = "generic";

  /**
   * Attributes searched when the server has no native ANR support.
   */
  public static anrAttributes: string[] = [
    "cn",
    "sn",
    "uid",
    "name",
    "mail",
    "givenname",
    "displayname",
  ];

  /**
   * Date attributes and how the server stores them.
   *
   * @example
   * ```typescript
   * public static dates: Record<string, DateType> = {
   *   whenchanged: "windows",
   *   accountexpires: "windows-int",
   * };
   * ```
   */
  public static dates: Record<string, DateType> = {};

  /**
   * Whether the entry was loaded from the directory.
   */
  public exists = false;

  protected dn: string | null;

  protected attributes: EntryAttributes = {};

  public constructor(attributes: EntryAttributes = {}, dn: string | null = null) {
    this.dn = dn;
    this.setRawAttributes(attributes);
  }

  // ============================================================================
  // STATICS
  // ============================================================================

  /**
   * Resolves the data source associated with this model.
   *
   * A string is looked up in the data-source registry, an instance is used
   * as-is and the default data source is used otherwise.
   */
  public static getDataSource(): DataSource {
    return dataSourceRegistry.resolve(this.dataSource);
  }

  /**
   * Add a global scope that is automatically applied to every query.
   *
   * Scope objects are registered under their class name.
   *
   * @example
   * ```typescript
   * User.addGlobalScope("enabled", (query) => {
   *   query.whereNotEquals("useraccountcontrol", "514");
   * });
   *
   * User.addGlobalScope(new OnlyEnabledScope());
   * ```
   */
  public static addGlobalScope(scope: ScopeContract): void;
  public static addGlobalScope(name: string, scope: Scope): void;
  public static addGlobalScope(nameOrScope: string | ScopeContract, scope?: Scope): void {
    const scopes = scopesOf(globalScopesRegistry, this);

    if (typeof nameOrScope !== "string") {
      scopes.set(nameOrScope.constructor.name, nameOrScope);
      return;
    }

    if (!scope) {
      throw new InvalidUsageError(`Global scope [${nameOrScope}] needs an implementation.`);
    }

    scopes.set(nameOrScope, scope);
  }

  public static removeGlobalScope(name: string): void {
    scopesOf(globalScopesRegistry, this).delete(name);
  }

  /**
   * Get the global scopes of this model, including the inherited ones.
   */
  public static getGlobalScopes(): Map<string, Scope> {
    return inheritedScopes(globalScopesRegistry, this);
  }

  /**
   * Add a named query fragment the model's builder can opt into.
   *
   * @example
   * ```typescript
   * User.addScope("inOu", (query, ou) => {
   *   query.setDn(`ou=${ou},{base}`);
   * });
   *
   * await User.query().scope("inOu", "Accounting").get();
   * ```
   */
  public static addScope(name: string, callback: LocalScopeCallback): void {
    scopesOf(localScopesRegistry, this).set(name, callback);
  }

  public static removeScope(name: string): void {
    scopesOf(localScopesRegistry, this).delete(name);
  }

  public static getLocalScopes(): Map<string, LocalScopeCallback> {
    return inheritedScopes(localScopesRegistry, this);
  }

  /**
   * Create a new query builder for this model.
   */
  public static query<TModel extends Model>(this: ModelClass<TModel>): ModelQueryBuilder<TModel> {
    return new this().newQuery();
  }

  /**
   * Find a model by its distinguished name.
   */
  public static async find<TModel extends Model>(
    this: ModelClass<TModel>,
    dn: string,
    columns?: string | string[],
  ): Promise<TModel | null> {
    return this.query().find(dn, columns);
  }

  /**
   * Find a model by its GUID.
   */
  public static async findByGuid<TModel extends Model>(
    this: ModelClass<TModel>,
    guid: string,
    columns?: string | string[],
  ): Promise<TModel | null> {
    return this.query().findByGuid(guid, columns);
  }

  // ============================================================================
  // QUERIES
  // ============================================================================

  public getModelClass(): ModelClass<this> {
    return this.constructor as ModelClass<this>;
  }

  public getDataSource(): DataSource {
    return this.getModelClass().getDataSource();
  }

  /**
   * Get the name of the data source the model reads from.
   */
  public getDataSourceName(): string {
    const ref = this.getModelClass().dataSource;

    return typeof ref === "string" ? ref : dataSourceRegistry.resolve(ref).name;
  }

  /**
   * Create a query filtered on the model's object classes, with its
   * global scopes registered.
   */
  public newQuery(): ModelQueryBuilder<this> {
    const query = this.newQueryWithoutScopes();
    const ModelClass = this.getModelClass();

    for (const objectClass of ModelClass.objectClasses) {
      query.whereEquals("objectclass", objectClass);
    }

    for (const [name, scope] of ModelClass.getGlobalScopes()) {
      query.withGlobalScope(name, scope);
    }

    return query;
  }

  /**
   * Create a bare query for the model.
   */
  public newQueryWithoutScopes(): ModelQueryBuilder<this> {
    return new ModelQueryBuilder(this, new QueryBuilder(this.getDataSource()));
  }

  /**
   * Create a model instance for every raw entry.
   */
  public hydrate(entries: DirectoryEntry[]): ModelCollection<this> {
    return this.newCollection(entries.map((entry) => this.newFromEntry(entry)));
  }

  public newFromEntry(entry: DirectoryEntry): this {
    const model = this.newInstance(entry.attributes, entry.dn);

    model.exists = true;

    return model;
  }

  public newInstance(attributes: EntryAttributes = {}, dn: string | null = null): this {
    const ModelClass = this.getModelClass();

    return new ModelClass(attributes, dn);
  }

  public newCollection<TModel extends Model>(models: TModel[] = []): ModelCollection<TModel> {
    return new ModelCollection(models);
  }

  /**
   * Copy this entry into the given model instance.
   */
  public convert<TModel extends Model>(into: TModel): TModel {
    into.setDn(this.dn);
    into.setRawAttributes(this.attributes);
    into.exists = this.exists;

    return into;
  }

  // ============================================================================
  // DISTINGUISHED NAME
  // ============================================================================

  public getDn(): string | null {
    return this.dn;
  }

  public setDn(dn: string | null): this {
    this.dn = dn;
    return this;
  }

  /**
   * Get the value of the first RDN, `cn=John Doe,ou=Users` => `John Doe`.
   */
  public getName(): string | null {
    if (!this.dn) return null;

    const [rdn] = this.dn.split(/(?<!\\),/);
    const separator = rdn.indexOf("=");

    return separator === -1 ? rdn : rdn.substring(separator + 1);
  }

  /**
   * Determine if both models point at the same entry of the same data source.
   */
  public is(model: Model | null | undefined): boolean {
    if (!model || this.dn === null || model.getDn() === null) return false;

    return (
      this.dn.toLowerCase() === model.getDn()?.toLowerCase() &&
      this.getDataSourceName() === model.getDataSourceName()
    );
  }

  public isNot(model: Model | null | undefined): boolean {
    return !this.is(model);
  }

  // ============================================================================
  // ATTRIBUTES
  // ============================================================================

  public normalizeAttributeKey(key: string): string {
    return key.toLowerCase();
  }

  public getAttributes(): EntryAttributes {
    return { ...this.attributes };
  }

  public setRawAttributes(attributes: EntryAttributes): this {
    this.attributes = {};

    for (const [key, values] of Object.entries(attributes)) {
      this.attributes[this.normalizeAttributeKey(key)] = [...values];
    }

    return this;
  }

  public hasAttribute(key: string): boolean {
    return this.normalizeAttributeKey(key) in this.attributes;
  }

  public getAttribute(key: string): AttributeValue[] | null {
    return this.attributes[this.normalizeAttributeKey(key)] ?? null;
  }

  public getFirstAttribute(key: string): AttributeValue | null {
    return this.getAttribute(key)?.[0] ?? null;
  }

  /**
   * Set an attribute locally, nothing is sent to the directory.
   */
  public setAttribute(key: string, value: AttributeInput): this {
    const attribute = this.normalizeAttributeKey(key);

    this.attributes[attribute] = this.prepareAttributeValues(attribute, value);

    return this;
  }

  public getObjectClasses(): string[] {
    return (this.getAttribute("objectclass") ?? []).map((value) => value.toString());
  }

  public getGuidKey(): string {
    return this.normalizeAttributeKey(this.getModelClass().guidKey);
  }

  public getAnrAttributes(): string[] {
    return this.getModelClass().anrAttributes;
  }

  public getCapabilities(): DirectoryCapabilities {
    return getDirectoryCapabilities(this.getModelClass().directoryType);
  }

  /**
   * Get the GUID in its dashed string form.
   */
  public getConvertedGuid(): string | null {
    const value = this.getFirstAttribute(this.getGuidKey());

    if (value === null) return null;

    return typeof value === "string" ? value : new Guid(value).getValue();
  }

  /**
   * Add values to an attribute of the entry on the server, then locally.
   */
  public async createAttribute(
    attribute: string,
    value: AttributeValue | AttributeValue[],
  ): Promise<void> {
    const dn = this.requireExistingDn("create attributes on");
    const key = this.normalizeAttributeKey(attribute);
    const values = wrapValues(value);

    await this.newQueryWithoutScopes().insertAttributes(dn, { [key]: values });

    this.addAttributeValues(key, values);
  }

  /**
   * Replace the values of an attribute on the server, then locally.
   */
  public async updateAttribute(
    attribute: string,
    value: AttributeValue | AttributeValue[],
  ): Promise<void> {
    const dn = this.requireExistingDn("update attributes on");
    const key = this.normalizeAttributeKey(attribute);
    const values = wrapValues(value);

    await this.newQueryWithoutScopes().updateAttributes(dn, { [key]: values });

    this.attributes[key] = values;
  }

  /**
   * Remove attribute values from the entry on the server, then locally.
   *
   * Attributes given by name only, or with an empty value list, lose
   * every value.
   *
   * @example
   * ```typescript
   * await user.deleteAttribute("mobile");
   * await user.deleteAttribute({ memberof: [groupDn] });
   * ```
   */
  public async deleteAttribute(
    attributes: string | string[] | Record<string, AttributeValue | AttributeValue[]>,
  ): Promise<void> {
    const dn = this.requireExistingDn("delete attributes from");
    const changes: EntryAttributes = {};

    if (typeof attributes === "string" || Array.isArray(attributes)) {
      const names: string[] = typeof attributes === "string" ? [attributes] : attributes;

      for (const attribute of names) {
        changes[this.normalizeAttributeKey(attribute)] = [];
      }
    } else {
      for (const [attribute, value] of Object.entries(attributes)) {
        changes[this.normalizeAttributeKey(attribute)] = wrapValues(value);
      }
    }

    await this.newQueryWithoutScopes().deleteAttributes(dn, changes);

    for (const [key, values] of Object.entries(changes)) {
      this.removeAttributeValues(key, values);
    }
  }

  // ============================================================================
  // DATES
  // ============================================================================

  /**
   * Get the declared date attributes with normalized keys.
   */
  public getDates(): Record<string, DateType> {
    const dates: Record<string, DateType> = {};

    for (const [key, type] of Object.entries(this.getModelClass().dates)) {
      dates[this.normalizeAttributeKey(key)] = type;
    }

    return dates;
  }

  public isDateAttribute(key: string): boolean {
    return this.normalizeAttributeKey(key) in this.getDates();
  }

  public fromDateTime(type: DateType, date: Date): string {
    return fromDateTime(type, date);
  }

  /**
   * Read a date attribute, `null` when unset.
   */
  public getDateAttribute(key: string): Date | null {
    const attribute = this.normalizeAttributeKey(key);
    const type = this.getDates()[attribute];

    if (!type) {
      throw new InvalidUsageError(`Attribute [${attribute}] is not a model date.`);
    }

    const value = this.getFirstAttribute(attribute);

    return value === null ? null : toDateTime(type, value.toString());
  }

  // ============================================================================
  // RELATIONS
  // ============================================================================

  /**
   * Define a one-to-many relationship resolved through attribute values.
   *
   * @param related - Related model class(es), matched by object classes
   * @param relationKey - Attribute of the related entries holding the foreign value
   * @param foreignKey - Attribute of this model supplying the value, `dn` for the DN
   */
  public hasMany<TRelated extends Model>(
    related: ModelClass<TRelated> | ModelClass<TRelated>[],
    relationKey: string,
    foreignKey = "dn",
    relationName?: string,
  ): HasMany<TRelated> {
    return new HasMany(
      this,
      Array.isArray(related) ? related : [related],
      relationKey,
      foreignKey,
      relationName,
    );
  }

  // ============================================================================
  // INTERNALS
  // ============================================================================

  protected requireExistingDn(action: string): string {
    if (!this.exists || !this.dn) {
      throw new InvalidUsageError(`Cannot ${action} a model that does not exist in the directory.`);
    }

    return this.dn;
  }

  protected prepareAttributeValues(attribute: string, value: AttributeInput): AttributeValue[] {
    if (value instanceof Date) {
      const type = this.getDates()[attribute];

      if (!type) {
        throw new InvalidUsageError(`Attribute [${attribute}] is not a model date.`);
      }

      return [this.fromDateTime(type, value)];
    }

    if (typeof value === "number") {
      if (!this.isDateAttribute(attribute) || !isResetInteger(value)) {
        throw new InvalidUsageError(
          `Attribute [${attribute}] only takes the reset integers 0 and -1, got [${value}].`,
        );
      }

      return [String(value)];
    }

    return wrapValues(value);
  }

  protected addAttributeValues(key: string, values: AttributeValue[]): void {
    const current = this.attributes[key] ?? [];

    for (const value of values) {
      if (!current.some((existing) => valuesEqual(existing, value))) {
        current.push(value);
      }
    }

    this.attributes[key] = current;
  }

  protected removeAttributeValues(key: string, values: AttributeValue[]): void {
    if (values.length === 0) {
      delete this.attributes[key];
      return;
    }

    const remaining = (this.attributes[key] ?? []).filter(
      (existing) => !values.some((value) => valuesEqual(existing, value)),
    );

    if (remaining.length === 0) {
      delete this.attributes[key];
    } else {
      this.attributes[key] = remaining;
    }
  }
}

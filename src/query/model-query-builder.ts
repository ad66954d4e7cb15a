import type { Scope, ScopeContract } from "../contracts";
import type { DataSource } from "../data-source/data-source";
import { InvalidUsageError } from "../errors/invalid-usage.error";
import { ModelNotFoundError } from "../errors/model-not-found.error";
import { MultipleObjectsFoundError } from "../errors/multiple-objects-found.error";
import type { ModelCollection } from "../model/collection";
import { Guid } from "../model/guid";
import type { Model } from "../model/model";
import type { EntryAttributes } from "../types";
import { debugLog } from "../utils/debug-log";
import type { EscapedValue } from "./escaped-value";
import type { FilterOperator, QueryFilters } from "./filter-grammar";
import {
  type DnHolder,
  type FilterValue,
  type NestedFilterCallback,
  type QueryBuilder,
  type SearchType,
  isWildcardSelection,
  wrapColumns,
} from "./query-builder";

/**
 * Value accepted by the model's where clauses. Dates are converted to the
 * directory timestamp of the attribute.
 */
export type ModelFilterValue = FilterValue | Date;

/**
 * Query builder bound to a model: applies the model's global scopes before
 * execution and hydrates results into model instances.
 *
 * @example
 * ```typescript
 * const users = await User.query()
 *   .whereStartsWith("cn", "John")
 *   .withoutGlobalScope("enabled")
 *   .get();
 *
 * const admin = await User.query().findByAnrOrFail("admin");
 * ```
 */
export class ModelQueryBuilder<TModel extends Model = Model> {
  /**
   * Registered global scopes by identifier, in registration order.
   */
  protected scopes = new Map<string, Scope>();

  /**
   * Identifiers removed through `withoutGlobalScope`.
   */
  protected removed: string[] = [];

  /**
   * Identifiers already applied to the underlying query.
   */
  protected applied = new Set<string>();

  public constructor(
    protected readonly model: TModel,
    protected readonly query: QueryBuilder,
  ) {
    this.query.select([this.model.getGuidKey(), "*"]);
  }

  public getModel(): TModel {
    return this.model;
  }

  /**
   * Get the underlying query as it is, without applying scopes.
   */
  public getBaseQuery(): QueryBuilder {
    return this.query;
  }

  /**
   * Apply the scopes and get the underlying query.
   */
  public toBase(): QueryBuilder {
    return this.applyScopes().query;
  }

  /**
   * Get the compiled filter with the scopes applied.
   */
  public getQuery(): string {
    return this.toBase().getQuery();
  }

  // ============================================================================
  // GLOBAL SCOPES
  // ============================================================================

  public withGlobalScope(identifier: string, scope: Scope): this {
    this.scopes.set(identifier, scope);
    return this;
  }

  /**
   * Remove a registered global scope. Scope objects are identified by
   * their class name.
   */
  public withoutGlobalScope(scope: string | ScopeContract): this {
    const identifier = typeof scope === "string" ? scope : scope.constructor.name;

    this.scopes.delete(identifier);
    this.removed.push(identifier);

    return this;
  }

  /**
   * Remove the given global scopes, or every registered one.
   */
  public withoutGlobalScopes(identifiers: string[] | null = null): this {
    for (const identifier of identifiers ?? [...this.scopes.keys()]) {
      this.withoutGlobalScope(identifier);
    }

    return this;
  }

  public removedScopes(): string[] {
    return [...this.removed];
  }

  public appliedScopes(): string[] {
    return [...this.applied];
  }

  /**
   * Apply each registered scope that was not applied yet, in registration order.
   */
  public applyScopes(): this {
    for (const [identifier, scope] of this.scopes) {
      if (this.applied.has(identifier)) continue;

      if (typeof scope === "function") {
        scope(this);
      } else {
        scope.apply(this, this.model);
      }

      this.applied.add(identifier);
    }

    return this;
  }

  /**
   * Apply one of the model's local scopes.
   */
  public scope(name: string, ...args: unknown[]): this {
    const callback = this.model.getModelClass().getLocalScopes().get(name);

    if (!callback) {
      throw new InvalidUsageError(`Local scope [${name}] is not defined on the model.`);
    }

    callback(this, ...args);

    return this;
  }

  // ============================================================================
  // SEARCH ROOT & SELECTS
  // ============================================================================

  /**
   * Select the given columns, the GUID key is always selected first.
   */
  public select(columns: string | string[]): this {
    const merged = [this.model.getGuidKey(), ...wrapColumns(columns)];

    this.query.select([...new Set(merged)]);

    return this;
  }

  public addSelect(columns: string | string[]): this {
    this.query.addSelect(columns);
    return this;
  }

  public setDn(dn: string | DnHolder): this {
    this.query.setDn(dn);
    return this;
  }

  public in(dn: string | DnHolder): this {
    return this.setDn(dn);
  }

  public read(): this {
    this.query.read();
    return this;
  }

  public listing(): this {
    this.query.listing();
    return this;
  }

  public recursive(): this {
    this.query.recursive();
    return this;
  }

  public limit(limit: number): this {
    this.query.limit(limit);
    return this;
  }

  // ============================================================================
  // WHERE CLAUSES
  // ============================================================================

  public where(conditions: Record<string, ModelFilterValue>): this;
  public where(field: string, value: ModelFilterValue): this;
  public where(field: string, operator: FilterOperator, value?: ModelFilterValue): this;
  public where(
    fieldOrConditions: string | Record<string, ModelFilterValue>,
    operatorOrValue?: FilterOperator | ModelFilterValue,
    value?: ModelFilterValue,
  ): this {
    return this.addWhere("and", fieldOrConditions, operatorOrValue, value);
  }

  public orWhere(conditions: Record<string, ModelFilterValue>): this;
  public orWhere(field: string, value: ModelFilterValue): this;
  public orWhere(field: string, operator: FilterOperator, value?: ModelFilterValue): this;
  public orWhere(
    fieldOrConditions: string | Record<string, ModelFilterValue>,
    operatorOrValue?: FilterOperator | ModelFilterValue,
    value?: ModelFilterValue,
  ): this {
    return this.addWhere("or", fieldOrConditions, operatorOrValue, value);
  }

  public whereRaw(conditions: Record<string, string>): this;
  public whereRaw(field: string, operator: FilterOperator, value?: string): this;
  public whereRaw(
    fieldOrConditions: string | Record<string, string>,
    operator?: FilterOperator,
    value?: string,
  ): this {
    this.query.addWhere("and", fieldOrConditions, operator, value, true);
    return this;
  }

  public orWhereRaw(conditions: Record<string, string>): this;
  public orWhereRaw(field: string, operator: FilterOperator, value?: string): this;
  public orWhereRaw(
    fieldOrConditions: string | Record<string, string>,
    operator?: FilterOperator,
    value?: string,
  ): this {
    this.query.addWhere("or", fieldOrConditions, operator, value, true);
    return this;
  }

  public whereEquals(field: string, value: ModelFilterValue): this {
    return this.where(field, "=", value);
  }

  public whereNotEquals(field: string, value: ModelFilterValue): this {
    return this.where(field, "!", value);
  }

  public whereApproximatelyEquals(field: string, value: ModelFilterValue): this {
    return this.where(field, "~=", value);
  }

  public whereHas(field: string): this {
    return this.where(field, "*");
  }

  public whereNotHas(field: string): this {
    return this.where(field, "!*");
  }

  public whereContains(field: string, value: FilterValue): this {
    return this.where(field, "contains", value);
  }

  public whereNotContains(field: string, value: FilterValue): this {
    return this.where(field, "not_contains", value);
  }

  public whereStartsWith(field: string, value: FilterValue): this {
    return this.where(field, "starts_with", value);
  }

  public whereNotStartsWith(field: string, value: FilterValue): this {
    return this.where(field, "not_starts_with", value);
  }

  public whereEndsWith(field: string, value: FilterValue): this {
    return this.where(field, "ends_with", value);
  }

  public whereNotEndsWith(field: string, value: FilterValue): this {
    return this.where(field, "not_ends_with", value);
  }

  public whereIn(field: string, values: FilterValue[]): this {
    this.query.whereIn(field, values);
    return this;
  }

  public whereBetween(field: string, [from, to]: [ModelFilterValue, ModelFilterValue]): this {
    return this.where(field, ">=", from).where(field, "<=", to);
  }

  public orWhereEquals(field: string, value: ModelFilterValue): this {
    return this.orWhere(field, "=", value);
  }

  public orWhereNotEquals(field: string, value: ModelFilterValue): this {
    return this.orWhere(field, "!", value);
  }

  public orWhereHas(field: string): this {
    return this.orWhere(field, "*");
  }

  public orWhereContains(field: string, value: FilterValue): this {
    return this.orWhere(field, "contains", value);
  }

  public orWhereStartsWith(field: string, value: FilterValue): this {
    return this.orWhere(field, "starts_with", value);
  }

  public orWhereEndsWith(field: string, value: FilterValue): this {
    return this.orWhere(field, "ends_with", value);
  }

  public rawFilter(...filters: string[]): this {
    this.query.rawFilter(...filters);
    return this;
  }

  public andFilter(callback: NestedFilterCallback): this {
    this.query.andFilter(callback);
    return this;
  }

  public orFilter(callback: NestedFilterCallback): this {
    this.query.orFilter(callback);
    return this;
  }

  public notFilter(callback: NestedFilterCallback): this {
    this.query.notFilter(callback);
    return this;
  }

  public clearFilters(): this {
    this.query.clearFilters();
    return this;
  }

  public get filters(): QueryFilters {
    return this.query.filters;
  }

  // ============================================================================
  // READ-ONLY PASS-THROUGH
  // ============================================================================

  public getDn(): string {
    return this.toBase().getDn();
  }

  public getType(): SearchType {
    return this.toBase().getType();
  }

  public getBaseDn(): string {
    return this.toBase().getBaseDn();
  }

  public getSelects(): string[] {
    return this.toBase().getSelects();
  }

  public getConnection(): DataSource {
    return this.toBase().getConnection();
  }

  public getUnescapedQuery(): string {
    return this.toBase().getUnescapedQuery();
  }

  public escape(value: FilterValue): EscapedValue {
    return this.toBase().escape(value);
  }

  public async exists(): Promise<boolean> {
    return this.toBase().exists();
  }

  public async existsOr<T>(callback: () => T | Promise<T>): Promise<true | T> {
    return this.toBase().existsOr(callback);
  }

  public async doesntExist(): Promise<boolean> {
    return this.toBase().doesntExist();
  }

  public async insertAttributes(dn: string, attributes: EntryAttributes): Promise<void> {
    await this.query.insertAttributes(dn, attributes);
  }

  public async updateAttributes(dn: string, attributes: EntryAttributes): Promise<void> {
    await this.query.updateAttributes(dn, attributes);
  }

  public async deleteAttributes(dn: string, attributes: EntryAttributes): Promise<void> {
    await this.query.deleteAttributes(dn, attributes);
  }

  // ============================================================================
  // RESULTS
  // ============================================================================

  /**
   * Apply the scopes, execute the search and hydrate the results.
   */
  public async get(columns: string | string[] = ["*"]): Promise<ModelCollection<TModel>> {
    if (!isWildcardSelection(columns)) {
      this.select(columns);
    }

    const entries = await this.toBase().get(columns);

    return this.model.hydrate(entries);
  }

  /**
   * Execute the search through the paged results control.
   */
  public async paginate(pageSize = 1000): Promise<ModelCollection<TModel>> {
    const entries = await this.toBase().paginate(pageSize);

    return this.model.hydrate(entries);
  }

  public async first(columns: string | string[] = ["*"]): Promise<TModel | null> {
    const models = await this.limit(1).get(columns);

    return models.first();
  }

  public async firstOrFail(columns: string | string[] = ["*"]): Promise<TModel> {
    const model = await this.first(columns);

    if (!model) {
      throw this.notFound();
    }

    return model;
  }

  /**
   * Get the only entry matching the query.
   *
   * Fails when nothing matched, and when more than one entry did.
   */
  public async sole(columns: string | string[] = ["*"]): Promise<TModel> {
    const models = await this.limit(2).get(columns);
    const model = models.first();

    if (!model) {
      throw this.notFound();
    }

    if (models.count() > 1) {
      throw new MultipleObjectsFoundError(this.query.getUnescapedQuery(), this.query.getDn());
    }

    return model;
  }

  /**
   * Find an entry by DN, or several entries by their DNs.
   */
  public async find(dn: string, columns?: string | string[]): Promise<TModel | null>;
  public async find(dns: string[], columns?: string | string[]): Promise<ModelCollection<TModel>>;
  public async find(
    dn: string | string[],
    columns: string | string[] = ["*"],
  ): Promise<TModel | null | ModelCollection<TModel>> {
    if (Array.isArray(dn)) {
      return this.findMany(dn, columns);
    }

    return this.setDn(dn).read().first(columns);
  }

  public async findOrFail(dn: string, columns: string | string[] = ["*"]): Promise<TModel> {
    const model = await this.find(dn, columns);

    if (!model) {
      throw this.notFound();
    }

    return model;
  }

  /**
   * Find the entries of the given DNs, in the given order.
   * DNs that do not exist are skipped.
   */
  public async findMany(
    dns: string | string[],
    columns: string | string[] = ["*"],
  ): Promise<ModelCollection<TModel>> {
    const models: TModel[] = [];

    for (const dn of wrapColumns(dns)) {
      const model = await this.clone().find(dn, columns);

      if (model) {
        models.push(model);
      }
    }

    return this.model.newCollection(models);
  }

  public async findBy(
    attribute: string,
    value: ModelFilterValue,
    columns: string | string[] = ["*"],
  ): Promise<TModel | null> {
    try {
      return await this.findByOrFail(attribute, value, columns);
    } catch (error) {
      if (error instanceof ModelNotFoundError) return null;

      throw error;
    }
  }

  public async findByOrFail(
    attribute: string,
    value: ModelFilterValue,
    columns: string | string[] = ["*"],
  ): Promise<TModel> {
    return this.whereEquals(attribute, value).firstOrFail(columns);
  }

  /**
   * Find the entries whose attribute equals any of the given values.
   */
  public async findManyBy(
    attribute: string,
    values: FilterValue[] = [],
    columns: string | string[] = ["*"],
  ): Promise<ModelCollection<TModel>> {
    if (values.length === 0) {
      return this.model.newCollection<TModel>();
    }

    return this.whereIn(attribute, values).get(columns);
  }

  /**
   * Find an entry through ambiguous name resolution.
   *
   * Directories without native ANR are searched on the model's ANR
   * attributes instead.
   */
  public async findByAnr(value: string, columns?: string | string[]): Promise<TModel | null>;
  public async findByAnr(
    values: string[],
    columns?: string | string[],
  ): Promise<ModelCollection<TModel>>;
  public async findByAnr(
    value: string | string[],
    columns: string | string[] = ["*"],
  ): Promise<TModel | null | ModelCollection<TModel>> {
    if (Array.isArray(value)) {
      return this.findManyByAnr(value, columns);
    }

    if (this.model.getCapabilities().anr) {
      return this.findBy("anr", value, columns);
    }

    return this.prepareAnrEquivalentQuery([value]).first(columns);
  }

  public async findByAnrOrFail(
    value: string,
    columns: string | string[] = ["*"],
  ): Promise<TModel> {
    const model = await this.findByAnr(value, columns);

    if (!model) {
      throw this.notFound();
    }

    return model;
  }

  /**
   * Find every entry matching any of the given names.
   */
  public async findManyByAnr(
    values: string[] = [],
    columns: string | string[] = ["*"],
  ): Promise<ModelCollection<TModel>> {
    if (this.model.getCapabilities().anr) {
      return this.findManyBy("anr", values, columns);
    }

    if (values.length === 0) {
      return this.model.newCollection<TModel>();
    }

    return this.prepareAnrEquivalentQuery(values).get(columns);
  }

  public async findByGuid(
    guid: string,
    columns: string | string[] = ["*"],
  ): Promise<TModel | null> {
    try {
      return await this.findByGuidOrFail(guid, columns);
    } catch (error) {
      if (error instanceof ModelNotFoundError) return null;

      throw error;
    }
  }

  /**
   * Find an entry by its GUID. Directories storing binary GUIDs are
   * searched on the hex-escaped bytes.
   */
  public async findByGuidOrFail(
    guid: string,
    columns: string | string[] = ["*"],
  ): Promise<TModel> {
    const value = this.model.getCapabilities().binaryGuid
      ? new Guid(guid).getEncodedHex()
      : guid;

    return this.whereRaw({ [this.model.getGuidKey()]: value }).firstOrFail(columns);
  }

  /**
   * Deep copy of the builder. The copy owns its scope state.
   */
  public clone(): ModelQueryBuilder<TModel> {
    const query = this.query.clone();
    const columns = query.columns;
    const cloned = new ModelQueryBuilder(this.model, query);

    query.columns = columns;

    cloned.scopes = new Map(this.scopes);
    cloned.removed = [...this.removed];
    cloned.applied = new Set(this.applied);

    return cloned;
  }

  // ============================================================================
  // INTERNALS
  // ============================================================================

  protected addWhere(
    boolean: keyof QueryFilters,
    fieldOrConditions: string | Record<string, ModelFilterValue>,
    operatorOrValue: FilterOperator | ModelFilterValue | undefined,
    value: ModelFilterValue | undefined,
  ): this {
    if (typeof fieldOrConditions !== "string") {
      const conditions: Record<string, FilterValue> = {};

      for (const [field, conditionValue] of Object.entries(fieldOrConditions)) {
        conditions[field] = this.prepareWhereValue(field, conditionValue);
      }

      this.query.addWhere(boolean, conditions, undefined, undefined);

      return this;
    }

    const field = fieldOrConditions;

    if (value === undefined) {
      const prepared =
        operatorOrValue instanceof Date
          ? this.prepareWhereValue(field, operatorOrValue)
          : operatorOrValue;

      this.query.addWhere(boolean, field, prepared, undefined);

      return this;
    }

    if (operatorOrValue instanceof Date) {
      throw new InvalidUsageError(`Invalid filter operator on [${field}].`);
    }

    this.query.addWhere(boolean, field, operatorOrValue, this.prepareWhereValue(field, value));

    return this;
  }

  /**
   * Convert dates into the timestamp representation of the attribute.
   */
  protected prepareWhereValue(field: string, value: ModelFilterValue): FilterValue {
    if (!(value instanceof Date)) {
      return value;
    }

    const attribute = this.model.normalizeAttributeKey(field);
    const type = this.model.getDates()[attribute];

    if (!type) {
      throw new InvalidUsageError(
        `Cannot convert field [${attribute}] to a directory timestamp. Add it to the model dates.`,
      );
    }

    return this.model.fromDateTime(type, value);
  }

  /**
   * Match any of the values on any of the model's ANR attributes.
   */
  protected prepareAnrEquivalentQuery(values: string[]): this {
    const attributes = this.model.getAnrAttributes();

    if (attributes.length === 0) {
      throw new InvalidUsageError(
        `Model [${this.model.constructor.name}] declares no ANR attributes to search.`,
      );
    }

    debugLog(
      "info",
      "directory.query",
      "anr",
      `Native ANR is not supported, searching [${attributes.join(", ")}] instead`,
    );

    return this.orFilter((query) => {
      for (const value of values) {
        for (const attribute of attributes) {
          query.whereEquals(attribute, value);
        }
      }
    });
  }

  protected notFound(): ModelNotFoundError {
    return ModelNotFoundError.forQuery(this.query.getUnescapedQuery(), this.query.getDn());
  }
}

import { clone } from "@mongez/reinforcements";
import type { AttributeChange, SearchScope } from "../contracts";
import type { DataSource } from "../data-source/data-source";
import { InvalidUsageError } from "../errors/invalid-usage.error";
import type { DirectoryEntry, EntryAttributes } from "../types";
import { EscapedValue, unescape } from "./escaped-value";
import {
  type FilterClause,
  FilterGrammar,
  type FilterOperator,
  type QueryFilters,
  isFilterOperator,
  isPresenceOperator,
} from "./filter-grammar";

/**
 * Value accepted by where clauses.
 */
export type FilterValue = string | number | boolean;

/**
 * Search depth of a query.
 *
 * - `search`: whole subtree below the DN
 * - `listing`: direct children of the DN
 * - `read`: the DN itself
 */
export type SearchType = "search" | "listing" | "read";

/**
 * Anything exposing a DN, such as a model.
 */
export type DnHolder = { getDn(): string | null | undefined };

export type NestedFilterCallback = (query: QueryBuilder) => void;

const SEARCH_SCOPES: Record<SearchType, SearchScope> = {
  search: "sub",
  listing: "one",
  read: "base",
};

/**
 * Normalize a column list argument to an array.
 */
export function wrapColumns(columns: string | string[]): string[] {
  return Array.isArray(columns) ? [...columns] : [columns];
}

/**
 * Determine if the columns select every attribute.
 */
export function isWildcardSelection(columns: string | string[]): boolean {
  const list = wrapColumns(columns);

  return list.length === 1 && list[0] === "*";
}

/**
 * Normalize a filter value to the string the directory compares against.
 */
export function normalizeFilterValue(value: FilterValue): string {
  if (typeof value === "boolean") {
    return value ? "TRUE" : "FALSE";
  }

  return String(value);
}

/**
 * Builds LDAP filters and executes them against a data source driver.
 *
 * @example
 * ```typescript
 * const entries = await new QueryBuilder(dataSource)
 *   .setDn("ou=Users,{base}")
 *   .whereEquals("objectclass", "person")
 *   .whereStartsWith("cn", "Jo")
 *   .get(["cn", "mail"]);
 * ```
 */
export class QueryBuilder {
  /**
   * Where clauses grouped by boolean.
   */
  public filters: QueryFilters = { and: [], or: [] };

  /**
   * Selected attributes, `null` until something is selected.
   */
  public columns: string[] | null = null;

  public readonly grammar = new FilterGrammar();

  /**
   * DN the query is rooted at, defaults to the data source base DN.
   */
  protected dn?: string;

  protected type: SearchType = "search";

  protected sizeLimit = 0;

  public constructor(public readonly dataSource: DataSource) {}

  /**
   * Create a fresh query on the same data source.
   */
  public newInstance(): QueryBuilder {
    return new QueryBuilder(this.dataSource);
  }

  // ============================================================================
  // SEARCH ROOT
  // ============================================================================

  public getConnection(): DataSource {
    return this.dataSource;
  }

  public getBaseDn(): string {
    return this.dataSource.baseDn;
  }

  public getDn(): string {
    return this.dn ?? this.getBaseDn();
  }

  /**
   * Root the query at the given DN. `{base}` is replaced by the base DN.
   */
  public setDn(dn: string | DnHolder): this {
    const value = typeof dn === "string" ? dn : (dn.getDn() ?? "");

    this.dn = this.dataSource.expandDn(value);

    return this;
  }

  /**
   * Alias of `setDn`.
   */
  public in(dn: string | DnHolder): this {
    return this.setDn(dn);
  }

  public getType(): SearchType {
    return this.type;
  }

  /**
   * Only search the DN itself.
   */
  public read(): this {
    this.type = "read";
    return this;
  }

  /**
   * Only search the direct children of the DN.
   */
  public listing(): this {
    this.type = "listing";
    return this;
  }

  /**
   * Search the whole subtree below the DN.
   */
  public recursive(): this {
    this.type = "search";
    return this;
  }

  public limit(limit: number): this {
    this.sizeLimit = limit;
    return this;
  }

  public getLimit(): number {
    return this.sizeLimit;
  }

  // ============================================================================
  // SELECTS
  // ============================================================================

  public select(columns: string | string[]): this {
    this.columns = wrapColumns(columns);
    return this;
  }

  /**
   * Append columns to the selection, skipping the ones already selected.
   */
  public addSelect(columns: string | string[]): this {
    const selected = this.columns ?? [];

    for (const column of wrapColumns(columns)) {
      if (!selected.includes(column)) {
        selected.push(column);
      }
    }

    this.columns = selected;

    return this;
  }

  /**
   * Get the attributes the search will request.
   *
   * `objectclass` is always requested so results can be matched to models.
   */
  public getSelects(): string[] {
    const selects = this.columns ?? ["*"];

    if (selects.includes("*") || selects.includes("objectclass")) {
      return selects;
    }

    return [...selects, "objectclass"];
  }

  // ============================================================================
  // WHERE CLAUSES
  // ============================================================================

  public escape(value: FilterValue): EscapedValue {
    return new EscapedValue(normalizeFilterValue(value));
  }

  /**
   * Add an AND where clause.
   *
   * With two arguments the clause is an equality, unless the second
   * argument is a presence operator (`*` or `!*`).
   */
  public where(conditions: Record<string, FilterValue>): this;
  public where(field: string, value: FilterValue): this;
  public where(field: string, operator: FilterOperator, value?: FilterValue): this;
  public where(
    fieldOrConditions: string | Record<string, FilterValue>,
    operatorOrValue?: FilterOperator | FilterValue,
    value?: FilterValue,
  ): this {
    return this.addWhere("and", fieldOrConditions, operatorOrValue, value);
  }

  /**
   * Add an OR where clause.
   */
  public orWhere(conditions: Record<string, FilterValue>): this;
  public orWhere(field: string, value: FilterValue): this;
  public orWhere(field: string, operator: FilterOperator, value?: FilterValue): this;
  public orWhere(
    fieldOrConditions: string | Record<string, FilterValue>,
    operatorOrValue?: FilterOperator | FilterValue,
    value?: FilterValue,
  ): this {
    return this.addWhere("or", fieldOrConditions, operatorOrValue, value);
  }

  /**
   * Add an AND where clause whose value is used as-is, without escaping.
   */
  public whereRaw(conditions: Record<string, string>): this;
  public whereRaw(field: string, operator: FilterOperator, value?: string): this;
  public whereRaw(
    fieldOrConditions: string | Record<string, string>,
    operator?: FilterOperator,
    value?: string,
  ): this {
    return this.addWhere("and", fieldOrConditions, operator, value, true);
  }

  public orWhereRaw(conditions: Record<string, string>): this;
  public orWhereRaw(field: string, operator: FilterOperator, value?: string): this;
  public orWhereRaw(
    fieldOrConditions: string | Record<string, string>,
    operator?: FilterOperator,
    value?: string,
  ): this {
    return this.addWhere("or", fieldOrConditions, operator, value, true);
  }

  public whereEquals(field: string, value: FilterValue): this {
    return this.where(field, "=", value);
  }

  public whereNotEquals(field: string, value: FilterValue): this {
    return this.where(field, "!", value);
  }

  public whereApproximatelyEquals(field: string, value: FilterValue): this {
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

  /**
   * Match any of the given values.
   */
  public whereIn(field: string, values: FilterValue[]): this {
    return this.orFilter((query) => {
      for (const value of values) {
        query.whereEquals(field, value);
      }
    });
  }

  /**
   * Match values between the given bounds (inclusive).
   */
  public whereBetween(field: string, [from, to]: [FilterValue, FilterValue]): this {
    return this.where(field, ">=", from).where(field, "<=", to);
  }

  public orWhereEquals(field: string, value: FilterValue): this {
    return this.orWhere(field, "=", value);
  }

  public orWhereNotEquals(field: string, value: FilterValue): this {
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

  /**
   * Add pre-built filters, e.g. `(objectcategory=person)`.
   */
  public rawFilter(...filters: string[]): this {
    for (const filter of filters) {
      this.filters.and.push({ type: "raw", filter });
    }

    return this;
  }

  /**
   * Add a nested group whose clauses must all match.
   */
  public andFilter(callback: NestedFilterCallback): this {
    return this.addNestedFilter(callback, (filter) => this.grammar.compileAnd(filter));
  }

  /**
   * Add a nested group where any clause may match.
   */
  public orFilter(callback: NestedFilterCallback): this {
    return this.addNestedFilter(callback, (filter) => this.grammar.compileOr(filter));
  }

  /**
   * Add a nested group that must not match.
   */
  public notFilter(callback: NestedFilterCallback): this {
    return this.addNestedFilter(callback, (filter, count) =>
      this.grammar.compileNot(count > 1 ? this.grammar.compileAnd(filter) : filter),
    );
  }

  public clearFilters(): this {
    this.filters = { and: [], or: [] };
    return this;
  }

  public hasFilters(): boolean {
    return this.filters.and.length > 0 || this.filters.or.length > 0;
  }

  /**
   * Get the compiled, escaped filter.
   */
  public getQuery(): string {
    return this.grammar.compile(this.filters);
  }

  /**
   * Get the compiled filter with escape sequences decoded, for display.
   */
  public getUnescapedQuery(): string {
    return unescape(this.getQuery());
  }

  // ============================================================================
  // EXECUTION
  // ============================================================================

  /**
   * Execute the query.
   *
   * The given columns are only used when nothing was selected yet.
   */
  public async get(columns: string | string[] = ["*"]): Promise<DirectoryEntry[]> {
    return this.onceWithColumns(columns, () => this.run());
  }

  public async first(columns: string | string[] = ["*"]): Promise<DirectoryEntry | null> {
    const entries = await this.limit(1).get(columns);

    return entries[0] ?? null;
  }

  /**
   * Execute the query through the paged results control.
   */
  public async paginate(pageSize = 1000): Promise<DirectoryEntry[]> {
    return this.onceWithColumns(["*"], () => this.run({ pageSize }));
  }

  public async exists(): Promise<boolean> {
    const entries = await this.clone().limit(1).get();

    return entries.length > 0;
  }

  /**
   * Determine if any entry matches, otherwise return the callback's result.
   */
  public async existsOr<T>(callback: () => T | Promise<T>): Promise<true | T> {
    return (await this.exists()) ? true : callback();
  }

  public async doesntExist(): Promise<boolean> {
    return !(await this.exists());
  }

  // ============================================================================
  // MODIFICATIONS
  // ============================================================================

  /**
   * Add the given values to the entry's attributes.
   */
  public async insertAttributes(dn: string, attributes: EntryAttributes): Promise<void> {
    await this.modify(dn, "add", attributes);
  }

  /**
   * Replace the entry's attribute values.
   */
  public async updateAttributes(dn: string, attributes: EntryAttributes): Promise<void> {
    await this.modify(dn, "replace", attributes);
  }

  /**
   * Remove the given values from the entry's attributes.
   * An empty value list removes every value of the attribute.
   */
  public async deleteAttributes(dn: string, attributes: EntryAttributes): Promise<void> {
    await this.modify(dn, "delete", attributes);
  }

  /**
   * Deep copy of the query state.
   */
  public clone(): QueryBuilder {
    const cloned = this.newInstance();

    cloned.filters = clone(this.filters);
    cloned.columns = this.columns ? [...this.columns] : null;
    cloned.dn = this.dn;
    cloned.type = this.type;
    cloned.sizeLimit = this.sizeLimit;

    return cloned;
  }

  // ============================================================================
  // INTERNALS
  // ============================================================================

  /**
   * Add a where clause to the given group.
   */
  public addWhere(
    boolean: keyof QueryFilters,
    fieldOrConditions: string | Record<string, FilterValue>,
    operatorOrValue: FilterOperator | FilterValue | undefined,
    value: FilterValue | undefined,
    raw = false,
  ): this {
    if (typeof fieldOrConditions !== "string") {
      for (const [field, conditionValue] of Object.entries(fieldOrConditions)) {
        this.addFilter(boolean, field, "=", conditionValue, raw);
      }

      return this;
    }

    if (value === undefined && !isPresenceOperator(operatorOrValue)) {
      return this.addFilter(boolean, fieldOrConditions, "=", operatorOrValue, raw);
    }

    if (!isFilterOperator(operatorOrValue)) {
      throw new InvalidUsageError(`Invalid filter operator [${String(operatorOrValue)}].`);
    }

    return this.addFilter(boolean, fieldOrConditions, operatorOrValue, value, raw);
  }

  protected addFilter(
    boolean: keyof QueryFilters,
    field: string,
    operator: FilterOperator,
    value: FilterValue | undefined,
    raw: boolean,
  ): this {
    let prepared = "";

    if (!isPresenceOperator(operator)) {
      if (value === undefined) {
        throw new InvalidUsageError(
          `Filter operator [${operator}] on [${field}] requires a value.`,
        );
      }

      prepared = raw ? normalizeFilterValue(value) : this.escape(value).get();
    }

    const clause: FilterClause = { type: "where", field, operator, value: prepared };

    this.filters[boolean].push(clause);

    return this;
  }

  protected addNestedFilter(
    callback: NestedFilterCallback,
    compile: (filter: string, count: number) => string,
  ): this {
    const nested = this.newInstance();

    callback(nested);

    const clauses = this.grammar.compileNested(nested.filters);

    if (clauses.length === 0) {
      return this;
    }

    return this.rawFilter(compile(clauses.join(""), clauses.length));
  }

  protected async onceWithColumns<T>(
    columns: string | string[],
    callback: () => Promise<T>,
  ): Promise<T> {
    const original = this.columns;

    if (original === null) {
      this.columns = wrapColumns(columns);
    }

    try {
      return await callback();
    } finally {
      this.columns = original;
    }
  }

  protected async run(paged?: { pageSize: number }): Promise<DirectoryEntry[]> {
    return this.dataSource.driver.search({
      baseDn: this.getDn(),
      scope: SEARCH_SCOPES[this.type],
      filter: this.getQuery(),
      attributes: this.getSelects(),
      sizeLimit: this.sizeLimit,
      paged,
    });
  }

  protected async modify(
    dn: string,
    operation: AttributeChange["operation"],
    attributes: EntryAttributes,
  ): Promise<void> {
    const changes: AttributeChange[] = Object.entries(attributes).map(([attribute, values]) => ({
      operation,
      attribute,
      values,
    }));

    await this.dataSource.driver.modify(dn, changes);
  }
}

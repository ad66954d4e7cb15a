import { InvalidUsageError } from "../errors/invalid-usage.error";
import type { ModelCollection } from "../model/collection";
import type { Model, ModelClass } from "../model/model";
import type { ModelQueryBuilder } from "../query/model-query-builder";
import { EscapedValue, hexEscapeBytes } from "../query/escaped-value";
import { isWildcardSelection } from "../query/query-builder";
import type { AttributeValue } from "../types";
import type { RelatedReference } from "./types";

const DISTINGUISHED_NAME_KEYS = ["dn", "distinguishedname"];

/**
 * Base of the relationships resolved through attribute values.
 *
 * A related entry is linked to the parent when its relation key attribute
 * holds the parent's foreign value (its DN by default).
 */
export abstract class Relation<TRelated extends Model = Model> {
  /**
   * Query the relationship constraints are added to.
   */
  protected query: ModelQueryBuilder<TRelated>;

  /**
   * Relations whose results are merged into this one's.
   */
  protected merging: Relation<TRelated>[] = [];

  /**
   * Whether to follow the relationship on each related entry.
   */
  protected isRecursive = false;

  public constructor(
    protected readonly parent: Model,
    protected readonly related: ModelClass<TRelated>[],
    protected readonly relationKey: string,
    protected readonly foreignKey: string,
    protected readonly relationName?: string,
  ) {
    if (related.length === 0) {
      throw new InvalidUsageError("A relation needs at least one related model.");
    }

    this.query = new related[0]().newQueryWithoutScopes();
  }

  /**
   * Get the related entries, paginated and hydrated.
   */
  public abstract getRelationResults(pageSize?: number): Promise<ModelCollection<TRelated>>;

  /**
   * Create the same relation for another parent.
   */
  protected abstract newRelationFor(parent: Model): Relation<TRelated>;

  public getParent(): Model {
    return this.parent;
  }

  public getRelated(): ModelClass<TRelated>[] {
    return [...this.related];
  }

  public getRelationKey(): string {
    return this.relationKey;
  }

  public getForeignKey(): string {
    return this.foreignKey;
  }

  public getRelationName(): string | undefined {
    return this.relationName;
  }

  /**
   * Get the underlying query, to add constraints to the relationship.
   */
  public getQuery(): ModelQueryBuilder<TRelated> {
    return this.query;
  }

  /**
   * Follow the relationship on every related entry, each DN visited once.
   */
  public recursive(enable = true): this {
    this.isRecursive = enable;
    return this;
  }

  /**
   * Merge the results of the given relations into this one's.
   *
   * @example
   * ```typescript
   * const groups = await user.groups().with(user.primaryGroup()).get();
   * ```
   */
  public with(relations: Relation<TRelated> | Relation<TRelated>[]): this {
    this.merging.push(...(Array.isArray(relations) ? relations : [relations]));
    return this;
  }

  /**
   * Run the callback without merging the `with` relations.
   */
  public async onceWithoutMerging<T>(callback: () => Promise<T>): Promise<T> {
    const merging = this.merging;

    this.merging = [];

    try {
      return await callback();
    } finally {
      this.merging = merging;
    }
  }

  /**
   * Only return entries matching the object classes of the related models.
   */
  public onlyRelated(): this {
    const objectClassSets = this.related
      .map((related) => related.objectClasses)
      .filter((objectClasses) => objectClasses.length > 0);

    if (objectClassSets.length === 0) {
      return this;
    }

    this.query.orFilter((query) => {
      for (const objectClasses of objectClassSets) {
        query.andFilter((nested) => {
          for (const objectClass of objectClasses) {
            nested.whereEquals("objectclass", objectClass);
          }
        });
      }
    });

    return this;
  }

  /**
   * Get the related entries.
   */
  public async get(columns: string | string[] = ["*"]): Promise<ModelCollection<TRelated>> {
    return this.fetch(columns);
  }

  /**
   * Get the related entries, searching with the given page size when set.
   */
  protected async fetch(
    columns: string | string[],
    pageSize?: number,
  ): Promise<ModelCollection<TRelated>> {
    if (this.getForeignValueFromModel(this.parent) === null) {
      return this.parent.newCollection<TRelated>();
    }

    if (!isWildcardSelection(columns)) {
      this.query.select(columns);
    }

    const results = this.isRecursive
      ? await this.getRecursiveResults(new Set([this.dnKey(this.parent)]), pageSize)
      : await this.getRelationResults(pageSize);

    let merged = results;

    for (const relation of this.merging) {
      merged = merged.merge(await relation.recursive(this.isRecursive).get());
    }

    return merged;
  }

  public async first(columns: string | string[] = ["*"]): Promise<TRelated | null> {
    const results = await this.get(columns);

    return results.first();
  }

  /**
   * Determine if the relationship has any entry, or every given one.
   */
  public async exists(models?: RelatedReference | RelatedReference[]): Promise<boolean> {
    const results = await this.get();
    const references = this.wrapReferences(models);

    if (references.length === 0) {
      return results.isNotEmpty();
    }

    return references.every((reference) => this.resultsContain(results, reference));
  }

  /**
   * Determine if the relationship has any of the given entries.
   */
  public async contains(models: RelatedReference | RelatedReference[]): Promise<boolean> {
    const results = await this.get();

    return this.wrapReferences(models).some((reference) =>
      this.resultsContain(results, reference),
    );
  }

  public async count(): Promise<number> {
    return (await this.get()).count();
  }

  /**
   * Get the value the relation key must hold to link the given model.
   */
  public getForeignValueFromModel(model: Model): AttributeValue | null {
    if (DISTINGUISHED_NAME_KEYS.includes(model.normalizeAttributeKey(this.foreignKey))) {
      return model.getDn();
    }

    return model.getFirstAttribute(this.foreignKey);
  }

  /**
   * Get the foreign value of the model ready for use in a filter.
   */
  protected getEscapedForeignValueFromModel(model: Model): string {
    const value = this.getForeignValueFromModel(model);

    if (value === null) {
      throw new InvalidUsageError(
        `Model [${model.getDn() ?? ""}] has no [${this.foreignKey}] value to relate with.`,
      );
    }

    return typeof value === "string" ? new EscapedValue(value).both().get() : hexEscapeBytes(value);
  }

  /**
   * Convert each entry into the related model matching its object classes.
   */
  protected transformResults(results: ModelCollection<TRelated>): ModelCollection<TRelated> {
    const models = results.map((model) => {
      const related = this.determineModelFromRelated(model);

      if (!related || model instanceof related) {
        return model;
      }

      return model.convert(new related());
    });

    return this.parent.newCollection(models);
  }

  protected determineModelFromRelated(model: Model): ModelClass<TRelated> | undefined {
    const objectClasses = model.getObjectClasses().map((objectClass) => objectClass.toLowerCase());

    return this.related.find((related) =>
      related.objectClasses.every((objectClass) =>
        objectClasses.includes(objectClass.toLowerCase()),
      ),
    );
  }

  protected async getRecursiveResults(
    loaded: Set<string>,
    pageSize?: number,
  ): Promise<ModelCollection<TRelated>> {
    const results = (await this.getRelationResults(pageSize)).filter(
      (model) => !loaded.has(this.dnKey(model)),
    );

    for (const model of results) {
      loaded.add(this.dnKey(model));
    }

    let merged = results;

    for (const model of results) {
      // entries without a foreign value cannot be related to anything
      if (this.getForeignValueFromModel(model) === null) continue;

      merged = merged.merge(
        await this.newRelationFor(model).getRecursiveResults(loaded, pageSize),
      );
    }

    return merged;
  }

  protected dnKey(model: Model): string {
    return (model.getDn() ?? "").toLowerCase();
  }

  protected wrapReferences(models?: RelatedReference | RelatedReference[]): RelatedReference[] {
    if (models === undefined) return [];

    return Array.isArray(models) ? models : [models];
  }

  protected resultsContain(
    results: ModelCollection<TRelated>,
    reference: RelatedReference,
  ): boolean {
    if (typeof reference !== "string") {
      return results.contains(reference);
    }

    return results.dns().some((dn) => dn.toLowerCase() === reference.toLowerCase());
  }
}

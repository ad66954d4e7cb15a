import { getDirectoryConfig } from "../config";
import { DirectoryOperationError } from "../errors/directory-operation.error";
import { InvalidUsageError } from "../errors/invalid-usage.error";
import type { ModelCollection } from "../model/collection";
import type { Model } from "../model/model";
import type { ModelQueryBuilder } from "../query/model-query-builder";
import type { AttributeValue, BypassRule } from "../types";
import { debugLog } from "../utils/debug-log";
import { Relation } from "./relation";
import type { FailableOperation } from "./types";

/**
 * One-to-many relationship: the related entries hold the parent's foreign
 * value in their relation key attribute.
 *
 * @example
 * ```typescript
 * class User extends Model {
 *   public groups() {
 *     return this.hasMany(Group, "member");
 *   }
 * }
 *
 * class Group extends Model {
 *   // the link is written on the group's "member" attribute
 *   public members() {
 *     return this.hasMany([User, Group], "memberof").using(this, "member");
 *   }
 * }
 *
 * await user.groups().attach(accounting);
 * ```
 */
export class HasMany<TRelated extends Model = Model> extends Relation<TRelated> {
  /**
   * Model attach / detach write onto instead of the related model.
   */
  protected usingModel: Model | null = null;

  /**
   * Attribute of the `using` model attach / detach write onto.
   */
  protected usingKey: string | null = null;

  protected pageSize = getDirectoryConfig("pageSize");

  /**
   * Write attach / detach changes onto the given model's attribute.
   */
  public using(model: Model, usingKey: string): this {
    this.usingModel = model;
    this.usingKey = usingKey;

    return this;
  }

  public setPageSize(pageSize: number): this {
    this.pageSize = pageSize;
    return this;
  }

  public getPageSize(): number {
    return this.pageSize;
  }

  /**
   * Get the related entries with the given page size, for this call only.
   * The configured page size is left untouched.
   */
  public async paginate(pageSize = 1000): Promise<ModelCollection<TRelated>> {
    return this.fetch(["*"], pageSize);
  }

  public async getRelationResults(pageSize = this.pageSize): Promise<ModelCollection<TRelated>> {
    const results = await this.getRelationQuery().paginate(pageSize);

    return this.transformResults(results);
  }

  /**
   * Get the relation query constrained to the parent's foreign value.
   *
   * The attribute attach / detach relies on is added to the selection
   * unless every attribute is already selected.
   */
  public getRelationQuery(): ModelQueryBuilder<TRelated> {
    const columns = this.query.getBaseQuery().getSelects();
    const key = this.usingModel && this.usingKey ? this.usingKey : this.relationKey;

    if (!columns.includes("*") && !columns.includes(key)) {
      this.query.addSelect(key);
    }

    return this.query
      .clone()
      .whereRaw(this.relationKey, "=", this.getEscapedForeignValueFromModel(this.parent));
  }

  /**
   * Link the model to the parent.
   *
   * Linking a model that is already linked succeeds.
   */
  public async attach<TModel extends Model>(model: TModel): Promise<TModel> {
    return this.attemptFailableOperation(
      async () => {
        const foreign = this.resolveForeignValue(model);

        if (this.usingModel && this.usingKey) {
          await this.usingModel.createAttribute(this.usingKey, foreign);
        } else {
          await model.createAttribute(this.relationKey, foreign);
        }
      },
      getDirectoryConfig("bypass").attach,
      model,
    );
  }

  /**
   * Link each of the models to the parent, one after another.
   */
  public async attachMany<TModel extends Model>(models: Iterable<TModel>): Promise<TModel[]> {
    const attached: TModel[] = [];

    for (const model of models) {
      attached.push(await this.attach(model));
    }

    return attached;
  }

  /**
   * Unlink the model from the parent.
   *
   * Unlinking a model that is not linked succeeds.
   */
  public async detach<TModel extends Model>(model: TModel): Promise<TModel> {
    return this.attemptFailableOperation(
      async () => {
        const foreign = this.resolveForeignValue(model);

        if (this.usingModel && this.usingKey) {
          await this.usingModel.deleteAttribute({ [this.usingKey]: foreign });
        } else {
          await model.deleteAttribute({ [this.relationKey]: foreign });
        }
      },
      getDirectoryConfig("bypass").detach,
      model,
    );
  }

  /**
   * Unlink every currently related entry.
   */
  public async detachAll(): Promise<ModelCollection<TRelated>> {
    return this.onceWithoutMerging(async () => {
      const models = await this.get();

      await models.each((model) => this.detach(model));

      return models;
    });
  }

  /**
   * Run the directory mutation, treating the errors matching the bypass
   * rule as the desired state already being in place.
   */
  protected async attemptFailableOperation<T>(
    operation: FailableOperation,
    bypass: BypassRule,
    value: T,
  ): Promise<T> {
    try {
      await operation();
    } catch (error) {
      if (!this.isBypassable(error, bypass)) {
        throw error;
      }

      debugLog(
        "info",
        "directory.relation",
        "bypass",
        `Ignored [${error.message}] on [${this.relationKey}] of [${this.parent.getDn() ?? ""}]`,
      );
    }

    return value;
  }

  protected isBypassable(error: unknown, bypass: BypassRule): error is DirectoryOperationError {
    if (!(error instanceof DirectoryOperationError)) {
      return false;
    }

    if (error.isKind(...bypass.kinds)) {
      return true;
    }

    const message = error.message.toLowerCase();

    return bypass.messages.some((substring) => message.includes(substring.toLowerCase()));
  }

  protected resolveForeignValue(model: Model): AttributeValue {
    const source = this.usingModel ? model : this.parent;
    const foreign = this.getForeignValueFromModel(source);

    if (foreign === null) {
      throw new InvalidUsageError(
        `Model [${source.getDn() ?? ""}] has no [${this.foreignKey}] value to relate with.`,
      );
    }

    return foreign;
  }

  protected newRelationFor(parent: Model): HasMany<TRelated> {
    return new HasMany(
      parent,
      this.related,
      this.relationKey,
      this.foreignKey,
      this.relationName,
    ).setPageSize(this.pageSize);
  }
}

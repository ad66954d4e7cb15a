import type { Model } from "./model";

/**
 * Ordered list of models, in the order the directory returned them.
 */
export class ModelCollection<TModel extends Model = Model> implements Iterable<TModel> {
  protected readonly items: TModel[];

  public constructor(items: TModel[] = []) {
    this.items = [...items];
  }

  public all(): TModel[] {
    return [...this.items];
  }

  public first(): TModel | null {
    return this.items[0] ?? null;
  }

  public last(): TModel | null {
    return this.items[this.items.length - 1] ?? null;
  }

  public count(): number {
    return this.items.length;
  }

  public isEmpty(): boolean {
    return this.items.length === 0;
  }

  public isNotEmpty(): boolean {
    return this.items.length > 0;
  }

  public map<T>(callback: (model: TModel, index: number) => T): T[] {
    return this.items.map(callback);
  }

  public filter(callback: (model: TModel, index: number) => boolean): ModelCollection<TModel> {
    return new ModelCollection(this.items.filter(callback));
  }

  /**
   * Run the callback over each model in order, awaiting each call.
   */
  public async each(callback: (model: TModel, index: number) => unknown): Promise<this> {
    for (const [index, model] of this.items.entries()) {
      await callback(model, index);
    }

    return this;
  }

  /**
   * Determine if the collection holds the given model, compared by DN.
   */
  public contains(model: Model | ((item: TModel) => boolean)): boolean {
    if (typeof model === "function") {
      return this.items.some(model);
    }

    return this.items.some((item) => item.is(model));
  }

  public push(...models: TModel[]): this {
    this.items.push(...models);
    return this;
  }

  /**
   * Merge the given models, skipping the ones already present.
   */
  public merge(models: Iterable<TModel>): ModelCollection<TModel> {
    const merged = new ModelCollection(this.items);

    for (const model of models) {
      if (!merged.contains(model)) {
        merged.push(model);
      }
    }

    return merged;
  }

  /**
   * Get the DNs of the models.
   */
  public dns(): string[] {
    return this.items.flatMap((model) => {
      const dn = model.getDn();
      return dn ? [dn] : [];
    });
  }

  public [Symbol.iterator](): Iterator<TModel> {
    return this.items[Symbol.iterator]();
  }
}

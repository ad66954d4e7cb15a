import type { Model } from "../model/model";
import type { ModelQueryBuilder } from "../query/model-query-builder";

/**
 * Reusable global query modifier.
 *
 * @example
 * ```typescript
 * class OnlyEnabledScope implements ScopeContract {
 *   public apply(query: ModelQueryBuilder, model: Model) {
 *     query.whereNotEquals("useraccountcontrol", "514");
 *   }
 * }
 * ```
 */
export interface ScopeContract {
  apply(query: ModelQueryBuilder, model: Model): void;
}

/**
 * Global scope given as a plain callback.
 */
export type ScopeCallback = (query: ModelQueryBuilder) => void;

/**
 * Anything that can be registered as a global scope.
 */
export type Scope = ScopeContract | ScopeCallback;

/**
 * Local scope: a named query fragment a model offers to its builder.
 * The builder is injected as the first argument.
 */
export type LocalScopeCallback = (query: ModelQueryBuilder, ...args: unknown[]) => void;

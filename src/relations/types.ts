import type { Model } from "../model/model";

/**
 * A related entry given either as a model or by its DN.
 */
export type RelatedReference = Model | string;

/**
 * Directory mutation run by `attach` / `detach`.
 */
export type FailableOperation = () => Promise<unknown>;

import { Model } from "../model/model";

/**
 * Any directory entry, whatever its object classes.
 */
export class Entry extends Model {}

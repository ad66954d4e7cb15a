import { ConfigurationError } from "../../errors/configuration.error";

/**
 * Options that must be a string or null when given.
 */
const STRING_OR_NULL_OPTIONS = ["baseDn", "username", "password"];

/**
 * Options that must be a positive integer when given.
 */
const POSITIVE_INTEGER_OPTIONS = ["port", "timeout"];

function isPositiveInteger(value: unknown): boolean {
  return typeof value === "number" && Number.isInteger(value) && value > 0;
}

/**
 * Validate the shape of connection options coming from configuration files
 * or the environment.
 *
 * @throws ConfigurationError naming the first invalid option
 */
export function validateConnectionOptions(options: object): void {
  for (const [key, option] of Object.entries(options)) {
    const value: unknown = option;

    if (value === undefined) continue;

    if (STRING_OR_NULL_OPTIONS.includes(key) && value !== null && typeof value !== "string") {
      throw new ConfigurationError(`Option ${key} must be a string or null.`, key);
    }

    if (POSITIVE_INTEGER_OPTIONS.includes(key) && !isPositiveInteger(value)) {
      throw new ConfigurationError(`Option ${key} must be a positive integer.`, key);
    }
  }
}

/**
 * Characters escaped when a value is used inside a search filter.
 */
const FILTER_CHARACTERS = ["\\", "*", "(", ")", "\0"];

/**
 * Characters escaped when a value is used inside a distinguished name.
 */
const DN_CHARACTERS = ["\\", ",", "=", "+", "<", ">", ";", '"', "#", "\r"];

export const ESCAPE_FILTER = 1;
export const ESCAPE_DN = 2;

/**
 * Hex-escape every byte of the given buffer, `<01 ff>` => `\01\ff`.
 */
export function hexEscapeBytes(bytes: Buffer): string {
  return Array.from(bytes)
    .map((byte) => `\\${byte.toString(16).padStart(2, "0")}`)
    .join("");
}

/**
 * Hex-escape every UTF-8 byte of the given character, `é` => `\c3\a9`.
 */
function hexEscape(character: string): string {
  return hexEscapeBytes(Buffer.from(character, "utf8"));
}

/**
 * Decode every `\xx` sequence of the given escaped value.
 *
 * @example
 * ```typescript
 * unescape("\\4a\\6f\\68\\6e"); // "John"
 * ```
 */
export function unescape(value: string): string {
  return value.replace(/(?:\\[0-9a-fA-F]{2})+/g, (sequence) =>
    Buffer.from(sequence.replace(/\\/g, ""), "hex").toString("utf8"),
  );
}

/**
 * A value prepared for literal use in a filter or a DN.
 *
 * Without any flag every byte is escaped, which is always safe inside a
 * filter assertion.
 *
 * @example
 * ```typescript
 * new EscapedValue("John (Admin)").forFilter().get(); // "John \\28Admin\\29"
 * new EscapedValue("Doe, John").forDn().get(); // "Doe\\2c John"
 * new EscapedValue("ab").get(); // "\\61\\62"
 * ```
 */
export class EscapedValue {
  /**
   * Characters left untouched.
   */
  protected ignored = "";

  /**
   * Combination of `ESCAPE_FILTER` and `ESCAPE_DN`.
   */
  protected flags = 0;

  public constructor(protected readonly value: string) {}

  /**
   * Leave the given characters unescaped.
   */
  public ignore(characters: string): this {
    this.ignored += characters;
    return this;
  }

  /**
   * Only escape the characters that are special inside a filter.
   */
  public forFilter(): this {
    this.flags = ESCAPE_FILTER;
    return this;
  }

  /**
   * Only escape the characters that are special inside a DN.
   */
  public forDn(): this {
    this.flags = ESCAPE_DN;
    return this;
  }

  /**
   * Escape the characters that are special inside a filter or a DN.
   */
  public both(): this {
    this.flags = ESCAPE_FILTER | ESCAPE_DN;
    return this;
  }

  /**
   * Get the raw, unescaped value.
   */
  public getValue(): string {
    return this.value;
  }

  /**
   * Get the escaped value.
   */
  public get(): string {
    const characters = Array.from(this.value);

    return characters
      .map((character, index) =>
        this.shouldEscape(character, index, characters.length) ? hexEscape(character) : character,
      )
      .join("");
  }

  public toString(): string {
    return this.get();
  }

  protected shouldEscape(character: string, index: number, length: number): boolean {
    if (this.ignored.includes(character)) return false;

    if (this.flags === 0) return true;

    if (this.flags & ESCAPE_FILTER && FILTER_CHARACTERS.includes(character)) {
      return true;
    }

    if (this.flags & ESCAPE_DN) {
      if (DN_CHARACTERS.includes(character)) return true;

      // leading and trailing spaces are not significant in a DN
      return character === " " && (index === 0 || index === length - 1);
    }

    return false;
  }
}

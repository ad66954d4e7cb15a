import { InvalidUsageError } from "../errors/invalid-usage.error";

/**
 * Order in which the bytes of a binary GUID are read to build the string
 * form. The first three groups are stored little-endian.
 */
const BYTE_ORDER = [3, 2, 1, 0, 5, 4, 7, 6, 8, 9, 10, 11, 12, 13, 14, 15];

/**
 * Dash positions of the string form, counted in bytes.
 */
const GROUP_BREAKS = [4, 6, 8, 10];

const GUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/**
 * Globally unique identifier of a directory entry.
 *
 * Active Directory stores `objectguid` as 16 raw bytes while displaying
 * and accepting it as a dashed string.
 *
 * @example
 * ```typescript
 * const guid = new Guid("270db4d0-249d-46a7-9cc5-eb695d9af9ac");
 *
 * guid.getEncodedHex();
 * // \d0\b4\0d\27\9d\24\a7\46\9c\c5\eb\69\5d\9a\f9\ac
 * ```
 */
export class Guid {
  protected readonly value: string;

  public constructor(value: string | Buffer) {
    if (typeof value === "string") {
      if (!Guid.isValid(value)) {
        throw new InvalidUsageError(`Invalid GUID [${value}].`);
      }

      this.value = value.toLowerCase();
    } else {
      this.value = Guid.fromBinary(value);
    }
  }

  public static isValid(value: string): boolean {
    return GUID_PATTERN.test(value);
  }

  /**
   * Build the dashed string form of a 16 byte binary GUID.
   */
  protected static fromBinary(binary: Buffer): string {
    if (binary.length !== 16) {
      throw new InvalidUsageError(`Binary GUID must be 16 bytes long, got ${binary.length}.`);
    }

    return BYTE_ORDER.map((position, index) => {
      const hex = binary[position].toString(16).padStart(2, "0");

      return GROUP_BREAKS.includes(index) ? `-${hex}` : hex;
    }).join("");
  }

  /**
   * Get the dashed string form.
   */
  public getValue(): string {
    return this.value;
  }

  /**
   * Get the bytes in the order the server stores them.
   */
  public getBinary(): Buffer {
    const hex = this.value.replace(/-/g, "");
    const bytes = Buffer.alloc(16);

    BYTE_ORDER.forEach((position, index) => {
      bytes[position] = parseInt(hex.substring(index * 2, index * 2 + 2), 16);
    });

    return bytes;
  }

  /**
   * Get the stored bytes as plain hex, `d0b40d27...`.
   */
  public getHex(): string {
    return this.getBinary().toString("hex");
  }

  /**
   * Get the stored bytes hex-escaped for use in a search filter.
   */
  public getEncodedHex(): string {
    return this.getHex().replace(/(..)/g, "\\$1");
  }

  public toString(): string {
    return this.value;
  }
}

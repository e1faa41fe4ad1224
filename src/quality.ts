import { QualityOutOfRangeError } from "./errors.js";

/**
 * JPEG compression quality, 0 (smallest, most lossy) to 100.
 *
 * `Quality.from` is the only way to obtain one, so code receiving a
 * `Quality` never re-checks the range.
 */
export class Quality {
  static readonly MIN = 0;
  static readonly MAX = 100;
  static readonly DEFAULT_VALUE = 50;

  readonly value: number;

  private constructor(value: number) {
    this.value = value;
    Object.freeze(this);
  }

  static from(raw: number): Quality {
    if (!Number.isInteger(raw) || raw < Quality.MIN || raw > Quality.MAX) {
      throw new QualityOutOfRangeError(raw);
    }
    return new Quality(raw);
  }

  static default(): Quality {
    return Quality.from(Quality.DEFAULT_VALUE);
  }

  toString(): string {
    return String(this.value);
  }
}

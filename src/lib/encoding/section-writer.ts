import type { FieldReader } from './coercion';
import type { TensorRange } from './layout';
import type { StatSource } from './types';

/**
 * Sequential writer over one fixed-width section of an output vector.
 * Every value goes through the call's FieldReader. Slots the writer never
 * reaches keep their zero initialisation. Writing past the section width
 * throws: that is a layout bug, not bad data.
 */
export class SectionWriter {
  private cursor = 0;

  constructor(
    private readonly out: Float32Array,
    private readonly section: TensorRange,
    private readonly reader: FieldReader,
    private readonly name: string,
  ) {}

  private put(value: number): this {
    if (this.cursor >= this.section.width) {
      throw new RangeError(`Section ${this.name} overflows its width of ${this.section.width}`);
    }
    this.out[this.section.start + this.cursor] = value;
    this.cursor++;
    return this;
  }

  float(value: unknown, fallback: number = 0): this {
    return this.put(this.reader.float(value, fallback));
  }

  code(value: unknown, modulus: number): this {
    return this.put(this.reader.code(value, modulus));
  }

  position(value: unknown): this {
    return this.put(this.reader.position(value));
  }

  /** One value per field, in field order, each defaulting to 0. */
  fields(source: StatSource | null | undefined, fieldNames: readonly string[]): this {
    for (const name of fieldNames) {
      this.float(source?.[name]);
    }
    return this;
  }

  /** Leave `count` slots at zero. */
  skip(count: number): this {
    if (this.cursor + count > this.section.width) {
      throw new RangeError(`Section ${this.name} overflows its width of ${this.section.width}`);
    }
    this.cursor += count;
    return this;
  }

  get written(): number {
    return this.cursor;
  }
}

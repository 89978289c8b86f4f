export interface JotSchema<T> {
  parse(value: unknown, path?: string): T;
}

class StringNode implements JotSchema<string> {
  parse(value: unknown, path: string = 'value'): string {
    if (typeof value !== 'string') {
      throw new TypeError(`${path} must be a string`);
    }

    return value;
  }
}

class BooleanNode implements JotSchema<boolean> {
  parse(value: unknown, path: string = 'value'): boolean {
    if (typeof value !== 'boolean') {
      throw new TypeError(`${path} must be a boolean`);
    }

    return value;
  }
}

class NumberNode implements JotSchema<number> {
  constructor(readonly options: { integer?: boolean; min?: number } = {}) {}

  parse(value: unknown, path: string = 'value'): number {
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw new TypeError(`${path} must be a finite number`);
    }
    if (this.options.integer && !Number.isInteger(value)) {
      throw new TypeError(`${path} must be an integer`);
    }
    if (this.options.min !== undefined && value < this.options.min) {
      throw new TypeError(`${path} must be at least ${this.options.min}`);
    }

    return value;
  }
}

class EnumNode<TValue extends readonly string[]> implements JotSchema<TValue[number]> {
  constructor(readonly values: TValue) {}

  parse(value: unknown, path: string = 'value'): TValue[number] {
    const match = this.values.find((candidate) => candidate === value);
    if (match === undefined) {
      throw new TypeError(`${path} must be one of ${this.values.join(', ')}`);
    }

    return match;
  }
}

class ArrayNode<T> implements JotSchema<T[]> {
  constructor(readonly itemNode: JotSchema<T>) {}

  parse(value: unknown, path: string = 'value'): T[] {
    if (!Array.isArray(value)) {
      throw new TypeError(`${path} must be an array`);
    }

    return value.map((item, index) => this.itemNode.parse(item, `${path}[${index}]`));
  }
}

class NullableNode<T> implements JotSchema<T | null> {
  constructor(readonly inner: JotSchema<T>) {}

  parse(value: unknown, path: string = 'value'): T | null {
    return value === null ? null : this.inner.parse(value, path);
  }
}

class OptionalNode<T> implements JotSchema<T | undefined> {
  constructor(readonly inner: JotSchema<T>) {}

  parse(value: unknown, path: string = 'value'): T | undefined {
    return value === undefined ? undefined : this.inner.parse(value, path);
  }
}

class UnknownNode implements JotSchema<unknown> {
  parse(value: unknown): unknown {
    return value;
  }
}

export interface ObjectNodeOptions {
  /** Keep properties the shape does not mention instead of dropping them. */
  passthrough?: boolean;
}

type ObjectOf<Shape extends Record<string, JotSchema<unknown>>> = { [K in keyof Shape]: InferJot<Shape[K]> };

class ObjectNode<Shape extends Record<string, JotSchema<unknown>>> implements JotSchema<ObjectOf<Shape>> {
  constructor(readonly shape: Shape, readonly options: ObjectNodeOptions = {}) {}

  parse(value: unknown, path: string = 'value'): ObjectOf<Shape> {
    if (!isRecord(value)) {
      throw new TypeError(`${path} must be an object`);
    }

    const result: Record<string, unknown> = this.options.passthrough ? { ...value } : {};
    for (const [key, node] of Object.entries(this.shape)) {
      result[key] = node.parse(value[key], `${path}.${key}`);
    }

    return result as ObjectOf<Shape>;
  }
}

export type InferJot<TSchema> = TSchema extends JotSchema<infer TValue> ? TValue : never;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export const jot = {
  string: (): JotSchema<string> => new StringNode(),
  boolean: (): JotSchema<boolean> => new BooleanNode(),
  number: (options?: { integer?: boolean; min?: number }): JotSchema<number> => new NumberNode(options),
  enum: <TValue extends readonly string[]>(values: TValue): JotSchema<TValue[number]> => new EnumNode(values),
  array: <T>(schema: JotSchema<T>): JotSchema<T[]> => new ArrayNode(schema),
  nullable: <T>(schema: JotSchema<T>): JotSchema<T | null> => new NullableNode(schema),
  optional: <T>(schema: JotSchema<T>): JotSchema<T | undefined> => new OptionalNode(schema),
  unknown: (): JotSchema<unknown> => new UnknownNode(),
  object: <Shape extends Record<string, JotSchema<unknown>>>(shape: Shape, options?: ObjectNodeOptions) =>
    new ObjectNode(shape, options),
};

/** `JSON.parse` followed by `schema.parse`; throws SyntaxError or TypeError. */
export function parseJson<T>(text: string, schema: JotSchema<T>, path: string = 'value'): T {
  return schema.parse(JSON.parse(text), path);
}

/**
 * JSON reading and writing that keeps object members in document order.
 *
 * `JSON.parse` moves integer-like keys ("2", "404") to the front of every
 * object, so objects are read into `Map`s instead.
 */

export type JsonValue = null | boolean | number | string | JsonValue[] | JsonObject;
export type JsonObject = Map<string, JsonValue>;

export class JsonSyntaxError extends Error {
  constructor(message: string, public readonly position: number) {
    super(`${message} at position ${position}`);
    this.name = 'JsonSyntaxError';
  }
}

// Sticky patterns, matched at the cursor.
const STRING_PATTERN = /"(?:[^"\\\u0000-\u001f]|\\(?:["\\/bfnrt]|u[0-9a-fA-F]{4}))*"/y;
const NUMBER_PATTERN = /-?(?:0|[1-9]\d*)(?:\.\d+)?(?:[eE][+-]?\d+)?/y;
const WHITESPACE_PATTERN = /[ \t\n\r]*/y;

class OrderedJsonParser {
  private index = 0;

  constructor(private readonly text: string) {}

  parseDocument(): JsonValue {
    const value = this.parseValue();
    this.skipWhitespace();
    if (this.index < this.text.length) {
      throw new JsonSyntaxError('Unexpected data after JSON value', this.index);
    }
    return value;
  }

  private parseValue(): JsonValue {
    this.skipWhitespace();
    switch (this.text.charAt(this.index)) {
      case '{':
        return this.parseObject();
      case '[':
        return this.parseArray();
      case '"':
        return this.parseString();
      case 't':
        return this.parseLiteral('true', true);
      case 'f':
        return this.parseLiteral('false', false);
      case 'n':
        return this.parseLiteral('null', null);
      case '':
        throw new JsonSyntaxError('Unexpected end of JSON input', this.index);
      default:
        return this.parseNumber();
    }
  }

  private parseObject(): JsonObject {
    const object: JsonObject = new Map();
    this.index += 1;
    this.skipWhitespace();
    if (this.text.charAt(this.index) === '}') {
      this.index += 1;
      return object;
    }

    for (;;) {
      this.skipWhitespace();
      if (this.text.charAt(this.index) !== '"') {
        throw new JsonSyntaxError('Expected a property name', this.index);
      }
      const key = this.parseString();
      this.skipWhitespace();
      this.expect(':');
      // A repeated key keeps its first position and takes the last value.
      object.set(key, this.parseValue());
      this.skipWhitespace();
      if (this.consume('}')) {
        return object;
      }
      this.expect(',');
    }
  }

  private parseArray(): JsonValue[] {
    const items: JsonValue[] = [];
    this.index += 1;
    this.skipWhitespace();
    if (this.consume(']')) {
      return items;
    }

    for (;;) {
      items.push(this.parseValue());
      this.skipWhitespace();
      if (this.consume(']')) {
        return items;
      }
      this.expect(',');
    }
  }

  private parseString(): string {
    const token = this.match(STRING_PATTERN, 'Invalid string');
    const decoded: unknown = JSON.parse(token);
    if (typeof decoded !== 'string') {
      throw new JsonSyntaxError('Invalid string', this.index);
    }
    return decoded;
  }

  private parseNumber(): number {
    return Number(this.match(NUMBER_PATTERN, 'Unexpected token'));
  }

  private parseLiteral<T extends JsonValue>(word: string, value: T): T {
    if (!this.text.startsWith(word, this.index)) {
      throw new JsonSyntaxError('Unexpected token', this.index);
    }
    this.index += word.length;
    return value;
  }

  private match(pattern: RegExp, message: string): string {
    pattern.lastIndex = this.index;
    const found = pattern.exec(this.text);
    if (!found || !found[0]) {
      throw new JsonSyntaxError(message, this.index);
    }
    this.index += found[0].length;
    return found[0];
  }

  private consume(char: string): boolean {
    if (this.text.charAt(this.index) === char) {
      this.index += 1;
      return true;
    }
    return false;
  }

  private expect(char: string): void {
    if (!this.consume(char)) {
      throw new JsonSyntaxError(`Expected '${char}'`, this.index);
    }
  }

  private skipWhitespace(): void {
    WHITESPACE_PATTERN.lastIndex = this.index;
    WHITESPACE_PATTERN.exec(this.text);
    this.index = WHITESPACE_PATTERN.lastIndex;
  }
}

export function parseOrderedJson(text: string): JsonValue {
  return new OrderedJsonParser(text).parseDocument();
}

/**
 * Format like `JSON.stringify(value, null, indent)`, walking maps in
 * insertion order. Non-ASCII characters are written as-is.
 */
export function stringifyOrderedJson(value: JsonValue, indent = 2): string {
  return formatValue(value, 0, indent);
}

function formatValue(value: JsonValue, depth: number, indent: number): string {
  const inner = ' '.repeat((depth + 1) * indent);
  const outer = ' '.repeat(depth * indent);

  if (value instanceof Map) {
    if (value.size === 0) {
      return '{}';
    }
    const members = Array.from(
      value,
      ([key, member]) => `${inner}${JSON.stringify(key)}: ${formatValue(member, depth + 1, indent)}`
    );
    return `{\n${members.join(',\n')}\n${outer}}`;
  }

  if (Array.isArray(value)) {
    if (value.length === 0) {
      return '[]';
    }
    const items = value.map((item) => `${inner}${formatValue(item, depth + 1, indent)}`);
    return `[\n${items.join(',\n')}\n${outer}]`;
  }

  return JSON.stringify(value);
}

/**
 * Convert a plain JavaScript value into the ordered form. Object members
 * follow `Object.entries` order.
 */
export function toJsonValue(value: unknown): JsonValue {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new TypeError(`${value} cannot be represented in JSON`);
    }
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown) => toJsonValue(item));
  }
  if (value instanceof Map) {
    return new Map(
      Array.from(value, ([key, member]: [unknown, unknown]): [string, JsonValue] => [String(key), toJsonValue(member)])
    );
  }
  if (typeof value === 'object') {
    return new Map(
      Object.entries(value).map(([key, member]): [string, JsonValue] => [key, toJsonValue(member)])
    );
  }
  throw new TypeError(`Values of type ${typeof value} cannot be represented in JSON`);
}

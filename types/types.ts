/**
 * Semantic types: the shape of a Form with its physical encoding erased.
 */

import { FormValueError, type Parameters } from "../types.ts";
import { describeValue } from "../util.ts";
import { isPrimitive, isUnknownLength, type Primitive, type ShapeItem } from "../forms/constants.ts";
import {
  arrayParameter,
  checkParameters,
  formatParameters,
  parametersEqual,
  typeParametersEqual,
} from "../forms/parameters.ts";

export const TypeKind = {
  Numpy: "numpy",
  Unknown: "unknown",
  List: "list",
  Regular: "regular",
  Option: "option",
  Record: "record",
  Union: "union",
} as const;

export type TypeKindName = (typeof TypeKind)[keyof typeof TypeKind];

export type Type =
  | NumpyType
  | UnknownType
  | ListType
  | RegularType
  | OptionType
  | RecordType
  | UnionType;

export interface TypeEqualityOptions {
  /** Compare every parameter, not only the type-level keys. */
  allParameters?: boolean;
}

export function isType(value: unknown): value is Type {
  return (
    value instanceof NumpyType ||
    value instanceof UnknownType ||
    value instanceof ListType ||
    value instanceof RegularType ||
    value instanceof OptionType ||
    value instanceof RecordType ||
    value instanceof UnionType
  );
}

function expectType(owner: string, value: unknown): Type {
  if (!isType(value)) {
    throw new TypeError(`${owner} 'content' must be a Type subclass, not ${describeValue(value)}`);
  }
  return value;
}

function expectLength(owner: string, field: string, value: unknown): ShapeItem {
  if (isUnknownLength(value)) return value;
  if (typeof value === "number" && Number.isInteger(value) && value >= 0) return value;
  throw new TypeError(
    `${owner} '${field}' must be a non-negative integer or unknown length, not ${describeValue(value)}`,
  );
}

function formatLength(length: ShapeItem): string {
  return isUnknownLength(length) ? "##" : String(length);
}

const IDENTIFIER = /^[A-Za-z_][A-Za-z_0-9]*$/;

function formatField(name: string): string {
  return IDENTIFIER.test(name) ? name : JSON.stringify(name);
}

abstract class TypeBase {
  abstract readonly kind: TypeKindName;
  protected readonly _parameters: Parameters | null;

  constructor(owner: string, parameters: Parameters | null) {
    this._parameters = checkParameters(owner, parameters);
  }

  get parameters(): Parameters {
    return this._parameters ?? {};
  }

  get parametersOrNull(): Parameters | null {
    return this._parameters;
  }

  parameter(key: string): Parameters[string] {
    return this._parameters?.[key] ?? null;
  }

  protected sameParameters(other: TypeBase, options: TypeEqualityOptions): boolean {
    return options.allParameters
      ? parametersEqual(this._parameters, other._parameters)
      : typeParametersEqual(this._parameters, other._parameters);
  }

  /** Wrap `text` with the parameters not already shown by it. */
  protected decorate(text: string, shown: readonly string[] = []): string {
    if (this._parameters === null) return text;
    const rest: Parameters = {};
    let any = false;
    for (const [key, value] of Object.entries(this._parameters)) {
      if (!shown.includes(key)) {
        rest[key] = value;
        any = true;
      }
    }
    return any ? `[${text}, parameters=${formatParameters(rest)}]` : text;
  }

  abstract isEqualTo(other: unknown, options?: TypeEqualityOptions): boolean;
  abstract withParameters(parameters: Parameters | null): Type;
  abstract toString(): string;
}

export class NumpyType extends TypeBase {
  readonly kind = TypeKind.Numpy;
  readonly primitive: Primitive;

  constructor(primitive: Primitive, parameters: Parameters | null = null) {
    super("NumpyType", parameters);
    if (!isPrimitive(primitive)) {
      throw new TypeError(`NumpyType 'primitive' must be a primitive dtype name, not ${describeValue(primitive)}`);
    }
    this.primitive = primitive;
  }

  isEqualTo(other: unknown, options: TypeEqualityOptions = {}): boolean {
    return other instanceof NumpyType && this.sameParameters(other, options) && this.primitive === other.primitive;
  }

  withParameters(parameters: Parameters | null): NumpyType {
    return new NumpyType(this.primitive, parameters);
  }

  toString(): string {
    const array = arrayParameter(this._parameters);
    if (array === "char" || array === "byte") return this.decorate(array, ["__array__"]);
    return this.decorate(this.primitive);
  }
}

export class UnknownType extends TypeBase {
  readonly kind = TypeKind.Unknown;

  constructor(parameters: Parameters | null = null) {
    super("UnknownType", parameters);
  }

  isEqualTo(other: unknown, options: TypeEqualityOptions = {}): boolean {
    return other instanceof UnknownType && this.sameParameters(other, options);
  }

  withParameters(parameters: Parameters | null): UnknownType {
    return new UnknownType(parameters);
  }

  toString(): string {
    return this.decorate("unknown");
  }
}

export class ListType extends TypeBase {
  readonly kind = TypeKind.List;
  readonly content: Type;

  constructor(content: Type, parameters: Parameters | null = null) {
    super("ListType", parameters);
    this.content = expectType("ListType", content);
  }

  isEqualTo(other: unknown, options: TypeEqualityOptions = {}): boolean {
    return (
      other instanceof ListType &&
      this.sameParameters(other, options) &&
      this.content.isEqualTo(other.content, options)
    );
  }

  withParameters(parameters: Parameters | null): ListType {
    return new ListType(this.content, parameters);
  }

  toString(): string {
    const array = arrayParameter(this._parameters);
    if (array === "string") return this.decorate("string", ["__array__"]);
    if (array === "bytestring") return this.decorate("bytes", ["__array__"]);
    return this.decorate(`var * ${this.content.toString()}`);
  }
}

export class RegularType extends TypeBase {
  readonly kind = TypeKind.Regular;
  readonly content: Type;
  readonly size: ShapeItem;

  constructor(content: Type, size: ShapeItem, parameters: Parameters | null = null) {
    super("RegularType", parameters);
    this.content = expectType("RegularType", content);
    this.size = expectLength("RegularType", "size", size);
  }

  isEqualTo(other: unknown, options: TypeEqualityOptions = {}): boolean {
    return (
      other instanceof RegularType &&
      this.sameParameters(other, options) &&
      this.size === other.size &&
      this.content.isEqualTo(other.content, options)
    );
  }

  withParameters(parameters: Parameters | null): RegularType {
    return new RegularType(this.content, this.size, parameters);
  }

  toString(): string {
    const array = arrayParameter(this._parameters);
    const size = formatLength(this.size);
    if (array === "string") return this.decorate(`string[${size}]`, ["__array__"]);
    if (array === "bytestring") return this.decorate(`bytes[${size}]`, ["__array__"]);
    return this.decorate(`${size} * ${this.content.toString()}`);
  }
}

export class OptionType extends TypeBase {
  readonly kind = TypeKind.Option;
  readonly content: Type;

  constructor(content: Type, parameters: Parameters | null = null) {
    super("OptionType", parameters);
    this.content = expectType("OptionType", content);
  }

  isEqualTo(other: unknown, options: TypeEqualityOptions = {}): boolean {
    return (
      other instanceof OptionType &&
      this.sameParameters(other, options) &&
      this.content.isEqualTo(other.content, options)
    );
  }

  withParameters(parameters: Parameters | null): OptionType {
    return new OptionType(this.content, parameters);
  }

  toString(): string {
    const content = this.content;
    // "?var * int64" would read as an option inside the list
    const prefixed =
      content instanceof NumpyType ||
      content instanceof UnknownType ||
      content instanceof RecordType ||
      ((content instanceof ListType || content instanceof RegularType) &&
        (arrayParameter(content.parametersOrNull) === "string" ||
          arrayParameter(content.parametersOrNull) === "bytestring"));
    return this.decorate(prefixed ? `?${content.toString()}` : `option[${content.toString()}]`);
  }
}

export class RecordType extends TypeBase {
  readonly kind = TypeKind.Record;
  readonly contents: readonly Type[];
  private readonly _fields: readonly string[] | null;

  constructor(contents: readonly Type[], fields: readonly string[] | null, parameters: Parameters | null = null) {
    super("RecordType", parameters);
    if (!Array.isArray(contents)) {
      throw new TypeError(`RecordType 'contents' must be a list, not ${describeValue(contents)}`);
    }
    this.contents = contents.map((c) => expectType("RecordType", c));
    if (fields === null) {
      this._fields = null;
    } else {
      if (fields.length !== this.contents.length) {
        throw new FormValueError(
          `RecordType 'fields' has ${fields.length} names but 'contents' has ${this.contents.length} types`,
        );
      }
      if (new Set(fields).size !== fields.length) {
        throw new FormValueError(`RecordType 'fields' contains duplicate names`);
      }
      this._fields = [...fields];
    }
  }

  get fields(): string[] {
    if (this._fields === null) return this.contents.map((_, i) => String(i));
    return [...this._fields];
  }

  get fieldsOrNull(): readonly string[] | null {
    return this._fields;
  }

  get isTuple(): boolean {
    return this._fields === null;
  }

  isEqualTo(other: unknown, options: TypeEqualityOptions = {}): boolean {
    if (
      !(other instanceof RecordType) ||
      !this.sameParameters(other, options) ||
      this.isTuple !== other.isTuple ||
      this.contents.length !== other.contents.length
    ) {
      return false;
    }
    const theirs = other._fields;
    if (this._fields === null || theirs === null) {
      return this.contents.every((c, i) => c.isEqualTo(other.contents[i], options));
    }
    return this._fields.every((f, i) => {
      const j = theirs.indexOf(f);
      return j !== -1 && this.contents[i].isEqualTo(other.contents[j], options);
    });
  }

  withParameters(parameters: Parameters | null): RecordType {
    return new RecordType(this.contents, this._fields, parameters);
  }

  toString(): string {
    const name = this.parameter("__record__");
    const named = typeof name === "string" && IDENTIFIER.test(name);
    const items =
      this._fields === null
        ? this.contents.map((c) => c.toString())
        : this._fields.map((f, i) => `${formatField(f)}: ${this.contents[i].toString()}`);
    const body = items.join(", ");
    if (named) return this.decorate(`${name}[${body}]`, ["__record__"]);
    return this.decorate(this._fields === null ? `(${body})` : `{${body}}`);
  }
}

export class UnionType extends TypeBase {
  readonly kind = TypeKind.Union;
  readonly contents: readonly Type[];

  constructor(contents: readonly Type[], parameters: Parameters | null = null) {
    super("UnionType", parameters);
    if (!Array.isArray(contents)) {
      throw new TypeError(`UnionType 'contents' must be a list, not ${describeValue(contents)}`);
    }
    this.contents = contents.map((c) => expectType("UnionType", c));
  }

  isEqualTo(other: unknown, options: TypeEqualityOptions = {}): boolean {
    return (
      other instanceof UnionType &&
      this.sameParameters(other, options) &&
      this.contents.length === other.contents.length &&
      this.contents.every((c, i) => c.isEqualTo(other.contents[i], options))
    );
  }

  withParameters(parameters: Parameters | null): UnionType {
    return new UnionType(this.contents, parameters);
  }

  toString(): string {
    return this.decorate(`union[${this.contents.map((c) => c.toString()).join(", ")}]`);
  }
}

/** A type together with the length of the outermost dimension. */
export class ArrayType {
  readonly content: Type;
  readonly length: ShapeItem;

  constructor(content: Type, length: ShapeItem) {
    this.content = expectType("ArrayType", content);
    this.length = expectLength("ArrayType", "length", length);
  }

  /** An unknown length matches any length. */
  isEqualTo(other: unknown, options: TypeEqualityOptions = {}): boolean {
    if (!(other instanceof ArrayType)) return false;
    const lengthsMatch =
      isUnknownLength(this.length) || isUnknownLength(other.length) || this.length === other.length;
    return lengthsMatch && this.content.isEqualTo(other.content, options);
  }

  toString(): string {
    return `${formatLength(this.length)} * ${this.content.toString()}`;
  }
}

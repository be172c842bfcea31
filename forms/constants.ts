/**
 * Constants for forms: dtype enumerations, class tags and legacy aliases.
 */

import { describeValue } from "../util.ts";

export const BASE_PRIMITIVES = [
  "bool",
  "int8",
  "uint8",
  "int16",
  "uint16",
  "int32",
  "uint32",
  "int64",
  "uint64",
  "float16",
  "float32",
  "float64",
  "float128",
  "complex64",
  "complex128",
  "complex256",
  "datetime64",
  "timedelta64",
] as const;

export type BasePrimitive = (typeof BASE_PRIMITIVES)[number];

/** Primitive dtype of a leaf, e.g. "float64" or "datetime64[ms]" */
export type Primitive =
  | BasePrimitive
  | `datetime64[${string}]`
  | `timedelta64[${string}]`;

// Optional multiplier followed by a unit: "s", "10ms", "3D"
const TIME_UNIT = /^(datetime64|timedelta64)\[([1-9]\d*)?(Y|M|W|D|h|m|s|ms|us|ns|ps|fs|as)\]$/;

export function isPrimitive(value: unknown): value is Primitive {
  if (typeof value !== "string") return false;
  for (const p of BASE_PRIMITIVES) {
    if (value === p) return true;
  }
  return TIME_UNIT.test(value);
}

/** Bytes per item; datetime and timedelta are 64-bit regardless of unit. */
export function primitiveItemSize(primitive: Primitive): number {
  if (primitive.startsWith("datetime64") || primitive.startsWith("timedelta64")) return 8;
  switch (primitive) {
    case "bool":
    case "int8":
    case "uint8":
      return 1;
    case "int16":
    case "uint16":
    case "float16":
      return 2;
    case "int32":
    case "uint32":
    case "float32":
      return 4;
    case "float128":
    case "complex128":
      return 16;
    case "complex256":
      return 32;
    default:
      return 8;
  }
}

export const INDEX_TYPES = ["i8", "u8", "i32", "u32", "i64"] as const;
export type IndexType = (typeof INDEX_TYPES)[number];

export const LIST_INDEX_TYPES = ["i32", "u32", "i64"] as const;
export type ListIndexType = (typeof LIST_INDEX_TYPES)[number];

export const OPTION_INDEX_TYPES = ["i32", "i64"] as const;
export type OptionIndexType = (typeof OPTION_INDEX_TYPES)[number];

export const BYTE_MASK_TYPES = ["i8"] as const;
export type ByteMaskType = (typeof BYTE_MASK_TYPES)[number];

export const BIT_MASK_TYPES = ["u8"] as const;
export type BitMaskType = (typeof BIT_MASK_TYPES)[number];

export const UNION_TAG_TYPES = ["i8"] as const;
export type UnionTagType = (typeof UNION_TAG_TYPES)[number];

export const INDEX_TO_DTYPE = {
  i8: "int8",
  u8: "uint8",
  i32: "int32",
  u32: "uint32",
  i64: "int64",
} as const satisfies Record<IndexType, Primitive>;

export const INDEX_BYTE_SIZE = {
  i8: 1,
  u8: 1,
  i32: 4,
  u32: 4,
  i64: 8,
} as const satisfies Record<IndexType, number>;

/**
 * Narrow `value` to one of `allowed` or throw a TypeError naming the owner and field.
 */
export function expectOneOf<T extends string>(
  owner: string,
  field: string,
  value: unknown,
  allowed: readonly T[],
): T {
  for (const option of allowed) {
    if (value === option) return option;
  }
  throw new TypeError(
    `${owner} '${field}' must be one of ${allowed.join(", ")}, not ${describeValue(value)}`,
  );
}

/** Sentinel for a dimension whose size is not known, e.g. RegularForm size or ArrayType length. */
export const unknownLength: unique symbol = Symbol("unknownLength");
export type UnknownLength = typeof unknownLength;
export type ShapeItem = number | UnknownLength;

export function isUnknownLength(value: unknown): value is UnknownLength {
  return value === unknownLength;
}

/** Current class tags, one per form variant. */
export const FormClass = {
  Numpy: "NumpyArray",
  Empty: "EmptyArray",
  Regular: "RegularArray",
  List: "ListArray",
  ListOffset: "ListOffsetArray",
  Indexed: "IndexedArray",
  IndexedOption: "IndexedOptionArray",
  ByteMasked: "ByteMaskedArray",
  BitMasked: "BitMaskedArray",
  Unmasked: "UnmaskedArray",
  Record: "RecordArray",
  Union: "UnionArray",
} as const;

export type FormClassName = (typeof FormClass)[keyof typeof FormClass];

/** Width-suffixed class tags written by older serializers. */
export const LEGACY_CLASS_ALIASES: Readonly<Record<string, FormClassName>> = {
  ListArray32: FormClass.List,
  ListArrayU32: FormClass.List,
  ListArray64: FormClass.List,
  ListOffsetArray32: FormClass.ListOffset,
  ListOffsetArrayU32: FormClass.ListOffset,
  ListOffsetArray64: FormClass.ListOffset,
  IndexedArray32: FormClass.Indexed,
  IndexedArrayU32: FormClass.Indexed,
  IndexedArray64: FormClass.Indexed,
  IndexedOptionArray32: FormClass.IndexedOption,
  IndexedOptionArray64: FormClass.IndexedOption,
  UnionArray8_32: FormClass.Union,
  UnionArray8_U32: FormClass.Union,
  UnionArray8_64: FormClass.Union,
};

/** Lazy-array tag from the 1.x format; rejected on read. */
export const LEGACY_VIRTUAL_CLASS = "VirtualArray";

export const Legacy = {
  // Form keys restored from positional state belonged to the first partition
  FORM_KEY_PREFIX: "part0-",
} as const;

/** Buffer-protocol format codes used by positional NumpyArray state. */
export const LEGACY_FORMAT_TO_PRIMITIVE: Readonly<Record<string, BasePrimitive>> = {
  "?": "bool",
  b: "int8",
  B: "uint8",
  h: "int16",
  H: "uint16",
  i: "int32",
  I: "uint32",
  l: "int64",
  L: "uint64",
  q: "int64",
  Q: "uint64",
  e: "float16",
  f: "float32",
  d: "float64",
  g: "float128",
  F: "complex64",
  D: "complex128",
  G: "complex256",
  Zf: "complex64",
  Zd: "complex128",
  Zg: "complex256",
};

/** Zero-filled stub buffer sizes for synthetic arrays. */
export const Stub = {
  LENGTH_ZERO_BYTES: 8,
  // complex256 is the widest item
  LENGTH_ONE_BYTES: 32,
} as const;

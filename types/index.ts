export {
  ArrayType,
  isType,
  ListType,
  NumpyType,
  OptionType,
  RecordType,
  RegularType,
  type Type,
  type TypeEqualityOptions,
  TypeKind,
  type TypeKindName,
  UnionType,
  UnknownType,
} from "./types.ts";

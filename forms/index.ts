/**
 * Forms: buffer-free descriptions of the layout of nested, variable-length
 * arrays.
 */

export {
  BitMaskedForm,
  ByteMaskedForm,
  EmptyForm,
  type Form,
  type FormOptions,
  IndexedForm,
  IndexedOptionForm,
  isForm,
  isOptionForm,
  ListForm,
  ListOffsetForm,
  NumpyForm,
  type OptionForm,
  RecordForm,
  RegularForm,
  UnionForm,
  UnmaskedForm,
  type BitMaskedChanges,
  type ByteMaskedChanges,
  type IndexedChanges,
  type IndexedOptionChanges,
  type ListChanges,
  type ListOffsetChanges,
  type NumpyChanges,
  type RecordChanges,
  type RegularChanges,
  type UnionChanges,
  type UnmaskedChanges,
} from "./forms.ts";
export {
  BASE_PRIMITIVES,
  type BitMaskType,
  type ByteMaskType,
  FormClass,
  type FormClassName,
  type IndexType,
  INDEX_TO_DTYPE,
  isPrimitive,
  isUnknownLength,
  type ListIndexType,
  type OptionIndexType,
  type Primitive,
  primitiveItemSize,
  type ShapeItem,
  type UnionTagType,
  type UnknownLength,
  unknownLength,
} from "./constants.ts";
export { isReservedParameter, parametersEqual, parametersUnion, TYPE_PARAMETER_KEYS } from "./parameters.ts";
export {
  type FormDict,
  type FormDictObject,
  formToString,
  fromDict,
  fromJson,
  restoreFormState,
  toDict,
  type ToDictOptions,
  toJson,
} from "./serialization.ts";
export {
  type ColumnSpecifier,
  columns,
  type ColumnsOptions,
  columnTypes,
  expandBraces,
  pruneColumns,
  selectColumns,
  type SelectColumnsOptions,
} from "./columns.ts";
export {
  assignFormKeys,
  type BufferContainer,
  type BufferKey,
  bufferKeyFromTemplate,
  type BufferMaterializer,
  type ExpectedBuffersOptions,
  expectedFromBuffers,
  lengthOneArray,
  lengthZeroArray,
  stubContainer,
} from "./buffers.ts";
export { formForScalar, formType, fromType } from "./derive.ts";

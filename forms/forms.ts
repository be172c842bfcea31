/**
 * Form classes. Each class describes one layer of a ragged array's physical
 * layout without holding any buffers.
 *
 * The set of variants is closed: consumers switch on `form.kind` over the
 * `Form` union and the compiler checks that every variant is handled.
 */

import { FieldNotFoundError, FormValueError, type JSONValue, type Parameters } from "../types.ts";
import { describeValue } from "../util.ts";
import {
  BIT_MASK_TYPES,
  BYTE_MASK_TYPES,
  type BitMaskType,
  type ByteMaskType,
  expectOneOf,
  FormClass,
  type FormClassName,
  isPrimitive,
  isUnknownLength,
  LIST_INDEX_TYPES,
  type ListIndexType,
  OPTION_INDEX_TYPES,
  type OptionIndexType,
  type Primitive,
  type ShapeItem,
  UNION_TAG_TYPES,
  type UnionTagType,
} from "./constants.ts";
import {
  arrayParameter,
  checkParameters,
  isStringLike,
  jsonEqual,
  parametersEqual,
  parametersUnion,
} from "./parameters.ts";

export type Form =
  | NumpyForm
  | EmptyForm
  | RegularForm
  | ListForm
  | ListOffsetForm
  | IndexedForm
  | IndexedOptionForm
  | ByteMaskedForm
  | BitMaskedForm
  | UnmaskedForm
  | RecordForm
  | UnionForm;

/** Forms whose elements may be missing. */
export type OptionForm = IndexedOptionForm | ByteMaskedForm | BitMaskedForm | UnmaskedForm;

/** Metadata shared by every form. */
export interface FormOptions {
  parameters?: Parameters | null;
  formKey?: string | null;
}

export function isForm(value: unknown): value is Form {
  return (
    value instanceof NumpyForm ||
    value instanceof EmptyForm ||
    value instanceof RegularForm ||
    value instanceof ListForm ||
    value instanceof ListOffsetForm ||
    value instanceof IndexedForm ||
    value instanceof IndexedOptionForm ||
    value instanceof ByteMaskedForm ||
    value instanceof BitMaskedForm ||
    value instanceof UnmaskedForm ||
    value instanceof RecordForm ||
    value instanceof UnionForm
  );
}

export function isOptionForm(form: Form): form is OptionForm {
  return (
    form instanceof IndexedOptionForm ||
    form instanceof ByteMaskedForm ||
    form instanceof BitMaskedForm ||
    form instanceof UnmaskedForm
  );
}

function expectForm(owner: string, value: unknown): Form {
  if (!isForm(value)) {
    throw new TypeError(`${owner} all 'contents' must be Form subclasses, not ${describeValue(value)}`);
  }
  return value;
}

function expectBoolean(owner: string, field: string, value: unknown): boolean {
  if (typeof value !== "boolean") {
    throw new TypeError(`${owner} '${field}' must be bool, not ${describeValue(value)}`);
  }
  return value;
}

function expectFormKey(owner: string, value: unknown): string | null {
  if (value === null || value === undefined) return null;
  if (typeof value !== "string") {
    throw new TypeError(`${owner} 'form_key' must be of type string or None, not ${describeValue(value)}`);
  }
  return value;
}

// undefined keeps the current value; null is a value (it clears a nullable field)
function keep<T>(next: T | undefined, current: T): T {
  return next === undefined ? current : next;
}

function isCategorical(params: Parameters | null): boolean {
  return arrayParameter(params) === "categorical";
}

const EMPTY_PARAMETERS: Parameters = {};
Object.freeze(EMPTY_PARAMETERS);

abstract class FormBase {
  abstract readonly kind: FormClassName;
  protected readonly _parameters: Parameters | null;
  private _formKey: string | null;

  constructor(owner: string, options: FormOptions) {
    this._parameters = checkParameters(owner, options.parameters);
    this._formKey = expectFormKey(owner, options.formKey);
  }

  /** Parameter map; empty when none were given. */
  get parameters(): Parameters {
    return this._parameters ?? EMPTY_PARAMETERS;
  }

  /** Parameter map as given to the constructor (null when none). */
  get parametersOrNull(): Parameters | null {
    return this._parameters;
  }

  parameter(key: string): JSONValue {
    return this._parameters?.[key] ?? null;
  }

  get formKey(): string | null {
    return this._formKey;
  }

  /**
   * The one mutable field. Writes are not synchronized: set it before the form
   * is handed to other code, or not at all.
   */
  set formKey(value: string | null) {
    this._formKey = expectFormKey("Form", value);
  }

  get isNumpy(): boolean {
    return this.kind === FormClass.Numpy;
  }

  get isUnknown(): boolean {
    return this.kind === FormClass.Empty;
  }

  get isList(): boolean {
    return this.kind === FormClass.List || this.kind === FormClass.ListOffset;
  }

  get isRegular(): boolean {
    return this.kind === FormClass.Regular;
  }

  get isOption(): boolean {
    return (
      this.kind === FormClass.IndexedOption ||
      this.kind === FormClass.ByteMasked ||
      this.kind === FormClass.BitMasked ||
      this.kind === FormClass.Unmasked
    );
  }

  get isIndexed(): boolean {
    return this.kind === FormClass.Indexed || this.kind === FormClass.IndexedOption;
  }

  get isRecord(): boolean {
    return this.kind === FormClass.Record;
  }

  get isUnion(): boolean {
    return this.kind === FormClass.Union;
  }

  protected sameMeta(other: FormBase): boolean {
    return this._formKey === other._formKey && parametersEqual(this._parameters, other._parameters);
  }

  protected meta(changes: FormOptions): FormOptions {
    return {
      parameters: keep(changes.parameters, this._parameters),
      formKey: keep(changes.formKey, this._formKey),
    };
  }

  abstract copy(changes?: FormOptions): Form;
  abstract equals(other: unknown): boolean;

  /** Number of list dimensions down to the first record or union-of-different-depths (-1). */
  abstract get purelistDepth(): number;
  abstract get minmaxDepth(): [number, number];
  abstract get branchDepth(): [boolean, number];
  abstract get purelistIsRegular(): boolean;
  abstract get isIdentityLike(): boolean;
  abstract get dimensionOptiontype(): boolean;
  abstract purelistParameter(key: string): JSONValue;
}

export interface NumpyChanges extends FormOptions {
  primitive?: Primitive;
  innerShape?: readonly number[];
}

export class NumpyForm extends FormBase {
  readonly kind = FormClass.Numpy;
  readonly primitive: Primitive;
  /** Fixed trailing dimensions of each element; empty for scalars. */
  readonly innerShape: readonly number[];

  constructor(primitive: Primitive, innerShape: readonly number[] = [], options: FormOptions = {}) {
    super("NumpyForm", options);
    if (!isPrimitive(primitive)) {
      throw new TypeError(`NumpyForm 'primitive' must be a primitive dtype name, not ${describeValue(primitive)}`);
    }
    if (!Array.isArray(innerShape) || !innerShape.every((n) => Number.isInteger(n) && n >= 0)) {
      throw new TypeError(
        `NumpyForm 'inner_shape' must be a list of non-negative integers, not ${describeValue(innerShape)}`,
      );
    }
    this.primitive = primitive;
    this.innerShape = [...innerShape];
  }

  copy(changes: NumpyChanges = {}): NumpyForm {
    return new NumpyForm(
      keep(changes.primitive, this.primitive),
      keep(changes.innerShape, this.innerShape),
      this.meta(changes),
    );
  }

  equals(other: unknown): boolean {
    return (
      other instanceof NumpyForm &&
      this.sameMeta(other) &&
      this.primitive === other.primitive &&
      this.innerShape.length === other.innerShape.length &&
      this.innerShape.every((n, i) => n === other.innerShape[i])
    );
  }

  get purelistDepth(): number {
    return this.innerShape.length + 1;
  }

  get minmaxDepth(): [number, number] {
    return [this.purelistDepth, this.purelistDepth];
  }

  get branchDepth(): [boolean, number] {
    return [false, this.purelistDepth];
  }

  get purelistIsRegular(): boolean {
    return true;
  }

  get isIdentityLike(): boolean {
    return false;
  }

  get dimensionOptiontype(): boolean {
    return false;
  }

  purelistParameter(key: string): JSONValue {
    return this.parameter(key);
  }
}

/** Zero-length array of unknown type; merges with anything. */
export class EmptyForm extends FormBase {
  readonly kind = FormClass.Empty;

  constructor(options: FormOptions = {}) {
    super("EmptyForm", options);
  }

  copy(changes: FormOptions = {}): EmptyForm {
    return new EmptyForm(this.meta(changes));
  }

  equals(other: unknown): boolean {
    return other instanceof EmptyForm && this.sameMeta(other);
  }

  get purelistDepth(): number {
    return 1;
  }

  get minmaxDepth(): [number, number] {
    return [1, 1];
  }

  get branchDepth(): [boolean, number] {
    return [false, 1];
  }

  get purelistIsRegular(): boolean {
    return true;
  }

  get isIdentityLike(): boolean {
    return true;
  }

  get dimensionOptiontype(): boolean {
    return false;
  }

  purelistParameter(key: string): JSONValue {
    return this.parameter(key);
  }
}

/** A form with exactly one child. */
abstract class ContentForm extends FormBase {
  readonly content: Form;

  constructor(owner: string, content: Form, options: FormOptions) {
    super(owner, options);
    this.content = expectForm(owner, content);
  }

  purelistParameter(key: string): JSONValue {
    if (this._parameters !== null && key in this._parameters) {
      return this.parameter(key);
    }
    return this.content.purelistParameter(key);
  }

  get isIdentityLike(): boolean {
    return false;
  }
}

/** Regular, List and ListOffset: one dimension of nesting, except for strings. */
abstract class ListLikeForm extends ContentForm {
  get purelistDepth(): number {
    if (isStringLike(this._parameters)) return 1;
    return this.content.purelistDepth + 1;
  }

  get minmaxDepth(): [number, number] {
    if (isStringLike(this._parameters)) return [1, 1];
    const [min, max] = this.content.minmaxDepth;
    return [min + 1, max + 1];
  }

  get branchDepth(): [boolean, number] {
    if (isStringLike(this._parameters)) return [false, 1];
    const [branch, depth] = this.content.branchDepth;
    return [branch, depth + 1];
  }

  get dimensionOptiontype(): boolean {
    return false;
  }
}

/** Indexed and option forms: transparent to depth. */
abstract class WrapperForm extends ContentForm {
  get purelistDepth(): number {
    return this.content.purelistDepth;
  }

  get minmaxDepth(): [number, number] {
    return this.content.minmaxDepth;
  }

  get branchDepth(): [boolean, number] {
    return this.content.branchDepth;
  }

  get purelistIsRegular(): boolean {
    return this.content.purelistIsRegular;
  }

  get dimensionOptiontype(): boolean {
    return true;
  }
}

export interface RegularChanges extends FormOptions {
  content?: Form;
  size?: ShapeItem;
}

export class RegularForm extends ListLikeForm {
  readonly kind = FormClass.Regular;
  readonly size: ShapeItem;

  constructor(content: Form, size: ShapeItem, options: FormOptions = {}) {
    super("RegularForm", content, options);
    if (!isUnknownLength(size) && !(Number.isInteger(size) && size >= 0)) {
      throw new TypeError(
        `RegularForm 'size' must be a non-negative integer or unknown length, not ${describeValue(size)}`,
      );
    }
    this.size = size;
  }

  copy(changes: RegularChanges = {}): RegularForm {
    return new RegularForm(
      keep(changes.content, this.content),
      keep(changes.size, this.size),
      this.meta(changes),
    );
  }

  equals(other: unknown): boolean {
    return (
      other instanceof RegularForm &&
      this.sameMeta(other) &&
      this.size === other.size &&
      this.content.equals(other.content)
    );
  }

  get purelistIsRegular(): boolean {
    return this.content.purelistIsRegular;
  }
}

export interface ListChanges extends FormOptions {
  starts?: ListIndexType;
  stops?: ListIndexType;
  content?: Form;
}

export class ListForm extends ListLikeForm {
  readonly kind = FormClass.List;
  readonly starts: ListIndexType;
  readonly stops: ListIndexType;

  constructor(starts: ListIndexType, stops: ListIndexType, content: Form, options: FormOptions = {}) {
    super("ListForm", content, options);
    this.starts = expectOneOf("ListForm", "starts", starts, LIST_INDEX_TYPES);
    this.stops = expectOneOf("ListForm", "stops", stops, LIST_INDEX_TYPES);
  }

  copy(changes: ListChanges = {}): ListForm {
    return new ListForm(
      keep(changes.starts, this.starts),
      keep(changes.stops, this.stops),
      keep(changes.content, this.content),
      this.meta(changes),
    );
  }

  equals(other: unknown): boolean {
    return (
      other instanceof ListForm &&
      this.sameMeta(other) &&
      this.starts === other.starts &&
      this.stops === other.stops &&
      this.content.equals(other.content)
    );
  }

  get purelistIsRegular(): boolean {
    return false;
  }
}

export interface ListOffsetChanges extends FormOptions {
  offsets?: ListIndexType;
  content?: Form;
}

export class ListOffsetForm extends ListLikeForm {
  readonly kind = FormClass.ListOffset;
  readonly offsets: ListIndexType;

  constructor(offsets: ListIndexType, content: Form, options: FormOptions = {}) {
    super("ListOffsetForm", content, options);
    this.offsets = expectOneOf("ListOffsetForm", "offsets", offsets, LIST_INDEX_TYPES);
  }

  copy(changes: ListOffsetChanges = {}): ListOffsetForm {
    return new ListOffsetForm(
      keep(changes.offsets, this.offsets),
      keep(changes.content, this.content),
      this.meta(changes),
    );
  }

  equals(other: unknown): boolean {
    return (
      other instanceof ListOffsetForm &&
      this.sameMeta(other) &&
      this.offsets === other.offsets &&
      this.content.equals(other.content)
    );
  }

  get purelistIsRegular(): boolean {
    return false;
  }
}

export interface IndexedChanges extends FormOptions {
  index?: ListIndexType;
  content?: Form;
}

/** Gather over the content: reorders or duplicates, never introduces missing values. */
export class IndexedForm extends WrapperForm {
  readonly kind = FormClass.Indexed;
  readonly index: ListIndexType;

  constructor(index: ListIndexType, content: Form, options: FormOptions = {}) {
    super("IndexedForm", content, options);
    this.index = expectOneOf("IndexedForm", "index", index, LIST_INDEX_TYPES);
  }

  /**
   * Build an IndexedForm, collapsing it into a union child (the union takes
   * the parameters) or merging it with an indexed or option child.
   */
  static simplified(index: ListIndexType, content: Form, options: FormOptions = {}): Form {
    const parameters = checkParameters("IndexedForm", options.parameters);
    if (content instanceof UnionForm && !isCategorical(parameters)) {
      return content.copy({ parameters: parametersUnion(content.parametersOrNull, parameters) });
    }
    const merged = parametersUnion(content.parametersOrNull, parameters);
    if (content instanceof IndexedForm) {
      return IndexedForm.simplified("i64", content.content, { parameters: merged });
    }
    if (isOptionForm(content)) {
      return IndexedOptionForm.simplified("i64", content.content, { parameters: merged });
    }
    return new IndexedForm(index, content, options);
  }

  copy(changes: IndexedChanges = {}): IndexedForm {
    return new IndexedForm(
      keep(changes.index, this.index),
      keep(changes.content, this.content),
      this.meta(changes),
    );
  }

  equals(other: unknown): boolean {
    return (
      other instanceof IndexedForm &&
      this.sameMeta(other) &&
      this.index === other.index &&
      this.content.equals(other.content)
    );
  }

  get dimensionOptiontype(): boolean {
    return this.content.dimensionOptiontype;
  }
}

export interface IndexedOptionChanges extends FormOptions {
  index?: OptionIndexType;
  content?: Form;
}

/** Gather where a negative index marks a missing value. */
export class IndexedOptionForm extends WrapperForm {
  readonly kind = FormClass.IndexedOption;
  readonly index: OptionIndexType;

  constructor(index: OptionIndexType, content: Form, options: FormOptions = {}) {
    super("IndexedOptionForm", content, options);
    this.index = expectOneOf("IndexedOptionForm", "index", index, OPTION_INDEX_TYPES);
  }

  /**
   * Build an IndexedOptionForm over `content`:
   * - a union child absorbs the option into each of its branches;
   * - an option or indexed child merges with this layer into one IndexedOptionForm;
   * - anything else is wrapped as given.
   */
  static simplified(index: OptionIndexType, content: Form, options: FormOptions = {}): Form {
    const parameters = checkParameters("IndexedOptionForm", options.parameters);
    if (content instanceof UnionForm && !isCategorical(parameters)) {
      return content.unionOfOptions(index, parameters);
    }
    if (content instanceof IndexedForm || isOptionForm(content)) {
      return IndexedOptionForm.simplified("i64", content.content, {
        parameters: parametersUnion(content.parametersOrNull, parameters),
      });
    }
    return new IndexedOptionForm(index, content, options);
  }

  copy(changes: IndexedOptionChanges = {}): IndexedOptionForm {
    return new IndexedOptionForm(
      keep(changes.index, this.index),
      keep(changes.content, this.content),
      this.meta(changes),
    );
  }

  equals(other: unknown): boolean {
    return (
      other instanceof IndexedOptionForm &&
      this.sameMeta(other) &&
      this.index === other.index &&
      this.content.equals(other.content)
    );
  }
}

export interface ByteMaskedChanges extends FormOptions {
  mask?: ByteMaskType;
  content?: Form;
  validWhen?: boolean;
}

/** One mask byte per element; `validWhen` says whether 1 or 0 means present. */
export class ByteMaskedForm extends WrapperForm {
  readonly kind = FormClass.ByteMasked;
  readonly mask: ByteMaskType;
  readonly validWhen: boolean;

  constructor(mask: ByteMaskType, content: Form, validWhen: boolean, options: FormOptions = {}) {
    super("ByteMaskedForm", content, options);
    this.mask = expectOneOf("ByteMaskedForm", "mask", mask, BYTE_MASK_TYPES);
    this.validWhen = expectBoolean("ByteMaskedForm", "valid_when", validWhen);
  }

  static simplified(
    mask: ByteMaskType,
    content: Form,
    validWhen: boolean,
    options: FormOptions = {},
  ): Form {
    const parameters = checkParameters("ByteMaskedForm", options.parameters);
    if (content instanceof UnionForm) {
      return content.unionOfOptions("i64", parameters);
    }
    if (content instanceof IndexedForm || isOptionForm(content)) {
      return IndexedOptionForm.simplified("i64", content, { parameters });
    }
    return new ByteMaskedForm(mask, content, validWhen, options);
  }

  copy(changes: ByteMaskedChanges = {}): ByteMaskedForm {
    return new ByteMaskedForm(
      keep(changes.mask, this.mask),
      keep(changes.content, this.content),
      keep(changes.validWhen, this.validWhen),
      this.meta(changes),
    );
  }

  equals(other: unknown): boolean {
    return (
      other instanceof ByteMaskedForm &&
      this.sameMeta(other) &&
      this.mask === other.mask &&
      this.validWhen === other.validWhen &&
      this.content.equals(other.content)
    );
  }
}

export interface BitMaskedChanges extends FormOptions {
  mask?: BitMaskType;
  content?: Form;
  validWhen?: boolean;
  lsbOrder?: boolean;
}

/** Bit-packed mask; `lsbOrder` fixes the bit order within each byte. */
export class BitMaskedForm extends WrapperForm {
  readonly kind = FormClass.BitMasked;
  readonly mask: BitMaskType;
  readonly validWhen: boolean;
  readonly lsbOrder: boolean;

  constructor(
    mask: BitMaskType,
    content: Form,
    validWhen: boolean,
    lsbOrder: boolean,
    options: FormOptions = {},
  ) {
    super("BitMaskedForm", content, options);
    this.mask = expectOneOf("BitMaskedForm", "mask", mask, BIT_MASK_TYPES);
    this.validWhen = expectBoolean("BitMaskedForm", "valid_when", validWhen);
    this.lsbOrder = expectBoolean("BitMaskedForm", "lsb_order", lsbOrder);
  }

  static simplified(
    mask: BitMaskType,
    content: Form,
    validWhen: boolean,
    lsbOrder: boolean,
    options: FormOptions = {},
  ): Form {
    const parameters = checkParameters("BitMaskedForm", options.parameters);
    if (content instanceof UnionForm) {
      return content.unionOfOptions("i64", parameters);
    }
    if (content instanceof IndexedForm || isOptionForm(content)) {
      return IndexedOptionForm.simplified("i64", content, { parameters });
    }
    return new BitMaskedForm(mask, content, validWhen, lsbOrder, options);
  }

  copy(changes: BitMaskedChanges = {}): BitMaskedForm {
    return new BitMaskedForm(
      keep(changes.mask, this.mask),
      keep(changes.content, this.content),
      keep(changes.validWhen, this.validWhen),
      keep(changes.lsbOrder, this.lsbOrder),
      this.meta(changes),
    );
  }

  equals(other: unknown): boolean {
    return (
      other instanceof BitMaskedForm &&
      this.sameMeta(other) &&
      this.mask === other.mask &&
      this.validWhen === other.validWhen &&
      this.lsbOrder === other.lsbOrder &&
      this.content.equals(other.content)
    );
  }
}

export interface UnmaskedChanges extends FormOptions {
  content?: Form;
}

/** Option-typed position that holds no missing values. */
export class UnmaskedForm extends WrapperForm {
  readonly kind = FormClass.Unmasked;

  constructor(content: Form, options: FormOptions = {}) {
    super("UnmaskedForm", content, options);
  }

  static simplified(content: Form, options: FormOptions = {}): Form {
    const parameters = checkParameters("UnmaskedForm", options.parameters);
    if (content instanceof UnionForm) {
      return content.unionOfOptions("i64", parameters);
    }
    if (content instanceof IndexedForm || isOptionForm(content)) {
      return IndexedOptionForm.simplified("i64", content, { parameters });
    }
    return new UnmaskedForm(content, options);
  }

  copy(changes: UnmaskedChanges = {}): UnmaskedForm {
    return new UnmaskedForm(keep(changes.content, this.content), this.meta(changes));
  }

  equals(other: unknown): boolean {
    return other instanceof UnmaskedForm && this.sameMeta(other) && this.content.equals(other.content);
  }
}

function expectContents(owner: string, contents: unknown): Form[] {
  if (!Array.isArray(contents)) {
    throw new TypeError(`${owner} 'contents' must be a list, not ${describeValue(contents)}`);
  }
  return contents.map((c) => expectForm(owner, c));
}

export interface RecordChanges extends FormOptions {
  contents?: readonly Form[];
  fields?: readonly string[] | null;
}

/** Struct of named fields, or a tuple when `fields` is null. */
export class RecordForm extends FormBase {
  readonly kind = FormClass.Record;
  readonly contents: readonly Form[];
  private readonly _fields: readonly string[] | null;

  constructor(contents: readonly Form[], fields: readonly string[] | null, options: FormOptions = {}) {
    super("RecordForm", options);
    this.contents = expectContents("RecordForm", contents);
    if (fields === null || fields === undefined) {
      this._fields = null;
    } else {
      if (!Array.isArray(fields) || !fields.every((f) => typeof f === "string")) {
        throw new TypeError(`RecordForm 'fields' must be a list of strings or None, not ${describeValue(fields)}`);
      }
      if (fields.length !== this.contents.length) {
        throw new FormValueError(
          `RecordForm 'fields' has ${fields.length} names but 'contents' has ${this.contents.length} forms`,
        );
      }
      const seen = new Set<string>();
      for (const f of fields) {
        if (seen.has(f)) {
          throw new FormValueError(`RecordForm 'fields' contains duplicate name ${JSON.stringify(f)}`);
        }
        seen.add(f);
      }
      this._fields = [...fields];
    }
  }

  /** Field names; positional ("0", "1", ...) for tuples. */
  get fields(): string[] {
    if (this._fields === null) return this.contents.map((_, i) => String(i));
    return [...this._fields];
  }

  /** Field names as given to the constructor (null for tuples). */
  get fieldsOrNull(): readonly string[] | null {
    return this._fields;
  }

  get isTuple(): boolean {
    return this._fields === null;
  }

  fieldToIndex(field: string): number {
    if (this._fields === null) {
      if (/^\d+$/.test(field)) {
        const i = Number(field);
        if (i < this.contents.length) return i;
      }
    } else {
      const i = this._fields.indexOf(field);
      if (i !== -1) return i;
    }
    throw new FieldNotFoundError(field, this.contents.length);
  }

  indexToField(index: number): string {
    if (Number.isInteger(index) && index >= 0 && index < this.contents.length) {
      return this._fields === null ? String(index) : this._fields[index];
    }
    throw new FieldNotFoundError(index, this.contents.length);
  }

  hasField(field: string): boolean {
    if (this._fields === null) {
      return /^\d+$/.test(field) && Number(field) < this.contents.length;
    }
    return this._fields.includes(field);
  }

  /** Child by position or by field name. */
  content(indexOrField: number | string): Form {
    if (typeof indexOrField === "string") {
      return this.contents[this.fieldToIndex(indexOrField)];
    }
    if (typeof indexOrField === "number") {
      this.indexToField(indexOrField);
      return this.contents[indexOrField];
    }
    throw new TypeError(
      `index_or_field must be an integer (index) or string (field), not ${describeValue(indexOrField)}`,
    );
  }

  copy(changes: RecordChanges = {}): RecordForm {
    return new RecordForm(
      keep(changes.contents, this.contents),
      keep(changes.fields, this._fields),
      this.meta(changes),
    );
  }

  equals(other: unknown): boolean {
    if (
      !(other instanceof RecordForm) ||
      !this.sameMeta(other) ||
      this.isTuple !== other.isTuple ||
      this.contents.length !== other.contents.length
    ) {
      return false;
    }
    if (this._fields === null) {
      return this.contents.every((c, i) => c.equals(other.contents[i]));
    }
    // Named records compare as field -> content maps
    return this._fields.every((f, i) => other.hasField(f) && this.contents[i].equals(other.content(f)));
  }

  get purelistDepth(): number {
    return 1;
  }

  get minmaxDepth(): [number, number] {
    if (this.contents.length === 0) return [1, 1];
    let min = Infinity;
    let max = -Infinity;
    for (const c of this.contents) {
      const [lo, hi] = c.minmaxDepth;
      min = Math.min(min, lo);
      max = Math.max(max, hi);
    }
    return [min, max];
  }

  get branchDepth(): [boolean, number] {
    if (this.contents.length === 0) return [false, 1];
    let anyBranch = false;
    let minDepth = -1;
    for (const c of this.contents) {
      const [branch, depth] = c.branchDepth;
      if (minDepth === -1) minDepth = depth;
      if (branch || minDepth !== depth) anyBranch = true;
      if (minDepth > depth) minDepth = depth;
    }
    return [anyBranch, minDepth];
  }

  get purelistIsRegular(): boolean {
    return true;
  }

  get isIdentityLike(): boolean {
    return false;
  }

  get dimensionOptiontype(): boolean {
    return false;
  }

  purelistParameter(key: string): JSONValue {
    return this.parameter(key);
  }
}

export interface UnionChanges extends FormOptions {
  tags?: UnionTagType;
  index?: ListIndexType;
  contents?: readonly Form[];
}

/** Heterogeneous branches selected by a tag per element. */
export class UnionForm extends FormBase {
  readonly kind = FormClass.Union;
  readonly tags: UnionTagType;
  readonly index: ListIndexType;
  readonly contents: readonly Form[];

  constructor(tags: UnionTagType, index: ListIndexType, contents: readonly Form[], options: FormOptions = {}) {
    super("UnionForm", options);
    this.tags = expectOneOf("UnionForm", "tags", tags, UNION_TAG_TYPES);
    this.index = expectOneOf("UnionForm", "index", index, LIST_INDEX_TYPES);
    this.contents = expectContents("UnionForm", contents);
  }

  /**
   * Build a UnionForm with nested unions flattened into this one (options and
   * indexes over a nested union are absorbed first) and duplicate branches
   * merged. A single remaining branch is returned instead of a union.
   */
  static simplified(
    tags: UnionTagType,
    index: ListIndexType,
    contents: readonly Form[],
    options: FormOptions = {},
  ): Form {
    const parameters = checkParameters("UnionForm", options.parameters);
    const branches: Form[] = [];
    for (const c of expectContents("UnionForm", contents)) {
      flattenBranch(branches, c);
    }
    if (branches.length === 1) {
      const only = branches[0];
      return only.copy({ parameters: parametersUnion(only.parametersOrNull, parameters) });
    }
    return new UnionForm(tags, index, branches, options);
  }

  /**
   * Distribute an option over the branches: every branch that is not already an
   * option becomes one. Branches that are unions are spliced in.
   */
  unionOfOptions(index: OptionIndexType, parameters: Parameters | null): UnionForm {
    const contents: Form[] = [];
    for (const c of this.contents) {
      const branch = isOptionForm(c) ? c : IndexedOptionForm.simplified(index, c);
      if (branch instanceof UnionForm) contents.push(...branch.contents);
      else contents.push(branch);
    }
    return this.copy({ contents, parameters: parametersUnion(this._parameters, parameters) });
  }

  copy(changes: UnionChanges = {}): UnionForm {
    return new UnionForm(
      keep(changes.tags, this.tags),
      keep(changes.index, this.index),
      keep(changes.contents, this.contents),
      this.meta(changes),
    );
  }

  equals(other: unknown): boolean {
    return (
      other instanceof UnionForm &&
      this.sameMeta(other) &&
      this.tags === other.tags &&
      this.index === other.index &&
      this.contents.length === other.contents.length &&
      this.contents.every((c, i) => c.equals(other.contents[i]))
    );
  }

  get purelistDepth(): number {
    let out: number | null = null;
    for (const c of this.contents) {
      if (out === null) out = c.purelistDepth;
      else if (out !== c.purelistDepth) return -1;
    }
    return out ?? 1;
  }

  get minmaxDepth(): [number, number] {
    if (this.contents.length === 0) return [1, 1];
    let min = Infinity;
    let max = -Infinity;
    for (const c of this.contents) {
      const [lo, hi] = c.minmaxDepth;
      min = Math.min(min, lo);
      max = Math.max(max, hi);
    }
    return [min, max];
  }

  get branchDepth(): [boolean, number] {
    let anyBranch = false;
    let minDepth = -1;
    for (const c of this.contents) {
      const [branch, depth] = c.branchDepth;
      if (minDepth === -1) minDepth = depth;
      if (branch || minDepth !== depth) anyBranch = true;
      if (minDepth > depth) minDepth = depth;
    }
    return [anyBranch, minDepth === -1 ? 1 : minDepth];
  }

  get purelistIsRegular(): boolean {
    return this.contents.every((c) => c.purelistIsRegular);
  }

  get isIdentityLike(): boolean {
    return false;
  }

  get dimensionOptiontype(): boolean {
    return this.contents.some((c) => c.dimensionOptiontype);
  }

  purelistParameter(key: string): JSONValue {
    if (this._parameters !== null && key in this._parameters) {
      return this.parameter(key);
    }
    if (this.contents.length === 0) return null;
    const out = this.contents[0].purelistParameter(key);
    for (const c of this.contents.slice(1)) {
      if (!jsonEqual(out, c.purelistParameter(key))) return null;
    }
    return out;
  }
}

// Indexed and option layers directly over a union are pushed into it
function absorbIntoUnion(form: Form): Form {
  if (form instanceof IndexedForm && form.content instanceof UnionForm) {
    return IndexedForm.simplified(form.index, form.content, { parameters: form.parametersOrNull });
  }
  if (isOptionForm(form) && form.content instanceof UnionForm) {
    return form.content.unionOfOptions("i64", form.parametersOrNull);
  }
  return form;
}

function flattenBranch(out: Form[], branch: Form): void {
  const form = absorbIntoUnion(branch);
  if (form instanceof UnionForm) {
    for (const inner of form.contents) flattenBranch(out, inner);
    return;
  }
  if (!out.some((existing) => existing.equals(form))) {
    out.push(form);
  }
}

/**
 * Form <-> JSON-compatible dicts, including the legacy layouts:
 * width-suffixed class tags, old-style records and positional state.
 */

import fastJson from "fast-json-stringify";
import { FormValueError, type Parameters } from "../types.ts";
import { assertNever, debugLog, describeValue, isPlainObject } from "../util.ts";
import {
  BIT_MASK_TYPES,
  BYTE_MASK_TYPES,
  FormClass,
  type FormClassName,
  isPrimitive,
  isUnknownLength,
  Legacy,
  LEGACY_CLASS_ALIASES,
  LEGACY_FORMAT_TO_PRIMITIVE,
  LEGACY_VIRTUAL_CLASS,
  LIST_INDEX_TYPES,
  OPTION_INDEX_TYPES,
  expectOneOf,
  type Primitive,
  primitiveItemSize,
  type ShapeItem,
  UNION_TAG_TYPES,
  unknownLength,
} from "./constants.ts";
import {
  BitMaskedForm,
  ByteMaskedForm,
  EmptyForm,
  type Form,
  type FormOptions,
  IndexedForm,
  IndexedOptionForm,
  isForm,
  ListForm,
  ListOffsetForm,
  NumpyForm,
  RecordForm,
  RegularForm,
  UnionForm,
  UnmaskedForm,
} from "./forms.ts";
import { checkParameters } from "./parameters.ts";

/** A serialized form: a dict, or a bare primitive name for a plain leaf. */
export type FormDict = string | FormDictObject;

export interface FormDictObject {
  class: FormClassName;
  primitive?: Primitive;
  inner_shape?: number[];
  size?: number | null;
  starts?: string;
  stops?: string;
  offsets?: string;
  index?: string;
  tags?: string;
  mask?: string;
  valid_when?: boolean;
  lsb_order?: boolean;
  content?: FormDict;
  contents?: FormDict[];
  fields?: string[] | null;
  parameters?: Parameters;
  form_key?: string | null;
}

export interface ToDictOptions {
  /** Write parameters, form_key and inner_shape even when empty (default true). */
  verbose?: boolean;
}

function isPlainLeaf(form: Form): boolean {
  return (
    form instanceof NumpyForm &&
    form.innerShape.length === 0 &&
    Object.keys(form.parameters).length === 0 &&
    form.formKey === null
  );
}

function childDict(form: Form, verbose: boolean): FormDict {
  if (!verbose && form instanceof NumpyForm && isPlainLeaf(form)) return form.primitive;
  return dictOf(form, verbose);
}

function dictOf(form: Form, verbose: boolean): FormDictObject {
  let out: FormDictObject;
  switch (form.kind) {
    case FormClass.Numpy:
      out = { class: form.kind, primitive: form.primitive };
      if (verbose || form.innerShape.length > 0) out.inner_shape = [...form.innerShape];
      break;
    case FormClass.Empty:
      out = { class: form.kind };
      break;
    case FormClass.Regular:
      out = {
        class: form.kind,
        size: isUnknownLength(form.size) ? null : form.size,
        content: childDict(form.content, verbose),
      };
      break;
    case FormClass.List:
      out = {
        class: form.kind,
        starts: form.starts,
        stops: form.stops,
        content: childDict(form.content, verbose),
      };
      break;
    case FormClass.ListOffset:
      out = { class: form.kind, offsets: form.offsets, content: childDict(form.content, verbose) };
      break;
    case FormClass.Indexed:
    case FormClass.IndexedOption:
      out = { class: form.kind, index: form.index, content: childDict(form.content, verbose) };
      break;
    case FormClass.ByteMasked:
      out = {
        class: form.kind,
        mask: form.mask,
        valid_when: form.validWhen,
        content: childDict(form.content, verbose),
      };
      break;
    case FormClass.BitMasked:
      out = {
        class: form.kind,
        mask: form.mask,
        valid_when: form.validWhen,
        lsb_order: form.lsbOrder,
        content: childDict(form.content, verbose),
      };
      break;
    case FormClass.Unmasked:
      out = { class: form.kind, content: childDict(form.content, verbose) };
      break;
    case FormClass.Record: {
      const fields = form.fieldsOrNull;
      out = {
        class: form.kind,
        fields: fields === null ? null : [...fields],
        contents: form.contents.map((c) => childDict(c, verbose)),
      };
      break;
    }
    case FormClass.Union:
      out = {
        class: form.kind,
        tags: form.tags,
        index: form.index,
        contents: form.contents.map((c) => childDict(c, verbose)),
      };
      break;
    default:
      return assertNever(form, "form");
  }
  const parameters = form.parameters;
  if (verbose || Object.keys(parameters).length > 0) out.parameters = structuredClone(parameters);
  if (verbose || form.formKey !== null) out.form_key = form.formKey;
  return out;
}

/** Serialize to a JSON-compatible dict. The top level is always a dict. */
export function toDict(form: Form, options: ToDictOptions = {}): FormDictObject {
  return dictOf(form, options.verbose ?? true);
}

const FORM_NODE = {
  type: "object",
  properties: {
    class: { type: "string" },
    primitive: { type: "string" },
    inner_shape: { type: "array", items: { type: "integer" } },
    size: { type: "integer", nullable: true },
    starts: { type: "string" },
    stops: { type: "string" },
    offsets: { type: "string" },
    index: { type: "string" },
    tags: { type: "string" },
    mask: { type: "string" },
    valid_when: { type: "boolean" },
    lsb_order: { type: "boolean" },
    content: { $ref: "#/definitions/form" },
    contents: { type: "array", items: { $ref: "#/definitions/form" } },
    fields: { type: "array", items: { type: "string" }, nullable: true },
    parameters: { type: "object", additionalProperties: true },
    form_key: { type: "string", nullable: true },
  },
} as const;

const FORM_SCHEMA = { ...FORM_NODE, definitions: { form: FORM_NODE } };

// Children in verbose dicts are always objects, never the bare-primitive shorthand
const stringifyForm = fastJson(FORM_SCHEMA);

/** Verbose dict as compact JSON. */
export function toJson(form: Form): string {
  return stringifyForm(toDict(form, { verbose: true }));
}

/** Non-verbose dict as 4-space-indented JSON. */
export function formToString(form: Form): string {
  return JSON.stringify(toDict(form, { verbose: false }), null, 4);
}

function resolveClass(tag: string): FormClassName {
  if (tag === LEGACY_VIRTUAL_CLASS) {
    throw new FormValueError(
      "VirtualArray is a lazy array from the 1.x format and is not supported; " +
        "re-serialize the data without virtual arrays",
    );
  }
  for (const name of Object.values(FormClass)) {
    if (name === tag) return name;
  }
  if (Object.hasOwn(LEGACY_CLASS_ALIASES, tag)) {
    const alias = LEGACY_CLASS_ALIASES[tag];
    debugLog("forms", `legacy class tag ${tag} read as ${alias}`);
    return alias;
  }
  throw new FormValueError(`input class: ${JSON.stringify(tag)} was not recognised`);
}

function readPrimitive(owner: string, value: unknown): Primitive {
  if (!isPrimitive(value)) {
    throw new TypeError(`${owner} 'primitive' must be a primitive dtype name, not ${describeValue(value)}`);
  }
  return value;
}

function readShape(owner: string, value: unknown): number[] {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value) || !value.every((n) => typeof n === "number")) {
    throw new TypeError(`${owner} 'inner_shape' must be a list of integers, not ${describeValue(value)}`);
  }
  return value;
}

function readSize(owner: string, value: unknown): ShapeItem {
  if (value === null) return unknownLength;
  if (typeof value === "number") return value;
  throw new TypeError(`${owner} 'size' must be an integer or None, not ${describeValue(value)}`);
}

function readBoolean(owner: string, field: string, value: unknown): boolean {
  if (typeof value !== "boolean") {
    throw new TypeError(`${owner} '${field}' must be bool, not ${describeValue(value)}`);
  }
  return value;
}

function readList(owner: string, field: string, value: unknown): unknown[] {
  if (!Array.isArray(value)) {
    throw new TypeError(`${owner} '${field}' must be a list, not ${describeValue(value)}`);
  }
  return value;
}

function readFields(owner: string, value: unknown): string[] | null {
  if (value === null) return null;
  const list = readList(owner, "fields", value);
  const out: string[] = [];
  for (const f of list) {
    if (typeof f !== "string") {
      throw new TypeError(`${owner} 'fields' must be a list of strings or None, not ${describeValue(value)}`);
    }
    out.push(f);
  }
  return out;
}

function readFormKey(owner: string, value: unknown): string | null {
  if (value === undefined || value === null) return null;
  if (typeof value !== "string") {
    throw new TypeError(`${owner} 'form_key' must be of type string or None, not ${describeValue(value)}`);
  }
  return value;
}

function readRecord(
  owner: string,
  input: Record<string, unknown>,
  child: (value: unknown) => Form,
  options: FormOptions,
): RecordForm {
  const contents = input.contents;
  if ("fields" in input) {
    if (isPlainObject(contents)) {
      throw new TypeError(`new-style ${owner} 'contents' must be a list, not a mapping`);
    }
    const forms = readList(owner, "contents", contents).map(child);
    return new RecordForm(forms, readFields(owner, input.fields), options);
  }
  if (isPlainObject(contents)) {
    debugLog("forms", `old-style ${owner} with contents keyed by field name`);
    const names = Object.keys(contents);
    return new RecordForm(
      names.map((name) => child(contents[name])),
      names,
      options,
    );
  }
  debugLog("forms", `old-style ${owner} tuple without 'fields'`);
  return new RecordForm(readList(owner, "contents", contents).map(child), null, options);
}

/**
 * Build one node from serialized field names. `child` turns each nested value
 * into a Form: recursive decoding for dicts, a plain check for restored state.
 */
function buildForm(
  cls: FormClassName,
  input: Record<string, unknown>,
  child: (value: unknown) => Form,
): Form {
  const options: FormOptions = {
    parameters: checkParameters(cls, input.parameters),
    formKey: readFormKey(cls, input.form_key),
  };
  switch (cls) {
    case FormClass.Numpy:
      return new NumpyForm(
        readPrimitive(cls, input.primitive),
        readShape(cls, input.inner_shape),
        options,
      );
    case FormClass.Empty:
      return new EmptyForm(options);
    case FormClass.Regular:
      return new RegularForm(child(input.content), readSize(cls, input.size), options);
    case FormClass.List:
      return new ListForm(
        expectOneOf(cls, "starts", input.starts, LIST_INDEX_TYPES),
        expectOneOf(cls, "stops", input.stops, LIST_INDEX_TYPES),
        child(input.content),
        options,
      );
    case FormClass.ListOffset:
      return new ListOffsetForm(
        expectOneOf(cls, "offsets", input.offsets, LIST_INDEX_TYPES),
        child(input.content),
        options,
      );
    case FormClass.Indexed:
      return new IndexedForm(
        expectOneOf(cls, "index", input.index, LIST_INDEX_TYPES),
        child(input.content),
        options,
      );
    case FormClass.IndexedOption:
      return new IndexedOptionForm(
        expectOneOf(cls, "index", input.index, OPTION_INDEX_TYPES),
        child(input.content),
        options,
      );
    case FormClass.ByteMasked:
      return new ByteMaskedForm(
        expectOneOf(cls, "mask", input.mask, BYTE_MASK_TYPES),
        child(input.content),
        readBoolean(cls, "valid_when", input.valid_when),
        options,
      );
    case FormClass.BitMasked:
      return new BitMaskedForm(
        expectOneOf(cls, "mask", input.mask, BIT_MASK_TYPES),
        child(input.content),
        readBoolean(cls, "valid_when", input.valid_when),
        readBoolean(cls, "lsb_order", input.lsb_order),
        options,
      );
    case FormClass.Unmasked:
      return new UnmaskedForm(child(input.content), options);
    case FormClass.Record:
      return readRecord(cls, input, child, options);
    case FormClass.Union:
      return new UnionForm(
        expectOneOf(cls, "tags", input.tags, UNION_TAG_TYPES),
        expectOneOf(cls, "index", input.index, LIST_INDEX_TYPES),
        readList(cls, "contents", input.contents).map(child),
        options,
      );
    default:
      return assertNever(cls, "form class");
  }
}

/** Inverse of toDict; also reads legacy class tags and record layouts. */
export function fromDict(input: unknown): Form {
  if (typeof input === "string") {
    return new NumpyForm(readPrimitive(FormClass.Numpy, input));
  }
  if (!isPlainObject(input)) {
    throw new TypeError(`form must be a dict or a primitive name, not ${describeValue(input)}`);
  }
  const tag = input.class;
  if (typeof tag !== "string") {
    throw new TypeError(`form dict 'class' must be a string, not ${describeValue(tag)}`);
  }
  return buildForm(resolveClass(tag), input, fromDict);
}

export function fromJson(text: string): Form {
  return fromDict(JSON.parse(text));
}

function restoredChild(owner: string): (value: unknown) => Form {
  return (value) => {
    if (!isForm(value)) {
      throw new TypeError(`${owner} state must hold Forms as children, not ${describeValue(value)}`);
    }
    return value;
  };
}

// Field names of the positional tail after [hasIdentities, parameters, formKey]
const POSITIONAL_FIELDS: Readonly<Record<FormClassName, readonly string[]>> = {
  [FormClass.Numpy]: ["inner_shape", "itemsize", "format"],
  [FormClass.Empty]: [],
  [FormClass.Regular]: ["content", "size"],
  [FormClass.List]: ["starts", "stops", "content"],
  [FormClass.ListOffset]: ["offsets", "content"],
  [FormClass.Indexed]: ["index", "content"],
  [FormClass.IndexedOption]: ["index", "content"],
  [FormClass.ByteMasked]: ["mask", "content", "valid_when"],
  [FormClass.BitMasked]: ["mask", "content", "valid_when", "lsb_order"],
  [FormClass.Unmasked]: ["content"],
  [FormClass.Record]: ["contents", "fields"],
  [FormClass.Union]: ["tags", "index", "contents"],
};

/** Primitive for a buffer-protocol format code such as "<d" or "M8[s]". */
function primitiveFromFormat(format: unknown, itemsize: unknown): Primitive {
  if (typeof format !== "string") {
    throw new TypeError(`NumpyArray 'format' must be a string, not ${describeValue(format)}`);
  }
  const code = format.replace(/^[<>=|@!]/, "");
  let primitive: Primitive | undefined;
  const time = /^([Mm])8(\[[^\]]+\])?$/.exec(code);
  if (time !== null) {
    const name = time[1] === "M" ? "datetime64" : "timedelta64";
    const unit = time[2] ?? "";
    const candidate = `${name}${unit}`;
    if (isPrimitive(candidate)) primitive = candidate;
  } else if (Object.hasOwn(LEGACY_FORMAT_TO_PRIMITIVE, code)) {
    primitive = LEGACY_FORMAT_TO_PRIMITIVE[code];
  }
  if (primitive === undefined) {
    throw new FormValueError(`NumpyArray format ${JSON.stringify(format)} is not recognised`);
  }
  if (typeof itemsize === "number" && itemsize !== primitiveItemSize(primitive)) {
    throw new FormValueError(
      `NumpyArray itemsize ${itemsize} does not match format ${JSON.stringify(format)}`,
    );
  }
  return primitive;
}

function restorePositional(cls: FormClassName, state: unknown[]): Form {
  const names = POSITIONAL_FIELDS[cls];
  if (state.length !== 3 + names.length) {
    throw new TypeError(
      `${cls} positional state must have ${3 + names.length} items, not ${state.length}`,
    );
  }
  const [, parameters, formKey, ...tail] = state;
  const input: Record<string, unknown> = { parameters };
  names.forEach((name, i) => {
    input[name] = tail[i];
  });
  if (typeof formKey === "string") {
    input.form_key = Legacy.FORM_KEY_PREFIX + formKey;
  } else {
    input.form_key = formKey;
  }
  if (cls === FormClass.Numpy) {
    input.primitive = primitiveFromFormat(input.format, input.itemsize);
  }
  debugLog("forms", `restoring ${cls} from positional state`);
  return buildForm(cls, input, restoredChild(cls));
}

/**
 * Rebuild a form from saved object state. A mapping holds constructor fields
 * by serialized name; an array is the older positional layout
 * `[hasIdentities, parameters, formKey, ...fields]`, whose form key gains the
 * "part0-" prefix.
 */
export function restoreFormState(className: string, state: unknown): Form {
  const cls = resolveClass(className);
  if (Array.isArray(state)) return restorePositional(cls, state);
  if (isPlainObject(state)) return buildForm(cls, state, restoredChild(cls));
  throw new TypeError(`${cls} state must be a mapping or a list, not ${describeValue(state)}`);
}

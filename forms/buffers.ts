/**
 * What a buffer provider must supply to build an array of a given form:
 * the (key, dtype) pairs, key naming, and zero-filled stubs for arrays of
 * length zero and one.
 */

import { FormValueError } from "../types.ts";
import { assertNever } from "../util.ts";
import {
  FormClass,
  INDEX_BYTE_SIZE,
  INDEX_TO_DTYPE,
  isUnknownLength,
  type Primitive,
  primitiveItemSize,
  Stub,
} from "./constants.ts";
import type { Form } from "./forms.ts";

/** Names the buffer holding `attribute` ("data", "offsets", "mask", ...) of `form`. */
export type BufferKey = (form: Form, attribute: string) => string;

export type BufferContainer = Readonly<Record<string, Uint8Array>>;

/** Builds an array from a form and its buffers; supplied by the array library. */
export interface BufferMaterializer<T> {
  fromBuffers(form: Form, length: number, container: BufferContainer, bufferKey: BufferKey): T;
}

export interface ExpectedBuffersOptions {
  /** Include the children's buffers, depth first (default true). */
  recursive?: boolean;
}

/** Yield `[key, dtype]` for every buffer the form reads, parents before children. */
export function* expectedFromBuffers(
  form: Form,
  getKey: BufferKey,
  options: ExpectedBuffersOptions = {},
): Generator<[string, Primitive]> {
  const recursive = options.recursive ?? true;
  switch (form.kind) {
    case FormClass.Numpy:
      yield [getKey(form, "data"), form.primitive];
      return;
    case FormClass.Empty:
      return;
    case FormClass.Regular:
    case FormClass.Unmasked:
      break;
    case FormClass.List:
      yield [getKey(form, "starts"), INDEX_TO_DTYPE[form.starts]];
      yield [getKey(form, "stops"), INDEX_TO_DTYPE[form.stops]];
      break;
    case FormClass.ListOffset:
      yield [getKey(form, "offsets"), INDEX_TO_DTYPE[form.offsets]];
      break;
    case FormClass.Indexed:
    case FormClass.IndexedOption:
      yield [getKey(form, "index"), INDEX_TO_DTYPE[form.index]];
      break;
    case FormClass.ByteMasked:
    case FormClass.BitMasked:
      yield [getKey(form, "mask"), INDEX_TO_DTYPE[form.mask]];
      break;
    case FormClass.Record:
      if (recursive) {
        for (const c of form.contents) yield* expectedFromBuffers(c, getKey, options);
      }
      return;
    case FormClass.Union:
      yield [getKey(form, "tags"), INDEX_TO_DTYPE[form.tags]];
      yield [getKey(form, "index"), INDEX_TO_DTYPE[form.index]];
      if (recursive) {
        for (const c of form.contents) yield* expectedFromBuffers(c, getKey, options);
      }
      return;
    default:
      assertNever(form, "form");
  }
  if (recursive) yield* expectedFromBuffers(form.content, getKey, options);
}

/**
 * Key function for a template such as "{form_key}-{attribute}". Every form
 * must have a form key when the template uses one.
 */
export function bufferKeyFromTemplate(template: string): BufferKey {
  return (form, attribute) =>
    template.replace(/\{(form_key|attribute)\}/g, (_, name: string) => {
      if (name === "attribute") return attribute;
      if (form.formKey === null) {
        throw new FormValueError(`cannot name the ${attribute} buffer of a ${form.kind} without a form_key`);
      }
      return form.formKey;
    });
}

/** Copy of `form` with keys `${prefix}0`, `${prefix}1`, ... in depth-first preorder. */
export function assignFormKeys(form: Form, prefix = "node"): Form {
  let next = 0;
  const visit = (node: Form): Form => {
    const formKey = `${prefix}${next++}`;
    switch (node.kind) {
      case FormClass.Numpy:
      case FormClass.Empty:
        return node.copy({ formKey });
      case FormClass.Regular:
      case FormClass.List:
      case FormClass.ListOffset:
      case FormClass.Indexed:
      case FormClass.IndexedOption:
      case FormClass.ByteMasked:
      case FormClass.BitMasked:
      case FormClass.Unmasked:
        return node.copy({ formKey, content: visit(node.content) });
      case FormClass.Record:
      case FormClass.Union:
        return node.copy({ formKey, contents: node.contents.map(visit) });
      default:
        return assertNever(node, "form");
    }
  };
  return visit(form);
}

// Bytes read from a zero-filled buffer by `length` elements of `form`. Zeroed
// offsets give empty lists; zeroed indexes all point at element 0.
function bytesNeeded(form: Form, length: number): number {
  const first = Math.min(length, 1);
  switch (form.kind) {
    case FormClass.Numpy:
      return form.innerShape.reduce((n, dim) => n * dim, length * primitiveItemSize(form.primitive));
    case FormClass.Empty:
      return 0;
    case FormClass.Regular:
      return bytesNeeded(form.content, isUnknownLength(form.size) ? 0 : length * form.size);
    case FormClass.List:
      return Math.max(length * INDEX_BYTE_SIZE[form.starts], bytesNeeded(form.content, 0));
    case FormClass.ListOffset:
      return Math.max((length + 1) * INDEX_BYTE_SIZE[form.offsets], bytesNeeded(form.content, 0));
    case FormClass.Indexed:
    case FormClass.IndexedOption:
      return Math.max(length * INDEX_BYTE_SIZE[form.index], bytesNeeded(form.content, first));
    case FormClass.ByteMasked:
      return Math.max(length, bytesNeeded(form.content, length));
    case FormClass.BitMasked:
      return Math.max(Math.ceil(length / 8), bytesNeeded(form.content, length));
    case FormClass.Unmasked:
      return bytesNeeded(form.content, length);
    case FormClass.Record:
      return Math.max(0, ...form.contents.map((c) => bytesNeeded(c, length)));
    case FormClass.Union:
      return Math.max(
        length,
        length * INDEX_BYTE_SIZE[form.index],
        ...form.contents.map((c, i) => bytesNeeded(c, i === 0 ? first : 0)),
      );
    default:
      return assertNever(form, "form");
  }
}

/** Container with one zero-filled buffer under key "" large enough for `length` elements. */
export function stubContainer(form: Form, length: 0 | 1): BufferContainer {
  const base = length === 0 ? Stub.LENGTH_ZERO_BYTES : Stub.LENGTH_ONE_BYTES;
  const needed = Math.ceil(bytesNeeded(form, length) / 8) * 8;
  return { "": new Uint8Array(Math.max(base, needed)) };
}

const STUB_KEY: BufferKey = () => "";

export function lengthZeroArray<T>(form: Form, materializer: BufferMaterializer<T>): T {
  return materializer.fromBuffers(form, 0, stubContainer(form, 0), STUB_KEY);
}

/** Array of one element whose every index, offset, mask and value reads as zero. */
export function lengthOneArray<T>(form: Form, materializer: BufferMaterializer<T>): T {
  return materializer.fromBuffers(form, 1, stubContainer(form, 1), STUB_KEY);
}

/**
 * Conversions between forms and semantic types, and the forms that
 * single host values are read into.
 */

import type { Parameters } from "../types.ts";
import { assertNever, describeValue } from "../util.ts";
import {
  ListType,
  NumpyType,
  OptionType,
  RecordType,
  RegularType,
  type Type,
  TypeKind,
  UnionType,
  UnknownType,
} from "../types/types.ts";
import { FormClass } from "./constants.ts";
import {
  EmptyForm,
  type Form,
  IndexedOptionForm,
  ListOffsetForm,
  NumpyForm,
  RecordForm,
  RegularForm,
  UnionForm,
} from "./forms.ts";
import { parametersUnion } from "./parameters.ts";

// Option layers merge, and an option over a union moves into every branch
function optionOf(content: Type, parameters: Parameters | null): Type {
  if (content instanceof OptionType) {
    return new OptionType(content.content, parametersUnion(content.parametersOrNull, parameters));
  }
  if (content instanceof UnionType) {
    return new UnionType(
      content.contents.map((c) => optionOf(c, null)),
      parametersUnion(content.parametersOrNull, parameters),
    );
  }
  return new OptionType(content, parameters);
}

/** The semantic type of a form: index dtypes and mask conventions are dropped. */
export function formType(form: Form): Type {
  const parameters = form.parametersOrNull;
  switch (form.kind) {
    case FormClass.Numpy: {
      // Inner dimensions become regular lists; parameters go on the outermost layer
      const shape = form.innerShape;
      let out: Type = new NumpyType(form.primitive, shape.length === 0 ? parameters : null);
      for (let i = shape.length - 1; i >= 0; i--) {
        out = new RegularType(out, shape[i], i === 0 ? parameters : null);
      }
      return out;
    }
    case FormClass.Empty:
      return new UnknownType(parameters);
    case FormClass.Regular:
      return new RegularType(formType(form.content), form.size, parameters);
    case FormClass.List:
    case FormClass.ListOffset:
      return new ListType(formType(form.content), parameters);
    case FormClass.Indexed: {
      const content = formType(form.content);
      if (parameters === null) return content;
      return content.withParameters(parametersUnion(content.parametersOrNull, parameters));
    }
    case FormClass.IndexedOption:
    case FormClass.ByteMasked:
    case FormClass.BitMasked:
    case FormClass.Unmasked:
      return optionOf(formType(form.content), parameters);
    case FormClass.Record:
      return new RecordType(form.contents.map(formType), form.fieldsOrNull, parameters);
    case FormClass.Union:
      return new UnionType(form.contents.map(formType), parameters);
    default:
      return assertNever(form, "form");
  }
}

/**
 * A form with the default encoding for `type`: 64-bit list offsets and option
 * indexes, 8-bit union tags with a 64-bit index.
 */
export function fromType(type: Type): Form {
  const parameters = type.parametersOrNull;
  switch (type.kind) {
    case TypeKind.Numpy:
      return new NumpyForm(type.primitive, [], { parameters });
    case TypeKind.Unknown:
      return new EmptyForm({ parameters });
    case TypeKind.List:
      return new ListOffsetForm("i64", fromType(type.content), { parameters });
    case TypeKind.Regular:
      return new RegularForm(fromType(type.content), type.size, { parameters });
    case TypeKind.Option:
      return IndexedOptionForm.simplified("i64", fromType(type.content), { parameters });
    case TypeKind.Record:
      return new RecordForm(type.contents.map(fromType), type.fieldsOrNull, { parameters });
    case TypeKind.Union:
      return new UnionForm("i8", "i64", type.contents.map(fromType), { parameters });
    default:
      return assertNever(type, "type");
  }
}

function stringForm(kind: "string" | "bytestring"): ListOffsetForm {
  const item = kind === "string" ? "char" : "byte";
  return new ListOffsetForm("i64", new NumpyForm("uint8", [], { parameters: { __array__: item } }), {
    parameters: { __array__: kind },
  });
}

/** The form of an array holding `value` as its only element. */
export function formForScalar(value: unknown): Form {
  if (typeof value === "boolean") return new NumpyForm("bool");
  if (typeof value === "bigint") return new NumpyForm("int64");
  if (typeof value === "number") {
    return new NumpyForm(Number.isInteger(value) ? "int64" : "float64");
  }
  if (typeof value === "string") return stringForm("string");
  if (value instanceof Uint8Array) return stringForm("bytestring");
  if (value instanceof Date) return new NumpyForm("datetime64[ms]");
  throw new TypeError(`cannot determine a form for ${describeValue(value)}`);
}

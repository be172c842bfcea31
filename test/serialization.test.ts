import { describe, it } from "node:test";
import assert from "node:assert/strict";
import {
  ByteMaskedForm,
  formToString,
  formType,
  fromDict,
  fromJson,
  isUnknownLength,
  ListOffsetForm,
  NumpyForm,
  RecordForm,
  RegularForm,
  toDict,
  toJson,
  unknownLength,
} from "../forms/index.ts";
import { FormValueError } from "../types.ts";
import { assertFormEqual, float64, int64, record, sampleForms } from "./test_utils.ts";

describe("toDict", () => {
  it("writes every field in verbose mode", () => {
    assert.deepEqual(toDict(int64()), {
      class: "NumpyArray",
      primitive: "int64",
      inner_shape: [],
      parameters: {},
      form_key: null,
    });
  });

  it("writes a plain leaf as its primitive below the top level", () => {
    const form = new ListOffsetForm("i64", float64());
    assert.deepEqual(toDict(form, { verbose: false }), {
      class: "ListOffsetArray",
      offsets: "i64",
      content: "float64",
    });
  });

  it("keeps the top level a dict", () => {
    assert.deepEqual(toDict(int64(), { verbose: false }), { class: "NumpyArray", primitive: "int64" });
  });

  it("writes non-default metadata in compact mode", () => {
    const form = new ByteMaskedForm("i8", new NumpyForm("int32", [4]), true, {
      parameters: { note: "x" },
      formKey: "m",
    });
    assert.deepEqual(toDict(form, { verbose: false }), {
      class: "ByteMaskedArray",
      mask: "i8",
      valid_when: true,
      content: { class: "NumpyArray", primitive: "int32", inner_shape: [4] },
      parameters: { note: "x" },
      form_key: "m",
    });
  });

  it("writes an unknown regular size as null", () => {
    const dict = toDict(new RegularForm(int64(), unknownLength), { verbose: false });
    assert.equal(dict.size, null);
    const back = fromDict(dict);
    assert.ok(back instanceof RegularForm);
    assert.ok(isUnknownLength(back.size));
  });

  it("writes tuples with null fields", () => {
    const dict = toDict(new RecordForm([int64()], null), { verbose: false });
    assert.deepEqual(dict, { class: "RecordArray", fields: null, contents: ["int64"] });
  });
});

describe("round trips", () => {
  for (const form of sampleForms()) {
    it(`restores ${form.kind} from its verbose dict`, () => {
      assertFormEqual(fromDict(toDict(form)), form);
    });

    it(`restores ${form.kind} from its compact dict`, () => {
      assertFormEqual(fromDict(toDict(form, { verbose: false })), form);
    });

    it(`restores ${form.kind} from JSON`, () => {
      const text = toJson(form);
      assert.deepEqual(JSON.parse(text), toDict(form));
      assertFormEqual(fromJson(text), form);
    });
  }
});

describe("formToString", () => {
  it("prints the compact dict indented by four spaces", () => {
    const text = formToString(new ListOffsetForm("i64", float64()));
    assert.equal(
      text,
      ["{", '    "class": "ListOffsetArray",', '    "offsets": "i64",', '    "content": "float64"', "}"].join("\n"),
    );
  });
});

describe("fromDict", () => {
  it("reads a bare primitive name", () => {
    assertFormEqual(fromDict("datetime64[s]"), new NumpyForm("datetime64[s]"));
  });

  it("maps width-suffixed class tags onto one variant", () => {
    const current = fromDict({ class: "ListOffsetArray", offsets: "i64", content: "int64" });
    assertFormEqual(fromDict({ class: "ListOffsetArray64", offsets: "i64", content: "int64" }), current);
    const list = fromDict({ class: "ListArray32", starts: "i32", stops: "i32", content: "int64" });
    assert.equal(list.kind, "ListArray");
    assert.ok(formType(list).isEqualTo(formType(current)));
    const union = fromDict({ class: "UnionArray8_U32", tags: "i8", index: "u32", contents: ["int64", "bool"] });
    assert.equal(union.kind, "UnionArray");
  });

  it("reads records keyed by field name", () => {
    const legacy = fromDict({ class: "RecordArray", contents: { x: "int64", y: "float64" } });
    const current = fromDict({ class: "RecordArray", fields: ["x", "y"], contents: ["int64", "float64"] });
    assert.ok(legacy instanceof RecordForm);
    assert.ok(current instanceof RecordForm);
    assert.deepEqual(legacy.fields, current.fields);
    assertFormEqual(legacy, current);
    assertFormEqual(legacy, record({ x: int64(), y: float64() }));
  });

  it("reads records without fields as tuples", () => {
    const legacy = fromDict({ class: "RecordArray", contents: ["int64", "bool"] });
    assert.ok(legacy instanceof RecordForm);
    assert.equal(legacy.isTuple, true);
  });

  it("rejects new-style records with mapped contents", () => {
    assert.throws(
      () => fromDict({ class: "RecordArray", fields: ["x"], contents: { x: "int64" } }),
      TypeError,
    );
  });

  it("rejects virtual arrays", () => {
    assert.throws(() => fromDict({ class: "VirtualArray", form: "int64" }), (err: unknown) => {
      assert.ok(err instanceof FormValueError);
      assert.match(err.message, /^VirtualArray is a lazy array/);
      return true;
    });
  });

  it("names an unrecognised class tag", () => {
    assert.throws(() => fromDict({ class: "FooArray" }), {
      name: "FormValueError",
      message: 'input class: "FooArray" was not recognised',
    });
  });

  it("rejects malformed input", () => {
    assert.throws(() => fromDict({ primitive: "int64" }), {
      name: "TypeError",
      message: "form dict 'class' must be a string, not undefined",
    });
    assert.throws(() => fromDict(42), {
      name: "TypeError",
      message: "form must be a dict or a primitive name, not 42",
    });
    assert.throws(() => fromDict("int63"), TypeError);
  });

  it("names the field and value of a bad dtype", () => {
    assert.throws(() => fromDict({ class: "ListOffsetArray", offsets: "i8", content: "int64" }), {
      name: "TypeError",
      message: 'ListOffsetArray \'offsets\' must be one of i32, u32, i64, not "i8"',
    });
    assert.throws(() => fromDict({ class: "IndexedOptionArray", index: "u32", content: "int64" }), {
      name: "TypeError",
      message: 'IndexedOptionArray \'index\' must be one of i32, i64, not "u32"',
    });
  });

  it("rejects non-boolean flags and non-dict parameters", () => {
    assert.throws(() => fromDict({ class: "ByteMaskedArray", mask: "i8", valid_when: "yes", content: "int64" }), {
      name: "TypeError",
      message: 'ByteMaskedArray \'valid_when\' must be bool, not "yes"',
    });
    assert.throws(() => fromDict({ class: "NumpyArray", primitive: "int64", parameters: [1] }), {
      name: "TypeError",
      message: "NumpyArray 'parameters' must be of type dict or None, not [1]",
    });
  });

  it("rejects mismatched record fields", () => {
    assert.throws(
      () => fromDict({ class: "RecordArray", fields: ["a", "b"], contents: ["int64"] }),
      FormValueError,
    );
  });
});

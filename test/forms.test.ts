import { describe, it } from "node:test";
import assert from "node:assert/strict";
import {
  ByteMaskedForm,
  EmptyForm,
  formType,
  IndexedForm,
  IndexedOptionForm,
  isForm,
  isReservedParameter,
  ListOffsetForm,
  NumpyForm,
  RecordForm,
  RegularForm,
  UnionForm,
  UnmaskedForm,
} from "../forms/index.ts";
import { FieldNotFoundError, FormValueError, type JSONValue, type Parameters } from "../types.ts";
import { float64, int64, record, sampleForms, stringForm } from "./test_utils.ts";

describe("construction", () => {
  it("rejects negative inner shapes", () => {
    assert.throws(() => new NumpyForm("int64", [-1]), {
      name: "TypeError",
      message: "NumpyForm 'inner_shape' must be a list of non-negative integers, not [-1]",
    });
  });

  it("rejects fractional regular sizes", () => {
    assert.throws(() => new RegularForm(int64(), 1.5), {
      name: "TypeError",
      message: "RegularForm 'size' must be a non-negative integer or unknown length, not 1.5",
    });
  });

  it("rejects records whose fields and contents disagree", () => {
    assert.throws(() => new RecordForm([int64()], ["a", "b"]), FormValueError);
    assert.throws(() => new RecordForm([int64(), float64()], ["a", "a"]), {
      name: "FormValueError",
      message: 'RecordForm \'fields\' contains duplicate name "a"',
    });
  });

  it("recognises every variant", () => {
    for (const form of sampleForms()) {
      assert.ok(isForm(form), form.kind);
    }
    assert.equal(isForm({ kind: "NumpyArray" }), false);
  });
});

describe("copy", () => {
  const base = new NumpyForm("int64", [], { parameters: { a: 1 }, formKey: "k" });

  it("keeps every field when nothing is given", () => {
    const copy = base.copy();
    assert.notEqual(copy, base);
    assert.ok(copy.equals(base));
  });

  it("sets a given field and keeps the rest", () => {
    const copy = base.copy({ primitive: "float64" });
    assert.equal(copy.primitive, "float64");
    assert.equal(copy.formKey, "k");
    assert.deepEqual(copy.parameters, { a: 1 });
  });

  it("clears nullable fields given as null", () => {
    assert.equal(base.copy({ formKey: null }).formKey, null);
    assert.equal(base.copy({ parameters: null }).parametersOrNull, null);
  });

  it("turns a record into a tuple when fields are cleared", () => {
    const rec = record({ a: int64(), b: float64() });
    const tuple = rec.copy({ fields: null });
    assert.equal(tuple.isTuple, true);
    assert.deepEqual(tuple.fields, ["0", "1"]);
  });
});

describe("parameters", () => {
  it("copies the map given to the constructor", () => {
    const list: JSONValue[] = [1];
    const given: Parameters = { x: "1", nested: { y: list } };
    const form = new NumpyForm("int64", [], { parameters: given });
    given.x = "2";
    list.push(2);
    assert.deepEqual(form.parameters, { x: "1", nested: { y: [1] } });
    assert.ok(form.equals(new NumpyForm("int64", [], { parameters: { x: "1", nested: { y: [1] } } })));
  });

  it("cannot be changed through the getter", () => {
    const plain = new ListOffsetForm("i64", new NumpyForm("uint8"));
    assert.throws(() => {
      plain.parameters.__array__ = "string";
    }, TypeError);
    assert.equal(formType(plain).toString(), "var * uint8");

    const tagged = new ListOffsetForm("i64", new NumpyForm("uint8"), { parameters: { a: { b: 1 } } });
    const copy = tagged.copy({ formKey: "k" });
    assert.throws(() => {
      copy.parameters.a = 2;
    }, TypeError);
    assert.deepEqual(tagged.parameters, { a: { b: 1 } });
  });
});

describe("equals", () => {
  it("treats missing and empty parameters alike", () => {
    assert.ok(int64().equals(new NumpyForm("int64", [], { parameters: {} })));
  });

  it("compares parameters and form keys exactly", () => {
    assert.equal(int64().equals(new NumpyForm("int64", [], { parameters: { x: 1 } })), false);
    assert.equal(int64().equals(new NumpyForm("int64", [], { formKey: "k" })), false);
  });

  it("compares named records as maps", () => {
    const ab = new RecordForm([int64(), float64()], ["a", "b"]);
    const ba = new RecordForm([float64(), int64()], ["b", "a"]);
    assert.ok(ab.equals(ba));
    assert.equal(ab.equals(new RecordForm([int64(), float64()], null)), false);
  });

  it("compares physical encodings", () => {
    assert.equal(
      new ListOffsetForm("i32", int64()).equals(new ListOffsetForm("i64", int64())),
      false,
    );
    assert.equal(
      new ByteMaskedForm("i8", int64(), true).equals(new ByteMaskedForm("i8", int64(), false)),
      false,
    );
  });
});

describe("record lookups", () => {
  const rec = record({ a: int64(), b: float64() });
  const tuple = new RecordForm([int64(), float64()], null);

  it("maps fields to positions", () => {
    assert.equal(rec.fieldToIndex("b"), 1);
    assert.equal(rec.indexToField(0), "a");
    assert.equal(rec.hasField("c"), false);
    assert.ok(rec.content("b").equals(float64()));
    assert.ok(rec.content(0).equals(int64()));
  });

  it("addresses tuple slots by position", () => {
    assert.deepEqual(tuple.fields, ["0", "1"]);
    assert.equal(tuple.fieldToIndex("1"), 1);
    assert.equal(tuple.hasField("1"), true);
    assert.equal(tuple.hasField("2"), false);
  });

  it("names the field and the field count on a miss", () => {
    assert.throws(() => rec.content(5), {
      name: "FieldNotFoundError",
      message: "no index 5 in record with 2 fields",
    });
    assert.throws(() => rec.content("zz"), {
      name: "FieldNotFoundError",
      message: 'no field "zz" in record with 2 fields',
    });
    assert.throws(() => tuple.fieldToIndex("2"), (err: unknown) => {
      assert.ok(err instanceof FieldNotFoundError);
      assert.ok(err instanceof RangeError);
      assert.equal(err.field, "2");
      assert.equal(err.fieldCount, 2);
      return true;
    });
  });
});

describe("depth queries", () => {
  it("counts list dimensions", () => {
    assert.equal(new NumpyForm("int64", [2, 3]).purelistDepth, 3);
    const list = new ListOffsetForm("i64", int64());
    assert.equal(list.purelistDepth, 2);
    assert.deepEqual(list.minmaxDepth, [2, 2]);
    assert.equal(new RegularForm(list, 2).purelistIsRegular, false);
    assert.equal(new RegularForm(int64(), 2).purelistIsRegular, true);
  });

  it("counts a string as one dimension", () => {
    assert.equal(stringForm().purelistDepth, 1);
    assert.deepEqual(stringForm().branchDepth, [false, 1]);
  });

  it("sees through option and indexed layers", () => {
    const option = new IndexedOptionForm("i64", new ListOffsetForm("i64", int64()));
    assert.equal(option.purelistDepth, 2);
    assert.equal(option.dimensionOptiontype, true);
    assert.equal(new IndexedForm("i64", int64()).dimensionOptiontype, false);
  });

  it("reports branching records", () => {
    const rec = record({ a: new ListOffsetForm("i64", int64()), b: int64() });
    assert.equal(rec.purelistDepth, 1);
    assert.deepEqual(rec.minmaxDepth, [1, 2]);
    assert.deepEqual(rec.branchDepth, [true, 1]);
  });

  it("marks unions of different depths", () => {
    const union = new UnionForm("i8", "i64", [int64(), new ListOffsetForm("i64", int64())]);
    assert.equal(union.purelistDepth, -1);
    assert.equal(new UnionForm("i8", "i64", [int64(), float64()]).purelistDepth, 1);
  });

  it("finds list parameters through wrappers", () => {
    assert.equal(stringForm().purelistParameter("__array__"), "string");
    assert.equal(new IndexedOptionForm("i64", stringForm()).purelistParameter("__array__"), "string");
    assert.equal(record({ s: stringForm() }).purelistParameter("__array__"), null);
  });
});

describe("flags", () => {
  it("classifies variants", () => {
    assert.equal(new EmptyForm().isUnknown, true);
    assert.equal(new ListOffsetForm("i64", int64()).isList, true);
    assert.equal(new RegularForm(int64(), 1).isList, false);
    assert.equal(new UnmaskedForm(int64()).isOption, true);
    assert.equal(new IndexedOptionForm("i64", int64()).isIndexed, true);
    assert.equal(new IndexedForm("i64", int64()).isOption, false);
    assert.equal(new EmptyForm().isIdentityLike, true);
  });
});

describe("form keys", () => {
  it("can be set after construction", () => {
    const form = int64();
    form.formKey = "node7";
    assert.equal(form.formKey, "node7");
    assert.equal(form.copy().formKey, "node7");
  });
});

describe("reserved parameters", () => {
  it("knows the nominal array markers", () => {
    assert.equal(isReservedParameter("__array__", "string"), true);
    assert.equal(isReservedParameter("__array__", "categorical"), true);
    assert.equal(isReservedParameter("__array__", "widget"), false);
    assert.equal(isReservedParameter("__record__", "string"), false);
  });
});

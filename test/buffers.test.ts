import { describe, it } from "node:test";
import assert from "node:assert/strict";
import {
  assignFormKeys,
  BitMaskedForm,
  type BufferContainer,
  type BufferKey,
  bufferKeyFromTemplate,
  type BufferMaterializer,
  ByteMaskedForm,
  expectedFromBuffers,
  type Form,
  IndexedOptionForm,
  lengthOneArray,
  lengthZeroArray,
  ListForm,
  ListOffsetForm,
  NumpyForm,
  RecordForm,
  RegularForm,
  stubContainer,
  UnionForm,
} from "../forms/index.ts";
import { FormValueError } from "../types.ts";
import { float64, int64, record } from "./test_utils.ts";

const KEYS = bufferKeyFromTemplate("{form_key}-{attribute}");

describe("expectedFromBuffers", () => {
  it("lists buffers depth first, parents before children", () => {
    const form = assignFormKeys(
      record({ a: new ListOffsetForm("i32", float64()), b: new IndexedOptionForm("i64", int64()) }),
    );
    assert.deepEqual(
      [...expectedFromBuffers(form, KEYS)],
      [
        ["node1-offsets", "int32"],
        ["node2-data", "float64"],
        ["node3-index", "int64"],
        ["node4-data", "int64"],
      ],
    );
  });

  it("lists only the node's own buffers when not recursive", () => {
    const form = assignFormKeys(new ListForm("u32", "u32", int64()));
    assert.deepEqual(
      [...expectedFromBuffers(form, KEYS, { recursive: false })],
      [
        ["node0-starts", "uint32"],
        ["node0-stops", "uint32"],
      ],
    );
  });

  it("names mask, tag and index dtypes", () => {
    const form = assignFormKeys(
      new UnionForm("i8", "i32", [
        new ByteMaskedForm("i8", new NumpyForm("bool"), true),
        new BitMaskedForm("u8", new RegularForm(float64(), 2), true, false),
      ]),
    );
    assert.deepEqual(
      [...expectedFromBuffers(form, KEYS)],
      [
        ["node0-tags", "int8"],
        ["node0-index", "int32"],
        ["node1-mask", "int8"],
        ["node2-data", "bool"],
        ["node3-mask", "uint8"],
        ["node5-data", "float64"],
      ],
    );
  });
});

describe("bufferKeyFromTemplate", () => {
  it("substitutes every placeholder", () => {
    const key = bufferKeyFromTemplate("{form_key}/{attribute}/{form_key}");
    assert.equal(key(new NumpyForm("int64", [], { formKey: "k" }), "data"), "k/data/k");
    assert.equal(bufferKeyFromTemplate("{attribute}")(int64(), "data"), "data");
  });

  it("needs a form key when the template uses one", () => {
    assert.throws(() => KEYS(int64(), "data"), {
      name: "FormValueError",
      message: "cannot name the data buffer of a NumpyArray without a form_key",
    });
    assert.throws(() => KEYS(int64(), "data"), FormValueError);
  });
});

describe("assignFormKeys", () => {
  it("numbers nodes in preorder with the given prefix", () => {
    const form = assignFormKeys(record({ a: int64(), b: new ListOffsetForm("i64", float64()) }), "p");
    assert.ok(form instanceof RecordForm);
    assert.equal(form.formKey, "p0");
    assert.deepEqual(
      form.contents.map((c) => c.formKey),
      ["p1", "p2"],
    );
    const list = form.content("b");
    assert.ok(list instanceof ListOffsetForm);
    assert.equal(list.content.formKey, "p3");
  });

  it("leaves the input untouched", () => {
    const input = int64();
    assignFormKeys(input);
    assert.equal(input.formKey, null);
  });
});

describe("stubContainer", () => {
  const size = (form: Form, length: 0 | 1): number => stubContainer(form, length)[""].length;

  it("uses the minimum sizes for small forms", () => {
    assert.equal(size(int64(), 0), 8);
    assert.equal(size(int64(), 1), 32);
    assert.equal(size(new ListOffsetForm("i64", int64()), 1), 32);
  });

  it("grows for wide elements", () => {
    assert.equal(size(new NumpyForm("int64", [10]), 1), 80);
    assert.equal(size(new NumpyForm("complex256", [2]), 1), 64);
    assert.equal(size(new RegularForm(float64(), 5), 1), 40);
    assert.equal(size(new UnionForm("i8", "i64", [new NumpyForm("int64", [6]), int64()]), 1), 48);
  });

  it("rounds up to whole words", () => {
    assert.equal(size(new RecordForm([new NumpyForm("int32", [9])], null), 1), 40);
  });

  it("is zero-filled", () => {
    assert.ok(stubContainer(new NumpyForm("int64", [10]), 1)[""].every((b) => b === 0));
  });
});

interface Call {
  form: Form;
  length: number;
  bytes: number;
  key: string;
}

const recorder: BufferMaterializer<Call> = {
  fromBuffers(form: Form, length: number, container: BufferContainer, bufferKey: BufferKey): Call {
    const key = bufferKey(form, "data");
    return { form, length, bytes: container[key].length, key };
  },
};

describe("length-zero and length-one arrays", () => {
  it("hands the materializer one buffer under the empty key", () => {
    const form = float64();
    assert.deepEqual(lengthZeroArray(form, recorder), { form, length: 0, bytes: 8, key: "" });
    assert.deepEqual(lengthOneArray(form, recorder), { form, length: 1, bytes: 32, key: "" });
  });
});

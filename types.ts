/**
 * Shared types for form parameters and errors.
 */

/** JSON-serializable value carried in form and type parameters */
export type JSONValue =
  | string
  | number
  | boolean
  | null
  | JSONValue[]
  | { [key: string]: JSONValue };

/** String-keyed parameter map attached to forms and types, e.g. {"__array__": "string"} */
export type Parameters = { [key: string]: JSONValue };

/**
 * A value that is well-typed but not acceptable: an unrecognized class tag,
 * an unsupported legacy construct, or fields that disagree with each other.
 */
export class FormValueError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FormValueError";
  }
}

/**
 * Lookup of a record field or index that the record does not have.
 */
export class FieldNotFoundError extends RangeError {
  readonly field: string | number;
  readonly fieldCount: number;

  constructor(field: string | number, fieldCount: number) {
    const what = typeof field === "number" ? `index ${field}` : `field ${JSON.stringify(field)}`;
    super(`no ${what} in record with ${fieldCount} fields`);
    this.name = "FieldNotFoundError";
    this.field = field;
    this.fieldCount = fieldCount;
  }
}

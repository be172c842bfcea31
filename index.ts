export * from "./forms/index.ts";
export * from "./types/index.ts";
export { FieldNotFoundError, FormValueError, type JSONValue, type Parameters } from "./types.ts";
export { config, setDebug } from "./config.ts";

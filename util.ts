import { config } from "./config.ts";

/** Log to stdout under a scope prefix when debug logging is on. */
export function debugLog(scope: string, ...args: unknown[]): void {
  if (config.debug) {
    console.log(`[${scope}]`, ...args);
  }
}

/** Render a received value for an error message. */
export function describeValue(value: unknown): string {
  if (value === undefined) return "undefined";
  if (typeof value === "bigint") return `${value}n`;
  if (typeof value === "function") return `function ${value.name || "<anonymous>"}`;
  if (typeof value === "symbol") return value.toString();
  if (value !== null && typeof value === "object" && typeof value.constructor === "function") {
    const ctor = value.constructor.name;
    if (ctor !== "Object" && ctor !== "Array") return `<${ctor}>`;
  }
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== "object" || Array.isArray(value)) return false;
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/** Freeze `value` and everything reachable from it; returns `value`. */
export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

/** Exhaustiveness check for switches over closed unions. */
export function assertNever(value: never, what: string): never {
  throw new Error(`Unhandled ${what}: ${describeValue(value)}`);
}

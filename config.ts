/**
 * Runtime configuration.
 *
 * RAGGED_FORMS_DEBUG - "1" or "true" turns on debug logging of legacy-format
 *                      conversions and other decisions made while reading forms.
 */

function parseFlag(val: string | undefined): boolean {
  if (!val) return false;
  return val === "1" || val.toLowerCase() === "true";
}

export const config = {
  debug: parseFlag(process.env.RAGGED_FORMS_DEBUG),
};

/** Override the debug flag at run time (tests, REPL sessions). */
export function setDebug(enabled: boolean): void {
  config.debug = enabled;
}

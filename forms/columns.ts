/**
 * Column paths: dotted field names from the root to each leaf, and the
 * projection and pruning of forms by glob patterns over those paths.
 */

import picomatch from "picomatch";
import { assertNever, describeValue } from "../util.ts";
import type { Type } from "../types/types.ts";
import { FormClass } from "./constants.ts";
import { formType } from "./derive.ts";
import { type Form, RecordForm, type UnionForm } from "./forms.ts";
import { isStringLike } from "./parameters.ts";

export interface ColumnsOptions {
  /** Path segment appended at each list boundary, e.g. "list". */
  listIndicator?: string | null;
  /** Segments prepended to every path. */
  columnPrefix?: readonly string[];
}

/** Dotted path to every leaf, in depth-first order. Strings count as leaves. */
export function columns(form: Form, options: ColumnsOptions = {}): string[] {
  const out: string[] = [];
  collectColumns(form, [...(options.columnPrefix ?? [])], options.listIndicator ?? null, out);
  return out;
}

function collectColumns(form: Form, path: string[], indicator: string | null, out: string[]): void {
  switch (form.kind) {
    case FormClass.Numpy:
    case FormClass.Empty:
      out.push(path.join("."));
      return;
    case FormClass.Regular:
    case FormClass.List:
    case FormClass.ListOffset:
      if (isStringLike(form.parametersOrNull)) {
        out.push(path.join("."));
        return;
      }
      collectColumns(form.content, indicator === null ? path : [...path, indicator], indicator, out);
      return;
    case FormClass.Indexed:
    case FormClass.IndexedOption:
    case FormClass.ByteMasked:
    case FormClass.BitMasked:
    case FormClass.Unmasked:
      collectColumns(form.content, path, indicator, out);
      return;
    case FormClass.Record: {
      const fields = form.fields;
      form.contents.forEach((c, i) => collectColumns(c, [...path, fields[i]], indicator, out));
      return;
    }
    case FormClass.Union:
      for (const c of form.contents) collectColumns(c, path, indicator, out);
      return;
    default:
      assertNever(form, "form");
  }
}

/** Type of every leaf, in `columns()` order. */
export function columnTypes(form: Form): Type[] {
  const out: Type[] = [];
  collectTypes(form, out);
  return out;
}

function collectTypes(form: Form, out: Type[]): void {
  switch (form.kind) {
    case FormClass.Numpy:
    case FormClass.Empty:
      out.push(formType(form));
      return;
    case FormClass.Regular:
    case FormClass.List:
    case FormClass.ListOffset:
      if (isStringLike(form.parametersOrNull)) {
        out.push(formType(form));
        return;
      }
      collectTypes(form.content, out);
      return;
    case FormClass.Indexed:
    case FormClass.IndexedOption:
    case FormClass.ByteMasked:
    case FormClass.BitMasked:
    case FormClass.Unmasked:
      collectTypes(form.content, out);
      return;
    case FormClass.Record:
    case FormClass.Union:
      for (const c of form.contents) collectTypes(c, out);
      return;
    default:
      assertNever(form, "form");
  }
}

const INNERMOST_GROUP = /\{([^{}]*)\}/;

/**
 * Expand `{a,b}` alternation groups, innermost first, into the cross product
 * of their alternatives. Identical expansions appear once.
 */
export function expandBraces(pattern: string): string[] {
  const out: string[] = [];
  const seen = new Set<string>();
  const pending = [pattern];
  for (let i = 0; i < pending.length; i++) {
    const current = pending[i];
    const match = INNERMOST_GROUP.exec(current);
    if (match === null) {
      if (!seen.has(current)) {
        seen.add(current);
        out.push(current);
      }
      continue;
    }
    const head = current.slice(0, match.index);
    const tail = current.slice(match.index + match[0].length);
    for (const alternative of match[1].split(",")) {
      pending.push(head + alternative + tail);
    }
  }
  return out;
}

type Matcher = (field: string) => boolean;

// LRU matcher cache. Maps iterate in insertion order, so re-inserting a hit
// moves it to the end and keys().next() is the oldest entry.
const MATCHER_CACHE = new Map<string, Matcher>();
const MATCHER_CACHE_LIMIT = 1024;

const GLOB_OPTIONS: picomatch.PicomatchOptions = {
  nobrace: true,
  noextglob: true,
  nonegate: true,
  dot: true,
};

// Stands in for "/" on both sides, so that picomatch sees no path separator
// and "*" or "?" can match a slash in a field name.
const SLASH_STANDIN = "\u0000";

function segmentMatcher(segment: string): Matcher {
  const glob = picomatch(segment.replaceAll("/", SLASH_STANDIN), GLOB_OPTIONS);
  return (field) => glob(field.replaceAll("/", SLASH_STANDIN));
}

function getMatcher(segment: string): Matcher {
  const cached = MATCHER_CACHE.get(segment);
  if (cached !== undefined) {
    MATCHER_CACHE.delete(segment);
    MATCHER_CACHE.set(segment, cached);
    return cached;
  }

  // picomatch rejects empty patterns; an empty segment names an empty field
  const matcher: Matcher = segment === "" ? (field) => field === "" : segmentMatcher(segment);
  MATCHER_CACHE.set(segment, matcher);

  if (MATCHER_CACHE.size > MATCHER_CACHE_LIMIT) {
    const oldest = MATCHER_CACHE.keys().next();
    if (!oldest.done) MATCHER_CACHE.delete(oldest.value);
  }

  return matcher;
}

export type ColumnSpecifier = string | readonly string[];

export interface SelectColumnsOptions {
  /** Expand `{a,b}` groups before matching (default true). */
  expandBraces?: boolean;
}

function parseSpecifier(specifier: unknown, expand: boolean): string[][] {
  let patterns: string[];
  if (typeof specifier === "string") {
    patterns = [specifier];
  } else if (Array.isArray(specifier) && specifier.every((s) => typeof s === "string")) {
    patterns = [];
    for (const s of specifier) {
      if (typeof s === "string") patterns.push(s);
    }
  } else {
    throw new TypeError(
      `specifier must be a string or a list of strings, not ${describeValue(specifier)}`,
    );
  }
  const out: string[][] = [];
  const seen = new Set<string>();
  for (const p of patterns) {
    for (const expanded of expand ? expandBraces(p) : [p]) {
      if (seen.has(expanded)) continue;
      seen.add(expanded);
      out.push(expanded === "" ? [] : expanded.split("."));
    }
  }
  return out;
}

/**
 * Keep the record fields that some pattern reaches. Each pattern is a dotted
 * path of glob segments; "" selects everything. Records left without fields
 * are dropped below the top level, together with the layers above them.
 */
export function selectColumns(
  form: Form,
  specifier: ColumnSpecifier,
  options: SelectColumnsOptions = {},
): Form {
  const patterns = parseSpecifier(specifier, options.expandBraces ?? true);
  return select(form, patterns, false) ?? new RecordForm([], []);
}

// null means the subtree was emptied and goes away
function select(form: Form, patterns: readonly string[][], nested: boolean): Form | null {
  if (patterns.some((p) => p.length === 0)) return form;
  switch (form.kind) {
    case FormClass.Numpy:
    case FormClass.Empty:
      // Patterns continue past this leaf, so none of them names it
      return nested ? null : form;
    case FormClass.Regular:
    case FormClass.List:
    case FormClass.ListOffset:
    case FormClass.Indexed:
    case FormClass.IndexedOption:
    case FormClass.ByteMasked:
    case FormClass.BitMasked:
    case FormClass.Unmasked: {
      const content = select(form.content, patterns, nested);
      if (content === null) return null;
      return content === form.content ? form : form.copy({ content });
    }
    case FormClass.Record: {
      const fields = form.fields;
      const keptContents: Form[] = [];
      const keptFields: string[] = [];
      form.contents.forEach((c, i) => {
        const matcher = (segment: string) => getMatcher(segment)(fields[i]);
        const next = patterns.filter((p) => matcher(p[0])).map((p) => p.slice(1));
        if (next.length === 0) return;
        const content = select(c, next, true);
        if (content === null) return;
        keptContents.push(content);
        keptFields.push(fields[i]);
      });
      return rebuildRecord(form, keptContents, keptFields, nested);
    }
    case FormClass.Union:
      return rebuildUnion(
        form,
        form.contents.map((c) => select(c, patterns, true)),
        nested,
      );
    default:
      return assertNever(form, "form");
  }
}

function rebuildRecord(
  form: RecordForm,
  contents: Form[],
  fields: string[],
  nested: boolean,
): Form | null {
  if (form.contents.length > 0 && contents.length === 0) {
    return nested ? null : form.copy({ contents: [], fields: form.isTuple ? null : [] });
  }
  if (contents.length === form.contents.length && contents.every((c, i) => c === form.contents[i])) {
    return form;
  }
  // Tuples stay tuples; surviving slots are renumbered
  return form.copy({ contents, fields: form.isTuple ? null : fields });
}

function rebuildUnion(form: UnionForm, branches: (Form | null)[], nested: boolean): Form | null {
  const kept = branches.filter((b): b is Form => b !== null);
  if (form.contents.length === 0 && !nested) return form;
  if (kept.length === 0) return nested ? null : new RecordForm([], []);
  if (kept.length < form.contents.length) {
    return kept.length === 1 ? kept[0] : form.copy({ contents: kept });
  }
  return kept.every((b, i) => b === form.contents[i]) ? form : form.copy({ contents: kept });
}

/**
 * Drop records with no fields below the top level, then every layer left
 * without content. The top level is never dropped.
 */
export function pruneColumns(form: Form): Form {
  return prune(form, false) ?? new RecordForm([], []);
}

function prune(form: Form, nested: boolean): Form | null {
  switch (form.kind) {
    case FormClass.Numpy:
    case FormClass.Empty:
      return form;
    case FormClass.Regular:
    case FormClass.List:
    case FormClass.ListOffset:
    case FormClass.Indexed:
    case FormClass.IndexedOption:
    case FormClass.ByteMasked:
    case FormClass.BitMasked:
    case FormClass.Unmasked: {
      const content = prune(form.content, nested);
      if (content === null) return null;
      return content === form.content ? form : form.copy({ content });
    }
    case FormClass.Record: {
      if (form.contents.length === 0) return nested ? null : form;
      const fields = form.fields;
      const keptContents: Form[] = [];
      const keptFields: string[] = [];
      form.contents.forEach((c, i) => {
        const content = prune(c, true);
        if (content === null) return;
        keptContents.push(content);
        keptFields.push(fields[i]);
      });
      return rebuildRecord(form, keptContents, keptFields, nested);
    }
    case FormClass.Union:
      return rebuildUnion(
        form,
        form.contents.map((c) => prune(c, true)),
        nested,
      );
    default:
      return assertNever(form, "form");
  }
}

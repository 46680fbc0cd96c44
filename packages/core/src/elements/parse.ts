/**
 * packages/core/src/elements/parse.ts - Untyped element list validation.
 *
 * Narrows caller-supplied JSON into DiagramElement values before anything is
 * rendered. Wire fields are snake_case (`bar_width`, `top_connector`); the
 * camelCase spelling is accepted too. A malformed element rejects the whole
 * list with a structured fatal naming the element, field, expected type and
 * received value. Unknown element types are skipped with a warning, or
 * rejected when `strict` is set.
 */

import { type Fatal, type Result, fatalToError } from "../errors.js";
import { type DiagramOptions, type DiagramSlot, renderDiagramSlots } from "../layout/diagram.js";
import type { ArrowDirection } from "../renderer/primitives.js";
import type { BarDatum } from "../widgets/barChart.js";
import { toBoxLines } from "./el.js";
import { type DiagramElement, type DiagramElementType, ELEMENT_TYPES } from "./types.js";

export type ParseElementsOptions = Readonly<{
  /** Reject unknown element types instead of skipping them (default: false) */
  strict?: boolean | undefined;
  /** Receives skipped-element diagnostics (default: console.warn outside production) */
  warn?: ((message: string) => void) | undefined;
}>;

type Bag = Readonly<Record<string, unknown>>;

const DEV_MODE = (process.env.NODE_ENV ?? "development") !== "production";

function warnDev(message: string): void {
  if (!DEV_MODE) return;
  console.warn(message);
}

const ELEMENT_TYPE_SET: ReadonlySet<string> = new Set(ELEMENT_TYPES);

function isRecord(v: unknown): v is Bag {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function describeReceivedType(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

function describeReceived(value: unknown): string {
  if (Array.isArray(value) || isRecord(value)) return describeReceivedType(value);
  return `${describeReceivedType(value)} (${String(value)})`;
}

function snakeToCamel(name: string): string {
  return name.replace(/_([a-z])/g, (_, ch: string) => ch.toUpperCase());
}

function isElementType(v: unknown): v is DiagramElementType {
  return typeof v === "string" && ELEMENT_TYPE_SET.has(v);
}

function parseFiniteNumber(value: unknown): number | undefined {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === "string") {
    const trimmed = value.trim();
    if (trimmed.length === 0) return undefined;
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

/** Cell text: strings as-is, numbers and booleans stringified. */
function parseCellText(value: unknown): string | undefined {
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return undefined;
}

function parseStringList(value: unknown): readonly string[] | undefined {
  if (!Array.isArray(value)) return undefined;
  const out: string[] = [];
  for (const item of value) {
    const text = parseCellText(item);
    if (text === undefined) return undefined;
    out.push(text);
  }
  return Object.freeze(out);
}

function parseBoxContent(value: unknown): readonly string[] | undefined {
  if (typeof value === "string") return toBoxLines(value);
  if (isRecord(value)) {
    if (value.lines !== undefined) return parseStringList(value.lines);
    if (typeof value.text === "string") return toBoxLines(value.text);
    return undefined;
  }
  return parseStringList(value);
}

/** `[label, value]` tuple or `{label, value}` object. */
function parseBarDatum(value: unknown): BarDatum | undefined {
  const pair = Array.isArray(value)
    ? { label: value[0], value: value[1] }
    : isRecord(value)
      ? { label: value.label, value: value.value }
      : undefined;
  if (pair === undefined) return undefined;
  const label = parseCellText(pair.label);
  const n = parseFiniteNumber(pair.value);
  if (label === undefined || n === undefined) return undefined;
  return Object.freeze({ label, value: n });
}

function parseList<T>(value: unknown, item: (v: unknown) => T | undefined): readonly T[] | undefined {
  if (!Array.isArray(value)) return undefined;
  const out: T[] = [];
  for (const raw of value) {
    const parsed = item(raw);
    if (parsed === undefined) return undefined;
    out.push(parsed);
  }
  return Object.freeze(out);
}

/**
 * Reads typed fields off one element, remembering the first failure. Readers
 * return a placeholder after a failure; callers check `failure` before using
 * the element.
 */
class FieldReader {
  private fatal: Fatal | undefined;

  constructor(
    private readonly label: string,
    private readonly bag: Bag,
  ) {}

  get failure(): Fatal | undefined {
    return this.fatal;
  }

  raw(name: string): unknown {
    const value = this.bag[name];
    return value !== undefined ? value : this.bag[snakeToCamel(name)];
  }

  reject(name: string, expected: string, received: unknown): void {
    if (this.fatal !== undefined) return;
    this.fatal = {
      code: "CSK_INVALID_ELEMENT",
      detail:
        `Invalid field "${name}" on ${this.label}: expected ${expected}, ` +
        `got ${describeReceived(received)}`,
    };
  }

  required<T>(name: string, expected: string, parse: (v: unknown) => T | undefined, fallback: T): T {
    const value = this.raw(name);
    const parsed = value === undefined ? undefined : parse(value);
    if (parsed === undefined) {
      this.reject(name, expected, value);
      return fallback;
    }
    return parsed;
  }

  optional<T>(name: string, expected: string, parse: (v: unknown) => T | undefined): T | undefined {
    const value = this.raw(name);
    if (value === undefined || value === null) return undefined;
    const parsed = parse(value);
    if (parsed === undefined) this.reject(name, expected, value);
    return parsed;
  }

  int(name: string): number | undefined {
    return this.optional(name, "an integer >= 0", (v) => {
      const n = parseFiniteNumber(v);
      return n === undefined || n < 0 ? undefined : Math.trunc(n);
    });
  }

  number(name: string): number | undefined {
    return this.optional(name, "a finite number", parseFiniteNumber);
  }

  boolean(name: string): boolean | undefined {
    return this.optional(name, "a boolean", (v) => (typeof v === "boolean" ? v : undefined));
  }

  string(name: string): string | undefined {
    return this.optional(name, "a string", (v) => (typeof v === "string" ? v : undefined));
  }

  requiredString(name: string): string {
    return this.required(name, "a string", parseCellText, "");
  }
}

function readArrowDirection(v: unknown): ArrowDirection | undefined {
  if (v === "down" || v === "up" || v === "left" || v === "right") return v;
  return undefined;
}

function parseKnownElement(
  type: DiagramElementType,
  f: FieldReader,
): DiagramElement {
  switch (type) {
    case "title":
      return { type, text: f.requiredString("text") };
    case "box": {
      const lines =
        f.raw("lines") !== undefined
          ? f.required("lines", "an array of strings", parseStringList, [])
          : f.required("text", "a string or lines array", parseBoxContent, []);
      return {
        type,
        lines,
        x: f.int("x"),
        width: f.int("width"),
        padding: f.int("padding"),
        comment: f.string("comment"),
        topConnector: f.boolean("top_connector"),
        bottomConnector: f.boolean("bottom_connector"),
        boxStyle: f.string("box_style"),
      };
    }
    case "row":
      return {
        type,
        boxes: f.required(
          "boxes",
          "an array of box texts or {text|lines} objects",
          (v) => parseList(v, parseBoxContent),
          [],
        ),
        spacing: f.int("spacing"),
        merge: f.boolean("merge"),
        boxStyle: f.string("box_style"),
      };
    case "text":
      return {
        type,
        text: f.requiredString("text"),
        x: f.int("x"),
        comment: f.string("comment"),
      };
    case "spacer":
      return { type };
    case "arrow":
      return {
        type,
        direction: f.optional("direction", '"down" | "up" | "left" | "right"', readArrowDirection),
        length: f.int("length"),
        x: f.int("x"),
      };
    case "bar_chart":
      return {
        type,
        data: f.required(
          "data",
          "an array of [label, value] pairs",
          (v) => parseList(v, parseBarDatum),
          [],
        ),
        barWidth: f.int("bar_width"),
        showValues: f.boolean("show_values"),
        labelWidth: f.int("label_width"),
        x: f.int("x"),
      };
    case "bar_chart_vertical":
      return {
        type,
        data: f.required(
          "data",
          "an array of [label, value] pairs",
          (v) => parseList(v, parseBarDatum),
          [],
        ),
        barHeight: f.int("bar_height"),
        barWidth: f.int("bar_width"),
        showValues: f.boolean("show_values"),
        gap: f.int("gap"),
        x: f.int("x"),
      };
    case "sparkline":
      return {
        type,
        data: f.required("data", "an array of numbers", (v) => parseList(v, parseFiniteNumber), []),
        label: f.string("label"),
        x: f.int("x"),
      };
    case "progress":
      return {
        type,
        value: f.required("value", "a finite number", parseFiniteNumber, 0),
        max: f.number("max"),
        width: f.int("width"),
        showPercent: f.boolean("show_percent"),
        label: f.string("label"),
        x: f.int("x"),
      };
    case "shaded_box":
      return {
        type,
        width: f.int("width"),
        height: f.int("height"),
        title: f.string("title"),
        palette: f.string("palette"),
        direction: f.string("direction"),
        contrast: f.number("contrast"),
        boxStyle: f.string("box_style"),
        x: f.int("x"),
      };
    case "table":
      return {
        type,
        headers: f.required("headers", "an array of strings", parseStringList, []),
        rows: f.required(
          "rows",
          "an array of string arrays",
          (v) => parseList(v, parseStringList),
          [],
        ),
        boxStyle: f.string("box_style"),
        x: f.int("x"),
      };
  }
}

/**
 * Validate an untyped element list, keeping one slot per input position.
 * Skipped unknown elements leave an `undefined` slot so the layout lookahead
 * still sees them between their neighbours.
 */
export function parseElementSlots(
  input: unknown,
  opts: ParseElementsOptions = {},
): Result<readonly DiagramSlot[]> {
  if (!Array.isArray(input)) {
    return {
      ok: false,
      fatal: {
        code: "CSK_INPUT_ERROR",
        detail: `Invalid elements: expected an array, got ${describeReceived(input)}`,
      },
    };
  }

  const warn = opts.warn ?? warnDev;
  const slots: DiagramSlot[] = [];
  for (let index = 0; index < input.length; index++) {
    const raw: unknown = input[index];
    if (!isRecord(raw)) {
      return {
        ok: false,
        fatal: {
          code: "CSK_INVALID_ELEMENT",
          detail: `Invalid element #${String(index)}: expected an object, got ${describeReceived(raw)}`,
        },
      };
    }
    const type = raw.type;
    if (typeof type !== "string") {
      return {
        ok: false,
        fatal: {
          code: "CSK_INVALID_ELEMENT",
          detail: `Invalid field "type" on element #${String(index)}: expected a string, got ${describeReceived(type)}`,
        },
      };
    }
    if (!isElementType(type)) {
      const detail = `Unknown element type "${type}" at element #${String(index)}`;
      if (opts.strict === true) {
        return { ok: false, fatal: { code: "CSK_UNKNOWN_ELEMENT", detail } };
      }
      warn(`[cellsketch][elements] ${detail}; skipped`);
      slots.push(undefined);
      continue;
    }

    const reader = new FieldReader(`element #${String(index)} <${type}>`, raw);
    const element = parseKnownElement(type, reader);
    const failure = reader.failure;
    if (failure !== undefined) return { ok: false, fatal: failure };
    slots.push(element);
  }
  return { ok: true, value: Object.freeze(slots) };
}

function isElement(slot: DiagramSlot): slot is DiagramElement {
  return slot !== undefined;
}

/**
 * Validate an untyped element list.
 *
 * @example
 * ```ts
 * const res = parseElements(JSON.parse(body), { strict: true });
 * if (!res.ok) throw fatalToError(res.fatal);
 * ```
 */
export function parseElements(
  input: unknown,
  opts: ParseElementsOptions = {},
): Result<readonly DiagramElement[]> {
  const res = parseElementSlots(input, opts);
  if (!res.ok) return res;
  return { ok: true, value: Object.freeze(res.value.filter(isElement)) };
}

/**
 * Validate and render in one step. Throws CellsketchError on invalid input.
 * A box followed by a skipped unknown element gets no automatic connector.
 */
export function renderDiagramFromInput(
  input: unknown,
  opts: DiagramOptions & ParseElementsOptions = {},
): readonly string[] {
  const res = parseElementSlots(input, opts);
  if (!res.ok) throw fatalToError(res.fatal);
  return renderDiagramSlots(res.value, opts);
}

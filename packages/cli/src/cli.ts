/**
 * packages/cli/src/cli.ts - `cellsketch` command.
 *
 * Reads an element list (or `{elements, width?, frame?}` document) as JSON
 * from a file or stdin and prints the rendered diagram, or the Sheets
 * requests that place it with `--requests`. All I/O goes through CliIo so the
 * command runs unchanged under test.
 */

import {
  CellsketchError,
  buildPlacementRequests,
  parseA1Anchor,
  renderDiagramFromInput,
} from "@cellsketch/core";

export type CliOptions = {
  input?: string | undefined;
  width?: number | undefined;
  frame?: boolean | undefined;
  strict?: boolean | undefined;
  anchor?: string | undefined;
  sheetId?: number | undefined;
  requests: boolean;
  help: boolean;
};

export type CliIo = Readonly<{
  readFile: (path: string) => Promise<string>;
  readStdin: () => Promise<string>;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  env: Readonly<Record<string, string | undefined>>;
}>;

type InputDocument = Readonly<{
  elements: unknown;
  width?: number | undefined;
  frame?: boolean | undefined;
}>;

type ValueFlag = "--width" | "--anchor" | "--sheet-id";

export const HELP_TEXT = [
  "cellsketch",
  "",
  "Usage:",
  "  cellsketch diagram.json",
  "  cat diagram.json | cellsketch --width 48 --frame",
  "",
  "Options:",
  "  --width <n>          Total diagram width in cells (default 60)",
  "  --frame, --no-frame  Wrap the diagram in a dashed frame",
  "  --strict             Reject unknown element types (or CELLSKETCH_STRICT=1)",
  "  --requests           Print Sheets batchUpdate requests instead of text",
  "  --anchor <A1>        Top cell for --requests (default A1)",
  "  --sheet-id <n>       Sheet id for --requests (default 0)",
  "  --help, -h           Show this help",
  "",
].join("\n");

function isValueFlag(name: string): name is ValueFlag {
  return name === "--width" || name === "--anchor" || name === "--sheet-id";
}

function parseCount(flag: string, value: string): number {
  const n = Number(value);
  if (value.trim().length === 0 || !Number.isInteger(n) || n < 0) {
    throw new CellsketchError(
      "CSK_INVALID_OPTIONS",
      `Invalid value for ${flag}: expected a non-negative integer, got "${value}"`,
    );
  }
  return n;
}

function applyValue(options: CliOptions, flag: ValueFlag, value: string): void {
  switch (flag) {
    case "--width":
      options.width = parseCount(flag, value);
      return;
    case "--sheet-id":
      options.sheetId = parseCount(flag, value);
      return;
    case "--anchor":
      options.anchor = value;
      return;
  }
}

export function parseArgs(argv: readonly string[]): CliOptions {
  const options: CliOptions = { requests: false, help: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? "";
    if (arg === "--help" || arg === "-h") {
      options.help = true;
      continue;
    }
    if (arg === "--frame" || arg === "--no-frame") {
      options.frame = arg === "--frame";
      continue;
    }
    if (arg === "--strict") {
      options.strict = true;
      continue;
    }
    if (arg === "--requests") {
      options.requests = true;
      continue;
    }

    const eq = arg.indexOf("=");
    const name = arg.startsWith("--") && eq > 0 ? arg.slice(0, eq) : arg;
    if (isValueFlag(name)) {
      const inline = name !== arg;
      const value = inline ? arg.slice(eq + 1) : argv[i + 1];
      if (value === undefined || value.length === 0) {
        throw new CellsketchError("CSK_INVALID_OPTIONS", `Missing value for ${name}`);
      }
      if (!inline) i++;
      applyValue(options, name, value);
      continue;
    }
    if (arg.startsWith("-") && arg !== "-") {
      throw new CellsketchError("CSK_INVALID_OPTIONS", `Unknown option: ${arg}`);
    }
    if (options.input === undefined) {
      options.input = arg;
      continue;
    }
    throw new CellsketchError("CSK_INVALID_OPTIONS", `Unexpected argument: ${arg}`);
  }

  return options;
}

/** `1`, `true` and `yes` (any case) switch a boolean env setting on. */
export function envFlag(value: string | undefined): boolean {
  const normalized = (value ?? "").trim().toLowerCase();
  return normalized === "1" || normalized === "true" || normalized === "yes";
}

function parseJson(source: string): unknown {
  try {
    return JSON.parse(source);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new CellsketchError("CSK_INPUT_ERROR", `Invalid JSON input: ${reason}`);
  }
}

function invalidDocument(detail: string): CellsketchError {
  return new CellsketchError("CSK_INPUT_ERROR", `Invalid input document: ${detail}`);
}

export function readDocument(raw: unknown): InputDocument {
  if (Array.isArray(raw)) return { elements: raw };
  if (typeof raw !== "object" || raw === null || !("elements" in raw)) {
    throw invalidDocument("expected an element array or {elements, width?, frame?}");
  }
  const rawWidth = "width" in raw ? raw.width : undefined;
  const rawFrame = "frame" in raw ? raw.frame : undefined;
  let width: number | undefined;
  if (rawWidth !== undefined) {
    if (typeof rawWidth !== "number" || !Number.isInteger(rawWidth) || rawWidth < 0) {
      throw invalidDocument('"width" must be a non-negative integer');
    }
    width = rawWidth;
  }
  if (rawFrame !== undefined && typeof rawFrame !== "boolean") {
    throw invalidDocument('"frame" must be a boolean');
  }
  const frame = typeof rawFrame === "boolean" ? rawFrame : undefined;
  return { elements: raw.elements, width, frame };
}

/** Run the command; resolves to the process exit code. */
export async function runCli(argv: readonly string[], io: CliIo): Promise<number> {
  try {
    const options = parseArgs(argv);
    if (options.help) {
      io.stdout(HELP_TEXT);
      return 0;
    }

    const source =
      options.input === undefined || options.input === "-"
        ? await io.readStdin()
        : await io.readFile(options.input);
    const doc = readDocument(parseJson(source));
    const lines = renderDiagramFromInput(doc.elements, {
      width: options.width ?? doc.width,
      frame: options.frame ?? doc.frame,
      strict: options.strict ?? envFlag(io.env.CELLSKETCH_STRICT),
      warn: (message) => io.stderr(`${message}\n`),
    });

    if (options.requests) {
      const requests = buildPlacementRequests(lines, {
        sheetId: options.sheetId ?? 0,
        anchor: parseA1Anchor(options.anchor ?? "A1"),
      });
      io.stdout(`${JSON.stringify({ requests }, null, 2)}\n`);
      return 0;
    }

    io.stdout(lines.length > 0 ? `${lines.join("\n")}\n` : "");
    return 0;
  } catch (err) {
    io.stderr(`cellsketch error: ${err instanceof Error ? err.message : String(err)}\n`);
    return 1;
  }
}

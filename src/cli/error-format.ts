/*
Purpose: print errors that end a fileloop command.
Assumptions: output goes to stderr; color only when that stream is a TTY and NO_COLOR is unset.
Usage: console.error(renderCliError(err, { debug }));
*/

import {
  createAnsiFormatter,
  formatErrorLines,
  resolveColorEnabled,
  type AnsiFormatter,
  type AnsiStyle,
  type ErrorFormatLine,
  type ErrorFormatLineKind,
} from "../core/error-format.js";

export type CliErrorFormatOptions = {
  debug?: boolean;
  useColor?: boolean;
  stream?: { isTTY?: boolean };
};

type LabelledKind = Exclude<ErrorFormatLineKind, "title" | "message">;

// Details below the hint only appear with --debug and are dimmed as a whole.
const LABELS: Record<LabelledKind, { label: string; styles: AnsiStyle[]; dimBody: boolean }> = {
  hint: { label: "Hint:", styles: ["yellow"], dimBody: false },
  next: { label: "Next:", styles: ["cyan"], dimBody: false },
  code: { label: "Code:", styles: ["dim"], dimBody: true },
  name: { label: "Name:", styles: ["dim"], dimBody: true },
  cause: { label: "Cause:", styles: ["dim"], dimBody: true },
  stack: { label: "Stack:", styles: ["dim"], dimBody: true },
};

export function renderCliError(error: unknown, options: CliErrorFormatOptions = {}): string {
  const format = createAnsiFormatter(
    resolveColorEnabled({ stream: options.stream ?? process.stderr, useColor: options.useColor }),
  );

  return formatErrorLines(error, { mode: options.debug ? "debug" : "short" })
    .map((line) => renderLine(line, format))
    .join("\n");
}

function renderLine(line: ErrorFormatLine, format: AnsiFormatter): string {
  if (line.kind === "title") {
    return `${format("Error:", ["red", "bold"])} ${format(line.text, ["bold"])}`;
  }
  if (line.kind === "message") {
    return line.text;
  }

  const { label, styles, dimBody } = LABELS[line.kind];
  if (line.kind === "stack") {
    const indented = line.text
      .split("\n")
      .map((frame) => `  ${frame}`)
      .join("\n");
    return `${format(label, styles)}\n${format(indented, ["dim"])}`;
  }
  const body = dimBody ? format(line.text, ["dim"]) : line.text;
  return `${format(label, styles)} ${body}`;
}

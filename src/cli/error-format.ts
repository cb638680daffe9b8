/*
Purpose: render errors raised by cache-refresh commands for the terminal.
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

type LineLabel = { label: string; labelStyles: AnsiStyle[]; textStyles: AnsiStyle[] };

const LINE_LABELS: Record<Exclude<ErrorFormatLineKind, "message" | "stack">, LineLabel> = {
  title: { label: "Error:", labelStyles: ["red", "bold"], textStyles: ["bold"] },
  hint: { label: "Hint:", labelStyles: ["yellow"], textStyles: [] },
  next: { label: "Next:", labelStyles: ["cyan"], textStyles: [] },
  code: { label: "Code:", labelStyles: ["dim"], textStyles: ["dim"] },
  name: { label: "Name:", labelStyles: ["dim"], textStyles: ["dim"] },
  cause: { label: "Cause:", labelStyles: ["dim"], textStyles: ["dim"] },
};

export function renderCliError(error: unknown, options: CliErrorFormatOptions = {}): string {
  const lines = formatErrorLines(error, { mode: options.debug ? "debug" : "short" });
  const stream = options.stream ?? process.stderr;
  const format = createAnsiFormatter(resolveColorEnabled({ stream, useColor: options.useColor }));

  return lines.map((line) => renderLine(line, format)).join("\n");
}

function renderLine(line: ErrorFormatLine, format: AnsiFormatter): string {
  if (line.kind === "message") {
    return line.text;
  }

  if (line.kind === "stack") {
    const indented = line.text
      .split("\n")
      .map((entry) => `  ${entry}`)
      .join("\n");
    return `${format("Stack:", ["dim"])}\n${format(indented, ["dim"])}`;
  }

  const { label, labelStyles, textStyles } = LINE_LABELS[line.kind];
  const text = textStyles.length > 0 ? format(line.text, textStyles) : line.text;
  return `${format(label, labelStyles)} ${text}`;
}

/**
 * Model formulas: `label ~ terms`, where terms are column names, `.` (every
 * other column) or integer literals joined by `+`, `-` and `:`.
 */

import { InvalidConfigurationError } from "../errors";

export interface FormulaSpec {
  label: string;
  terms: string[];
}

export type FormulaInput = string | FormulaSpec;

type Token =
  | { kind: "term"; text: string }
  | { kind: "op"; text: "~" | "+" | "-" | ":" };

const TOKEN = /\s*(?:(`[^`]+`)|([A-Za-z_.][A-Za-z0-9_.]*)|(\d+)|([~+\-:]))\s*/y;

function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let pos = 0;

  while (pos < source.length) {
    TOKEN.lastIndex = pos;
    const m = TOKEN.exec(source);
    if (!m) {
      const rest = source.slice(pos).trimStart();
      if (rest.length === 0) break;
      throw new InvalidConfigurationError(`unsupported character "${rest[0]}" in formula "${source}"`);
    }
    pos = TOKEN.lastIndex;
    const [, quoted, name, num, op] = m;
    if (op === "~" || op === "+" || op === "-" || op === ":") {
      tokens.push({ kind: "op", text: op });
    } else {
      tokens.push({ kind: "term", text: quoted ?? name ?? num });
    }
  }

  return tokens;
}

function join(tokens: Token[]): string {
  let out = "";
  for (const t of tokens) {
    if (t.kind === "op" && t.text !== ":") {
      out += ` ${t.text} `;
    } else {
      out += t.text;
    }
  }
  return out;
}

/**
 * Validate a formula and return its canonical single-line form, e.g.
 * `"y~a+  b:c"` becomes `"y ~ a + b:c"`.
 */
export function serializeFormula(input: FormulaInput): string {
  const source = typeof input === "string" ? input : buildFormula(input);
  const tokens = tokenize(source);

  const tildes = tokens.filter((t) => t.kind === "op" && t.text === "~").length;
  if (tildes !== 1) {
    throw new InvalidConfigurationError(`formula "${source}" must contain exactly one "~"`);
  }

  const split = tokens.findIndex((t) => t.kind === "op" && t.text === "~");
  const lhs = tokens.slice(0, split);
  const rhs = tokens.slice(split + 1);

  if (lhs.length !== 1 || lhs[0].kind !== "term" || lhs[0].text === ".") {
    throw new InvalidConfigurationError(`formula "${source}" must name a single label column before "~"`);
  }
  if (rhs.length === 0) {
    throw new InvalidConfigurationError(`formula "${source}" has no terms after "~"`);
  }

  rhs.forEach((t, i) => {
    const expected = i % 2 === 0 ? "term" : "op";
    if (t.kind !== expected) {
      throw new InvalidConfigurationError(`formula "${source}" has a misplaced "${t.text}"`);
    }
  });
  if (rhs[rhs.length - 1].kind !== "term") {
    throw new InvalidConfigurationError(`formula "${source}" ends with an operator`);
  }

  return `${lhs[0].text} ~ ${join(rhs)}`;
}

/**
 * Build `label ~ t1 + t2 + ...` from its parts.
 */
export function buildFormula(spec: FormulaSpec): string {
  if (spec.terms.length === 0) {
    throw new InvalidConfigurationError(`formula for "${spec.label}" needs at least one term`);
  }
  return `${spec.label} ~ ${spec.terms.join(" + ")}`;
}

import { MissingTimeFilterError, QueryExecutionError, UnauthorizedTableError } from "@/lib/core/errors";
import type { Scalar } from "@/lib/planner/types";
import { isValidIsoDate } from "@/lib/utils/dates";
import type { SqlValue } from "./types";

export const AGGREGATE_TABLE = "ub.daily_metrics";
export const RAW_EVENT_TABLE = "ub.user_behavior";
export const ALLOWED_TABLES: ReadonlySet<string> = new Set([AGGREGATE_TABLE, RAW_EVENT_TABLE]);

// Parameters that count as a concrete date filter on the raw event table.
export const DATE_PARAMS = ["dt", "start", "end", "end_dt"] as const;

type TokenKind = "word" | "quoted" | "literal" | "param" | "punct" | "other";

type Token = {
  kind: TokenKind;
  /** Lower-cased for words, the bare name for params, source text otherwise. */
  text: string;
  start: number;
  end: number;
};

const WORD = /[a-zA-Z_][\w$]*/y;
const PARAM = /:([a-zA-Z_]\w*)/y;
const NUMBER = /\d[\w.]*/y;
const DOLLAR_QUOTE = /\$(?:[a-zA-Z_]\w*)?\$/y;
const PLAIN_IDENTIFIER = /^[a-z_][a-z0-9_$]*$/;
const PUNCT = new Set(["(", ")", ",", ";", "."]);

// `FROM` inside these calls is part of the call syntax, e.g. EXTRACT(DOW FROM dt).
const FROM_FUNCTIONS = new Set(["extract", "substring", "trim", "overlay"]);
const QUERY_STARTS = new Set(["select", "with", "values", "table"]);
const FROM_CLAUSE_END = new Set([
  "where",
  "group",
  "having",
  "window",
  "order",
  "limit",
  "offset",
  "fetch",
  "for",
  "union",
  "intersect",
  "except",
  "returning",
]);
const ALIAS_STOP = new Set([
  ...FROM_CLAUSE_END,
  "join",
  "inner",
  "left",
  "right",
  "full",
  "outer",
  "cross",
  "natural",
  "on",
  "using",
  "tablesample",
]);

function matchAt(pattern: RegExp, sql: string, index: number): RegExpExecArray | null {
  pattern.lastIndex = index;
  return pattern.exec(sql);
}

function closingQuote(sql: string, start: number, quote: string): number {
  let index = start + 1;
  while (index < sql.length) {
    if (sql[index] === quote) {
      if (sql[index + 1] !== quote) return index + 1;
      index += 2;
      continue;
    }
    index += 1;
  }
  return sql.length;
}

// Block comments nest in Postgres.
function blockCommentEnd(sql: string, start: number): number {
  let depth = 0;
  let index = start;
  while (index < sql.length) {
    if (sql.startsWith("/*", index)) {
      depth += 1;
      index += 2;
    } else if (sql.startsWith("*/", index)) {
      depth -= 1;
      index += 2;
      if (depth === 0) return index;
    } else {
      index += 1;
    }
  }
  return sql.length;
}

/**
 * Splits a statement into tokens, dropping comments. Quoted identifiers that are plain
 * lower-case names fold to words. Quoting the guard cannot read is reported in `unsupported`.
 */
function tokenize(sql: string): { tokens: Token[]; unsupported: string[] } {
  const tokens: Token[] = [];
  const unsupported: string[] = [];
  let index = 0;

  while (index < sql.length) {
    const char = sql[index];
    if (/\s/.test(char)) {
      index += 1;
      continue;
    }
    if (sql.startsWith("--", index)) {
      const newline = sql.indexOf("\n", index);
      index = newline === -1 ? sql.length : newline + 1;
      continue;
    }
    if (sql.startsWith("/*", index)) {
      index = blockCommentEnd(sql, index);
      continue;
    }

    const start = index;
    if (char === "'") {
      index = closingQuote(sql, start, "'");
      tokens.push({ kind: "literal", text: sql.slice(start, index), start, end: index });
      continue;
    }
    if (char === '"') {
      index = closingQuote(sql, start, '"');
      const name = sql.slice(start + 1, index - 1).replace(/""/g, '"');
      tokens.push(
        PLAIN_IDENTIFIER.test(name)
          ? { kind: "word", text: name, start, end: index }
          : { kind: "quoted", text: sql.slice(start, index), start, end: index }
      );
      continue;
    }
    if (char === "$") {
      const tag = matchAt(DOLLAR_QUOTE, sql, index);
      if (tag) {
        unsupported.push(`dollar-quoted text ${tag[0]}`);
        break;
      }
    }
    if (char === ":") {
      if (sql[index + 1] === ":") {
        index += 2;
        tokens.push({ kind: "punct", text: "::", start, end: index });
        continue;
      }
      const param = matchAt(PARAM, sql, index);
      if (param) {
        index += param[0].length;
        tokens.push({ kind: "param", text: param[1], start, end: index });
        continue;
      }
    }

    const word = matchAt(WORD, sql, index);
    if (word) {
      index += word[0].length;
      const text = word[0].toLowerCase();
      if (text === "e" && sql[index] === "'") {
        unsupported.push("escape string literal");
        break;
      }
      tokens.push({ kind: "word", text, start, end: index });
      continue;
    }
    const number = matchAt(NUMBER, sql, index);
    if (number) {
      index += number[0].length;
      tokens.push({ kind: "other", text: number[0], start, end: index });
      continue;
    }

    index += 1;
    tokens.push({ kind: PUNCT.has(char) ? "punct" : "other", text: char, start, end: index });
  }

  return { tokens, unsupported };
}

function isWord(token: Token | undefined, ...words: string[]): boolean {
  return token?.kind === "word" && words.includes(token.text);
}

function isPunct(token: Token | undefined, text: string): boolean {
  return token?.kind === "punct" && token.text === text;
}

function wordAt(tokens: Token[], index: number): string {
  const token = tokens[index];
  return token?.kind === "word" ? token.text : "";
}

function matchingParen(tokens: Token[], open: number): number {
  let depth = 0;
  for (let index = open; index < tokens.length; index += 1) {
    if (isPunct(tokens[index], "(")) depth += 1;
    else if (isPunct(tokens[index], ")")) {
      depth -= 1;
      if (depth === 0) return index;
    }
  }
  return tokens.length;
}

function readName(tokens: Token[], start: number): { text: string; next: number } | null {
  const parts: string[] = [];
  let index = start;
  for (;;) {
    const token = tokens[index];
    if (!token || (token.kind !== "word" && token.kind !== "quoted")) return null;
    parts.push(token.text);
    index += 1;
    if (!isPunct(tokens[index], ".")) break;
    index += 1;
  }
  return { text: parts.join("."), next: index };
}

function skipAlias(tokens: Token[], start: number): number {
  let index = start;
  if (isWord(tokens[index], "as")) index += 1;
  const alias = tokens[index];
  if (alias && (alias.kind === "quoted" || (alias.kind === "word" && !ALIAS_STOP.has(alias.text)))) index += 1;
  if (isPunct(tokens[index], "(")) index = matchingParen(tokens, index) + 1;
  return index;
}

type OpenParen = { id: number; fromFunction: boolean };

/** Walks every FROM clause, comma item and JOIN, tracking which CTE names are in scope. */
class TableScanner {
  readonly tables: string[] = [];
  readonly unresolved: string[] = [];
  private readonly tokens: Token[];
  private readonly ctes: { name: string; scope: number }[] = [];

  constructor(tokens: Token[]) {
    this.tokens = tokens;
  }

  scan(): void {
    const open: OpenParen[] = [];
    let nextId = 1;

    this.tokens.forEach((token, index) => {
      if (isPunct(token, "(")) {
        open.push({ id: nextId, fromFunction: FROM_FUNCTIONS.has(wordAt(this.tokens, index - 1)) });
        nextId += 1;
        return;
      }
      if (isPunct(token, ")")) {
        open.pop();
        return;
      }
      if (token.kind !== "word") return;

      const innermost = open.length > 0 ? open[open.length - 1] : null;
      if (this.isCteName(index)) {
        this.ctes.push({ name: token.text, scope: innermost ? innermost.id : 0 });
        return;
      }

      const visible = this.visibleCtes(open);
      if (token.text === "from") {
        if (innermost?.fromFunction || wordAt(this.tokens, index - 1) === "distinct") return;
        this.readFromClause(index + 1, visible);
      } else if (token.text === "join") {
        this.readFromClause(index + 1, visible);
      } else if (token.text === "table" && !isPunct(this.tokens[index - 1], ".")) {
        const name = readName(this.tokens, index + 1);
        if (name) this.record(name.text, visible);
      }
    });
  }

  private isCteName(index: number): boolean {
    const { tokens } = this;
    const previous = tokens[index - 1];
    if (!isWord(previous, "with", "recursive") && !isPunct(previous, ",")) return false;

    let next = index + 1;
    if (isPunct(tokens[next], "(")) next = matchingParen(tokens, next) + 1;
    if (!isWord(tokens[next], "as")) return false;
    next += 1;
    if (isWord(tokens[next], "not")) next += 1;
    if (isWord(tokens[next], "materialized")) next += 1;
    return isPunct(tokens[next], "(");
  }

  private visibleCtes(open: OpenParen[]): ReadonlySet<string> {
    const scopes = new Set([0, ...open.map((paren) => paren.id)]);
    return new Set(this.ctes.filter((cte) => scopes.has(cte.scope)).map((cte) => cte.name));
  }

  private record(name: string, visible: ReadonlySet<string>): void {
    if (!name.includes(".") && visible.has(name)) return;
    if (!this.tables.includes(name)) this.tables.push(name);
  }

  private readFromClause(start: number, visible: ReadonlySet<string>): void {
    const { tokens } = this;
    let index = start;
    let expectItem = true;

    while (index < tokens.length) {
      const token = tokens[index];
      if (isPunct(token, ")") || isPunct(token, ";")) return;
      if (token.kind === "word" && FROM_CLAUSE_END.has(token.text)) return;

      if (expectItem) {
        index = this.readItem(index, visible);
        expectItem = false;
        continue;
      }
      if (isPunct(token, "(")) {
        index = matchingParen(tokens, index) + 1;
        continue;
      }
      if (isPunct(token, ",") || isWord(token, "join")) expectItem = true;
      index += 1;
    }
  }

  private readItem(start: number, visible: ReadonlySet<string>): number {
    const { tokens } = this;
    let index = start;
    while (isWord(tokens[index], "only", "lateral")) index += 1;

    const token = tokens[index];
    if (!token) return index;

    if (isPunct(token, "(")) {
      // Subqueries are read where their own FROM appears; a parenthesised join is read here.
      if (!QUERY_STARTS.has(wordAt(tokens, index + 1))) this.readFromClause(index + 1, visible);
      return skipAlias(tokens, matchingParen(tokens, index) + 1);
    }

    const name = readName(tokens, index);
    if (!name) {
      this.unresolved.push(token.text);
      return index + 1;
    }
    if (isPunct(tokens[name.next], "(")) {
      this.unresolved.push(`${name.text}()`);
      return skipAlias(tokens, matchingParen(tokens, name.next) + 1);
    }
    this.record(name.text, visible);
    return skipAlias(tokens, name.next);
  }
}

export type TableScan = {
  tables: string[];
  /** FROM items and quoting the guard could not classify. */
  unresolved: string[];
};

export function scanTables(sql: string): TableScan {
  const { tokens, unsupported } = tokenize(sql);
  const scanner = new TableScanner(tokens);
  scanner.scan();
  return { tables: scanner.tables, unresolved: [...unsupported, ...scanner.unresolved] };
}

export function extractTables(sql: string): string[] {
  return scanTables(sql).tables;
}

export function extractParamNames(sql: string): string[] {
  const names: string[] = [];
  for (const token of tokenize(sql).tokens) {
    if (token.kind === "param" && !names.includes(token.text)) names.push(token.text);
  }
  return names;
}

/** Anything outside the allow-list, or that cannot be read as a table, is refused. */
export function assertAllowedTables(templateKey: string, sql: string): string[] {
  const { tables, unresolved } = scanTables(sql);
  const rejected = [...tables.filter((table) => !ALLOWED_TABLES.has(table)), ...unresolved];
  if (rejected.length > 0) {
    throw new UnauthorizedTableError(templateKey, rejected);
  }
  return tables;
}

/** The raw event table is only read through a date parameter the statement actually uses. */
export function assertTimeFilter(templateKey: string, sql: string, tables: string[], params: Record<string, Scalar>): void {
  if (!tables.includes(RAW_EVENT_TABLE)) return;
  const used = extractParamNames(sql);
  const filtered = DATE_PARAMS.some((name) => {
    const value = params[name];
    return used.includes(name) && typeof value === "string" && isValidIsoDate(value);
  });
  if (!filtered) {
    throw new MissingTimeFilterError(templateKey, RAW_EVENT_TABLE);
  }
}

/**
 * Rewrites `:name` placeholders to `$n`. A name used twice binds to the same position.
 * Placeholders inside string literals and comments are left alone.
 */
export function bindNamedParams(
  templateKey: string,
  sql: string,
  params: Record<string, Scalar>
): { text: string; values: SqlValue[] } {
  const positions = new Map<string, number>();
  const values: SqlValue[] = [];
  const missing: string[] = [];
  let text = "";
  let cursor = 0;

  for (const token of tokenize(sql).tokens) {
    if (token.kind !== "param") continue;
    const name = token.text;
    if (!Object.prototype.hasOwnProperty.call(params, name)) {
      if (!missing.includes(name)) missing.push(name);
      continue;
    }
    let position = positions.get(name);
    if (position === undefined) {
      values.push(params[name]);
      position = values.length;
      positions.set(name, position);
    }
    text += `${sql.slice(cursor, token.start)}$${position}`;
    cursor = token.end;
  }
  text += sql.slice(cursor);

  if (missing.length > 0) {
    throw new QueryExecutionError(templateKey, `Query "${templateKey}" is missing parameter(s): ${missing.join(", ")}`);
  }
  return { text, values };
}

function hasTopLevelRowLimit(sql: string): boolean {
  let depth = 0;
  for (const token of tokenize(sql).tokens) {
    if (isPunct(token, "(")) depth += 1;
    else if (isPunct(token, ")")) depth -= 1;
    else if (depth === 0 && isWord(token, "limit", "offset", "fetch")) return true;
  }
  return false;
}

/**
 * Caps the statement at one row past `maxRows`. The LIMIT is appended so the statement's own
 * ORDER BY still decides which rows are kept; a statement that already limits itself is
 * wrapped instead, and its own LIMIT picks the rows.
 */
export function withRowCap(sql: string, maxRows: number): string {
  const body = sql.trim().replace(/;\s*$/, "");
  const cap = maxRows + 1;
  if (hasTopLevelRowLimit(body)) {
    return `SELECT * FROM (\n${body}\n) AS guarded LIMIT ${cap}`;
  }
  return `${body}\nLIMIT ${cap}`;
}

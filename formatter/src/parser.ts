/**
 * Decoder for syntax trees handed over as JSON
 * The tree is produced by an external parser; this module only checks its
 * shape and turns it into the typed syntax tree
 */

import { parseColor } from "./color.js";
import { isUnit } from "./length.js";
import type {
  Argument,
  BinOp,
  Expr,
  ExprCall,
  Ident,
  Named,
  UnOp,
} from "./syntax/expr.js";
import { isIdent } from "./syntax/expr.js";
import type { Node, Tree } from "./syntax/node.js";
import type { Span, Spanned } from "./syntax/span.js";
import { ZERO_SPAN, joinSpans } from "./syntax/span.js";

const I64_MIN = -(2n ** 63n);
const I64_MAX = 2n ** 63n - 1n;

const INT_RE = /^-?\d+$/;

/** Levels are zero-based, so this allows up to 256 `#`. */
const MAX_HEADING_LEVEL = 255;

/**
 * Root of a decoded document
 */
export interface MarkupDocument {
  kind: "document";
  tree: Tree;
  span: Span;
}

/**
 * Parse result
 */
export interface ParseResult {
  rootNode: MarkupDocument;
  /** Number of expressions anywhere in the tree */
  exprCount: number;
}

/**
 * Thrown when the JSON does not describe a valid tree. `jsonPath` locates
 * the offending value, e.g. `$[0].v.expr.args[1]`.
 */
export class AstDecodeError extends Error {
  constructor(
    message: string,
    readonly jsonPath: string,
  ) {
    super(`${jsonPath}: ${message}`);
    this.name = "AstDecodeError";
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function expectObject(value: unknown, at: string): Record<string, unknown> {
  if (!isPlainObject(value)) {
    throw new AstDecodeError("Expected an object", at);
  }
  return value;
}

function expectArray(value: unknown, at: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new AstDecodeError("Expected an array", at);
  }
  return value;
}

function expectString(value: unknown, at: string): string {
  if (typeof value !== "string") {
    throw new AstDecodeError("Expected a string", at);
  }
  return value;
}

function expectNumber(value: unknown, at: string): number {
  if (typeof value !== "number") {
    throw new AstDecodeError("Expected a number", at);
  }
  return value;
}

function expectBoolean(value: unknown, at: string): boolean {
  if (typeof value !== "boolean") {
    throw new AstDecodeError("Expected a boolean", at);
  }
  return value;
}

function expectOffset(value: unknown, at: string): number {
  const n = expectNumber(value, at);
  if (!Number.isSafeInteger(n)) {
    throw new AstDecodeError(`Expected an integer offset, got ${n}`, at);
  }
  return n;
}

function decodeSpan(value: unknown, at: string): Span {
  const obj = expectObject(value, at);
  const start = expectOffset(obj.start, `${at}.start`);
  const end = expectOffset(obj.end, `${at}.end`);
  if (start < 0 || start > end) {
    throw new AstDecodeError(`Invalid span: ${start}..${end}`, at);
  }
  return { start, end };
}

/**
 * A positioned value is written either as `{ "v": ..., "span": ... }` or
 * as the bare value, which then gets an empty span.
 */
function decodeSpanned<T>(
  value: unknown,
  at: string,
  decode: (value: unknown, at: string) => T,
): Spanned<T> {
  if (isPlainObject(value) && "v" in value) {
    return {
      v: decode(value.v, `${at}.v`),
      span: value.span === undefined ? ZERO_SPAN : decodeSpan(value.span, `${at}.span`),
    };
  }
  return { v: decode(value, at), span: ZERO_SPAN };
}

function decodeIdent(value: unknown, at: string): Ident {
  const ident = expectString(value, at);
  if (!isIdent(ident)) {
    throw new AstDecodeError(`Invalid identifier: ${JSON.stringify(ident)}`, at);
  }
  return ident;
}

function decodeInt(value: unknown, at: string): bigint {
  let int: bigint;
  if (typeof value === "number" && Number.isSafeInteger(value)) {
    int = BigInt(value);
  } else if (typeof value === "string" && INT_RE.test(value)) {
    int = BigInt(value);
  } else {
    throw new AstDecodeError("Expected an integer or a string of digits", at);
  }

  if (int < I64_MIN || int > I64_MAX) {
    throw new AstDecodeError(`Integer out of 64-bit range: ${int}`, at);
  }
  return int;
}

function decodeUnOp(value: unknown, at: string): UnOp {
  const op = expectString(value, at);
  if (op !== "neg") {
    throw new AstDecodeError(`Unknown unary operator: ${op}`, at);
  }
  return op;
}

function decodeBinOp(value: unknown, at: string): BinOp {
  const op = expectString(value, at);
  switch (op) {
    case "add":
    case "sub":
    case "mul":
    case "div":
      return op;
    default:
      throw new AstDecodeError(`Unknown binary operator: ${op}`, at);
  }
}

function decodeSpannedExpr(value: unknown, at: string): Spanned<Expr> {
  return decodeSpanned(value, at, decodeExpr);
}

function decodeNamed(value: unknown, at: string): Named {
  const obj = expectObject(value, at);
  return {
    name: decodeSpanned(obj.name, `${at}.name`, decodeIdent),
    expr: decodeSpannedExpr(obj.expr, `${at}.expr`),
  };
}

function decodeArgument(value: unknown, at: string): Argument {
  const obj = expectObject(value, at);
  switch (obj.kind) {
    case "pos":
      return { kind: "pos", expr: decodeSpannedExpr(obj.expr, `${at}.expr`) };
    case "named":
      return { kind: "named", named: decodeNamed(obj, at) };
    default:
      throw new AstDecodeError(`Unknown argument kind: ${String(obj.kind)}`, `${at}.kind`);
  }
}

function decodeCall(obj: Record<string, unknown>, at: string): ExprCall {
  return {
    name: decodeSpanned(obj.name, `${at}.name`, decodeIdent),
    args: decodeSpanned(obj.args, `${at}.args`, (args, argsAt) =>
      expectArray(args, argsAt).map((arg, i) => decodeArgument(arg, `${argsAt}[${i}]`)),
    ),
  };
}

/**
 * Decode one expression
 */
export function decodeExpr(value: unknown, at: string = "$"): Expr {
  const obj = expectObject(value, at);
  const valueAt = `${at}.value`;

  switch (obj.kind) {
    case "none":
      return { kind: "none" };
    case "ident":
      return { kind: "ident", value: decodeIdent(obj.value, valueAt) };
    case "bool":
      return { kind: "bool", value: expectBoolean(obj.value, valueAt) };
    case "int":
      return { kind: "int", value: decodeInt(obj.value, valueAt) };
    case "float":
      return { kind: "float", value: expectNumber(obj.value, valueAt) };
    case "length": {
      const unit = expectString(obj.unit, `${at}.unit`);
      if (!isUnit(unit)) {
        throw new AstDecodeError(`Unknown unit: ${unit}`, `${at}.unit`);
      }
      return { kind: "length", value: expectNumber(obj.value, valueAt), unit };
    }
    case "percent":
      return { kind: "percent", value: expectNumber(obj.value, valueAt) };
    case "color": {
      const hex = expectString(obj.value, valueAt);
      try {
        return { kind: "color", value: parseColor(hex) };
      } catch (error) {
        throw new AstDecodeError(error instanceof Error ? error.message : String(error), valueAt);
      }
    }
    case "str":
      return { kind: "str", value: expectString(obj.value, valueAt) };
    case "call":
      return { kind: "call", call: decodeCall(obj, at) };
    case "unary":
      return {
        kind: "unary",
        unary: {
          op: decodeSpanned(obj.op, `${at}.op`, decodeUnOp),
          expr: decodeSpannedExpr(obj.expr, `${at}.expr`),
        },
      };
    case "binary":
      return {
        kind: "binary",
        binary: {
          lhs: decodeSpannedExpr(obj.lhs, `${at}.lhs`),
          op: decodeSpanned(obj.op, `${at}.op`, decodeBinOp),
          rhs: decodeSpannedExpr(obj.rhs, `${at}.rhs`),
        },
      };
    case "array":
      return {
        kind: "array",
        items: expectArray(obj.items, `${at}.items`).map((item, i) =>
          decodeSpannedExpr(item, `${at}.items[${i}]`),
        ),
      };
    case "dict":
      return {
        kind: "dict",
        items: expectArray(obj.items, `${at}.items`).map((item, i) =>
          decodeNamed(item, `${at}.items[${i}]`),
        ),
      };
    case "content":
      return { kind: "content", tree: decodeTree(obj.tree, `${at}.tree`) };
    default:
      throw new AstDecodeError(`Unknown expression kind: ${String(obj.kind)}`, `${at}.kind`);
  }
}

/**
 * Decode one markup node
 */
export function decodeNode(value: unknown, at: string = "$"): Node {
  const obj = expectObject(value, at);

  switch (obj.kind) {
    case "strong":
      return { kind: "strong" };
    case "emph":
      return { kind: "emph" };
    case "space":
      return { kind: "space" };
    case "linebreak":
      return { kind: "linebreak" };
    case "parbreak":
      return { kind: "parbreak" };
    case "text":
      return { kind: "text", text: expectString(obj.text, `${at}.text`) };
    case "heading":
      return {
        kind: "heading",
        heading: {
          level: decodeSpanned(obj.level, `${at}.level`, (level, levelAt) => {
            const n = expectNumber(level, levelAt);
            if (!Number.isInteger(n) || n < 0 || n > MAX_HEADING_LEVEL) {
              throw new AstDecodeError(
                `Heading level must be an integer from 0 to ${MAX_HEADING_LEVEL}`,
                levelAt,
              );
            }
            return n;
          }),
          contents: decodeTree(obj.contents, `${at}.contents`),
        },
      };
    case "raw":
      return {
        kind: "raw",
        raw: {
          lang: obj.lang === undefined || obj.lang === null
            ? null
            : decodeIdent(obj.lang, `${at}.lang`),
          lines: expectArray(obj.lines, `${at}.lines`).map((line, i) =>
            expectString(line, `${at}.lines[${i}]`),
          ),
          block: obj.block === undefined ? false : expectBoolean(obj.block, `${at}.block`),
        },
      };
    case "expr":
      return { kind: "expr", expr: decodeExpr(obj.expr, `${at}.expr`) };
    default:
      throw new AstDecodeError(`Unknown node kind: ${String(obj.kind)}`, `${at}.kind`);
  }
}

/**
 * Decode a sequence of markup nodes
 */
export function decodeTree(value: unknown, at: string = "$"): Tree {
  return expectArray(value, at).map((node, i) =>
    decodeSpanned(node, `${at}[${i}]`, decodeNode),
  );
}

/**
 * Walk every expression in the tree depth-first, parents before children
 */
export function walk(tree: Tree, visitor: (expr: Expr) => void): void {
  for (const node of tree) {
    walkNode(node.v, visitor);
  }
}

function walkNode(node: Node, visitor: (expr: Expr) => void): void {
  if (node.kind === "heading") {
    walk(node.heading.contents, visitor);
  } else if (node.kind === "expr") {
    walkExpr(node.expr, visitor);
  }
}

function walkExpr(expr: Expr, visitor: (expr: Expr) => void): void {
  visitor(expr);
  switch (expr.kind) {
    case "call":
      for (const arg of expr.call.args.v) {
        walkExpr(arg.kind === "pos" ? arg.expr.v : arg.named.expr.v, visitor);
      }
      break;
    case "unary":
      walkExpr(expr.unary.expr.v, visitor);
      break;
    case "binary":
      walkExpr(expr.binary.lhs.v, visitor);
      walkExpr(expr.binary.rhs.v, visitor);
      break;
    case "array":
      for (const item of expr.items) walkExpr(item.v, visitor);
      break;
    case "dict":
      for (const item of expr.items) walkExpr(item.expr.v, visitor);
      break;
    case "content":
      walk(expr.tree, visitor);
      break;
    default:
      break;
  }
}

/**
 * Parse a JSON document holding a markup tree
 * @param text JSON text whose root is an array of nodes
 * @returns ParseResult with the document root
 */
export function parse(text: string): ParseResult {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new AstDecodeError(error instanceof Error ? error.message : String(error), "$");
  }

  const tree = decodeTree(json);
  const span = tree.reduce<Span>((acc, node) => joinSpans(acc, node.span), ZERO_SPAN);

  let exprCount = 0;
  walk(tree, () => {
    exprCount++;
  });

  return {
    rootNode: { kind: "document", tree, span },
    exprCount,
  };
}

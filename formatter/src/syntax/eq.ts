/**
 * Structural equality and cloning of syntax trees. Spans are ignored:
 * two trees are equal when they would print the same way.
 */

import type { Argument, Expr, Named } from "./expr.js";
import type { Node, Tree } from "./node.js";
import type { Spanned } from "./span.js";

function allEqual<T>(
  a: readonly T[],
  b: readonly T[],
  eq: (x: T, y: T) => boolean,
): boolean {
  return a.length === b.length && a.every((x, i) => eq(x, b[i]));
}

function spannedExprEquals(a: Spanned<Expr>, b: Spanned<Expr>): boolean {
  return exprEquals(a.v, b.v);
}

function namedEquals(a: Named, b: Named): boolean {
  return a.name.v === b.name.v && exprEquals(a.expr.v, b.expr.v);
}

function argumentEquals(a: Argument, b: Argument): boolean {
  if (a.kind === "pos") {
    return b.kind === "pos" && exprEquals(a.expr.v, b.expr.v);
  }
  return b.kind === "named" && namedEquals(a.named, b.named);
}

export function exprEquals(a: Expr, b: Expr): boolean {
  switch (a.kind) {
    case "none":
      return b.kind === "none";
    case "ident":
      return b.kind === "ident" && b.value === a.value;
    case "bool":
      return b.kind === "bool" && b.value === a.value;
    case "int":
      return b.kind === "int" && b.value === a.value;
    case "str":
      return b.kind === "str" && b.value === a.value;
    // Object.is so that NaN literals equal themselves
    case "float":
      return b.kind === "float" && Object.is(b.value, a.value);
    case "percent":
      return b.kind === "percent" && Object.is(b.value, a.value);
    case "length":
      return b.kind === "length" && Object.is(b.value, a.value) && b.unit === a.unit;
    case "color":
      return (
        b.kind === "color" &&
        b.value.r === a.value.r &&
        b.value.g === a.value.g &&
        b.value.b === a.value.b &&
        b.value.a === a.value.a
      );
    case "call":
      return (
        b.kind === "call" &&
        b.call.name.v === a.call.name.v &&
        allEqual(a.call.args.v, b.call.args.v, argumentEquals)
      );
    case "unary":
      return (
        b.kind === "unary" &&
        b.unary.op.v === a.unary.op.v &&
        exprEquals(a.unary.expr.v, b.unary.expr.v)
      );
    case "binary":
      return (
        b.kind === "binary" &&
        b.binary.op.v === a.binary.op.v &&
        exprEquals(a.binary.lhs.v, b.binary.lhs.v) &&
        exprEquals(a.binary.rhs.v, b.binary.rhs.v)
      );
    case "array":
      return b.kind === "array" && allEqual(a.items, b.items, spannedExprEquals);
    case "dict":
      return b.kind === "dict" && allEqual(a.items, b.items, namedEquals);
    case "content":
      return b.kind === "content" && treeEquals(a.tree, b.tree);
    default: {
      const unreachable: never = a;
      return unreachable;
    }
  }
}

export function nodeEquals(a: Node, b: Node): boolean {
  switch (a.kind) {
    case "strong":
    case "emph":
    case "space":
    case "linebreak":
    case "parbreak":
      return b.kind === a.kind;
    case "text":
      return b.kind === "text" && b.text === a.text;
    case "heading":
      return (
        b.kind === "heading" &&
        b.heading.level.v === a.heading.level.v &&
        treeEquals(a.heading.contents, b.heading.contents)
      );
    case "raw":
      return (
        b.kind === "raw" &&
        b.raw.lang === a.raw.lang &&
        b.raw.block === a.raw.block &&
        allEqual(a.raw.lines, b.raw.lines, (x, y) => x === y)
      );
    case "expr":
      return b.kind === "expr" && exprEquals(a.expr, b.expr);
    default: {
      const unreachable: never = a;
      return unreachable;
    }
  }
}

export function treeEquals(a: Tree, b: Tree): boolean {
  return allEqual(a, b, (x, y) => nodeEquals(x.v, y.v));
}

/**
 * Deep copy of an expression, spans included.
 */
export function cloneExpr(expr: Expr): Expr {
  return structuredClone(expr);
}

export function cloneTree(tree: Tree): Tree {
  return structuredClone(tree);
}

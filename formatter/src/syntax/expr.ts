import type { RgbaColor } from "../color.js";
import type { Unit } from "../length.js";
import type { Tree } from "./node.js";
import type { Spanned } from "./span.js";

/** An identifier: `left`. */
export type Ident = string;

const IDENT_RE = /^[\p{L}_][\p{L}\p{N}_-]*$/u;

/**
 * Whether a string is a valid identifier.
 */
export function isIdent(value: string): boolean {
  return IDENT_RE.test(value);
}

/**
 * An expression.
 */
export type Expr =
  /** The none literal: `none`. */
  | { readonly kind: "none" }
  /** An identifier literal: `left`. */
  | { readonly kind: "ident"; readonly value: Ident }
  /** A boolean literal: `true`, `false`. */
  | { readonly kind: "bool"; readonly value: boolean }
  /** A 64-bit integer literal: `120`. */
  | { readonly kind: "int"; readonly value: bigint }
  /** A floating-point literal: `1.2`, `10e-4`. */
  | { readonly kind: "float"; readonly value: number }
  /** A length literal: `12pt`, `3cm`. */
  | { readonly kind: "length"; readonly value: number; readonly unit: Unit }
  /**
   * A percent literal: `50%`. Stored as written, so `50%` holds `50`.
   */
  | { readonly kind: "percent"; readonly value: number }
  /** A color literal: `#ffccee`. */
  | { readonly kind: "color"; readonly value: RgbaColor }
  /** A string literal: `"hello!"`. */
  | { readonly kind: "str"; readonly value: string }
  /** An invocation of a function: `[foo ...]`, `foo(...)`. */
  | { readonly kind: "call"; readonly call: ExprCall }
  /** A unary operation: `-x`. */
  | { readonly kind: "unary"; readonly unary: ExprUnary }
  /** A binary operation: `a + b`, `a / b`. */
  | { readonly kind: "binary"; readonly binary: ExprBinary }
  /** An array expression: `(1, "hi", 12cm)`. */
  | { readonly kind: "array"; readonly items: ExprArray }
  /** A dictionary expression: `(color: #f79143, pattern: dashed)`. */
  | { readonly kind: "dict"; readonly items: ExprDict }
  /** A content expression: `{*Hello* there!}`. */
  | { readonly kind: "content"; readonly tree: ExprContent };

export type ExprKind = Expr["kind"];

/**
 * An invocation of a function: `[foo ...]`, `foo(...)`.
 */
export interface ExprCall {
  readonly name: Spanned<Ident>;
  /**
   * For a bracketed invocation with a body, the body is the last
   * argument but lies outside of this span.
   */
  readonly args: Spanned<ExprArgs>;
}

/** The arguments to a function: `12, draw: false`. */
export type ExprArgs = readonly Argument[];

/**
 * An argument to a function call: `12` or `draw: false`.
 */
export type Argument =
  | { readonly kind: "pos"; readonly expr: Spanned<Expr> }
  | { readonly kind: "named"; readonly named: Named };

/**
 * A pair of a name and an expression: `pattern: dashed`.
 */
export interface Named {
  readonly name: Spanned<Ident>;
  readonly expr: Spanned<Expr>;
}

/** A unary operator. Only negation: `-`. */
export type UnOp = "neg";

/**
 * A unary operation: `-x`.
 */
export interface ExprUnary {
  readonly op: Spanned<UnOp>;
  readonly expr: Spanned<Expr>;
}

/** A binary operator: `+`, `-`, `*`, `/`. */
export type BinOp = "add" | "sub" | "mul" | "div";

/**
 * A binary operation: `a + b`, `a / b`.
 */
export interface ExprBinary {
  readonly lhs: Spanned<Expr>;
  readonly op: Spanned<BinOp>;
  readonly rhs: Spanned<Expr>;
}

/** An array expression: `(1, "hi", 12cm)`. */
export type ExprArray = readonly Spanned<Expr>[];

/** A dictionary expression: `(color: #f79143, pattern: dashed)`. */
export type ExprDict = readonly Named[];

/** A content expression: `{*Hello* there!}`. */
export type ExprContent = Tree;

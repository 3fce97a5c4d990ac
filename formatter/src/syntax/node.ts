import type { Expr, Ident } from "./expr.js";
import type { Spanned } from "./span.js";

/**
 * A sequence of markup nodes, the body of a document or content block.
 */
export type Tree = readonly Spanned<Node>[];

/**
 * A markup node.
 */
export type Node =
  /** Strong text was enabled or disabled: `*`. */
  | { readonly kind: "strong" }
  /** Emphasized text was enabled or disabled: `_`. */
  | { readonly kind: "emph" }
  /** Whitespace containing less than two newlines. */
  | { readonly kind: "space" }
  /** A forced line break: `\`. */
  | { readonly kind: "linebreak" }
  /** A paragraph break: Two or more newlines. */
  | { readonly kind: "parbreak" }
  /** Plain text. */
  | { readonly kind: "text"; readonly text: string }
  /** A section heading: `# Introduction`. */
  | { readonly kind: "heading"; readonly heading: NodeHeading }
  /** An optionally syntax-highlighted raw block: `` `print(x)` ``. */
  | { readonly kind: "raw"; readonly raw: NodeRaw }
  /** An expression: `{1 + 2}`, `[image "a.png"]`. */
  | { readonly kind: "expr"; readonly expr: Expr };

export interface NodeHeading {
  /** Zero-based: `#` is level 0, `##` is level 1. */
  readonly level: Spanned<number>;
  readonly contents: Tree;
}

export interface NodeRaw {
  readonly lang: Ident | null;
  readonly lines: readonly string[];
  /** Whether the raw text sits on lines of its own. */
  readonly block: boolean;
}

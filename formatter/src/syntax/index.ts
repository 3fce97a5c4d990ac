export type {
  Argument,
  BinOp,
  Expr,
  ExprArgs,
  ExprArray,
  ExprBinary,
  ExprCall,
  ExprContent,
  ExprDict,
  ExprKind,
  ExprUnary,
  Ident,
  Named,
  UnOp,
} from "./expr.js";
export { isIdent } from "./expr.js";
export type { Node, NodeHeading, NodeRaw, Tree } from "./node.js";
export type { Span, Spanned } from "./span.js";
export { ZERO_SPAN, joinSpans, spanned } from "./span.js";
export { cloneExpr, cloneTree, exprEquals, nodeEquals, treeEquals } from "./eq.js";

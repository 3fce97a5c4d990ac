/**
 * Canonical printer for the markup syntax tree
 * Produces prettier Docs made of text and joins only, so the output never
 * depends on the print width
 */

import type { AstPath, Doc, Printer } from 'prettier'
import { doc } from 'prettier'
import { formatColor } from './color.js'
import type {
  Argument,
  BinOp,
  Expr,
  ExprArgs,
  ExprArray,
  ExprBinary,
  ExprCall,
  ExprDict,
  ExprUnary,
  Named,
  UnOp,
} from './syntax/expr.js'
import type { Node, NodeHeading, NodeRaw, Tree } from './syntax/node.js'
import type { MarkupDocument } from './parser.js'

const { builders, printer } = doc
const { join } = builders

const UNARY_SYMBOLS: Record<UnOp, string> = {
  neg: '-',
}

const BINARY_SYMBOLS: Record<BinOp, string> = {
  add: '+',
  sub: '-',
  mul: '*',
  div: '/',
}

// ===========================================
// Literals
// ===========================================

/**
 * Shortest decimal that reads back as the same number, never in exponent
 * notation: `1e2` => `100`, `2.50` => `2.5`.
 */
export function formatFloat(value: number): string {
  if (Number.isNaN(value)) return 'NaN'
  if (!Number.isFinite(value)) return value > 0 ? 'inf' : '-inf'
  if (Object.is(value, -0)) return '-0'

  // String() already gives the shortest round-trip digits, but switches to
  // exponent notation outside of [1e-7, 1e21)
  const text = String(value)
  const e = text.indexOf('e')
  if (e < 0) return text
  return expandExponent(text.slice(0, e), Number(text.slice(e + 1)))
}

function expandExponent(mantissa: string, exponent: number): string {
  const sign = mantissa.startsWith('-') ? '-' : ''
  const [whole, fraction = ''] = mantissa.slice(sign.length).split('.')
  const digits = whole + fraction
  const point = whole.length + exponent

  if (point <= 0) {
    return `${sign}0.${'0'.repeat(-point)}${digits}`
  }
  if (point >= digits.length) {
    return sign + digits + '0'.repeat(point - digits.length)
  }
  return `${sign}${digits.slice(0, point)}.${digits.slice(point)}`
}

// Controls, format characters, separators other than the plain space,
// private use, surrogates and unassigned code points
const NON_PRINTABLE_RE = /^(?:[\p{C}\p{Zl}\p{Zp}]|(?! )\p{Zs})$/u

/**
 * Quote a string literal, escaping backslashes, quotes and non-printable
 * characters.
 */
export function quoteString(value: string): string {
  let out = '"'
  for (const ch of value) {
    switch (ch) {
      case '\\': out += '\\\\'; break
      case '"': out += '\\"'; break
      case '\n': out += '\\n'; break
      case '\r': out += '\\r'; break
      case '\t': out += '\\t'; break
      default: {
        const code = ch.codePointAt(0) ?? 0
        out += NON_PRINTABLE_RE.test(ch) ? `\\u{${code.toString(16)}}` : ch
      }
    }
  }
  return out + '"'
}

// ===========================================
// Expressions
// ===========================================

export function printExpr(expr: Expr): Doc {
  switch (expr.kind) {
    case 'none': return 'none'
    case 'ident': return expr.value
    case 'bool': return expr.value ? 'true' : 'false'
    case 'int': return expr.value.toString()
    case 'float': return formatFloat(expr.value)
    case 'length': return formatFloat(expr.value) + expr.unit
    case 'percent': return formatFloat(expr.value) + '%'
    case 'color': return formatColor(expr.value)
    case 'str': return quoteString(expr.value)
    case 'call': return printCall(expr.call)
    case 'unary': return printUnary(expr.unary)
    case 'binary': return printBinary(expr.binary)
    case 'array': return printArray(expr.items)
    case 'dict': return printDict(expr.items)
    case 'content': return printContentExpr(expr.tree)
    default: {
      const unreachable: never = expr
      return unreachable
    }
  }
}

/**
 * The call when a tree consists of nothing but a single call expression.
 */
function singleCall(tree: Tree): ExprCall | null {
  if (tree.length !== 1) return null
  const node = tree[0].v
  if (node.kind === 'expr' && node.expr.kind === 'call') {
    return node.expr.call
  }
  return null
}

/**
 * Content in an expression context. Braces around a lone call are dropped:
 * `(call: {[f]})` => `(call: [f])`.
 */
export function printContentExpr(tree: Tree): Doc {
  const call = singleCall(tree)
  if (call) {
    return printBracketCall(call, false)
  }
  return ['{', printTree(tree), '}']
}

/**
 * A call in parenthesized form: `foo(1, draw: false)`.
 */
export function printCall(call: ExprCall): Doc {
  return [call.name.v, '(', printArgs(call.args.v), ')']
}

/**
 * The content of the last argument, if that is positional content.
 */
function trailingContent(args: ExprArgs): Tree | null {
  const last = args.length > 0 ? args[args.length - 1] : undefined
  if (last?.kind === 'pos' && last.expr.v.kind === 'content') {
    return last.expr.v.tree
  }
  return null
}

/**
 * A call in bracketed form, written with a body or as a chain where
 * possible: `[v {Hi}]` => `[v][Hi]` and `[v][[f]]` => `[v | f]`.
 *
 * With `chained` set, the call continues a chain and opens with ` | `
 * instead of `[`.
 */
export function printBracketCall(call: ExprCall, chained: boolean): Doc {
  const parts: Doc[] = [chained ? ' | ' : '[', call.name.v]
  const args = call.args.v
  const content = trailingContent(args)

  if (content) {
    const head = args.slice(0, -1)
    if (head.length > 0) {
      parts.push(' ', printArgs(head))
    }

    const inner = singleCall(content)
    if (inner) {
      // The chained call closes the bracket for both
      parts.push(printBracketCall(inner, true))
      return parts
    }
    parts.push('][', printTree(content))
  } else if (args.length > 0) {
    parts.push(' ', printArgs(args))
  }

  // Either end of header or end of body
  parts.push(']')
  return parts
}

export function printArgs(args: ExprArgs): Doc {
  return join(', ', args.map(printArgument))
}

export function printArgument(arg: Argument): Doc {
  return arg.kind === 'pos' ? printExpr(arg.expr.v) : printNamed(arg.named)
}

export function printNamed(named: Named): Doc {
  return [named.name.v, ': ', printExpr(named.expr.v)]
}

export function printUnary(unary: ExprUnary): Doc {
  return [UNARY_SYMBOLS[unary.op.v], printExpr(unary.expr.v)]
}

/**
 * Operands are printed in tree order; no parentheses are added.
 */
export function printBinary(binary: ExprBinary): Doc {
  return [
    printExpr(binary.lhs.v),
    ' ',
    BINARY_SYMBOLS[binary.op.v],
    ' ',
    printExpr(binary.rhs.v),
  ]
}

/**
 * `(1, 2)`. A single item keeps a trailing comma, `(x,)`, since `(x)` is
 * just a parenthesized `x`.
 */
export function printArray(items: ExprArray): Doc {
  const parts: Doc[] = ['(', join(', ', items.map((item) => printExpr(item.v)))]
  if (items.length === 1) {
    parts.push(',')
  }
  parts.push(')')
  return parts
}

/**
 * `(a: 1, b: 2)`. The empty dictionary is `(:)`, `()` being an empty array.
 */
export function printDict(items: ExprDict): Doc {
  if (items.length === 0) {
    return '(:)'
  }
  return ['(', join(', ', items.map(printNamed)), ')']
}

// ===========================================
// Markup
// ===========================================

export function printTree(tree: Tree): Doc {
  return tree.map((node) => printNode(node.v))
}

export function printNode(node: Node): Doc {
  switch (node.kind) {
    case 'strong': return '*'
    case 'emph': return '_'
    case 'space': return ' '
    case 'linebreak': return '\\'
    case 'parbreak': return '\n\n'
    case 'text': return node.text
    case 'heading': return printHeading(node.heading)
    case 'raw': return printRaw(node.raw)
    case 'expr': return printExprNode(node.expr)
    default: {
      const unreachable: never = node
      return unreachable
    }
  }
}

/**
 * An expression in markup. Calls take bracket form, `{v()}` => `[v]`, and
 * content needs no block at all, `{{Hi}}` => `Hi`.
 */
export function printExprNode(expr: Expr): Doc {
  switch (expr.kind) {
    case 'call': return printBracketCall(expr.call, false)
    case 'content': return printTree(expr.tree)
    default: return ['{', printExpr(expr), '}']
  }
}

function printHeading(heading: NodeHeading): Doc {
  return ['#'.repeat(heading.level.v + 1), printTree(heading.contents)]
}

function printRaw(raw: NodeRaw): Doc {
  // A language tag or block layout need at least three backticks, and a
  // run of backticks in the text needs one more than its length
  let backticks = raw.lang !== null || raw.block ? 3 : 1
  for (const text of raw.lines) {
    for (const run of text.match(/`+/g) ?? []) {
      backticks = Math.max(backticks, 3, run.length + 1)
    }
  }

  const fence = '`'.repeat(backticks)
  const parts: Doc[] = [fence]
  if (raw.lang !== null) {
    parts.push(raw.lang)
  }

  if (raw.block) {
    parts.push('\n')
  } else if (backticks >= 3) {
    parts.push(' ')
  }

  parts.push(join('\n', [...raw.lines]))

  const lastLine = raw.lines.length > 0 ? raw.lines[raw.lines.length - 1] : ''
  if (raw.block) {
    parts.push('\n')
  } else if (lastLine.trimEnd().endsWith('`')) {
    parts.push(' ')
  }

  parts.push(fence)
  return parts
}

// ===========================================
// Entry points
// ===========================================

/**
 * Render an expression, or a whole markup tree, to canonical source text.
 */
export function pretty(value: Expr | Tree): string {
  const printed = isTree(value) ? printTree(value) : printExpr(value)
  return printer.printDocToString(printed, {
    printWidth: 80,
    tabWidth: 2,
    useTabs: false,
  }).formatted
}

function isTree(value: Expr | Tree): value is Tree {
  return Array.isArray(value)
}

/**
 * Main print function for the prettier plugin
 */
export const printMarkup: Printer<MarkupDocument>['print'] = (
  path: AstPath<MarkupDocument>,
) => {
  return printTree(path.node.tree)
}

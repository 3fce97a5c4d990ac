/**
 * Prettier plugin for markup syntax trees
 * Takes a tree decoded from JSON and prints its canonical source
 */

import type {
  Parser,
  Printer,
  Plugin,
  SupportLanguage,
} from "prettier";
import { parse as parseTree } from "./parser.js";
import type { MarkupDocument } from "./parser.js";
import { printMarkup } from "./printer.js";

// Language definition
const languages: SupportLanguage[] = [
  {
    name: "Markup AST",
    parsers: ["markup-ast"],
    extensions: [".ast.json"],
  },
];

// Parser definition
const parsers: Record<string, Parser<MarkupDocument>> = {
  "markup-ast": {
    parse(text: string): MarkupDocument {
      return parseTree(text).rootNode;
    },
    astFormat: "markup-ast",
    locStart(node: MarkupDocument): number {
      return node.span.start;
    },
    locEnd(node: MarkupDocument): number {
      return node.span.end;
    },
  },
};

// Printer definition
const printers: Record<string, Printer<MarkupDocument>> = {
  "markup-ast": {
    print: printMarkup,
  },
};

// Export the plugin
const plugin: Plugin<MarkupDocument> = {
  languages,
  parsers,
  printers,
};

export default plugin;
export { languages, parsers, printers };

export {
  pretty,
  printExpr,
  printCall,
  printBracketCall,
  printContentExpr,
  printArgs,
  printArgument,
  printNamed,
  printUnary,
  printBinary,
  printArray,
  printDict,
  printTree,
  printNode,
  printExprNode,
  formatFloat,
  quoteString,
} from "./printer.js";
export {
  parse,
  decodeExpr,
  decodeNode,
  decodeTree,
  walk,
  AstDecodeError,
} from "./parser.js";
export type { MarkupDocument, ParseResult } from "./parser.js";
export { parseColor, formatColor } from "./color.js";
export type { RgbaColor } from "./color.js";
export { UNITS, isUnit } from "./length.js";
export type { Unit } from "./length.js";
export * from "./syntax/index.js";

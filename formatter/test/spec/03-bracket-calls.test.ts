import { describe, it, expect } from "vitest";
import { pretty, printBracketCall } from "../../src/printer.js";
import { cloneTree } from "../../src/syntax/eq.js";
import { spanned } from "../../src/syntax/span.js";
import type { Tree } from "../../src/syntax/node.js";
import {
  call,
  callOf,
  content,
  exprNode,
  int,
  length,
  named,
  pos,
  render,
  str,
  text,
  tree,
} from "../helpers/builders.js";

/**
 * `[v ...]` whose only argument is content holding `[f]`, with the spans
 * each surface form would give it.
 */
function chainTree(argStart: number, argEnd: number): Tree {
  const inner = content(exprNode(call("f")));
  return [spanned(exprNode(call("v", pos(inner, { start: argStart, end: argEnd }))))];
}

describe("printBracketCall — chains", () => {
  it.each([
    ["[v [f]]", 3, 6],
    ["[v {[f]}]", 3, 8],
    ["[v][[f]]", 4, 7],
    ["[v | f]", 5, 6],
  ])("prints %s as [v | f]", (_source, start, end) => {
    expect(pretty(chainTree(start, end))).toBe("[v | f]");
  });

  it("keeps leading arguments before the chain", () => {
    const body = content(exprNode(call("f", pos(int(2)))));
    expect(pretty(tree(exprNode(call("v", pos(int(1)), pos(body)))))).toBe("[v 1 | f 2]");
  });

  it("chains more than two calls", () => {
    const g = content(exprNode(call("g")));
    const f = content(exprNode(call("f", pos(g))));
    expect(pretty(tree(exprNode(call("v", pos(f)))))).toBe("[v | f | g]");
  });

  it("ends a chain with a body", () => {
    const f = content(exprNode(call("f", pos(content(text("Hi"))))));
    expect(pretty(tree(exprNode(call("v", pos(f)))))).toBe("[v | f][Hi]");
  });

  it("opens a chained call with a pipe", () => {
    expect(render(printBracketCall(callOf("f", pos(int(1))), true))).toBe(" | f 1]");
    expect(render(printBracketCall(callOf("f", pos(int(1))), false))).toBe("[f 1]");
  });

  it("is stable across copies of the tree", () => {
    const source = chainTree(0, 0);
    expect(pretty(cloneTree(source))).toBe(pretty(source));
  });
});

describe("printBracketCall — bodies", () => {
  it("moves trailing content into a body — [v][Hi]", () => {
    expect(pretty(tree(exprNode(call("v", pos(content(text("Hi")))))))).toBe("[v][Hi]");
  });

  it("prints leading arguments in the header", () => {
    const expr = call("box", pos(length(2, "cm")), named("fill", str("red")), pos(content(text("Hi"))));
    expect(pretty(tree(exprNode(expr)))).toBe('[box 2cm, fill: "red"][Hi]');
  });

  it("prints an empty body", () => {
    expect(pretty(tree(exprNode(call("v", pos(content())))))).toBe("[v][]");
  });

  it("uses no body when content is followed by another argument — [v [f], 1]", () => {
    const expr = call("v", pos(content(exprNode(call("f")))), pos(int(1)));
    expect(pretty(tree(exprNode(expr)))).toBe("[v [f], 1]");
  });

  it("uses no body for named content", () => {
    const expr = call("v", named("body", content(text("Hi"))));
    expect(pretty(tree(exprNode(expr)))).toBe("[v body: {Hi}]");
  });
});

describe("printBracketCall — without content", () => {
  it("prints a bare call — [f]", () => {
    expect(pretty(tree(exprNode(call("f"))))).toBe("[f]");
  });

  it("prints plain arguments in the header", () => {
    expect(pretty(tree(exprNode(call("image", pos(str("a.png"))))))).toBe('[image "a.png"]');
  });

  it("does not chain a trailing call argument", () => {
    expect(pretty(tree(exprNode(call("v", pos(call("f"))))))).toBe("[v f()]");
  });
});

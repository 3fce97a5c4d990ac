import { describe, it, expect } from "vitest";
import { pretty } from "../../src/printer.js";
import {
  binary,
  call,
  content,
  dict,
  emph,
  exprNode,
  heading,
  int,
  linebreak,
  neg,
  none,
  parbreak,
  percent,
  pos,
  raw,
  space,
  strong,
  text,
  tree,
} from "../helpers/builders.js";

describe("pretty — markup", () => {
  it("prints strong and emphasis toggles", () => {
    expect(pretty(tree(strong(), text("Hi"), strong(), space(), emph(), text("there"), emph()))).toBe(
      "*Hi* _there_",
    );
  });

  it("prints breaks", () => {
    expect(pretty(tree(text("a"), space(), text("b"), linebreak(), parbreak(), text("c")))).toBe(
      "a b\\\n\nc",
    );
  });

  it("prints headings by level", () => {
    expect(pretty(tree(heading(0, space(), text("Intro"))))).toBe("# Intro");
    expect(pretty(tree(heading(2, space(), strong(), text("Details"), strong())))).toBe(
      "### *Details*",
    );
  });
});

describe("pretty — raw text", () => {
  it("fences inline raw text with one backtick", () => {
    expect(pretty(tree(raw(["x"])))).toBe("`x`");
  });

  it("fences blocks with three backticks and the language tag", () => {
    expect(pretty(tree(raw(["let x = 1;"], "js", true)))).toBe("```js\nlet x = 1;\n```");
  });

  it("joins lines of a block", () => {
    expect(pretty(tree(raw(["a", "b"], null, true)))).toBe("```\na\nb\n```");
  });

  it("uses more backticks than the text contains", () => {
    expect(pretty(tree(raw(["a`b"])))).toBe("``` a`b```");
    expect(pretty(tree(raw(["a````b"])))).toBe("````` a````b`````");
  });

  it("pads text ending in a backtick", () => {
    expect(pretty(tree(raw(["a`"])))).toBe("``` a` ```");
  });
});

describe("pretty — expressions in markup", () => {
  it("wraps non-call expressions in braces", () => {
    expect(pretty(tree(exprNode(none())))).toBe("{none}");
    expect(pretty(tree(exprNode(dict())))).toBe("{(:)}");
    expect(pretty(tree(exprNode(dict(["percent", percent(5)]))))).toBe("{(percent: 5%)}");
    expect(pretty(tree(exprNode(binary(int(1), "add", call("func", pos(neg(int(2))))))))).toBe(
      "{1 + func(-2)}",
    );
  });

  it("unwraps content blocks", () => {
    expect(pretty(tree(exprNode(content(text("Hi")))))).toBe("Hi");
  });

  it("drops braces around a lone call — (func: {[f]})", () => {
    const source = tree(text("(func: "), exprNode(content(exprNode(call("f")))), text(")"));
    expect(pretty(source)).toBe("(func: [f])");
  });
});

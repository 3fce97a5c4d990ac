import { describe, it, expect } from "vitest";
import { pretty } from "../../src/printer.js";
import {
  array,
  binary,
  bool,
  call,
  content,
  dict,
  exprNode,
  ident,
  int,
  named,
  neg,
  percent,
  pos,
  str,
  text,
} from "../helpers/builders.js";

describe("pretty — operators", () => {
  it("prints negation without a space", () => {
    expect(pretty(neg(ident("x")))).toBe("-x");
    expect(pretty(neg(neg(ident("x"))))).toBe("--x");
  });

  it("prints binary operators with single spaces", () => {
    const expr = binary(int(1), "add", call("func", pos(neg(int(2)))));
    expect(pretty(expr)).toBe("1 + func(-2)");
  });

  it.each([
    ["add", "a + b"],
    ["sub", "a - b"],
    ["mul", "a * b"],
    ["div", "a / b"],
  ] as const)("maps %s to its symbol", (op, expected) => {
    expect(pretty(binary(ident("a"), op, ident("b")))).toBe(expected);
  });

  it("prints nested operations in tree order without parentheses", () => {
    const expr = binary(binary(int(1), "sub", int(2)), "mul", int(3));
    expect(pretty(expr)).toBe("1 - 2 * 3");
  });
});

describe("pretty — arrays", () => {
  it("keeps a trailing comma for a single item — (-5,)", () => {
    expect(pretty(array(neg(int(5))))).toBe("(-5,)");
  });

  it("separates items with commas — (1, 2, 3)", () => {
    expect(pretty(array(int(1), int(2), int(3)))).toBe("(1, 2, 3)");
  });

  it("prints the empty array", () => {
    expect(pretty(array())).toBe("()");
  });
});

describe("pretty — dictionaries", () => {
  it("prints the empty dictionary as (:)", () => {
    expect(pretty(dict())).toBe("(:)");
  });

  it("prints pairs — (percent: 5%)", () => {
    expect(pretty(dict(["percent", percent(5)]))).toBe("(percent: 5%)");
  });

  it("keeps duplicate keys in order", () => {
    expect(pretty(dict(["a", int(1)], ["a", int(2)]))).toBe("(a: 1, a: 2)");
  });
});

describe("pretty — calls in expression position", () => {
  it("prints the parenthesized form", () => {
    expect(pretty(call("f"))).toBe("f()");
    expect(pretty(call("func", pos(int(1)), named("draw", bool(false))))).toBe(
      "func(1, draw: false)",
    );
  });

  it("does not chain a trailing call argument", () => {
    expect(pretty(call("f", pos(int(1)), pos(call("g"))))).toBe("f(1, g())");
  });

  it("does not use a body for a trailing string argument", () => {
    expect(pretty(call("image", pos(str("a.png"))))).toBe('image("a.png")');
  });

  it("keeps a content argument in parentheses", () => {
    expect(pretty(call("f", pos(content(text("Hi")))))).toBe("f({Hi})");
  });
});

describe("pretty — content expressions", () => {
  it("drops braces around a lone call — (func: [f])", () => {
    expect(pretty(dict(["func", content(exprNode(call("f")))]))).toBe("(func: [f])");
  });

  it("keeps braces around other content", () => {
    expect(pretty(content(text("Hi")))).toBe("{Hi}");
    expect(pretty(content(exprNode(call("f")), text("!")))).toBe("{[f]!}");
    expect(pretty(content())).toBe("{}");
  });

  it("keeps braces around a lone non-call expression", () => {
    expect(pretty(content(exprNode(int(1))))).toBe("{{1}}");
  });
});

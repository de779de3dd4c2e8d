import { lex } from "./lexer";
import { parse as parseInner } from "./parser";
import { dumpTree, print } from "./printer";

const parse = (code: string) => parseInner(lex(code));

// source positions change when a program is reprinted
function stripLines(node: unknown): unknown {
  if (Array.isArray(node)) return node.map(stripLines);
  if (node && typeof node === "object") {
    return Object.fromEntries(
      Object.entries(node)
        .filter(([key]) => key !== "line")
        .map(([key, value]) => [key, stripLines(value)])
    );
  }
  return node;
}

const code = `
  x = 1 + 2 * 3;
  if (x > 5) { y = "a\\"b"; } else if (x < 0) { y = 'c'; }
  func f(a, b) { return; }
  for (;;) { break; }
`;

it("prints programs as source", () => {
  expect(print(parse(code))).toEqual(
    [
      "x = (1 + (2 * 3));",
      "if ((x > 5)) {",
      '  y = "a\\"b";',
      "} else {",
      "  if ((x < 0)) {",
      '    y = "c";',
      "  }",
      "}",
      "func f(a, b) {",
      "  return;",
      "}",
      "for (; ; ) {",
      "  break;",
      "}",
    ].join("\n")
  );
});

it("prints large integers in full", () => {
  expect(print(parse("x = 100000000000000000000000;"))).toEqual(
    "x = 100000000000000000000000;"
  );
  expect(print(parse("x = 9007199254740993;"))).toEqual("x = 9007199254740993;");
});

it("reads back what it prints", () => {
  const programs = [
    code,
    "",
    "x = 2.0 - -1.5 / 3; b = !(true || false) && 1 != 2;",
    "s = \"back\\\\slash\"; { } while (s == \"\") { continue; }",
    "func g(n) { if (n <= 0) { return 0; } return n % 2 + g(n - 1); } t = g(4);",
    "for (i = 0; i < 10; i = i + 1) { f(i, i * i); }",
    "x = 100000000000000000000000;",
    `x = ${"9".repeat(401)};`,
  ];
  for (const program of programs) {
    const ast = parse(program);
    expect(stripLines(parse(print(ast)))).toEqual(stripLines(ast));
  }
});

it("dumps the tree", () => {
  expect(dumpTree(parse("x = 10 + 5;\nwhile (x) { f(x, -1); }"))).toEqual(
    [
      "Program",
      "|  Assignment x",
      "|  |  BinaryOp +",
      "|  |  |  Left: Literal 10",
      "|  |  |  Right: Literal 5",
      "|  While",
      "|  |  Condition: Identifier x",
      "|  |  Body: Block",
      "|  |  |  ExprStatement",
      "|  |  |  |  Call f",
      "|  |  |  |  |  Arg: Identifier x",
      "|  |  |  |  |  Arg: UnaryOp -",
      "|  |  |  |  |  |  Literal 1",
    ].join("\n")
  );
});

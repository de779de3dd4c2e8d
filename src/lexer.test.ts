import { lex, Lexer, LexicalError } from "./lexer";

it("has a lexer", () => {
  const code = `x = lettuce(12.5, "hi") // a comment`;
  expect(lex(code)).toEqual([
    { tag: "identifier", value: "x", line: 1 },
    { tag: "=", line: 1 },
    { tag: "identifier", value: "lettuce", line: 1 },
    { tag: "(", line: 1 },
    { tag: "float", value: 12.5, line: 1 },
    { tag: ",", line: 1 },
    { tag: "string", value: "hi", line: 1 },
    { tag: ")", line: 1 },
    { tag: "endOfInput", line: 1 },
  ]);
});

it("ends empty input with a single end token", () => {
  expect(lex("")).toEqual([{ tag: "endOfInput", line: 1 }]);
  expect(lex("  // nothing here")).toEqual([{ tag: "endOfInput", line: 1 }]);
});

it("reads the longest operator", () => {
  const tags = lex("a<=b==c!d&&e||f>=g!=h=i").map((t) => t.tag);
  expect(tags).toEqual([
    "identifier", "<=", "identifier", "==", "identifier", "!",
    "identifier", "&&", "identifier", "||", "identifier", ">=",
    "identifier", "!=", "identifier", "=", "identifier", "endOfInput",
  ]);
});

it("tells keywords from identifiers", () => {
  const tags = lex("if iffy func true false_ while").map((t) => t.tag);
  expect(tags).toEqual([
    "if", "identifier", "func", "true", "identifier", "while", "endOfInput",
  ]);
});

it("reads integers and floats", () => {
  expect(lex("0 42 3.14 1e3 2.5E-1")).toMatchObject([
    { tag: "integer", value: 0n },
    { tag: "integer", value: 42n },
    { tag: "float", value: 3.14 },
    { tag: "float", value: 1000 },
    { tag: "float", value: 0.25 },
    { tag: "endOfInput" },
  ]);
});

it("unescapes strings in either quote", () => {
  const code = String.raw`"a\"b" 'it\'s' "back\\slash" ""`;
  expect(lex(code)).toMatchObject([
    { tag: "string", value: 'a"b' },
    { tag: "string", value: "it's" },
    { tag: "string", value: "back\\slash" },
    { tag: "string", value: "" },
    { tag: "endOfInput" },
  ]);
});

it("tracks lines across comments", () => {
  const code = "x = 1;\n/* a\nb */ y = 2; // c\nz";
  expect(lex(code).map((t) => [t.tag, t.line])).toEqual([
    ["identifier", 1],
    ["=", 1],
    ["integer", 1],
    [";", 1],
    ["identifier", 3],
    ["=", 3],
    ["integer", 3],
    [";", 3],
    ["identifier", 4],
    ["endOfInput", 4],
  ]);
});

it("rejects unrecognized characters", () => {
  expect(() => lex("x = 1 @ 2")).toThrowError(LexicalError);
  expect(() => lex("x = 1 @ 2")).toThrowError(
    "Unrecognized character '@' on line 1"
  );
  expect(() => lex("x = 1;\ny = #")).toThrowError(
    "Unrecognized character '#' on line 2"
  );
  expect(() => lex("x = 1.")).toThrowError(
    "Unrecognized character '.' on line 1"
  );
  expect(() => lex(`s = "open`)).toThrowError(
    `Unrecognized character '"' on line 1`
  );
  expect(() => lex("x = \u{1F600}")).toThrowError(
    "Unrecognized character '\u{1F600}' on line 1"
  );
});

it("can be iterated more than once", () => {
  const lexer = new Lexer("a + 1");
  expect(Array.from(lexer)).toEqual(Array.from(lexer));
  expect(Array.from(lexer)).toHaveLength(4);
});

import { describe, expect, test } from "vitest";
import { formatGoSource } from "../../src/go/formatter";
import { GoSyntaxError } from "../../src/go/source";
import { goSource } from "../test-helpers";

const format = (text: string) => formatGoSource(Buffer.from(text), "t.go").toString("utf8");

describe("Go formatter", () => {
  test("re-indents statements with tabs", () => {
    const input = goSource("package p", "func f() {", "x := 1", "    if x == 1 {", "  x++", "}", "}");
    expect(format(input)).toBe(goSource("package p", "func f() {", "\tx := 1", "\tif x == 1 {", "\t\tx++", "\t}", "}"));
  });

  test("collapses runs of blank lines to one", () => {
    expect(format("package p\n\n\n\nfunc f() {}")).toBe("package p\n\nfunc f() {}\n");
  });

  test("puts block contents on their own lines", () => {
    expect(format("package p\nfunc f() { return }\n")).toBe(goSource("package p", "func f() {", "\treturn", "}"));
  });

  test("keeps a trailing comment beside the opening brace", () => {
    expect(format("package p\nfunc f() { // c\n}\n")).toBe(goSource("package p", "func f() { // c", "}"));
  });

  test("a block comment after the opening brace does not pull the next statement up", () => {
    expect(format("package p\nfunc f(a bool) {\n\tif a { /* c */ return }\n}\n")).toBe(
      goSource("package p", "func f(a bool) {", "\tif a { /* c */", "\t\treturn", "\t}", "}")
    );
  });

  test("a commented else wrapper keeps the nested if on its own line", () => {
    const input = goSource("package p", "func f(a bool) {", "\tif a {", "\t} else{ /* c */ if a {", "\treturn", "}}", "}");
    expect(format(input)).toBe(
      goSource(
        "package p",
        "func f(a bool) {",
        "\tif a {",
        "\t} else { /* c */",
        "\t\tif a {",
        "\t\t\treturn",
        "\t\t}",
        "\t}",
        "}"
      )
    );
  });

  test("a nested block statement starts its own line", () => {
    expect(format("package p\nfunc f() { { x() } }\n")).toBe(
      goSource("package p", "func f() {", "\t{", "\t\tx()", "\t}", "}")
    );
  });

  test("case clauses sit at the switch indent", () => {
    const input = goSource("package p", "func f(x int) {", "switch x {", "case 1:", "x++", "default:", "}", "}");
    expect(format(input)).toBe(
      goSource("package p", "func f(x int) {", "\tswitch x {", "\tcase 1:", "\t\tx++", "\tdefault:", "\t}", "}")
    );
  });

  test("joins else onto the closing brace line and spaces the block brace", () => {
    const input = goSource(
      "package p",
      "func f(a bool) {",
      "\tif a {",
      "\t\treturn",
      "\t} else{ if a {",
      "\treturn",
      "}}",
      "}"
    );
    expect(format(input)).toBe(
      goSource(
        "package p",
        "func f(a bool) {",
        "\tif a {",
        "\t\treturn",
        "\t} else {",
        "\t\tif a {",
        "\t\t\treturn",
        "\t\t}",
        "\t}",
        "}"
      )
    );
  });

  test("composite literal braces are not treated as blocks", () => {
    const input = goSource("package p", "var m = map[string]int{\"a\": 1}");
    expect(format(input)).toBe(input);
  });

  test("formatting is stable", () => {
    const once = format(goSource("package p", "func f() {", "  for i := 0; i < 3; i++ {", "go g(i)", "}", "}"));
    expect(format(once)).toBe(once);
  });

  test("throws GoSyntaxError for invalid input", () => {
    expect(() => format("package p\nfunc {\n")).toThrow(GoSyntaxError);
  });
});

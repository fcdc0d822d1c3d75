import { describe, expect, test, vi } from "vitest";
import { EditBuffer } from "../../src/core/edit-buffer";
import { emit } from "../../src/core/emitter";
import { ErrorSeverity } from "../../src/core/error-handler";
import { GoSyntaxError, SourceFile } from "../../src/go/source";

const REFS = "\nvar _ = _guardfault_rand_.Int\nvar _ = _guardfault_fmt_.Println\n";

describe("emit", () => {
  test("appends reference declarations before formatting", () => {
    const edits = new EditBuffer(Buffer.from("package p\n"));
    const format = vi.fn((content: Buffer) => content);
    const result = emit(edits, "a.go", format);

    expect(format).toHaveBeenCalledTimes(1);
    expect(format.mock.calls[0][0].toString()).toBe("package p\n" + REFS);
    expect(result.formatted).toBe(true);
    expect(result.formatError).toBeUndefined();
  });

  test("formats with the built-in formatter by default", () => {
    const edits = new EditBuffer(Buffer.from("package p\n"));
    expect(emit(edits, "a.go").code.toString()).toBe(
      "package p\n\nvar _ = _guardfault_rand_.Int\nvar _ = _guardfault_fmt_.Println\n"
    );
  });

  test("returns the raw output when formatting hits a Go syntax error", () => {
    const edits = new EditBuffer(Buffer.from("package p\n"));
    edits.insert(10, "func (\n");
    const syntaxError = new GoSyntaxError(new SourceFile("a.go", Buffer.from("x")), 0, "bad input");
    const result = emit(edits, "a.go", () => {
      throw syntaxError;
    });

    expect(result.formatted).toBe(false);
    expect(result.code.toString()).toBe("package p\nfunc (\n" + REFS);
    expect(result.formatError).toMatchObject({
      code: "FORMAT001",
      message: "code formatting failed with Go parse error: a.go:1:1: bad input",
      filePath: "a.go",
      line: 1,
      column: 1,
      severity: ErrorSeverity.ERROR,
    });
  });

  test("propagates other formatter failures", () => {
    const edits = new EditBuffer(Buffer.from("package p\n"));
    expect(() =>
      emit(edits, "a.go", () => {
        throw new RangeError("boom");
      })
    ).toThrow(RangeError);
  });
});

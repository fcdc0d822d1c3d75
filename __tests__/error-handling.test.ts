/**
 * 错误处理单元测试
 * 错误对象的创建、格式化、归类与输出
 */
import { afterEach, describe, expect, test, vi } from "vitest";
import {
  ErrorCategory,
  ErrorSeverity,
  FaultInjectionError,
  createInjectorError,
  enhanceError,
  formatError,
  logError,
} from "../src/core/error-handler";
import { GoSyntaxError, SourceFile } from "../src/go/source";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("错误处理单元测试", () => {
  describe("基础错误创建和格式化", () => {
    test("creates an error from its definition", () => {
      const error = createInjectorError("CONFIG001", ["0"]);
      expect(error).toMatchObject({
        code: "CONFIG001",
        category: ErrorCategory.CONFIG,
        message: "invalid error percent: 0",
        severity: ErrorSeverity.FATAL,
        suggestion: "use a percentage greater than 0 and at most 100",
      });
      expect(error.details).toBeUndefined();
    });

    test("fills every placeholder", () => {
      const error = createInjectorError("STRUCT001", ["else", 42], { keyword: "else", offset: 42 });
      expect(error.message).toBe("structural assumption violated: keyword 'else' not found after offset 42");
      expect(error.category).toBe(ErrorCategory.STRUCTURE);
      expect(error.suggestion).toBeUndefined();
    });

    test("unknown codes fall back to GENERAL001", () => {
      const error = createInjectorError("NOPE999", ["mystery"]);
      expect(error.code).toBe("GENERAL001");
      expect(error.message).toBe("unknown error: mystery");
      expect(error.category).toBe(ErrorCategory.UNKNOWN);
    });

    test("takes line and column from a Go-style message", () => {
      const error = createInjectorError("FORMAT001", ["x"], { originalError: new Error("out.go:12:5: expected ';'") });
      expect(error.line).toBe(12);
      expect(error.column).toBe(5);
      expect(error.details).toBe("out.go:12:5: expected ';'");
      expect(error.severity).toBe(ErrorSeverity.ERROR);
    });

    test("formats location, details and hint", () => {
      const error = createInjectorError("PARSING001", ["a.go:3:5: boom"], {
        filePath: "a.go",
        line: 3,
        column: 5,
        originalError: new Error("a.go:3:5: boom"),
      });
      expect(formatError(error)).toBe(
        [
          "[PARSING001] failed to parse Go source: a.go:3:5: boom",
          "  file: a.go:3:5",
          "  details: a.go:3:5: boom",
          "  hint: make sure the file compiles with the Go toolchain before injecting faults",
        ].join("\n")
      );
    });

    test("formats a bare error on one line", () => {
      expect(formatError(createInjectorError("FILE003", ["disk full"]))).toBe("[FILE003] failed to write output: disk full");
    });
  });

  describe("FaultInjectionError", () => {
    test("carries the error record", () => {
      const info = createInjectorError("STRUCT003", [9, 4]);
      const error = new FaultInjectionError(info);
      expect(error).toBeInstanceOf(Error);
      expect(error.code).toBe("STRUCT003");
      expect(error.info).toBe(info);
      expect(error.message).toBe("[STRUCT003] structural assumption violated: edit offset 9 outside source of 4 bytes");
    });
  });

  describe("enhanceError", () => {
    test("unwraps FaultInjectionError and adds the file path", () => {
      const error = new FaultInjectionError(createInjectorError("STRUCT002", ["Opaque", 1]));
      expect(enhanceError(error, "a.go")).toMatchObject({ code: "STRUCT002", filePath: "a.go" });
      expect(enhanceError(error)).toBe(error.info);
    });

    test("keeps an existing file path", () => {
      const error = new FaultInjectionError(createInjectorError("FILE002", ["x"], { filePath: "out.go" }));
      expect(enhanceError(error, "in.go").filePath).toBe("out.go");
    });

    test("classifies Go syntax errors as PARSING001", () => {
      const source = new SourceFile("b.go", Buffer.from("package p\nfunc {"));
      const syntax = new GoSyntaxError(source, 15, "expected identifier, found '{'");
      expect(enhanceError(syntax)).toMatchObject({
        code: "PARSING001",
        category: ErrorCategory.PARSING,
        filePath: "b.go",
        line: 2,
        column: 6,
        offset: 15,
        message: "failed to parse Go source: b.go:2:6: expected identifier, found '{'",
      });
    });

    test("classifies file system errors as FILE001", () => {
      const error = enhanceError(new Error("ENOENT: no such file or directory"), "missing.go");
      expect(error.code).toBe("FILE001");
      expect(error.message).toBe("failed to read file: missing.go");
    });

    test("anything else becomes GENERAL001", () => {
      expect(enhanceError("plain string")).toMatchObject({ code: "GENERAL001", message: "unknown error: plain string" });
    });
  });

  describe("logError", () => {
    test("writes errors to stderr", () => {
      const spy = vi.spyOn(console, "error").mockImplementation(() => {});
      logError(createInjectorError("FILE003", ["disk full"]));
      expect(spy).toHaveBeenCalledWith("[FILE003] failed to write output: disk full");
    });

    test("uses console.warn for warnings", () => {
      const spy = vi.spyOn(console, "warn").mockImplementation(() => {});
      logError({ ...createInjectorError("FILE003", ["x"]), severity: ErrorSeverity.WARNING });
      expect(spy).toHaveBeenCalledTimes(1);
    });
  });
});

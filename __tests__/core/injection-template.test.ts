import { describe, expect, test } from "vitest";
import { normalizeConfig } from "../../src/core/config-normalizer";
import {
  goQuote,
  injectionMessage,
  renderImportHeader,
  renderInjection,
  renderReferenceDecls,
} from "../../src/core/injection-template";

describe("injection template", () => {
  test("renders the traced injection block", () => {
    const config = normalizeConfig({ fileName: "svc/main.go", errorPercent: 5 });
    expect(renderInjection(12, config)).toBe(
      [
        "if _guardfault_rand_.Int()%20 == 0 {",
        '\t_guardfault_fmt_.Println("injected error at svc/main.go:12")',
        '\terr = _guardfault_fmt_.Errorf("injected error at svc/main.go:12")',
        "}",
        "",
      ].join("\n")
    );
  });

  test("omits the trace line when tracing is off", () => {
    const config = normalizeConfig({ fileName: "a.go", errorPercent: 100, trace: false });
    expect(renderInjection(1, config)).toBe(
      'if _guardfault_rand_.Int()%1 == 0 {\n\terr = _guardfault_fmt_.Errorf("injected error at a.go:1")\n}\n'
    );
  });

  test("escapes file names for Go string literals and Errorf verbs", () => {
    const config = normalizeConfig({ fileName: 'dir\\100%"x".go', trace: true });
    const block = renderInjection(3, config);
    expect(block).toContain('Println("injected error at dir\\\\100%\\"x\\".go:3")');
    expect(block).toContain('Errorf("injected error at dir\\\\100%%\\"x\\".go:3")');
  });

  test("quotes like a Go interpreted string", () => {
    expect(goQuote('a"b\n')).toBe('"a\\"b\\n"');
    expect(injectionMessage("x.go", 7)).toBe("injected error at x.go:7");
  });

  test("import header and reference declarations use the aliases", () => {
    expect(renderImportHeader()).toBe('\nimport _guardfault_rand_ "math/rand"\nimport _guardfault_fmt_ "fmt"\n');
    expect(renderReferenceDecls()).toBe("\nvar _ = _guardfault_rand_.Int\nvar _ = _guardfault_fmt_.Println\n");
  });
});

import { describe, expect, test } from "vitest";
import { CONFIG_DEFAULTS, errorDenominator, normalizeConfig } from "../../src/core/config-normalizer";
import { FaultInjectionError } from "../../src/core/error-handler";

function captureCode(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof FaultInjectionError) return error.code;
    throw error;
  }
  return undefined;
}

describe("配置规范化", () => {
  test("applies defaults", () => {
    expect(normalizeConfig()).toEqual({
      fileName: "<input>",
      errorPercent: 1,
      denominator: 100,
      trace: true,
    });
  });

  test("keeps explicit values", () => {
    expect(normalizeConfig({ fileName: "a.go", errorPercent: 5, trace: false })).toEqual({
      fileName: "a.go",
      errorPercent: 5,
      denominator: 20,
      trace: false,
    });
  });

  test.each([
    [5, 20],
    [100, 1],
    [50, 2],
    [3, 33],
    [0.5, 200],
    [1, 100],
  ])("percent %s gives denominator %s", (percent, denominator) => {
    expect(errorDenominator(percent)).toBe(denominator);
  });

  test.each([0, -1, 150, Number.NaN, Number.POSITIVE_INFINITY])("percent %s is rejected with CONFIG001", (percent) => {
    expect(captureCode(() => errorDenominator(percent))).toBe("CONFIG001");
  });

  test("normalizeConfig validates the percent", () => {
    expect(captureCode(() => normalizeConfig({ errorPercent: 0 }))).toBe("CONFIG001");
  });

  test("injected code aliases do not collide with common package names", () => {
    expect(CONFIG_DEFAULTS.RAND_PACKAGE_NAME).toBe("_guardfault_rand_");
    expect(CONFIG_DEFAULTS.FMT_PACKAGE_NAME).toBe("_guardfault_fmt_");
  });
});

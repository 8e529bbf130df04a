import { describe, it, expect } from "vitest";
import {
  MAPPING_DEFAULTS,
  normalizeComposition,
  normalizeEquation,
} from "../../src/config/normalize";
import {
  parseClock,
  parseFraction,
  parseInteger,
  parseNumber,
  parseWindow,
} from "../../src/config/parse";

describe("parse helpers", () => {
  it("reads fractions and decimals", () => {
    expect(parseFraction("3/8")).toBe(0.375);
    expect(parseFraction("0.5")).toBe(0.5);
    expect(parseFraction(0.25)).toBe(0.25);
    expect(parseFraction("x/2")).toBeNull();
    expect(parseFraction("1/0")).toBeNull();
  });

  it("reads clock times", () => {
    expect(parseClock("1:30")).toBe(90);
    expect(parseClock("0:02.5")).toBe(2.5);
    expect(parseClock(12)).toBe(12);
    expect(parseClock("1.5:00")).toBeNull();
  });

  it("reads windows as pairs or comma text", () => {
    expect(parseWindow([0, "0:02"])).toEqual({ start: 0, end: 2 });
    expect(parseWindow("0:01,0:03")).toEqual({ start: 1, end: 3 });
    expect(parseWindow("5")).toBeNull();
    expect(parseWindow(null)).toBeNull();
  });

  it("reads integers and numbers strictly", () => {
    expect(parseInteger("2.5")).toBeNull();
    expect(parseInteger(2.9)).toBe(2);
    expect(parseInteger(" 7 ")).toBe(7);
    expect(parseNumber("")).toBeNull();
    expect(parseNumber("abc")).toBeNull();
  });

  it("rejects infinite numbers", () => {
    expect(parseNumber("Infinity")).toBeNull();
    expect(parseNumber("-Infinity")).toBeNull();
    expect(parseNumber(Number.POSITIVE_INFINITY)).toBeNull();
    expect(parseNumber("1e999")).toBeNull();
    expect(parseClock("Infinity")).toBeNull();
    expect(parseWindow([0, "Infinity"])).toBeNull();
  });
});

describe("normalizeEquation", () => {
  it("fills every default", () => {
    const { equation, diagnostics } = normalizeEquation({}, 1);

    expect(equation.name).toBe("eq1");
    expect(equation.expr).toBe("sin(x)");
    expect(equation.vars).toEqual({ x: 0, y: 0, z: 0 });
    expect(equation.updates).toEqual([]);
    expect(equation.evalRate).toBe(0.125);
    expect(equation.duration).toBe(5);
    expect(equation.window).toEqual({ start: 0, end: 5 });
    expect(equation.mapping).toEqual(MAPPING_DEFAULTS);
    expect(equation.limits).toEqual([]);
    expect(diagnostics).toEqual([]);
  });

  it("freezes the result", () => {
    const { equation } = normalizeEquation({}, 1);
    expect(Object.isFrozen(equation)).toBe(true);
    expect(Object.isFrozen(equation.mapping)).toBe(true);
    expect(Object.isFrozen(equation.vars)).toBe(true);
  });

  it("reads explicit values and aliases", () => {
    const { equation, diagnostics } = normalizeEquation(
      {
        name: "lead",
        expr: "x * y",
        vars: { x: "1.5", y: 2 },
        updates: ["x = x + 1"],
        eval_rate: "1/4",
        activeWindow: "0:01,0:03",
        mapping: { poly: "3", scale: "C-Major", velocity_curve: "exp", base_midi: "48" },
      },
      2
    );

    expect(equation.name).toBe("lead");
    expect(equation.vars).toEqual({ x: 1.5, y: 2, z: 0 });
    expect(equation.updates).toEqual(["x = x + 1"]);
    expect(equation.evalRate).toBe(0.25);
    expect(equation.window).toEqual({ start: 1, end: 3 });
    expect(equation.mapping.polyphony).toBe(3);
    expect(equation.mapping.scale).toBe("C-Major");
    expect(equation.mapping.velocityCurve).toBe("exponential");
    expect(equation.mapping.baseMidi).toBe(48);
    expect(diagnostics).toEqual([]);
  });

  it("raises polyphony below 1 to 1", () => {
    const { equation } = normalizeEquation({ mapping: { polyphony: 0 } }, 1);
    expect(equation.mapping.polyphony).toBe(1);
  });

  it("falls back on unreadable fractions with a config diagnostic", () => {
    const { equation, diagnostics } = normalizeEquation(
      { eval_rate: "1/0", mapping: { rhythm_quant: "fast" } },
      1
    );

    expect(equation.evalRate).toBe(0.125);
    expect(equation.mapping.rhythmQuant).toBe(0.0625);
    expect(diagnostics.map((d) => d.id)).toEqual(["eq1:config:eval_rate", "eq1:config:rhythm_quant"]);
  });

  it("uses the duration as window when the window is unreadable", () => {
    const { equation, diagnostics } = normalizeEquation(
      { duration: 8, active_window: "soon" },
      1
    );
    expect(equation.window).toEqual({ start: 0, end: 8 });
    expect(diagnostics.map((d) => d.id)).toEqual(["eq1:config:active_window"]);
  });

  it.each(["Infinity", "-Infinity"])("falls back to the default duration for %s", (input) => {
    const { equation, diagnostics } = normalizeEquation({ duration: input }, 1);

    expect(equation.duration).toBe(5);
    expect(equation.window).toEqual({ start: 0, end: 5 });
    expect(diagnostics.map((d) => d.id)).toEqual(["eq1:config:duration"]);
    expect(diagnostics[0].message).toBe(`duration "${input}" is not a finite number; using 5`);
  });

  it("keeps an unknown scale name and reports it", () => {
    const { equation, diagnostics } = normalizeEquation({ mapping: { scale: "lydian" } }, 1);
    expect(equation.mapping.scale).toBe("lydian");
    expect(diagnostics).toHaveLength(1);
    expect(diagnostics[0].id).toBe("eq1:config:scale");
    expect(diagnostics[0].severity).toBe("info");
  });

  it("skips malformed limits with warnings", () => {
    const { equation, diagnostics } = normalizeEquation(
      { name: "a", limits: { x: [10, 0], w: [1, 2], y: "bad", z: ["3", "1"] } },
      1
    );

    expect(equation.limits).toEqual([
      { variable: "x", threshold: 10, resetTo: 0 },
      { variable: "z", threshold: 3, resetTo: 1 },
    ]);
    expect(diagnostics.map((d) => d.id)).toEqual(["a:limit:w", "a:limit:y"]);
    expect(diagnostics.every((d) => d.severity === "warning")).toBe(true);
  });
});

describe("normalizeComposition", () => {
  it("names equations by position and defaults the tempo", () => {
    const result = normalizeComposition({ tempo: 0, equations: [{}, { name: "b" }, {}] });

    expect(result.tempo).toBe(120);
    expect(result.equations.map((e) => e.name)).toEqual(["eq1", "b", "eq3"]);
  });

  it("keeps a positive tempo", () => {
    expect(normalizeComposition({ tempo: 90 }).tempo).toBe(90);
  });
});

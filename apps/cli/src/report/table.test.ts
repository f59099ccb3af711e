import { describe, expect, it, vi } from "vitest";
import type { CompilerTarget, TestVariant } from "../config/types.js";
import type { TestResult } from "../runner/types.js";
import { resolveFootnotes } from "./footnotes.js";
import { statusIcon, visualWidth } from "./status.js";
import { buildMarkdownTable } from "./table.js";

const gcc: CompilerTarget = {
  id: "cg132",
  displayName: "GCC",
  extraFlags: [],
  local: { kind: "remote" },
};

const tcc: CompilerTarget = {
  id: "tcc0927",
  displayName: "TCC",
  extraFlags: [],
  local: { kind: "compile", compiler: "tcc", compilerArgs: [] },
};

const armGcc: CompilerTarget = {
  id: "arm1320",
  displayName: "ARM GCC",
  extraFlags: [],
  local: {
    kind: "assemble",
    assembler: "arm-as",
    assemblerArgs: [],
    linker: "arm-gcc",
    linkerArgs: [],
  },
};

const variant = (
  group: string,
  name: string,
  displayName: string,
  extra: Partial<TestVariant> = {}
): TestVariant => ({
  testName: `${group}_${name}`,
  variant: name,
  group,
  fileName: `/work/${group}.c`,
  displayName,
  prependLines: [],
  isAuto: false,
  includeInTable: true,
  additionalFiles: [],
  includeDirs: [],
  ...extra,
});

const auto = variant("impl", "auto", "auto", { isAuto: true, includeInTable: false });
const native = variant("impl", "native", "Native", { detectValue: 1 });
const poly = variant("impl", "poly", "Poly", { detectValue: 0 });

const result = (
  test: TestVariant,
  compiler: CompilerTarget,
  overrides: Partial<TestResult> = {}
): TestResult => ({
  testName: test.testName,
  group: test.group,
  variant: test.variant,
  variantDisplay: test.displayName,
  isAuto: test.isAuto,
  detectValue: test.detectValue,
  compiler: { displayName: compiler.displayName, id: compiler.id },
  stage: "success",
  passed: true,
  hasWarnings: false,
  hasErrors: false,
  apiError: false,
  files: {},
  stderr: { preprocess: "", compile: "", run: "" },
  ...overrides,
});

describe("statusIcon", () => {
  it("marks a missing result with a dash", () => {
    expect(statusIcon(undefined)).toBe("—");
  });

  it("leaves API errors blank", () => {
    expect(statusIcon(result(native, gcc, { passed: false, apiError: true }))).toBe("");
  });

  it("distinguishes build failures from runtime failures", () => {
    expect(statusIcon(result(native, gcc, { passed: false, stage: "preprocessing" }))).toBe("❌");
    expect(statusIcon(result(native, gcc, { passed: false, stage: "compilation" }))).toBe("❌");
    expect(statusIcon(result(native, gcc, { passed: false, stage: "runtime" }))).toBe("⚠️");
  });

  it("adds the warning icon only to passing results", () => {
    expect(statusIcon(result(native, gcc, { hasWarnings: true }))).toBe("✅ℹ️");
    expect(
      statusIcon(result(native, gcc, { passed: false, stage: "runtime", hasWarnings: true }))
    ).toBe("⚠️");
  });
});

describe("visualWidth", () => {
  it("counts wide icons twice", () => {
    expect(visualWidth("abc")).toBe(3);
    expect(visualWidth("✅")).toBe(2);
    expect(visualWidth("⭐✅")).toBe(4);
    expect(visualWidth("⚠️")).toBe(3);
    expect(visualWidth("—")).toBe(1);
  });
});

describe("resolveFootnotes", () => {
  it("shares a marker between compilers with the same local toolchain", async () => {
    const detect = vi.fn(async (command: string) =>
      command === "tcc" ? { name: "tcc" as const, version: "0.9.27" } : undefined
    );
    const tcc2 = { ...tcc, displayName: "TCC (x86)" };

    const footnotes = await resolveFootnotes([gcc, tcc, tcc2, armGcc], detect);

    expect([...footnotes.markers]).toEqual([
      ["TCC", "*"],
      ["TCC (x86)", "*"],
      ["ARM GCC", "**"],
    ]);
    expect(footnotes.lines).toEqual([
      "\\* This compiler was only used for preprocessing and then the result was compiled locally with tcc 0.9.27.  ",
      "\\** This compiler outputted assembly which was then assembled and run locally with arm-gcc.  ",
    ]);
    expect(detect).toHaveBeenCalledTimes(2);
  });

  it("hands out at most four markers", async () => {
    const locals = ["a", "b", "c", "d", "e"].map(
      (name): CompilerTarget => ({
        ...tcc,
        displayName: name.toUpperCase(),
        local: { kind: "compile", compiler: `${name}cc`, compilerArgs: [] },
      })
    );

    const footnotes = await resolveFootnotes(locals, async () => undefined);

    expect(footnotes.markers.get("D")).toBe("****");
    expect(footnotes.markers.has("E")).toBe(false);
    expect(footnotes.lines).toHaveLength(4);
  });
});

describe("buildMarkdownTable", () => {
  it("renders icons, detection stars, aligned columns and footnotes", async () => {
    const results = [
      result(auto, gcc, { implValue: 1 }),
      result(native, gcc),
      result(poly, gcc, { passed: false, stage: "compilation" }),
      result(auto, tcc, { implValue: 0 }),
      result(native, tcc, { passed: false, stage: "runtime" }),
      result(poly, tcc, { hasWarnings: true }),
      result(native, armGcc, { passed: false, apiError: true, stage: "preprocessing" }),
    ];
    const footnotes = await resolveFootnotes([gcc, tcc, armGcc], async (command) =>
      command === "tcc" ? { name: "tcc", version: "0.9.27" } : undefined
    );

    const table = buildMarkdownTable(
      { results, compilers: [gcc, tcc, armGcc], tests: [auto, native, poly] },
      footnotes
    );

    expect(table).toBe(
      [
        "| CC        | Native | Poly    |",
        "| --------- | ------ | ------- |",
        "| GCC       | ⭐✅   | ❌      |",
        "| TCC*      | ⚠️    | ⭐✅ℹ️ |",
        "| ARM GCC** |        | —       |",
        "",
        "\\* This compiler was only used for preprocessing and then the result was compiled locally with tcc 0.9.27.  ",
        "\\** This compiler outputted assembly which was then assembled and run locally with arm-gcc.  ",
        "",
      ].join("\n")
    );
  });

  it("prefixes column labels with the group when groups are mixed", () => {
    const smoke = variant("misc", "smoke", "Smoke");

    const table = buildMarkdownTable({
      results: [result(smoke, gcc)],
      compilers: [gcc],
      tests: [native, smoke],
    });

    expect(table).toBe(
      [
        "| CC  | impl:Native | misc:Smoke |",
        "| --- | ----------- | ---------- |",
        "| GCC | —           | ✅         |",
        "",
      ].join("\n")
    );
  });
});

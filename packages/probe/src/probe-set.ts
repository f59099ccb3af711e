import type { IncludeProbe } from "./include-probes.js";

/**
 * Probe state owned by a single compilation unit.
 *
 * Include probes are replaced wholesale every time a source is instrumented.
 * Macro probes accumulate in call order until cleared; the extracted values
 * are refreshed on every extraction pass.
 */
export class ProbeSet {
  private includes: readonly IncludeProbe[] = [];
  private readonly macros: string[] = [];
  private values = new Map<string, number>();

  get includeProbes(): readonly IncludeProbe[] {
    return this.includes;
  }

  get macroNames(): readonly string[] {
    return this.macros;
  }

  get hasMacroProbes(): boolean {
    return this.macros.length > 0;
  }

  /**
   * Returns false when the macro is already registered.
   */
  addMacro(name: string): boolean {
    if (this.macros.includes(name)) {
      return false;
    }
    this.macros.push(name);
    return true;
  }

  setIncludeProbes(probes: readonly IncludeProbe[]): void {
    this.includes = probes;
  }

  clearIncludeProbes(): void {
    this.includes = [];
  }

  replaceValues(values: ReadonlyMap<string, number>): void {
    this.values = new Map(values);
  }

  valueFor(name: string): number | undefined {
    return this.values.get(name);
  }

  clearMacroProbes(): void {
    this.macros.length = 0;
    this.values = new Map();
  }
}

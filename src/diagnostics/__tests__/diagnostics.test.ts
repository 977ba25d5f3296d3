import { afterEach, describe, expect, it, vi } from "vitest";
import {
  DiagnosticError,
  createDiagnostic,
  diagnosticFromCode,
  formatDiagnostic,
  getDiagnosticDefinition,
} from "../index.js";
import {
  consoleLogger,
  defaultPassLogger,
  isPassDebugEnabled,
  silentLogger,
} from "../pass-debug.js";

describe("diagnosticFromCode", () => {
  it("fills message, severity and phase from the registry", () => {
    const diagnostic = diagnosticFromCode({
      code: "VT0002",
      params: { kind: "function-field-write", structType: "$VTable", field: 3 },
      location: { function: "patch", heapType: "$VTable", field: 3 },
    });
    expect(diagnostic).toEqual({
      code: "VT0002",
      message:
        "$VTable field 3 holds a function reference and cannot be written after struct.new",
      severity: "error",
      phase: "module-code",
      location: { function: "patch", heapType: "$VTable", field: 3 },
    });
  });

  it("lets callers override the severity", () => {
    const diagnostic = diagnosticFromCode({
      code: "VT0004",
      params: { kind: "function-array", arrayType: "$Methods" },
      location: {},
      severity: "error",
    });
    expect(diagnostic.severity).toBe("error");
    expect(getDiagnosticDefinition("VT0004").severity).toBe("warning");
  });
});

describe("formatDiagnostic", () => {
  it("prints location, severity, phase and code", () => {
    const diagnostic = createDiagnostic({
      code: "VT0003",
      message: "narrowed",
      location: { heapType: "$B", field: 0 },
      phase: "type-graph",
    });
    expect(formatDiagnostic(diagnostic)).toBe(
      "type $B, field 0 ERROR [type-graph] VT0003: narrowed"
    );
  });

  it("falls back to the module as location", () => {
    expect(
      formatDiagnostic(
        createDiagnostic({ code: "VT0004", message: "m", location: {}, severity: "note" })
      )
    ).toBe("module NOTE VT0004: m");
  });
});

describe("DiagnosticError", () => {
  it("keeps the first diagnostic and all others", () => {
    const first = createDiagnostic({ code: "VT0001", message: "a", location: {} });
    const second = createDiagnostic({ code: "VT0002", message: "b", location: {} });
    const error = new DiagnosticError(first, [first, second]);
    expect(error.message).toBe("module ERROR VT0001: a");
    expect(error.diagnostics).toEqual([first, second]);
    expect(new DiagnosticError(first).diagnostics).toEqual([first]);
  });
});

describe("pass debug logging", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it("is off unless VTABLE_INDEXES_DEBUG is set to something but 0", () => {
    vi.stubEnv("VTABLE_INDEXES_DEBUG", "");
    expect(isPassDebugEnabled()).toBe(false);
    expect(defaultPassLogger()).toBe(silentLogger);
    vi.stubEnv("VTABLE_INDEXES_DEBUG", "0");
    expect(isPassDebugEnabled()).toBe(false);
    vi.stubEnv("VTABLE_INDEXES_DEBUG", "1");
    expect(isPassDebugEnabled()).toBe(true);
    expect(defaultPassLogger()).toBe(consoleLogger);
  });

  it("prefixes console lines with the topic", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    consoleLogger("pass", "vtable-to-indexes finished in 1.00ms");
    expect(log).toHaveBeenCalledWith(
      "[vtable-indexes][pass] vtable-to-indexes finished in 1.00ms"
    );
  });
});

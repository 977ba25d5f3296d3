export type DiagnosticSeverity = "error" | "warning" | "note";

export type DiagnosticPhase = "type-graph" | "module-code";

/** Where in the module a diagnostic points */
export interface DiagnosticLocation {
  /** Function whose body holds the offending expression */
  function?: string;
  /** Printed name of the heap type involved */
  heapType?: string;
  field?: number;
}

export interface Diagnostic {
  code: string;
  message: string;
  severity: DiagnosticSeverity;
  location: DiagnosticLocation;
  phase?: DiagnosticPhase;
}

export type DiagnosticInput = {
  code: string;
  message: string;
  location: DiagnosticLocation;
  severity?: DiagnosticSeverity;
  phase?: DiagnosticPhase;
};

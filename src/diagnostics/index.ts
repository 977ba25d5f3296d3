export * from "./types.js";
export * from "./registry.js";

import type {
  Diagnostic,
  DiagnosticInput,
  DiagnosticLocation,
  DiagnosticSeverity,
} from "./types.js";
import {
  formatDiagnosticMessage,
  getDiagnosticDefinition,
  type DiagnosticCode,
  type DiagnosticParams,
} from "./registry.js";

export const createDiagnostic = ({
  severity,
  ...input
}: DiagnosticInput): Diagnostic => ({
  ...input,
  severity: severity ?? "error",
});

type RegistryDiagnosticOptions<K extends DiagnosticCode> = {
  code: K;
  params: DiagnosticParams<K>;
  location: DiagnosticLocation;
  severity?: DiagnosticSeverity;
};

export const diagnosticFromCode = <K extends DiagnosticCode>(
  options: RegistryDiagnosticOptions<K>
): Diagnostic => {
  const definition = getDiagnosticDefinition(options.code);
  return createDiagnostic({
    code: options.code,
    message: formatDiagnosticMessage(options.code, options.params),
    location: options.location,
    severity: options.severity ?? definition.severity,
    phase: definition.phase,
  });
};

const formatLocation = ({ function: func, heapType, field }: DiagnosticLocation) => {
  const parts = [
    func ? `func ${func}` : undefined,
    heapType ? `type ${heapType}` : undefined,
    field === undefined ? undefined : `field ${field}`,
  ].filter((part): part is string => part !== undefined);
  return parts.length ? parts.join(", ") : "module";
};

export const formatDiagnostic = (diagnostic: Diagnostic): string => {
  const severity = diagnostic.severity.toUpperCase();
  const phase = diagnostic.phase ? `[${diagnostic.phase}] ` : "";
  return `${formatLocation(diagnostic.location)} ${severity} ${phase}${diagnostic.code}: ${diagnostic.message}`;
};

export class DiagnosticError extends Error {
  diagnostic: Diagnostic;
  diagnostics: readonly Diagnostic[];

  constructor(diagnostic: Diagnostic, diagnostics?: readonly Diagnostic[]) {
    super(formatDiagnostic(diagnostic));
    this.diagnostic = diagnostic;
    this.diagnostics =
      diagnostics && diagnostics.length > 0 ? [...diagnostics] : [diagnostic];
  }
}

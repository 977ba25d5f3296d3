import type { DiagnosticPhase, DiagnosticSeverity } from "./types.js";

type DiagnosticMessage<P> = (params: P) => string;

export type DiagnosticDefinition<P> = {
  code: string;
  message: DiagnosticMessage<P>;
  severity: DiagnosticSeverity;
  phase: DiagnosticPhase;
};

type DiagnosticParamsMap = {
  VT0001: {
    kind: "non-constant-function-field";
    structType: string;
    field: number;
    operand: string;
  };
  VT0002: { kind: "function-field-write"; structType: string; field: number };
  VT0003: {
    kind: "specialized-function-field";
    structType: string;
    supertype: string;
    field: number;
    expected: string;
    actual: string;
  };
  VT0004: { kind: "function-array"; arrayType: string };
};

export type DiagnosticCode = keyof DiagnosticParamsMap;

export type DiagnosticParams<K extends DiagnosticCode> = DiagnosticParamsMap[K];

export const diagnosticsRegistry: {
  [K in DiagnosticCode]: DiagnosticDefinition<DiagnosticParamsMap[K]>;
} = {
  VT0001: {
    code: "VT0001",
    message: (params) =>
      `${params.structType} field ${params.field} holds a function reference and must be initialized with ref.func, found ${params.operand}`,
    severity: "error",
    phase: "module-code",
  },
  VT0002: {
    code: "VT0002",
    message: (params) =>
      `${params.structType} field ${params.field} holds a function reference and cannot be written after struct.new`,
    severity: "error",
    phase: "module-code",
  },
  VT0003: {
    code: "VT0003",
    message: (params) =>
      `${params.structType} narrows inherited field ${params.field} of ${params.supertype} from ${params.expected} to ${params.actual}`,
    severity: "error",
    phase: "type-graph",
  },
  VT0004: {
    code: "VT0004",
    message: (params) =>
      `${params.arrayType} is an array of function references; its elements are left as references`,
    severity: "warning",
    phase: "type-graph",
  },
};

export const formatDiagnosticMessage = <K extends DiagnosticCode>(
  code: K,
  params: DiagnosticParams<K>
): string => diagnosticsRegistry[code].message(params);

export const getDiagnosticDefinition = <K extends DiagnosticCode>(code: K) =>
  diagnosticsRegistry[code];

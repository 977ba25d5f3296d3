import {
  DiagnosticError,
  diagnosticFromCode,
  formatDiagnostic,
  type Diagnostic,
} from "../diagnostics/index.js";
import { walkExpression } from "../ir/delegations.js";
import type { Expression } from "../ir/expressions.js";
import { createHeapTypeNamer, formatType } from "../ir/format.js";
import { collectHeapTypes, walkModuleCode } from "../ir/module-utils.js";
import type { Module } from "../ir/module.js";
import {
  isFunctionType,
  typesEqual,
  type StructHeapType,
  type Type,
} from "../ir/types.js";
import type { Pass, PassRunner } from "./pass-runner.js";

const structOf = (type: Type): StructHeapType | undefined =>
  type.kind === "ref" && type.heapType.kind === "struct" ? type.heapType : undefined;

/**
 * Reports the places where `module` breaks the input contract of
 * `vtable-to-indexes`. The pass itself never checks these.
 */
export const findVTableAssumptionViolations = (module: Module): Diagnostic[] => {
  const { types, indices } = collectHeapTypes(module);
  const namer = createHeapTypeNamer({ names: module.typeNames, indices });
  const diagnostics: Diagnostic[] = [];

  types.forEach((type) => {
    if (type.kind === "array" && isFunctionType(type.element.type)) {
      diagnostics.push(
        diagnosticFromCode({
          code: "VT0004",
          params: { kind: "function-array", arrayType: namer(type) },
          location: { heapType: namer(type) },
        })
      );
    }

    if (type.kind !== "struct") return;
    const supertype = type.supertype;
    if (supertype?.kind !== "struct") return;
    supertype.fields.forEach((parentField, index) => {
      const field = type.fields[index];
      if (!field || !isFunctionType(parentField.type)) return;
      if (typesEqual(field.type, parentField.type)) return;
      diagnostics.push(
        diagnosticFromCode({
          code: "VT0003",
          params: {
            kind: "specialized-function-field",
            structType: namer(type),
            supertype: namer(supertype),
            field: index,
            expected: formatType(parentField.type, namer),
            actual: formatType(field.type, namer),
          },
          location: { heapType: namer(type), field: index },
        })
      );
    });
  });

  const checkExpression = (expr: Expression, func?: string) => {
    if (expr.kind === "struct.new") {
      const struct = structOf(expr.type);
      if (!struct) return;
      const operands = expr.operands;
      struct.fields.forEach((field, index) => {
        if (!isFunctionType(field.type)) return;
        const operand = operands[index];
        if (operand?.kind === "ref.func") return;
        diagnostics.push(
          diagnosticFromCode({
            code: "VT0001",
            params: {
              kind: "non-constant-function-field",
              structType: namer(struct),
              field: index,
              operand: operand ? operand.kind : "default value",
            },
            location: { function: func, heapType: namer(struct), field: index },
          })
        );
      });
      return;
    }

    if (expr.kind === "struct.set") {
      const struct = structOf(expr.ref.type);
      const field = struct?.fields[expr.index];
      if (!struct || !field || !isFunctionType(field.type)) return;
      diagnostics.push(
        diagnosticFromCode({
          code: "VT0002",
          params: {
            kind: "function-field-write",
            structType: namer(struct),
            field: expr.index,
          },
          location: { function: func, heapType: namer(struct), field: expr.index },
        })
      );
    }
  };

  module.functions.forEach((func) => {
    if (func.body) walkExpression(func.body, (expr) => checkExpression(expr, func.name));
  });
  walkModuleCode(module, (expr) => checkExpression(expr));

  return diagnostics;
};

export class CheckVTableAssumptions implements Pass {
  readonly name = "check-vtable-assumptions";

  run(runner: PassRunner, module: Module): void {
    const diagnostics = findVTableAssumptionViolations(module);
    diagnostics
      .filter((diagnostic) => diagnostic.severity !== "error")
      .forEach((diagnostic) => runner.log(this.name, formatDiagnostic(diagnostic)));

    const firstError = diagnostics.find((diagnostic) => diagnostic.severity === "error");
    if (firstError) {
      throw new DiagnosticError(firstError, diagnostics);
    }
  }
}

export const createCheckVTableAssumptionsPass = (): Pass => new CheckVTableAssumptions();

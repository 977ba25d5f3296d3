import type { Expression } from "./expressions.js";
import type { HeapType, Signature, Type } from "./types.js";

/**
 * Per-kind knowledge of expression attributes. Both dispatchers below switch
 * over every expression kind, so a new kind does not compile until it states
 * which of its attributes are children and which carry types.
 */

export interface TypeFieldUpdater {
  type(type: Type): Type;
  heapType(heapType: HeapType): HeapType;
  signature(signature: Signature): Signature;
}

const present = (...exprs: (Expression | undefined)[]): Expression[] =>
  exprs.filter((expr): expr is Expression => expr !== undefined);

/** Child operands in evaluation order */
export const childrenOf = (expr: Expression): Expression[] => {
  switch (expr.kind) {
    case "nop":
    case "unreachable":
    case "local.get":
    case "global.get":
    case "const":
    case "ref.null":
    case "ref.func":
    case "rtt.canon":
      return [];
    case "block":
      return [...expr.children];
    case "if":
      return present(expr.condition, expr.ifTrue, expr.ifFalse);
    case "loop":
      return [expr.body];
    case "break":
      return present(expr.value, expr.condition);
    case "switch":
      return present(expr.value, expr.condition);
    case "call":
    case "tuple.make":
    case "struct.new":
      return [...expr.operands];
    case "call_indirect":
      return [...expr.operands, expr.target];
    case "call_ref":
      return [...expr.operands, expr.target];
    case "local.set":
    case "global.set":
    case "unary":
    case "drop":
    case "ref.is_null":
      return [expr.value];
    case "return":
      return present(expr.value);
    case "binary":
    case "ref.eq":
      return [expr.left, expr.right];
    case "select":
      return [expr.ifTrue, expr.ifFalse, expr.condition];
    case "table.get":
      return [expr.index];
    case "table.set":
      return [expr.index, expr.value];
    case "tuple.extract":
      return [expr.tuple];
    case "ref.test":
    case "ref.cast":
    case "br_on":
    case "array.len":
      return [expr.ref];
    case "rtt.sub":
      return [expr.parent];
    case "struct.get":
      return [expr.ref];
    case "struct.set":
      return [expr.ref, expr.value];
    case "array.new":
      return present(expr.init, expr.size);
    case "array.new_fixed":
      return [...expr.values];
    case "array.get":
      return [expr.ref, expr.index];
    case "array.set":
      return [expr.ref, expr.index, expr.value];
    case "array.copy":
      return [expr.destRef, expr.destIndex, expr.srcRef, expr.srcIndex, expr.length];
    default: {
      const unreachable: never = expr;
      throw new Error(`unknown expression kind ${JSON.stringify(unreachable)}`);
    }
  }
};

/**
 * Rewrites the type-bearing attributes of `expr` other than its result type.
 * Child links, names, indices and literals are left alone.
 */
export const updateTypeFields = (
  expr: Expression,
  update: TypeFieldUpdater
): void => {
  switch (expr.kind) {
    case "call_indirect":
      expr.signature = update.signature(expr.signature);
      return;
    case "ref.test":
    case "ref.cast":
      expr.castType = update.heapType(expr.castType);
      return;
    case "br_on":
      expr.castType = update.type(expr.castType);
      return;
    case "nop":
    case "unreachable":
    case "block":
    case "if":
    case "loop":
    case "break":
    case "switch":
    case "call":
    case "local.get":
    case "local.set":
    case "global.get":
    case "global.set":
    case "const":
    case "unary":
    case "binary":
    case "select":
    case "drop":
    case "return":
    case "ref.null":
    case "ref.is_null":
    case "ref.func":
    case "ref.eq":
    case "table.get":
    case "table.set":
    case "tuple.make":
    case "tuple.extract":
    case "call_ref":
    case "rtt.canon":
    case "rtt.sub":
    case "struct.new":
    case "struct.get":
    case "struct.set":
    case "array.new":
    case "array.new_fixed":
    case "array.get":
    case "array.set":
    case "array.len":
    case "array.copy":
      return;
    default: {
      const unreachable: never = expr;
      throw new Error(`unknown expression kind ${JSON.stringify(unreachable)}`);
    }
  }
};

/**
 * Visits every expression under (and including) `root` exactly once,
 * children before parents. Iterative, since tree depth is unbounded.
 */
export const walkExpression = (
  root: Expression,
  visit: (expr: Expression) => void
): void => {
  const pending: Expression[] = [root];
  const order: Expression[] = [];
  while (pending.length) {
    const expr = pending.pop();
    if (!expr) break;
    order.push(expr);
    pending.push(...childrenOf(expr));
  }
  for (let i = order.length - 1; i >= 0; i--) {
    visit(order[i]);
  }
};

import type { HeapType, Signature, Type } from "./types.js";

/**
 * Instruction tree of the GC IR. Every node carries its result `type`;
 * nodes are mutated in place by passes.
 */
export type Expression =
  | Nop
  | Unreachable
  | Block
  | If
  | Loop
  | Break
  | Switch
  | Call
  | CallIndirect
  | LocalGet
  | LocalSet
  | GlobalGet
  | GlobalSet
  | Const
  | Unary
  | Binary
  | Select
  | Drop
  | Return
  | RefNull
  | RefIsNull
  | RefFunc
  | RefEq
  | TableGet
  | TableSet
  | TupleMake
  | TupleExtract
  | CallRef
  | RefTest
  | RefCast
  | BrOn
  | RttCanon
  | RttSub
  | StructNew
  | StructGet
  | StructSet
  | ArrayNew
  | ArrayNewFixed
  | ArrayGet
  | ArraySet
  | ArrayLen
  | ArrayCopy;

export type ExpressionKind = Expression["kind"];

export type ExpressionOfKind<K extends ExpressionKind> = Extract<
  Expression,
  { kind: K }
>;

interface ExpressionBase {
  type: Type;
}

export interface Nop extends ExpressionBase {
  kind: "nop";
}

export interface Unreachable extends ExpressionBase {
  kind: "unreachable";
}

export interface Block extends ExpressionBase {
  kind: "block";
  name?: string;
  children: Expression[];
}

export interface If extends ExpressionBase {
  kind: "if";
  condition: Expression;
  ifTrue: Expression;
  ifFalse?: Expression;
}

export interface Loop extends ExpressionBase {
  kind: "loop";
  name: string;
  body: Expression;
}

export interface Break extends ExpressionBase {
  kind: "break";
  name: string;
  condition?: Expression;
  value?: Expression;
}

export interface Switch extends ExpressionBase {
  kind: "switch";
  names: string[];
  defaultName: string;
  condition: Expression;
  value?: Expression;
}

export interface Call extends ExpressionBase {
  kind: "call";
  target: string;
  operands: Expression[];
  isReturn: boolean;
}

export interface CallIndirect extends ExpressionBase {
  kind: "call_indirect";
  table: string;
  target: Expression;
  operands: Expression[];
  signature: Signature;
  isReturn: boolean;
}

export interface LocalGet extends ExpressionBase {
  kind: "local.get";
  index: number;
}

export interface LocalSet extends ExpressionBase {
  kind: "local.set";
  index: number;
  value: Expression;
  isTee: boolean;
}

export interface GlobalGet extends ExpressionBase {
  kind: "global.get";
  name: string;
}

export interface GlobalSet extends ExpressionBase {
  kind: "global.set";
  name: string;
  value: Expression;
}

export interface Const extends ExpressionBase {
  kind: "const";
  value: number;
}

export interface Unary extends ExpressionBase {
  kind: "unary";
  op: string;
  value: Expression;
}

export interface Binary extends ExpressionBase {
  kind: "binary";
  op: string;
  left: Expression;
  right: Expression;
}

export interface Select extends ExpressionBase {
  kind: "select";
  ifTrue: Expression;
  ifFalse: Expression;
  condition: Expression;
}

export interface Drop extends ExpressionBase {
  kind: "drop";
  value: Expression;
}

export interface Return extends ExpressionBase {
  kind: "return";
  value?: Expression;
}

export interface RefNull extends ExpressionBase {
  kind: "ref.null";
}

export interface RefIsNull extends ExpressionBase {
  kind: "ref.is_null";
  value: Expression;
}

export interface RefFunc extends ExpressionBase {
  kind: "ref.func";
  func: string;
}

export interface RefEq extends ExpressionBase {
  kind: "ref.eq";
  left: Expression;
  right: Expression;
}

export interface TableGet extends ExpressionBase {
  kind: "table.get";
  table: string;
  index: Expression;
}

export interface TableSet extends ExpressionBase {
  kind: "table.set";
  table: string;
  index: Expression;
  value: Expression;
}

export interface TupleMake extends ExpressionBase {
  kind: "tuple.make";
  operands: Expression[];
}

export interface TupleExtract extends ExpressionBase {
  kind: "tuple.extract";
  tuple: Expression;
  index: number;
}

export interface CallRef extends ExpressionBase {
  kind: "call_ref";
  target: Expression;
  operands: Expression[];
  isReturn: boolean;
}

export interface RefTest extends ExpressionBase {
  kind: "ref.test";
  ref: Expression;
  castType: HeapType;
}

export interface RefCast extends ExpressionBase {
  kind: "ref.cast";
  ref: Expression;
  castType: HeapType;
}

export type BrOnOp = "br_on_null" | "br_on_non_null" | "br_on_cast" | "br_on_cast_fail";

export interface BrOn extends ExpressionBase {
  kind: "br_on";
  op: BrOnOp;
  name: string;
  ref: Expression;
  /** Only meaningful for the cast variants; `none` otherwise */
  castType: Type;
}

export interface RttCanon extends ExpressionBase {
  kind: "rtt.canon";
}

export interface RttSub extends ExpressionBase {
  kind: "rtt.sub";
  parent: Expression;
}

export interface StructNew extends ExpressionBase {
  kind: "struct.new";
  operands: Expression[];
}

export interface StructGet extends ExpressionBase {
  kind: "struct.get";
  index: number;
  ref: Expression;
  signed: boolean;
}

export interface StructSet extends ExpressionBase {
  kind: "struct.set";
  index: number;
  ref: Expression;
  value: Expression;
}

export interface ArrayNew extends ExpressionBase {
  kind: "array.new";
  size: Expression;
  init?: Expression;
}

export interface ArrayNewFixed extends ExpressionBase {
  kind: "array.new_fixed";
  values: Expression[];
}

export interface ArrayGet extends ExpressionBase {
  kind: "array.get";
  ref: Expression;
  index: Expression;
  signed: boolean;
}

export interface ArraySet extends ExpressionBase {
  kind: "array.set";
  ref: Expression;
  index: Expression;
  value: Expression;
}

export interface ArrayLen extends ExpressionBase {
  kind: "array.len";
  ref: Expression;
}

export interface ArrayCopy extends ExpressionBase {
  kind: "array.copy";
  destRef: Expression;
  destIndex: Expression;
  srcRef: Expression;
  srcIndex: Expression;
  length: Expression;
}

import binaryen from "binaryen";

type usize = number;
type bool = boolean;
type u32 = number;
type i32 = number;

export type Ref = usize;
export type ModuleRef = Ref;
export type TypeRef = Ref;
export type HeapTypeRef = Ref;
export type Index = u32;
export type PackedType = u32;
export type TypeBuilderRef = Ref;
export type TypeBuilderErrorReason = u32;
export type ArrayRef<_T> = Ref;
export type Pointer<_T> = Ref;

export type StructField = {
  type: TypeRef;
  /** Defaults to unpacked */
  packedType?: PackedType;
  /** Defaults to immutable */
  mutable?: bool;
};

export type AugmentedBinaryen = typeof binaryen & {
  _BinaryenTypeFromHeapType(heapType: HeapTypeRef, nullable: bool): TypeRef;
  _BinaryenTypeGetHeapType(type: TypeRef): HeapTypeRef;
  _BinaryenPackedTypeNotPacked(): PackedType;
  _BinaryenPackedTypeInt8(): PackedType;
  _BinaryenPackedTypeInt16(): PackedType;
  _BinaryenHeapTypeExt(): HeapTypeRef;
  _BinaryenHeapTypeFunc(): HeapTypeRef;
  _BinaryenHeapTypeAny(): HeapTypeRef;
  _BinaryenHeapTypeEq(): HeapTypeRef;
  _BinaryenHeapTypeI31(): HeapTypeRef;
  _BinaryenHeapTypeStruct(): HeapTypeRef;
  _BinaryenHeapTypeGetSupertype(heapType: HeapTypeRef): HeapTypeRef;
  _BinaryenStructTypeGetNumFields(heapType: HeapTypeRef): Index;
  _BinaryenStructTypeGetFieldType(heapType: HeapTypeRef, index: Index): TypeRef;
  _TypeBuilderCreate(size: Index): TypeBuilderRef;
  _TypeBuilderGetSize(builder: TypeBuilderRef): Index;
  _TypeBuilderSetSignatureType(
    builder: TypeBuilderRef,
    index: Index,
    paramTypes: TypeRef,
    resultTypes: TypeRef
  ): void;
  _TypeBuilderSetStructType(
    builder: TypeBuilderRef,
    index: Index,
    fieldTypes: ArrayRef<TypeRef>,
    fieldPackedTypes: ArrayRef<PackedType>,
    fieldMutables: ArrayRef<bool>,
    numFields: i32
  ): void;
  _TypeBuilderSetArrayType(
    builder: TypeBuilderRef,
    index: Index,
    elementType: TypeRef,
    elementPackedType: PackedType,
    elementMutable: bool
  ): void;
  _TypeBuilderGetTempHeapType(
    builder: TypeBuilderRef,
    index: Index
  ): HeapTypeRef;
  _TypeBuilderGetTempTupleType(
    builder: TypeBuilderRef,
    types: ArrayRef<TypeRef>,
    numTypes: Index
  ): TypeRef;
  _TypeBuilderGetTempRefType(
    builder: TypeBuilderRef,
    heapType: HeapTypeRef,
    nullable: bool
  ): TypeRef;
  _TypeBuilderSetSubType(
    builder: TypeBuilderRef,
    index: Index,
    supertype: HeapTypeRef
  ): void;
  _TypeBuilderSetOpen(builder: TypeBuilderRef, index: Index): void;
  _TypeBuilderCreateRecGroup(
    builder: TypeBuilderRef,
    index: Index,
    length: Index
  ): void;
  _TypeBuilderBuildAndDispose(
    builder: TypeBuilderRef,
    heapTypes: ArrayRef<HeapTypeRef>,
    errorIndex: Pointer<Index>,
    errorReason: Pointer<TypeBuilderErrorReason>
  ): bool;
  _BinaryenModuleSetTypeName(
    module: ModuleRef,
    heapType: HeapTypeRef,
    name: Pointer<string>
  ): void;
  _BinaryenModuleSetFieldName(
    module: ModuleRef,
    heapType: HeapTypeRef,
    index: Index,
    name: Pointer<string>
  ): void;
  _malloc(size: usize): usize;
  _free(ptr: usize): void;
  __i32_load(ptr: usize): number;
  stringToUTF8OnStack(str: string): Pointer<string>;
  HEAPU32: Uint32Array;
};

export {
  bool,
  float32,
  float64,
  int16,
  int32,
  int64,
  int8,
  uint16,
  uint32,
  uint64,
  uint8,
} from './primitives.ts';
export { struct } from './struct.ts';
export type { StructFields, StructType, StructValue } from './struct.ts';
export { array, vector } from './vector.ts';
export type { VectorOptions } from './vector.ts';
export { GATHER_THRESHOLD, bytes, string } from './string.ts';
export type { BytesOptions, StringOptions } from './string.ts';
export { handle } from './handle.ts';
export type { HandleOptions } from './handle.ts';
export { box } from './box.ts';
export { UNKNOWN_KEY, table } from './table.ts';
export type { Member, Members, TableOptions, TableValue, UnknownField } from './table.ts';
export { union } from './union.ts';
export type { UnionOptions, UnionValue, UnionVariant, UnknownVariant } from './union.ts';
export { enumeration } from './enumeration.ts';
export type { EnumOptions, EnumValues } from './enumeration.ts';
export { allBits, bits } from './bits.ts';
export type { BitsOptions, BitsValues } from './bits.ts';
export { lazy } from './lazy.ts';
export { VECTOR_HEADER_SIZE, required } from './shared.ts';

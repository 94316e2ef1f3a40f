export { compile } from './compiler';
export { parse_descriptor } from './schema';

export { configure, get_config, reset_config } from './core/config';
export type { SchemataConfig } from './core/config';
export { default_error_map } from './core/error-map';
export {
  SchemaError,
  SchemaDefinitionError,
  flatten_error,
  treeify_error,
  prettify_error,
  format_path,
} from './core/error';
export type { ErrorTree, FlattenedError } from './core/error';
export {
  parse,
  safe_parse,
  parse_async,
  safe_parse_async,
  decode,
  encode,
  safe_decode,
  safe_encode,
  decode_async,
  encode_async,
  safe_decode_async,
  safe_encode_async,
} from './core/parse';
export {
  compare_check,
  format_check,
  multiple_of_check,
  overwrite_check,
  refine_check,
  size_check,
  super_refine_check,
} from './core/checks';
export type { Check, CheckOptions, CheckParams, CustomIssueInput, RefineParams, RefinementContext } from './core/checks';
export {
  Schema,
  OptionalSchema,
  NullableSchema,
  NonOptionalSchema,
  DefaultSchema,
  PrefaultSchema,
  CatchSchema,
  ReadonlySchema,
  BrandSchema,
  PipeSchema,
  TransformSchema,
} from './core/schema';
export type {
  AnySchema,
  Brand,
  CatchContext,
  SchemaDef,
  SchemaKind,
  TransformContext,
  infer,
  input,
  output,
} from './core/schema';

export {
  symbol,
  _undefined as undefined,
  _null as null,
  _void as void,
  any,
  unknown,
  never,
  nan,
  boolean,
  GuardSchema,
  BooleanSchema,
} from './schemas/primitive';
export { string, StringSchema } from './schemas/string';
export { number, int, bigint, NumberSchema, BigIntSchema } from './schemas/number';
export { date, DateSchema } from './schemas/date';
export { literal, _enum as enum, native_enum, LiteralSchema, EnumSchema } from './schemas/enum';
export { object, strict_object, loose_object, ObjectSchema } from './schemas/object';
export type { ObjectInput, ObjectOutput, Shape, UnknownKeys } from './schemas/object';
export { array, tuple, ArraySchema, TupleSchema } from './schemas/array';
export { record, partial_record, map, set, RecordSchema, MapSchema, SetSchema } from './schemas/collection';
export {
  union,
  discriminated_union,
  intersection,
  UnionSchema,
  DiscriminatedUnionSchema,
  IntersectionSchema,
} from './schemas/union';
export { lazy, custom, instance_of, LazySchema, CustomSchema } from './schemas/lazy';
export { _function as function, FunctionSchema } from './schemas/function';
export { codec, pipe, transform, preprocess, CodecSchema } from './schemas/codec';
export { coerce } from './schemas/coerce';

/** 与组合子同名的便捷写法：optional(s) / nullable(s) / nullish(s) */
export { optional, nullable, nullish } from './schemas/modifiers';

export type * from './types';

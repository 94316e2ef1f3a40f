import type { AnySchema, NullableSchema, OptionalSchema } from '../core/schema';

export function optional<S extends AnySchema>(schema: S): OptionalSchema<S> {
  return schema.optional();
}

export function nullable<S extends AnySchema>(schema: S): NullableSchema<S> {
  return schema.nullable();
}

export function nullish<S extends AnySchema>(schema: S): OptionalSchema<NullableSchema<S>> {
  return schema.nullish();
}

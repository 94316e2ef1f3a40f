import {
  fail_payload,
  finalize_issues,
  invalid_type,
  then_all,
  then_one,
  type Outcome,
  type ParseContext,
  type ParsePayload,
} from '../core/engine';
import { SchemaDefinitionError } from '../core/error';
import { Schema, type AnySchema, type input, type output, type SchemaDef } from '../core/schema';
import type { Primitive } from '../types';
import { merge_values } from '../utils/merge.util';
import { is_record } from '../utils/type.util';
import { EnumSchema, LiteralSchema } from './enum';
import { ObjectSchema } from './object';

/* ---------------------------
 *  union
 * ---------------------------*/

export interface UnionDef<T extends readonly AnySchema[]> extends SchemaDef {
  readonly options: T;
}

function union_failure(input: unknown, branches: ParsePayload[], ctx: ParseContext): ParsePayload {
  return fail_payload({
    code: 'invalid_union',
    errors: branches.map((branch) => finalize_issues(branch.issues, ctx)),
    path: [],
    input,
  });
}

/**
 * 按声明顺序逐个尝试，取第一个成功的分支；全部失败时只报一条 invalid_union，
 * 各分支的问题在这里定稿后放进 errors。
 */
export class UnionSchema<T extends readonly AnySchema[]> extends Schema<output<T[number]>, input<T[number]>, UnionDef<T>> {
  protected parse_base(input: unknown, ctx: ParseContext): Outcome {
    const options = this.def.options;
    // 同步 / 异步都逐个尝试：前面的分支成功后，后面的分支（含其 refine / transform）不再执行
    const failed: ParsePayload[] = [];
    const attempt = (index: number): Outcome =>
      then_one(options[index].run(input, ctx), (payload) => {
        if (payload.issues.length === 0) return payload;
        failed.push(payload);
        return index + 1 < options.length ? attempt(index + 1) : union_failure(input, failed, ctx);
      });
    return attempt(0);
  }

  get options(): T {
    return this.def.options;
  }
}

export function union<const T extends readonly [AnySchema, ...AnySchema[]]>(options: T): UnionSchema<T> {
  if (options.length === 0) throw new SchemaDefinitionError('union() requires at least one option');
  return new UnionSchema({ kind: 'union', checks: [], options });
}

/* ---------------------------
 *  discriminated_union
 * ---------------------------*/

export interface DiscriminatedUnionDef<T extends readonly AnySchema[]> extends UnionDef<T> {
  readonly discriminator: string;
  /** 判别值 → 分支，构造时建好 */
  readonly lookup: ReadonlyMap<unknown, AnySchema>;
}

/** 字段 schema 能给出的判别值（literal / enum） */
function tag_values(schema: AnySchema): readonly Primitive[] | undefined {
  if (schema instanceof LiteralSchema || schema instanceof EnumSchema) {
    const values: readonly Primitive[] = schema.def.values;
    return values;
  }
  return undefined;
}

/**
 * 先读判别键再直接派发到唯一分支，不回溯。
 * 判别值未命中时在 [discriminator] 报一条 invalid_union。
 */
export class DiscriminatedUnionSchema<T extends readonly AnySchema[]> extends Schema<
  output<T[number]>,
  input<T[number]>,
  DiscriminatedUnionDef<T>
> {
  protected parse_base(input: unknown, ctx: ParseContext): Outcome {
    if (!is_record(input)) return invalid_type('object', input);
    const { discriminator, lookup } = this.def;
    const option = lookup.get(input[discriminator]);
    if (option) return option.run(input, ctx);
    return fail_payload({
      code: 'invalid_union',
      errors: [],
      discriminator,
      note: 'No matching discriminator',
      path: [discriminator],
      input,
    });
  }

  get options(): T {
    return this.def.options;
  }

  get discriminator(): string {
    return this.def.discriminator;
  }
}

export function discriminated_union<const T extends readonly [AnySchema, ...AnySchema[]]>(
  discriminator: string,
  options: T,
): DiscriminatedUnionSchema<T> {
  if (options.length === 0) {
    throw new SchemaDefinitionError('discriminated_union() requires at least one option');
  }
  const lookup = new Map<unknown, AnySchema>();
  options.forEach((option, i) => {
    if (!(option instanceof ObjectSchema)) {
      throw new SchemaDefinitionError(`discriminated_union(): option ${i} is not an object schema`);
    }
    const field: AnySchema | undefined = option.def.fields[discriminator];
    if (!field) {
      throw new SchemaDefinitionError(`discriminated_union(): option ${i} has no "${discriminator}" field`);
    }
    const values = tag_values(field);
    if (!values) {
      throw new SchemaDefinitionError(
        `discriminated_union(): option ${i} field "${discriminator}" must be a literal or enum`,
      );
    }
    for (const value of values) {
      if (lookup.has(value)) {
        throw new SchemaDefinitionError(
          `discriminated_union(): duplicate discriminator value ${String(value)} for "${discriminator}"`,
        );
      }
      lookup.set(value, option);
    }
  });
  return new DiscriminatedUnionSchema({ kind: 'discriminated_union', checks: [], options, discriminator, lookup });
}

/* ---------------------------
 *  intersection
 * ---------------------------*/

export interface IntersectionDef<A extends AnySchema, B extends AnySchema> extends SchemaDef {
  readonly left: A;
  readonly right: B;
}

/**
 * 两侧都对同一输入校验，通过后合并输出；无法合并时报 invalid_intersection
 */
export class IntersectionSchema<A extends AnySchema, B extends AnySchema> extends Schema<
  output<A> & output<B>,
  input<A> & input<B>,
  IntersectionDef<A, B>
> {
  protected parse_base(input: unknown, ctx: ParseContext): Outcome {
    const { left, right } = this.def;
    return then_all([left.run(input, ctx), right.run(input, ctx)], ([l, r]) => {
      if (l.issues.length || r.issues.length) {
        return { value: input, issues: [...l.issues, ...r.issues] };
      }
      const merged = merge_values(l.value, r.value);
      if (merged.ok) return { value: merged.value, issues: [] };
      return fail_payload({ code: 'invalid_intersection', merge_path: merged.merge_path, path: [], input });
    });
  }
}

export function intersection<A extends AnySchema, B extends AnySchema>(left: A, right: B): IntersectionSchema<A, B> {
  return new IntersectionSchema({ kind: 'intersection', checks: [], left, right });
}

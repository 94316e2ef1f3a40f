import { fail_payload, ok_payload, type Outcome, type ParseContext } from '../core/engine';
import { SchemaDefinitionError } from '../core/error';
import { Schema, type SchemaDef } from '../core/schema';
import type { Primitive } from '../types';
import { parsed_type } from '../utils/type.util';

/* ---------------------------
 *  literal
 * ---------------------------*/

export interface LiteralDef extends SchemaDef {
  readonly values: readonly Primitive[];
  /** SameValueZero 查找：NaN 字面量也能命中 */
  readonly lookup: ReadonlySet<unknown>;
}

export class LiteralSchema<T extends Primitive> extends Schema<T, T, LiteralDef> {
  protected parse_base(input: unknown, _ctx: ParseContext): Outcome {
    if (this.def.lookup.has(input)) return ok_payload(input);
    return fail_payload({
      code: 'invalid_literal',
      expected: this.def.values,
      received: parsed_type(input),
      path: [],
      input,
    });
  }

  get values(): readonly Primitive[] {
    return this.def.values;
  }

  /** 单值字面量的值；多值时取第一个 */
  get value(): T {
    return this.options[0];
  }

  get options(): T[] {
    return this.def.values.filter((v): v is T => this.def.lookup.has(v));
  }
}

function is_list(value: Primitive | readonly Primitive[]): value is readonly Primitive[] {
  return Array.isArray(value);
}

export function literal<const T extends Primitive>(value: T): LiteralSchema<T>;
export function literal<const T extends readonly Primitive[]>(values: T): LiteralSchema<T[number]>;
export function literal(value: Primitive | readonly Primitive[]): LiteralSchema<Primitive> {
  const values = is_list(value) ? [...value] : [value];
  if (values.length === 0) throw new SchemaDefinitionError('literal() requires at least one value');
  return new LiteralSchema({ kind: 'literal', checks: [], values, lookup: new Set<unknown>(values) });
}

/* ---------------------------
 *  enum / native_enum
 * ---------------------------*/

export type EnumLike = Readonly<Record<string, string | number>>;

/** 字符串数组 → { a: 'a', b: 'b' } */
export type EnumFromValues<T extends readonly string[]> = { readonly [K in T[number]]: K };

/** 只保留 / 去掉值在 V 中的键 */
export type ExtractEnum<E, V> = { [K in keyof E as E[K] extends V ? K : never]: E[K] };
export type ExcludeEnum<E, V> = { [K in keyof E as E[K] extends V ? never : K]: E[K] };

export interface EnumDef<E> extends SchemaDef {
  /** 类型层面的键值表 */
  readonly entries: E;
  /** 同一张表的运行期视图 */
  readonly pairs: readonly (readonly [string, string | number])[];
  readonly values: readonly (string | number)[];
  readonly lookup: ReadonlySet<unknown>;
}

export class EnumSchema<E> extends Schema<E[keyof E], E[keyof E], EnumDef<E>> {
  protected parse_base(input: unknown, _ctx: ParseContext): Outcome {
    if (this.def.lookup.has(input)) return ok_payload(input);
    return fail_payload({
      code: 'invalid_literal',
      expected: this.def.values,
      received: parsed_type(input),
      path: [],
      input,
    });
  }

  /** 键 → 值 */
  get enum(): E {
    return this.def.entries;
  }

  get options(): E[keyof E][] {
    return this.def.values.filter((v): v is E[keyof E] & (string | number) => this.def.lookup.has(v));
  }

  /** 只保留给定的值 */
  extract<const V extends readonly E[keyof E][]>(values: V): EnumSchema<ExtractEnum<E, V[number]>> {
    const keep = new Set<unknown>(values);
    return make_enum<ExtractEnum<E, V[number]>>(filter_entries(this.def.pairs, (v) => keep.has(v)));
  }

  /** 去掉给定的值 */
  exclude<const V extends readonly E[keyof E][]>(values: V): EnumSchema<ExcludeEnum<E, V[number]>> {
    const drop = new Set<unknown>(values);
    return make_enum<ExcludeEnum<E, V[number]>>(filter_entries(this.def.pairs, (v) => !drop.has(v)));
  }
}

function filter_entries(
  pairs: readonly (readonly [string, string | number])[],
  keep: (value: string | number) => boolean,
): Record<string, string | number> {
  const out: Record<string, string | number> = {};
  for (const [key, value] of pairs) {
    if (keep(value)) out[key] = value;
  }
  return out;
}

/**
 * 过滤后的 entries 在类型上由调用方声明；运行期只保证键值来自原 entries
 */
export function make_enum<E>(entries: EnumLike): EnumSchema<E> {
  const pairs = Object.entries(entries);
  const values = pairs.map(([, value]) => value);
  if (values.length === 0) throw new SchemaDefinitionError('enum requires at least one value');
  return new EnumSchema<E>({
    kind: 'enum',
    checks: [],
    // entries 只由本模块构造：要么来自字面量数组，要么是 E 的子集
    entries: Object.freeze({ ...entries }) as E,
    pairs,
    values,
    lookup: new Set<unknown>(values),
  });
}

export function _enum<const T extends readonly string[]>(values: T): EnumSchema<EnumFromValues<T>> {
  const entries: Record<string, string> = {};
  for (const value of values) entries[value] = value;
  return make_enum<EnumFromValues<T>>(entries);
}

/**
 * TS enum / 常量对象。数值 enum 的反向映射（"0" → "A"）会被剔除。
 */
export function native_enum<const E extends EnumLike>(source: E): EnumSchema<E> {
  const all: EnumLike = source;
  const entries: Record<string, string | number> = {};
  for (const [key, value] of Object.entries(all)) {
    if (typeof all[value] === 'number') continue;
    entries[key] = value;
  }
  return make_enum<E>(entries);
}

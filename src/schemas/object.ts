import { absorb, invalid_type, then_all, type Outcome, type ParseContext, type ParsePayload } from '../core/engine';
import { SchemaDefinitionError } from '../core/error';
import {
  NonOptionalSchema,
  OptionalSchema,
  Schema,
  type AnySchema,
  type input,
  type output,
  type SchemaDef,
} from '../core/schema';
import type { RawIssue } from '../types';
import { is_record, set_key } from '../utils/type.util';
import { make_enum, type EnumSchema } from './enum';

export type Shape = { readonly [key: string]: AnySchema };

type Flatten<T> = { [K in keyof T]: T[K] } & {};

/** 输出可以缺省（含 undefined）的键 */
type OptionalOutputKeys<S> = {
  [K in keyof S]: undefined extends output<S[K]> ? K : never;
}[keyof S];

type OptionalInputKeys<S> = {
  [K in keyof S]: undefined extends input<S[K]> ? K : never;
}[keyof S];

export type ObjectOutput<S> = Flatten<
  { [K in Exclude<keyof S, OptionalOutputKeys<S>>]: output<S[K]> } & {
    [K in OptionalOutputKeys<S>]?: output<S[K]>;
  }
>;

export type ObjectInput<S> = Flatten<
  { [K in Exclude<keyof S, OptionalInputKeys<S>>]: input<S[K]> } & {
    [K in OptionalInputKeys<S>]?: input<S[K]>;
  }
>;

/** 形状派生的类型 */
export type ExtendShape<A, B> = Flatten<Omit<A, keyof B> & B>;
export type PartialShape<S, K extends keyof S = keyof S> = Flatten<
  Omit<S, K> & { [P in K]: S[P] extends AnySchema ? OptionalSchema<S[P]> : never }
>;
export type RequiredShape<S, K extends keyof S = keyof S> = Flatten<
  Omit<S, K> & { [P in K]: S[P] extends AnySchema ? NonOptionalSchema<S[P]> : never }
>;
type ShapeKeys<S> = readonly (keyof S & string)[];

/**
 * 未声明键的处理策略：
 * - strip（默认）：丢弃
 * - strict：每个未知键报一条 unrecognized_keys
 * - passthrough：原样保留，不校验
 * catchall 设置后优先于以上三者
 */
export type UnknownKeys = 'strip' | 'strict' | 'passthrough';

export interface ObjectDef<S> extends SchemaDef {
  /** 类型层面的形状 */
  readonly shape: S;
  /** 同一个形状的运行期视图 */
  readonly fields: Shape;
  readonly unknown_keys: UnknownKeys;
  readonly catchall?: AnySchema;
}

function has_own(target: object, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(target, key);
}

export class ObjectSchema<S> extends Schema<ObjectOutput<S>, ObjectInput<S>, ObjectDef<S>> {
  protected parse_base(input: unknown, ctx: ParseContext): Outcome {
    if (!is_record(input)) return invalid_type('object', input);

    const { fields: shape, unknown_keys, catchall } = this.def;
    const keys = Object.keys(shape);
    const extra = Object.keys(input).filter((k) => !has_own(shape, k));

    // 声明的字段按声明顺序，未知键按输入顺序
    const fields = keys.map((key) => shape[key].run(has_own(input, key) ? input[key] : undefined, ctx));
    const rest = catchall ? extra.map((key) => catchall.run(input[key], ctx)) : [];

    return then_all([...fields, ...rest], (payloads) => {
      const result: ParsePayload = { value: undefined, issues: [] };
      const out: Record<string, unknown> = {};

      keys.forEach((key, i) => {
        const child = payloads[i];
        absorb(result, key, child);
        // 缺省键且结果为 undefined：输出里也不出现（default 会填上值）
        if (child.value !== undefined || has_own(input, key)) set_key(out, key, child.value);
      });

      if (catchall) {
        extra.forEach((key, i) => {
          const child = payloads[keys.length + i];
          absorb(result, key, child);
          set_key(out, key, child.value);
        });
      } else if (unknown_keys === 'passthrough') {
        for (const key of extra) set_key(out, key, input[key]);
      } else if (unknown_keys === 'strict') {
        for (const key of extra) {
          const issue: RawIssue = { code: 'unrecognized_keys', keys: [key], path: [], input };
          result.issues.push(issue);
        }
      }

      result.value = out;
      return result;
    });
  }

  get shape(): S {
    return this.def.shape;
  }

  /* ---------------------------
   *  未知键策略
   * ---------------------------*/

  strict(): this {
    return this.derive({ unknown_keys: 'strict', catchall: undefined });
  }

  strip(): this {
    return this.derive({ unknown_keys: 'strip', catchall: undefined });
  }

  passthrough(): this {
    return this.derive({ unknown_keys: 'passthrough', catchall: undefined });
  }

  /** 未声明的键都按 schema 校验 */
  catchall(schema: AnySchema): this {
    return this.derive({ catchall: schema });
  }

  /* ---------------------------
   *  形状派生：得到新的对象节点，原节点的检查不会带过去
   * ---------------------------*/

  private with_shape<N>(shape: Shape): ObjectSchema<N> {
    const fields = Object.freeze(shape);
    return new ObjectSchema<N>({
      kind: 'object',
      checks: [],
      // 形状由本类的派生方法按 N 的结构逐键构造
      shape: fields as N,
      fields,
      unknown_keys: this.def.unknown_keys,
      catchall: this.def.catchall,
    });
  }

  extend<E extends Shape>(extension: E): ObjectSchema<ExtendShape<S, E>> {
    return this.with_shape<ExtendShape<S, E>>({ ...this.def.fields, ...extension });
  }

  /** 合并另一个对象 schema：键冲突时以 other 为准，未知键策略也取 other 的 */
  merge<E>(other: ObjectSchema<E>): ObjectSchema<ExtendShape<S, E>> {
    const merged = this.with_shape<ExtendShape<S, E>>({ ...this.def.fields, ...other.def.fields });
    return other.def.catchall ? merged.catchall(other.def.catchall) : merged.derive({ unknown_keys: other.def.unknown_keys });
  }

  pick<const K extends ShapeKeys<S>>(keys: K): ObjectSchema<Flatten<Pick<S, K[number]>>> {
    this.assert_keys('pick', keys);
    const next: Record<string, AnySchema> = {};
    for (const key of keys) next[key] = this.def.fields[key];
    return this.with_shape<Flatten<Pick<S, K[number]>>>(next);
  }

  omit<const K extends ShapeKeys<S>>(keys: K): ObjectSchema<Flatten<Omit<S, K[number]>>> {
    this.assert_keys('omit', keys);
    const drop = new Set<string>(keys);
    const next: Record<string, AnySchema> = {};
    for (const [key, schema] of Object.entries(this.def.fields)) {
      if (!drop.has(key)) next[key] = schema;
    }
    return this.with_shape<Flatten<Omit<S, K[number]>>>(next);
  }

  /** 全部（或指定）字段变为 optional */
  partial<const K extends ShapeKeys<S> = ShapeKeys<S>>(keys?: K): ObjectSchema<PartialShape<S, K[number]>> {
    if (keys) this.assert_keys('partial', keys);
    const only = keys ? new Set<string>(keys) : undefined;
    const next: Record<string, AnySchema> = {};
    for (const [key, schema] of Object.entries(this.def.fields)) {
      next[key] = !only || only.has(key) ? schema.optional() : schema;
    }
    return this.with_shape<PartialShape<S, K[number]>>(next);
  }

  /** 全部（或指定）字段不再接受缺省 */
  required<const K extends ShapeKeys<S> = ShapeKeys<S>>(keys?: K): ObjectSchema<RequiredShape<S, K[number]>> {
    if (keys) this.assert_keys('required', keys);
    const only = keys ? new Set<string>(keys) : undefined;
    const next: Record<string, AnySchema> = {};
    for (const [key, schema] of Object.entries(this.def.fields)) {
      next[key] = !only || only.has(key) ? schema.non_optional() : schema;
    }
    return this.with_shape<RequiredShape<S, K[number]>>(next);
  }

  /** 声明的键组成的 enum */
  keyof(): EnumSchema<{ readonly [K in keyof S & string]: K }> {
    const entries: Record<string, string> = {};
    for (const key of Object.keys(this.def.fields)) entries[key] = key;
    return make_enum<{ readonly [K in keyof S & string]: K }>(entries);
  }

  private assert_keys(method: string, keys: readonly string[]): void {
    for (const key of keys) {
      if (!has_own(this.def.fields, key)) {
        throw new SchemaDefinitionError(`${method}(): key "${key}" is not part of the object shape`);
      }
    }
  }
}

function make_object<S extends Shape>(shape: S, unknown_keys: UnknownKeys): ObjectSchema<S> {
  const fields = Object.freeze({ ...shape });
  return new ObjectSchema<S>({ kind: 'object', checks: [], shape: fields, fields, unknown_keys });
}

export function object<S extends Shape>(shape: S): ObjectSchema<S> {
  return make_object(shape, 'strip');
}

export function strict_object<S extends Shape>(shape: S): ObjectSchema<S> {
  return make_object(shape, 'strict');
}

export function loose_object<S extends Shape>(shape: S): ObjectSchema<S> {
  return make_object(shape, 'passthrough');
}

import type { Issue, ParseOptions, RawIssue, SafeParseResult } from '../types';
import {
  refine_check,
  run_checks,
  super_refine_check,
  type Check,
  type CheckParams,
  type CustomIssueInput,
  type RefineParams,
  type RefinementContext,
} from './checks';
import {
  await_step,
  finalize_issues,
  ok_payload,
  then_one,
  type Outcome,
  type ParseContext,
} from './engine';
import { SchemaDefinitionError } from './error';
import {
  decode,
  decode_async,
  encode,
  encode_async,
  parse,
  parse_async,
  safe_decode,
  safe_encode,
  safe_encode_async,
  safe_parse,
  safe_parse_async,
} from './parse';

/**
 * Schema Node 的种类标签
 */
export type SchemaKind =
  | 'string'
  | 'number'
  | 'bigint'
  | 'boolean'
  | 'date'
  | 'symbol'
  | 'undefined'
  | 'null'
  | 'void'
  | 'any'
  | 'unknown'
  | 'never'
  | 'nan'
  | 'literal'
  | 'enum'
  | 'object'
  | 'array'
  | 'tuple'
  | 'union'
  | 'discriminated_union'
  | 'intersection'
  | 'record'
  | 'map'
  | 'set'
  | 'lazy'
  | 'function'
  | 'codec'
  | 'custom'
  | 'optional'
  | 'nullable'
  | 'non_optional'
  | 'default'
  | 'prefault'
  | 'catch'
  | 'readonly'
  | 'brand'
  | 'pipe'
  | 'transform';

/** 所有节点共有的定义；各种类在此基础上扩展 */
export interface SchemaDef {
  readonly kind: SchemaKind;
  /** 约束与精化，按声明顺序执行 */
  readonly checks: readonly Check[];
  /** 仅作元数据 */
  readonly description?: string;
}

/** 类型层面的输出 / 输入提取（运行期无作用） */
export type output<S> = S extends { readonly _output: infer O } ? O : never;
export type input<S> = S extends { readonly _input: infer I } ? I : never;
export type { output as infer };

export type AnySchema = Schema<unknown, unknown, SchemaDef>;

declare const brand_marker: unique symbol;
/** 名义类型标记：只存在于类型层面 */
export type Brand<B extends PropertyKey> = { readonly [brand_marker]: { [K in B]: true } };

export interface CatchContext {
  /** 被吞掉的问题（已定稿） */
  issues: Issue[];
  input: unknown;
}

export interface TransformContext {
  add_issue(issue: string | CustomIssueInput): void;
}

/** 值或工厂函数统一成工厂；函数值一律视为工厂 */
function to_factory(value: unknown): (ctx?: CatchContext) => unknown {
  if (typeof value === 'function') {
    const fn = value;
    return (ctx) => fn(ctx);
  }
  return () => value;
}

/**
 * 所有 Schema Node 的基类。
 *
 * 节点构造后不可变：def 被冻结，约束 / 修饰方法都返回新节点，
 * 同一个节点可以被任意多次并发校验共享。
 *
 * O / I 是类型层面的输出 / 输入（`_output` / `_input` 只有声明，没有运行期值）。
 */
export abstract class Schema<O = unknown, I = O, D extends SchemaDef = SchemaDef> {
  declare readonly _output: O;
  declare readonly _input: I;
  readonly def: D;

  constructor(def: D) {
    this.def = Object.freeze(def);
  }

  /** 种类自身的类型 / 结构校验 */
  protected abstract parse_base(input: unknown, ctx: ParseContext): Outcome;

  /**
   * 引擎入口：先做种类校验，通过后再按声明顺序跑 checks。
   * 每次调用返回新的 payload，问题路径相对本节点。
   */
  run(input: unknown, ctx: ParseContext): Outcome {
    const checks = this.def.checks;
    const base = this.parse_base(input, ctx);
    if (checks.length === 0) return base;
    return then_one(base, (payload) => (payload.issues.length ? payload : run_checks(payload, checks, ctx)));
  }

  /** 写时复制：同类新节点，def 合并 patch 后重新冻结 */
  protected derive(patch: Partial<SchemaDef> | Partial<D>): this {
    const next: this = Object.create(Object.getPrototypeOf(this));
    Object.defineProperty(next, 'def', {
      value: Object.freeze({ ...this.def, ...patch }),
      enumerable: true,
    });
    return next;
  }

  get kind(): SchemaKind {
    return this.def.kind;
  }

  get description(): string | undefined {
    return this.def.description;
  }

  /* ---------------------------
   *  校验入口
   * ---------------------------*/

  /** 失败抛 SchemaError */
  parse(input: unknown, options?: ParseOptions): O {
    return parse(this, input, options);
  }

  /** 从不因校验失败而抛错 */
  safe_parse(input: unknown, options?: ParseOptions): SafeParseResult<O> {
    return safe_parse(this, input, options);
  }

  parse_async(input: unknown, options?: ParseOptions): Promise<O> {
    return parse_async(this, input, options);
  }

  safe_parse_async(input: unknown, options?: ParseOptions): Promise<SafeParseResult<O>> {
    return safe_parse_async(this, input, options);
  }

  /** 强类型的 parse：输入必须是 I */
  decode(input: I, options?: ParseOptions): O {
    return decode(this, input, options);
  }

  /** 反向运行：O → I（codec 调用 encode，一般 transform 不可逆会抛错） */
  encode(value: O, options?: ParseOptions): I {
    return encode(this, value, options);
  }

  safe_decode(input: I, options?: ParseOptions): SafeParseResult<O> {
    return safe_decode(this, input, options);
  }

  safe_encode(value: O, options?: ParseOptions): SafeParseResult<I> {
    return safe_encode(this, value, options);
  }

  decode_async(input: I, options?: ParseOptions): Promise<O> {
    return decode_async(this, input, options);
  }

  encode_async(value: O, options?: ParseOptions): Promise<I> {
    return encode_async(this, value, options);
  }

  safe_encode_async(value: O, options?: ParseOptions): Promise<SafeParseResult<I>> {
    return safe_encode_async(this, value, options);
  }

  /* ---------------------------
   *  修饰
   * ---------------------------*/

  optional(): OptionalSchema<this> {
    return new OptionalSchema({ kind: 'optional', checks: [], inner: this });
  }

  nullable(): NullableSchema<this> {
    return new NullableSchema({ kind: 'nullable', checks: [], inner: this });
  }

  nullish(): OptionalSchema<NullableSchema<this>> {
    return this.nullable().optional();
  }

  non_optional(params?: Pick<CheckParams, 'message'>): NonOptionalSchema<this> {
    return new NonOptionalSchema({ kind: 'non_optional', checks: [], inner: this, message: params?.message });
  }

  /** 输入缺省（undefined）时直接给出 value，不再校验 */
  default(value: Exclude<O, undefined> | (() => Exclude<O, undefined>)): DefaultSchema<this> {
    return new DefaultSchema({ kind: 'default', checks: [], inner: this, get_default: to_factory(value) });
  }

  /** 输入缺省时用 value 代替输入，并照常校验 / 转换 */
  prefault(value: Exclude<I, undefined> | (() => Exclude<I, undefined>)): PrefaultSchema<this> {
    return new PrefaultSchema({ kind: 'prefault', checks: [], inner: this, get_prefault: to_factory(value) });
  }

  /** 校验失败时用 value 兜底并判为成功 */
  catch(value: O | ((ctx: CatchContext) => O)): CatchSchema<this> {
    return new CatchSchema({ kind: 'catch', checks: [], inner: this, get_catch: to_factory(value) });
  }

  readonly(): ReadonlySchema<this> {
    return new ReadonlySchema({ kind: 'readonly', checks: [], inner: this });
  }

  /** 名义标记，运行期无作用 */
  brand<B extends PropertyKey = PropertyKey>(tag?: B): BrandSchema<this, B> {
    return new BrandSchema<this, B>({ kind: 'brand', checks: [], inner: this, tag });
  }

  describe(description: string): this {
    return this.derive({ description });
  }

  /** 追加任意检查（内置约束方法最终都走这里） */
  check(...checks: Check[]): this {
    return this.derive({ checks: Object.freeze([...this.def.checks, ...checks]) });
  }

  /** fn 返回假值即报 custom 问题；可以返回 Promise（需用 parse_async） */
  refine(fn: (value: O) => unknown, params?: string | RefineParams): this {
    // 检查只在类型校验通过后执行，值已经是 O
    return this.check(refine_check((value) => fn(value as O), params));
  }

  super_refine(
    fn: (value: O, ctx: RefinementContext) => void | Promise<void>,
    params?: Pick<CheckParams, 'abort'>,
  ): this {
    return this.check(super_refine_check((value, ctx) => fn(value as O, ctx), params));
  }

  /** 本节点（含检查）通过后执行映射；输出不会再按本节点校验 */
  transform<N>(
    fn: (value: O, ctx: TransformContext) => N | Promise<N>,
  ): PipeSchema<this, TransformSchema<O, Awaited<N>>> {
    const step = new TransformSchema<O, Awaited<N>>({
      kind: 'transform',
      checks: [],
      fn: (value, ctx) => fn(value as O, ctx),
    });
    return this.pipe(step);
  }

  pipe<T extends AnySchema>(next: T): PipeSchema<this, T> {
    return new PipeSchema({ kind: 'pipe', checks: [], in: this, out: next });
  }

  is_optional(): boolean {
    return this.safe_parse(undefined).success;
  }

  is_nullable(): boolean {
    return this.safe_parse(null).success;
  }
}

/* ---------------------------
 *  包装节点
 * ---------------------------*/

export interface WrapperDef<S extends AnySchema> extends SchemaDef {
  readonly inner: S;
}

export class OptionalSchema<S extends AnySchema> extends Schema<output<S> | undefined, input<S> | undefined, WrapperDef<S>> {
  protected parse_base(input: unknown, ctx: ParseContext): Outcome {
    return input === undefined ? ok_payload(undefined) : this.def.inner.run(input, ctx);
  }

  unwrap(): S {
    return this.def.inner;
  }
}

export class NullableSchema<S extends AnySchema> extends Schema<output<S> | null, input<S> | null, WrapperDef<S>> {
  protected parse_base(input: unknown, ctx: ParseContext): Outcome {
    return input === null ? ok_payload(null) : this.def.inner.run(input, ctx);
  }

  unwrap(): S {
    return this.def.inner;
  }
}

export interface NonOptionalDef<S extends AnySchema> extends WrapperDef<S> {
  readonly message?: CheckParams['message'];
}

export class NonOptionalSchema<S extends AnySchema> extends Schema<
  Exclude<output<S>, undefined>,
  Exclude<input<S>, undefined>,
  NonOptionalDef<S>
> {
  protected parse_base(input: unknown, ctx: ParseContext): Outcome {
    return then_one(this.def.inner.run(input, ctx), (payload) => {
      if (payload.issues.length || payload.value !== undefined) return payload;
      const issue: RawIssue = { code: 'invalid_type', expected: 'nonoptional', received: 'undefined', path: [], input };
      if (this.def.message !== undefined) issue.message = this.def.message;
      return { value: undefined, issues: [issue] };
    });
  }

  unwrap(): S {
    return this.def.inner;
  }
}

export interface DefaultDef<S extends AnySchema> extends WrapperDef<S> {
  readonly get_default: () => unknown;
}

export class DefaultSchema<S extends AnySchema> extends Schema<
  Exclude<output<S>, undefined>,
  input<S> | undefined,
  DefaultDef<S>
> {
  protected parse_base(input: unknown, ctx: ParseContext): Outcome {
    if (input === undefined && ctx.direction === 'forward') return ok_payload(this.def.get_default());
    return this.def.inner.run(input, ctx);
  }

  remove_default(): S {
    return this.def.inner;
  }
}

export interface PrefaultDef<S extends AnySchema> extends WrapperDef<S> {
  readonly get_prefault: () => unknown;
}

export class PrefaultSchema<S extends AnySchema> extends Schema<
  Exclude<output<S>, undefined>,
  input<S> | undefined,
  PrefaultDef<S>
> {
  protected parse_base(input: unknown, ctx: ParseContext): Outcome {
    const value = input === undefined && ctx.direction === 'forward' ? this.def.get_prefault() : input;
    return this.def.inner.run(value, ctx);
  }

  unwrap(): S {
    return this.def.inner;
  }
}

export interface CatchDef<S extends AnySchema> extends WrapperDef<S> {
  readonly get_catch: (ctx: CatchContext) => unknown;
}

export class CatchSchema<S extends AnySchema> extends Schema<output<S>, input<S>, CatchDef<S>> {
  protected parse_base(input: unknown, ctx: ParseContext): Outcome {
    const inner = this.def.inner.run(input, ctx);
    if (ctx.direction === 'backward') return inner;
    return then_one(inner, (payload) => {
      if (!payload.issues.length) return payload;
      return ok_payload(this.def.get_catch({ issues: finalize_issues(payload.issues, ctx), input }));
    });
  }

  remove_catch(): S {
    return this.def.inner;
  }
}

export class ReadonlySchema<S extends AnySchema> extends Schema<Readonly<output<S>>, input<S>, WrapperDef<S>> {
  protected parse_base(input: unknown, ctx: ParseContext): Outcome {
    return then_one(this.def.inner.run(input, ctx), (payload) => {
      if (!payload.issues.length && typeof payload.value === 'object' && payload.value !== null) {
        Object.freeze(payload.value);
      }
      return payload;
    });
  }
}

export interface BrandDef<S extends AnySchema> extends WrapperDef<S> {
  readonly tag?: PropertyKey;
}

export class BrandSchema<S extends AnySchema, B extends PropertyKey> extends Schema<
  output<S> & Brand<B>,
  input<S>,
  BrandDef<S>
> {
  protected parse_base(input: unknown, ctx: ParseContext): Outcome {
    return this.def.inner.run(input, ctx);
  }

  unwrap(): S {
    return this.def.inner;
  }
}

export interface PipeDef<A extends AnySchema, B extends AnySchema> extends SchemaDef {
  readonly in: A;
  readonly out: B;
}

/**
 * A 的输出作为 B 的输入。正向 A → B，反向（encode）B → A；
 * 任一段出现问题即停止。
 */
export class PipeSchema<A extends AnySchema, B extends AnySchema> extends Schema<output<B>, input<A>, PipeDef<A, B>> {
  protected parse_base(input: unknown, ctx: ParseContext): Outcome {
    const [first, second] = ctx.direction === 'forward' ? [this.def.in, this.def.out] : [this.def.out, this.def.in];
    return then_one(first.run(input, ctx), (payload) => (payload.issues.length ? payload : second.run(payload.value, ctx)));
  }
}

export interface TransformDef extends SchemaDef {
  readonly fn: (value: unknown, ctx: TransformContext) => unknown;
}

/** 单向映射节点；只能出现在正向校验里 */
export class TransformSchema<In, Out> extends Schema<Out, In, TransformDef> {
  protected parse_base(input: unknown, ctx: ParseContext): Outcome {
    if (ctx.direction === 'backward') {
      throw new SchemaDefinitionError('transform() is one-way and cannot be encoded; declare both directions with codec()');
    }
    const issues: RawIssue[] = [];
    const tctx: TransformContext = {
      add_issue(issue) {
        const draft: CustomIssueInput = typeof issue === 'string' ? { message: issue } : issue;
        const raw: RawIssue = draft.params
          ? { code: 'custom', params: draft.params, path: [...(draft.path ?? [])], input }
          : { code: 'custom', path: [...(draft.path ?? [])], input };
        if (draft.message !== undefined) raw.message = draft.message;
        issues.push(raw);
      },
    };
    return await_step(this.def.fn(input, tctx), ctx, (value) => ({ value, issues }));
  }
}

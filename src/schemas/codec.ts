import { await_step, then_one, type Outcome, type ParseContext } from '../core/engine';
import {
  PipeSchema,
  Schema,
  TransformSchema,
  type AnySchema,
  type input,
  type output,
  type SchemaDef,
  type TransformContext,
} from '../core/schema';

/* ---------------------------
 *  codec：双向转换
 * ---------------------------*/

export interface CodecFunctions<A extends AnySchema, B extends AnySchema> {
  /** A 的输出 → B 的输入 */
  decode: (value: output<A>) => input<B> | Promise<input<B>>;
  /** B 的输出 → A 的输入 */
  encode: (value: output<B>) => input<A> | Promise<input<A>>;
}

export interface CodecDef<A extends AnySchema, B extends AnySchema> extends SchemaDef {
  readonly in: A;
  readonly out: B;
  readonly decode: (value: unknown) => unknown;
  readonly encode: (value: unknown) => unknown;
}

/**
 * 正向：A 校验 → decode → B 校验；
 * 反向：B 校验 → encode → A 校验。
 * 任一段有问题即停止，转换函数只会拿到校验通过的值。
 */
export class CodecSchema<A extends AnySchema, B extends AnySchema> extends Schema<output<B>, input<A>, CodecDef<A, B>> {
  protected parse_base(input: unknown, ctx: ParseContext): Outcome {
    const forward = ctx.direction === 'forward';
    const [first, second] = forward ? [this.def.in, this.def.out] : [this.def.out, this.def.in];
    const convert = forward ? this.def.decode : this.def.encode;
    return then_one(first.run(input, ctx), (payload) => {
      if (payload.issues.length) return payload;
      return await_step(convert(payload.value), ctx, (value) => second.run(value, ctx));
    });
  }

  get in_schema(): A {
    return this.def.in;
  }

  get out_schema(): B {
    return this.def.out;
  }
}

export function codec<A extends AnySchema, B extends AnySchema>(
  in_schema: A,
  out_schema: B,
  fns: CodecFunctions<A, B>,
): CodecSchema<A, B> {
  return new CodecSchema({
    kind: 'codec',
    checks: [],
    in: in_schema,
    out: out_schema,
    // 两侧 schema 校验通过后才会调用，值的类型已由对应 schema 保证
    decode: (value) => fns.decode(value as output<A>),
    encode: (value) => fns.encode(value as output<B>),
  });
}

/* ---------------------------
 *  pipe / transform / preprocess 的函数形式
 * ---------------------------*/

export function pipe<A extends AnySchema, B extends AnySchema>(first: A, second: B): PipeSchema<A, B> {
  return new PipeSchema({ kind: 'pipe', checks: [], in: first, out: second });
}

/** 独立的转换节点，输入不做校验 */
export function transform<I = unknown, O = unknown>(
  fn: (value: I, ctx: TransformContext) => O | Promise<O>,
): TransformSchema<I, Awaited<O>> {
  // 独立使用时由调用方声明 I；放在 pipe 里时上游 schema 已校验
  return new TransformSchema<I, Awaited<O>>({ kind: 'transform', checks: [], fn: (value, ctx) => fn(value as I, ctx) });
}

/** 校验前先用 fn 改写输入（可以是异步的） */
export function preprocess<S extends AnySchema>(
  fn: (value: unknown, ctx: TransformContext) => unknown,
  schema: S,
): PipeSchema<TransformSchema<unknown, unknown>, S> {
  return pipe(transform(fn), schema);
}

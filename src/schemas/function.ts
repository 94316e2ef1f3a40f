import { ok_payload, invalid_type, type Outcome, type ParseContext } from '../core/engine';
import { issue_error } from '../core/parse';
import { Schema, type AnySchema, type input, type output, type SchemaDef } from '../core/schema';
import { array, type ArraySchema } from './array';
import { unknown, type GuardSchema } from './primitive';

type Args<T> = T extends readonly unknown[] ? T : never;

/** 外部调用方看到的签名：参数按 A 的输入类型，返回 R 的输出类型 */
export type OuterFunction<A extends AnySchema, R extends AnySchema> = (...args: Args<input<A>>) => output<R>;
/** 被包装的实现：拿到校验后的参数，返回值再交给 R 校验 */
export type InnerFunction<A extends AnySchema, R extends AnySchema> = (...args: Args<output<A>>) => input<R>;

export interface FunctionDef<A extends AnySchema, R extends AnySchema> extends SchemaDef {
  readonly args: A;
  readonly returns: R;
}

/**
 * 函数 schema：校验输入是函数，输出为包装后的函数。
 * 包装函数每次调用都先校验参数（invalid_arguments），再校验返回值（invalid_return_type），
 * 失败时抛 SchemaError。
 */
export class FunctionSchema<A extends AnySchema, R extends AnySchema> extends Schema<
  OuterFunction<A, R>,
  InnerFunction<A, R>,
  FunctionDef<A, R>
> {
  protected parse_base(input: unknown, _ctx: ParseContext): Outcome {
    if (typeof input !== 'function') return invalid_type('function', input);
    return ok_payload(this.wrap(input));
  }

  /** 包装函数用 function 表达式：作为方法调用时把 this 原样交给实现 */
  private wrap(fn: Function): (...args: unknown[]) => unknown {
    const { args: args_schema, returns } = this.def;
    return function (this: unknown, ...args: unknown[]): unknown {
      const parsed = args_schema.safe_parse(args);
      if (!parsed.success) {
        throw issue_error({ code: 'invalid_arguments', issues: parsed.error.issues, path: [], input: args });
      }
      const values: unknown = parsed.data;
      const result: unknown = Reflect.apply(fn, this, Array.isArray(values) ? values : [values]);
      const checked = returns.safe_parse(result);
      if (!checked.success) {
        throw issue_error({ code: 'invalid_return_type', issues: checked.error.issues, path: [], input: result });
      }
      return checked.data;
    };
  }

  private wrap_async(fn: Function): (...args: unknown[]) => Promise<unknown> {
    const { args: args_schema, returns } = this.def;
    return async function (this: unknown, ...args: unknown[]): Promise<unknown> {
      const parsed = await args_schema.safe_parse_async(args);
      if (!parsed.success) {
        throw issue_error({ code: 'invalid_arguments', issues: parsed.error.issues, path: [], input: args });
      }
      const values: unknown = parsed.data;
      const result: unknown = await Reflect.apply(fn, this, Array.isArray(values) ? values : [values]);
      const checked = await returns.safe_parse_async(result);
      if (!checked.success) {
        throw issue_error({ code: 'invalid_return_type', issues: checked.error.issues, path: [], input: result });
      }
      return checked.data;
    };
  }

  /** 同步包装：参数或返回值里有异步步骤时报 async_in_sync */
  implement(fn: InnerFunction<A, R>): OuterFunction<A, R> {
    // 包装函数只会返回 returns 校验通过的值
    return this.wrap(fn) as OuterFunction<A, R>;
  }

  implement_async(
    fn: (...args: Args<output<A>>) => input<R> | Promise<input<R>>,
  ): (...args: Args<input<A>>) => Promise<output<R>> {
    return this.wrap_async(fn) as (...args: Args<input<A>>) => Promise<output<R>>;
  }

  get parameters(): A {
    return this.def.args;
  }

  get return_type(): R {
    return this.def.returns;
  }
}

export interface FunctionParams<A extends AnySchema, R extends AnySchema> {
  /** 参数列表 schema，通常是 tuple */
  input: A;
  output: R;
}

/** 不给参数时：任意参数、任意返回值 */
export function _function(): FunctionSchema<ArraySchema<GuardSchema<unknown>>, GuardSchema<unknown>>;
export function _function<A extends AnySchema, R extends AnySchema>(params: FunctionParams<A, R>): FunctionSchema<A, R>;
export function _function(params?: FunctionParams<AnySchema, AnySchema>): AnySchema {
  return new FunctionSchema({
    kind: 'function',
    checks: [],
    args: params?.input ?? array(unknown()),
    returns: params?.output ?? unknown(),
  });
}

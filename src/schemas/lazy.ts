import { await_step, fail_payload, ok_payload, type Outcome, type ParseContext } from '../core/engine';
import { Schema, type AnySchema, type input, type output, type SchemaDef } from '../core/schema';
import type { CheckParams } from '../core/checks';
import type { RawIssue } from '../types';

/* ---------------------------
 *  lazy：递归结构
 * ---------------------------*/

export interface LazyDef<S extends AnySchema> extends SchemaDef {
  readonly getter: () => S;
}

/**
 * 第一次校验时才调用 getter，结果缓存在节点外的闭包里；
 * 节点本身仍不可变，可以在 getter 里引用尚未赋值的外层变量。
 */
export class LazySchema<S extends AnySchema> extends Schema<output<S>, input<S>, LazyDef<S>> {
  protected parse_base(input: unknown, ctx: ParseContext): Outcome {
    return this.def.getter().run(input, ctx);
  }

  get schema(): S {
    return this.def.getter();
  }
}

export function lazy<S extends AnySchema>(getter: () => S): LazySchema<S> {
  let cached: S | undefined;
  const resolve = (): S => (cached ??= getter());
  return new LazySchema({ kind: 'lazy', checks: [], getter: resolve });
}

/* ---------------------------
 *  custom / instance_of
 * ---------------------------*/

export interface CustomDef extends SchemaDef {
  readonly predicate: (value: unknown) => unknown;
  readonly message?: CheckParams['message'];
  readonly params?: Record<string, unknown>;
}

/**
 * 任意谓词判定的种类；谓词可以返回 Promise（需要 parse_async）
 */
export class CustomSchema<T> extends Schema<T, T, CustomDef> {
  protected parse_base(input: unknown, ctx: ParseContext): Outcome {
    return await_step(this.def.predicate(input), ctx, (passed) => {
      if (passed) return ok_payload(input);
      const issue: RawIssue = this.def.params
        ? { code: 'custom', params: this.def.params, path: [], input }
        : { code: 'custom', path: [], input };
      if (this.def.message !== undefined) issue.message = this.def.message;
      return fail_payload(issue);
    });
  }
}

export interface CustomParams {
  message?: CheckParams['message'];
  params?: Record<string, unknown>;
}

/** 不带谓词时任何值都通过，只用于声明类型 */
export function custom<T>(predicate?: (value: unknown) => unknown, params?: string | CustomParams): CustomSchema<T> {
  const options: CustomParams = typeof params === 'string' ? { message: params } : (params ?? {});
  return new CustomSchema<T>({
    kind: 'custom',
    checks: [],
    predicate: predicate ?? (() => true),
    message: options.message,
    params: options.params,
  });
}

/** 任意参数的 class（含抽象类） */
type Constructor<T> = abstract new (...args: never[]) => T;

export function instance_of<T>(cls: Constructor<T>, params?: string | CustomParams): CustomSchema<T> {
  const options: CustomParams = typeof params === 'string' ? { message: params } : (params ?? {});
  return custom<T>((value) => value instanceof cls, {
    message: options.message ?? `Input not instance of ${cls.name}`,
    params: options.params,
  });
}

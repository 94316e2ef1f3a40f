import { size_check, type CheckOptions } from '../core/checks';
import { absorb, fail_payload, invalid_type, then_all, type Outcome, type ParseContext, type ParsePayload } from '../core/engine';
import { Schema, type AnySchema, type input, type output, type SchemaDef } from '../core/schema';

/* ---------------------------
 *  array
 * ---------------------------*/

export interface ArrayDef<E extends AnySchema> extends SchemaDef {
  readonly element: E;
}

/** 子结果按下标并回父结果，输出为新数组 */
function collect(payloads: ParsePayload[]): ParsePayload {
  const result: ParsePayload = { value: undefined, issues: [] };
  const out: unknown[] = [];
  payloads.forEach((child, i) => {
    absorb(result, i, child);
    out.push(child.value);
  });
  result.value = out;
  return result;
}

export class ArraySchema<E extends AnySchema> extends Schema<output<E>[], input<E>[], ArrayDef<E>> {
  protected parse_base(input: unknown, ctx: ParseContext): Outcome {
    if (!Array.isArray(input)) return invalid_type('array', input);
    const element = this.def.element;
    return then_all(
      input.map((item: unknown) => element.run(item, ctx)),
      (payloads) => collect(payloads),
    );
  }

  get element(): E {
    return this.def.element;
  }

  min(n: number, options?: CheckOptions): this {
    return this.check(size_check('array', 'min', n, options));
  }

  max(n: number, options?: CheckOptions): this {
    return this.check(size_check('array', 'max', n, options));
  }

  length(n: number, options?: CheckOptions): this {
    return this.check(size_check('array', 'exact', n, options));
  }

  nonempty(options?: CheckOptions): this {
    return this.min(1, options);
  }
}

export function array<E extends AnySchema>(element: E): ArraySchema<E> {
  return new ArraySchema({ kind: 'array', checks: [], element });
}

/* ---------------------------
 *  tuple
 * ---------------------------*/

type TupleItems<T extends readonly AnySchema[]> = { -readonly [K in keyof T]: output<T[K]> };
type TupleInputs<T extends readonly AnySchema[]> = { -readonly [K in keyof T]: input<T[K]> };

export type TupleOutput<T extends readonly AnySchema[], R> = R extends AnySchema
  ? [...TupleItems<T>, ...output<R>[]]
  : TupleItems<T>;

export type TupleInput<T extends readonly AnySchema[], R> = R extends AnySchema
  ? [...TupleInputs<T>, ...input<R>[]]
  : TupleInputs<T>;

export interface TupleDef<T extends readonly AnySchema[]> extends SchemaDef {
  readonly items: T;
  readonly rest?: AnySchema;
}

/**
 * 定长元组；有 rest 时多出的元素按 rest 校验，否则长度必须一致
 */
export class TupleSchema<T extends readonly AnySchema[], R extends AnySchema | undefined = undefined> extends Schema<
  TupleOutput<T, R>,
  TupleInput<T, R>,
  TupleDef<T>
> {
  protected parse_base(input: unknown, ctx: ParseContext): Outcome {
    if (!Array.isArray(input)) return invalid_type('array', input);
    const { items, rest } = this.def;

    if (input.length < items.length) {
      return fail_payload({
        code: 'too_small',
        origin: 'array',
        minimum: items.length,
        inclusive: true,
        exact: rest ? undefined : true,
        path: [],
        input,
      });
    }
    if (!rest && input.length > items.length) {
      return fail_payload({
        code: 'too_big',
        origin: 'array',
        maximum: items.length,
        inclusive: true,
        exact: true,
        path: [],
        input,
      });
    }

    const head = items.map((schema, i) => schema.run(input[i], ctx));
    const tail = rest ? input.slice(items.length).map((item: unknown) => rest.run(item, ctx)) : [];
    return then_all([...head, ...tail], (payloads) => collect(payloads));
  }

  get items(): T {
    return this.def.items;
  }

  /** 追加 rest 元素 schema */
  rest<N extends AnySchema>(schema: N): TupleSchema<T, N> {
    return new TupleSchema<T, N>({ kind: 'tuple', checks: [], items: this.def.items, rest: schema });
  }
}

export function tuple<const T extends readonly AnySchema[]>(items: T): TupleSchema<T>;
export function tuple<const T extends readonly AnySchema[], R extends AnySchema>(items: T, rest: R): TupleSchema<T, R>;
export function tuple<const T extends readonly AnySchema[], R extends AnySchema>(
  items: T,
  rest?: R,
): TupleSchema<T> | TupleSchema<T, R> {
  const base = new TupleSchema<T>({ kind: 'tuple', checks: [], items });
  return rest ? base.rest(rest) : base;
}

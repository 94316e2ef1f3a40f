import { coerce_with, invalid_type, ok_payload, type Outcome, type ParseContext } from '../core/engine';
import { Schema, type SchemaDef, type SchemaKind } from '../core/schema';

/**
 * 只靠一个类型守卫就能判定的种类：
 * symbol / undefined / null / void / any / unknown / never / nan
 */
export interface GuardDef extends SchemaDef {
  /** invalid_type 里的 expected */
  readonly expected: string;
  readonly guard: (value: unknown) => boolean;
}

export class GuardSchema<T> extends Schema<T, T, GuardDef> {
  protected parse_base(input: unknown, _ctx: ParseContext): Outcome {
    return this.def.guard(input) ? ok_payload(input) : invalid_type(this.def.expected, input);
  }
}

function guard<T>(kind: SchemaKind, expected: string, test: (value: unknown) => boolean): GuardSchema<T> {
  return new GuardSchema<T>({ kind, checks: [], expected, guard: test });
}

export function symbol(): GuardSchema<symbol> {
  return guard('symbol', 'symbol', (v) => typeof v === 'symbol');
}

export function _undefined(): GuardSchema<undefined> {
  return guard('undefined', 'undefined', (v) => v === undefined);
}

export function _null(): GuardSchema<null> {
  return guard('null', 'null', (v) => v === null);
}

/** 与 undefined 相同的运行期行为，类型上是 void */
export function _void(): GuardSchema<void> {
  return guard('void', 'void', (v) => v === undefined);
}

export function any(): GuardSchema<any> {
  return guard('any', 'any', () => true);
}

export function unknown(): GuardSchema<unknown> {
  return guard('unknown', 'unknown', () => true);
}

export function never(): GuardSchema<never> {
  return guard('never', 'never', () => false);
}

export function nan(): GuardSchema<number> {
  return guard('nan', 'nan', (v) => typeof v === 'number' && Number.isNaN(v));
}

/* ---------------------------
 *  boolean
 * ---------------------------*/

export interface CoercibleDef extends SchemaDef {
  /** 类型校验前先做宿主转换 */
  readonly coerce: boolean;
}

export class BooleanSchema extends Schema<boolean, boolean, CoercibleDef> {
  protected parse_base(input: unknown, _ctx: ParseContext): Outcome {
    const value = this.def.coerce ? coerce_with(Boolean, input) : input;
    return typeof value === 'boolean' ? ok_payload(value) : invalid_type('boolean', value);
  }
}

export function boolean(): BooleanSchema {
  return new BooleanSchema({ kind: 'boolean', checks: [], coerce: false });
}

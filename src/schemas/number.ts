import { compare_check, int_check, multiple_of_check, type CheckOptions } from '../core/checks';
import { coerce_with, invalid_type, ok_payload, type Outcome, type ParseContext } from '../core/engine';
import { Schema } from '../core/schema';
import type { CoercibleDef } from './primitive';

/**
 * 有限数字。NaN / ±Infinity 在种类校验阶段就被拒绝（received 为 nan / infinity）
 */
export class NumberSchema extends Schema<number, number, CoercibleDef> {
  protected parse_base(input: unknown, _ctx: ParseContext): Outcome {
    const value = this.def.coerce ? coerce_with(Number, input) : input;
    return typeof value === 'number' && Number.isFinite(value) ? ok_payload(value) : invalid_type('number', value);
  }

  gt(n: number, options?: CheckOptions): this {
    return this.check(compare_check('number', 'gt', n, options));
  }

  gte(n: number, options?: CheckOptions): this {
    return this.check(compare_check('number', 'gte', n, options));
  }

  min(n: number, options?: CheckOptions): this {
    return this.gte(n, options);
  }

  lt(n: number, options?: CheckOptions): this {
    return this.check(compare_check('number', 'lt', n, options));
  }

  lte(n: number, options?: CheckOptions): this {
    return this.check(compare_check('number', 'lte', n, options));
  }

  max(n: number, options?: CheckOptions): this {
    return this.lte(n, options);
  }

  int(options?: CheckOptions): this {
    return this.check(int_check(options));
  }

  positive(options?: CheckOptions): this {
    return this.gt(0, options);
  }

  nonnegative(options?: CheckOptions): this {
    return this.gte(0, options);
  }

  negative(options?: CheckOptions): this {
    return this.lt(0, options);
  }

  nonpositive(options?: CheckOptions): this {
    return this.lte(0, options);
  }

  multiple_of(divisor: number, options?: CheckOptions): this {
    return this.check(multiple_of_check(divisor, options));
  }

  step(divisor: number, options?: CheckOptions): this {
    return this.multiple_of(divisor, options);
  }
}

export function number(): NumberSchema {
  return new NumberSchema({ kind: 'number', checks: [], coerce: false });
}

/** number().int() 的简写 */
export function int(options?: CheckOptions): NumberSchema {
  return number().int(options);
}

/* ---------------------------
 *  bigint
 * ---------------------------*/

/** BigInt() 只收 bigint / number / string / boolean，其余先转字符串（通常随后抛错） */
function to_bigint(value: unknown): bigint {
  switch (typeof value) {
    case 'bigint':
    case 'number':
    case 'string':
    case 'boolean':
      return BigInt(value);
    default:
      return BigInt(String(value));
  }
}

export class BigIntSchema extends Schema<bigint, bigint, CoercibleDef> {
  protected parse_base(input: unknown, _ctx: ParseContext): Outcome {
    const value = this.def.coerce ? coerce_with(to_bigint, input) : input;
    return typeof value === 'bigint' ? ok_payload(value) : invalid_type('bigint', value);
  }

  gt(n: bigint, options?: CheckOptions): this {
    return this.check(compare_check('bigint', 'gt', n, options));
  }

  gte(n: bigint, options?: CheckOptions): this {
    return this.check(compare_check('bigint', 'gte', n, options));
  }

  min(n: bigint, options?: CheckOptions): this {
    return this.gte(n, options);
  }

  lt(n: bigint, options?: CheckOptions): this {
    return this.check(compare_check('bigint', 'lt', n, options));
  }

  lte(n: bigint, options?: CheckOptions): this {
    return this.check(compare_check('bigint', 'lte', n, options));
  }

  max(n: bigint, options?: CheckOptions): this {
    return this.lte(n, options);
  }

  positive(options?: CheckOptions): this {
    return this.gt(BigInt(0), options);
  }

  nonnegative(options?: CheckOptions): this {
    return this.gte(BigInt(0), options);
  }

  negative(options?: CheckOptions): this {
    return this.lt(BigInt(0), options);
  }

  nonpositive(options?: CheckOptions): this {
    return this.lte(BigInt(0), options);
  }

  multiple_of(divisor: bigint, options?: CheckOptions): this {
    return this.check(multiple_of_check(divisor, options));
  }
}

export function bigint(): BigIntSchema {
  return new BigIntSchema({ kind: 'bigint', checks: [], coerce: false });
}

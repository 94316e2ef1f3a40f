import { DateSchema } from './date';
import { BigIntSchema, NumberSchema } from './number';
import { BooleanSchema } from './primitive';
import { StringSchema } from './string';

/**
 * 类型校验前先做宿主转换（String / Number / Boolean / BigInt / new Date）。
 * 转换抛错时保留原输入，随后按 invalid_type 失败。
 */
export const coerce = {
  string: (): StringSchema => new StringSchema({ kind: 'string', checks: [], coerce: true }),
  number: (): NumberSchema => new NumberSchema({ kind: 'number', checks: [], coerce: true }),
  boolean: (): BooleanSchema => new BooleanSchema({ kind: 'boolean', checks: [], coerce: true }),
  bigint: (): BigIntSchema => new BigIntSchema({ kind: 'bigint', checks: [], coerce: true }),
  date: (): DateSchema => new DateSchema({ kind: 'date', checks: [], coerce: true }),
};

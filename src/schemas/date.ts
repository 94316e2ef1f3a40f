import { compare_check, type CheckOptions } from '../core/checks';
import { coerce_with, invalid_type, ok_payload, type Outcome, type ParseContext } from '../core/engine';
import { Schema } from '../core/schema';
import type { CoercibleDef } from './primitive';

function to_date(value: unknown): unknown {
  if (typeof value === 'string' || typeof value === 'number' || value instanceof Date) return new Date(value);
  return value;
}

/** Date 实例，且必须是有效时间（Invalid Date 报 received invalid_date） */
export class DateSchema extends Schema<Date, Date, CoercibleDef> {
  protected parse_base(input: unknown, _ctx: ParseContext): Outcome {
    const value = this.def.coerce ? coerce_with(to_date, input) : input;
    if (value instanceof Date && !Number.isNaN(value.getTime())) return ok_payload(value);
    return invalid_type('date', value);
  }

  min(date: Date, options?: CheckOptions): this {
    return this.check(compare_check('date', 'gte', date.getTime(), options));
  }

  max(date: Date, options?: CheckOptions): this {
    return this.check(compare_check('date', 'lte', date.getTime(), options));
  }
}

export function date(): DateSchema {
  return new DateSchema({ kind: 'date', checks: [], coerce: false });
}

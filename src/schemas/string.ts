import { format_check, overwrite_check, size_check, type CheckOptions } from '../core/checks';
import { coerce_with, invalid_type, ok_payload, type Outcome, type ParseContext } from '../core/engine';
import { Schema } from '../core/schema';
import {
  BASE64_PATTERN,
  EMAIL_PATTERN,
  IPV4_PATTERN,
  IPV6_PATTERN,
  ISO_DATETIME_PATTERN,
  ISO_DATE_PATTERN,
  UUID_PATTERN,
  is_url,
} from '../utils/format.util';
import type { CoercibleDef } from './primitive';

/** 去掉 g / y：带状态的 lastIndex 会让同一个正则交替匹配成功 / 失败 */
function stateless(pattern: RegExp): RegExp {
  return new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ''));
}

export class StringSchema extends Schema<string, string, CoercibleDef> {
  protected parse_base(input: unknown, _ctx: ParseContext): Outcome {
    const value = this.def.coerce ? coerce_with(String, input) : input;
    return typeof value === 'string' ? ok_payload(value) : invalid_type('string', value);
  }

  min(n: number, options?: CheckOptions): this {
    return this.check(size_check('string', 'min', n, options));
  }

  max(n: number, options?: CheckOptions): this {
    return this.check(size_check('string', 'max', n, options));
  }

  length(n: number, options?: CheckOptions): this {
    return this.check(size_check('string', 'exact', n, options));
  }

  regex(pattern: RegExp, options?: CheckOptions): this {
    const re = stateless(pattern);
    return this.check(format_check('regex', (v) => re.test(v), options, String(pattern)));
  }

  starts_with(prefix: string, options?: CheckOptions): this {
    return this.check(format_check('starts_with', (v) => v.startsWith(prefix), options, prefix));
  }

  ends_with(suffix: string, options?: CheckOptions): this {
    return this.check(format_check('ends_with', (v) => v.endsWith(suffix), options, suffix));
  }

  includes(part: string, options?: CheckOptions): this {
    return this.check(format_check('includes', (v) => v.includes(part), options, part));
  }

  email(options?: CheckOptions): this {
    return this.check(format_check('email', (v) => EMAIL_PATTERN.test(v), options));
  }

  url(options?: CheckOptions): this {
    return this.check(format_check('url', is_url, options));
  }

  uuid(options?: CheckOptions): this {
    return this.check(format_check('uuid', (v) => UUID_PATTERN.test(v), options));
  }

  ipv4(options?: CheckOptions): this {
    return this.check(format_check('ipv4', (v) => IPV4_PATTERN.test(v), options));
  }

  ipv6(options?: CheckOptions): this {
    return this.check(format_check('ipv6', (v) => IPV6_PATTERN.test(v), options));
  }

  /** ISO 8601 日期时间，必须带时区（Z 或偏移） */
  datetime(options?: CheckOptions): this {
    return this.check(
      format_check('datetime', (v) => ISO_DATETIME_PATTERN.test(v) && !Number.isNaN(Date.parse(v)), options),
    );
  }

  iso_date(options?: CheckOptions): this {
    return this.check(format_check('date', (v) => ISO_DATE_PATTERN.test(v), options));
  }

  base64(options?: CheckOptions): this {
    return this.check(format_check('base64', (v) => BASE64_PATTERN.test(v), options));
  }

  /* 改写类：不改变类型，只改值 */

  trim(): this {
    return this.check(overwrite_check('trim', (v) => (typeof v === 'string' ? v.trim() : v)));
  }

  to_lower_case(): this {
    return this.check(overwrite_check('to_lower_case', (v) => (typeof v === 'string' ? v.toLowerCase() : v)));
  }

  to_upper_case(): this {
    return this.check(overwrite_check('to_upper_case', (v) => (typeof v === 'string' ? v.toUpperCase() : v)));
  }
}

export function string(): StringSchema {
  return new StringSchema({ kind: 'string', checks: [], coerce: false });
}

import type { IssueDraft, Primitive, SizeOrigin } from '../types';

/** 字面量在消息里的写法：字符串带引号、bigint 带 n */
export function format_literal(value: Primitive): string {
  if (typeof value === 'bigint') return `${value}n`;
  if (typeof value === 'string') return JSON.stringify(value);
  return String(value);
}

const SIZE_UNITS: Partial<Record<SizeOrigin, string>> = {
  string: 'characters',
  array: 'items',
  set: 'items',
};

function format_bound(origin: SizeOrigin, bound: number | bigint): string {
  if (origin === 'date' && typeof bound === 'number') return new Date(bound).toISOString();
  return typeof bound === 'bigint' ? `${bound}n` : String(bound);
}

function size_message(
  kind: 'small' | 'big',
  origin: SizeOrigin,
  bound: number | bigint,
  inclusive: boolean,
  exact: boolean | undefined,
): string {
  const cmp = exact ? '' : kind === 'small' ? (inclusive ? '>=' : '>') : inclusive ? '<=' : '<';
  const head = kind === 'small' ? 'Too small' : 'Too big';
  const unit = SIZE_UNITS[origin];
  if (unit) return `${head}: expected ${origin} to have ${cmp}${format_bound(origin, bound)} ${unit}`;
  return `${head}: expected ${origin} to be ${cmp}${format_bound(origin, bound)}`;
}

function format_message(format: string, pattern: string | undefined): string {
  switch (format) {
    case 'starts_with':
      return `Invalid string: must start with "${pattern ?? ''}"`;
    case 'ends_with':
      return `Invalid string: must end with "${pattern ?? ''}"`;
    case 'includes':
      return `Invalid string: must include "${pattern ?? ''}"`;
    case 'regex':
      return `Invalid string: must match pattern ${pattern ?? ''}`;
    default:
      return `Invalid ${format}`;
  }
}

/** 内置英文消息（最后一级兜底） */
export function default_error_map(issue: IssueDraft): string {
  switch (issue.code) {
    case 'invalid_type':
      return `Invalid input: expected ${issue.expected}, received ${issue.received}`;
    case 'invalid_literal':
      if (issue.expected.length === 1) return `Invalid input: expected ${format_literal(issue.expected[0])}`;
      return `Invalid option: expected one of ${issue.expected.map(format_literal).join('|')}`;
    case 'unrecognized_keys':
      return `Unrecognized key${issue.keys.length > 1 ? 's' : ''}: ${issue.keys.map((k) => `"${k}"`).join(', ')}`;
    case 'invalid_union':
      if (issue.discriminator !== undefined) {
        return `Invalid input: no option matches discriminator "${issue.discriminator}"`;
      }
      return 'Invalid input';
    case 'too_small':
      return size_message('small', issue.origin, issue.minimum, issue.inclusive, issue.exact);
    case 'too_big':
      return size_message('big', issue.origin, issue.maximum, issue.inclusive, issue.exact);
    case 'invalid_format':
      return format_message(issue.format, issue.pattern);
    case 'not_multiple_of':
      return `Invalid number: must be a multiple of ${format_literal(issue.divisor)}`;
    case 'custom':
      return 'Invalid input';
    case 'invalid_key':
      return `Invalid key in ${issue.origin}`;
    case 'invalid_intersection':
      return 'Intersection results could not be merged';
    case 'invalid_arguments':
      return 'Invalid function arguments';
    case 'invalid_return_type':
      return 'Invalid function return type';
    case 'async_in_sync':
      return 'Encountered an asynchronous step during a synchronous parse; use parse_async()';
  }
}

import type { ErrorMap, IssueBody, PathSegment, RawIssue } from '../types';
import { is_promise } from '../utils/type.util';
import { ensure_async, type Outcome, type ParseContext, type ParsePayload } from './engine';
import { SchemaDefinitionError } from './error';

/** 约束 / 精化的公共参数 */
export interface CheckParams {
  /** 自定义消息，或按问题生成消息的函数 */
  message?: string | ErrorMap;
  /** 失败后停止本节点剩余检查 */
  abort?: boolean;
}

/** 传字符串等同于 { message } */
export type CheckOptions = string | CheckParams;

export interface RefineParams extends CheckParams {
  /** 问题挂在值内部的相对路径（如对象级 refine 指向某字段） */
  path?: PathSegment[];
  params?: Record<string, unknown>;
}

/**
 * 挂在节点上的一条检查：按声明顺序执行；
 * 失败时往 payload.issues 里追加问题，overwrite 类检查直接改写 payload.value。
 */
export interface Check {
  readonly kind: string;
  readonly abort: boolean;
  run(payload: ParsePayload, ctx: ParseContext): void | Promise<void>;
}

export function normalize_params(params?: CheckOptions): CheckParams {
  if (params === undefined) return {};
  return typeof params === 'string' ? { message: params } : params;
}

function push_issue(payload: ParsePayload, body: IssueBody, params: CheckParams, path: PathSegment[] = []): void {
  const issue: RawIssue = { ...body, path: [...path], input: payload.value };
  if (params.message !== undefined) issue.message = params.message;
  payload.issues.push(issue);
}

function make_check(kind: string, params: CheckParams, run: Check['run']): Check {
  return Object.freeze({ kind, abort: params.abort ?? false, run });
}

/**
 * 从 index 开始依次执行检查。
 * 非 abort 的失败不阻止后续检查（一次调用尽量暴露所有问题）；
 * abort 检查失败或 abort_early 时停在这里。
 */
export function run_checks(payload: ParsePayload, checks: readonly Check[], ctx: ParseContext, index = 0): Outcome {
  for (let i = index; i < checks.length; i++) {
    const check = checks[i];
    const before = payload.issues.length;
    const stop = () => payload.issues.length > before && (check.abort || ctx.abort_early);
    const result = check.run(payload, ctx);
    if (is_promise(result)) {
      return ensure_async(result, ctx).then(() => (stop() ? payload : run_checks(payload, checks, ctx, i + 1)));
    }
    if (stop()) return payload;
  }
  return payload;
}

/* ---------------------------
 *  尺寸：字符串长度 / 数组长度 / Set 大小
 * ---------------------------*/

export type SizeCheckOrigin = 'string' | 'array' | 'set';

function measure(value: unknown): number | undefined {
  if (typeof value === 'string' || Array.isArray(value)) return value.length;
  if (value instanceof Set) return value.size;
  return undefined;
}

export function size_check(
  origin: SizeCheckOrigin,
  bound: 'min' | 'max' | 'exact',
  n: number,
  options?: CheckOptions,
): Check {
  if (!Number.isInteger(n) || n < 0) {
    throw new SchemaDefinitionError(`${origin} ${bound} size must be a non-negative integer, got ${n}`);
  }
  const params = normalize_params(options);
  return make_check(`${bound}_size`, params, (payload) => {
    const size = measure(payload.value);
    if (size === undefined) return;
    const exact = bound === 'exact' ? true : undefined;
    if ((bound === 'min' || bound === 'exact') && size < n) {
      push_issue(payload, { code: 'too_small', origin, minimum: n, inclusive: true, exact }, params);
    } else if ((bound === 'max' || bound === 'exact') && size > n) {
      push_issue(payload, { code: 'too_big', origin, maximum: n, inclusive: true, exact }, params);
    }
  });
}

/* ---------------------------
 *  大小比较：number / bigint / Date（按毫秒）
 * ---------------------------*/

export type CompareOrigin = 'number' | 'bigint' | 'date';
export type CompareOp = 'gt' | 'gte' | 'lt' | 'lte';

function comparable(value: unknown): number | bigint | undefined {
  if (typeof value === 'number' || typeof value === 'bigint') return value;
  if (value instanceof Date) return value.getTime();
  return undefined;
}

export function compare_check(origin: CompareOrigin, op: CompareOp, bound: number | bigint, options?: CheckOptions): Check {
  const params = normalize_params(options);
  const inclusive = op === 'gte' || op === 'lte';
  return make_check(op, params, (payload) => {
    const v = comparable(payload.value);
    if (v === undefined) return;
    switch (op) {
      case 'gt':
      case 'gte':
        if (inclusive ? v < bound : v <= bound) {
          push_issue(payload, { code: 'too_small', origin, minimum: bound, inclusive }, params);
        }
        return;
      case 'lt':
      case 'lte':
        if (inclusive ? v > bound : v >= bound) {
          push_issue(payload, { code: 'too_big', origin, maximum: bound, inclusive }, params);
        }
        return;
    }
  });
}

/** 整数约束；失败按类型问题报告（expected int） */
export function int_check(options?: CheckOptions): Check {
  const params = normalize_params(options);
  return make_check('int', params, (payload) => {
    if (typeof payload.value === 'number' && !Number.isInteger(payload.value)) {
      push_issue(payload, { code: 'invalid_type', expected: 'int', received: 'number' }, params);
    }
  });
}

/* ---------------------------
 *  倍数
 * ---------------------------*/

function decimals_of(n: number): number {
  const [mantissa, exponent] = n.toString().toLowerCase().split('e');
  const fraction = mantissa.split('.')[1]?.length ?? 0;
  return Math.max(0, fraction - Number(exponent ?? 0));
}

/** 0.3 % 0.1 这类浮点余数按小数位放大成整数后再取模 */
function float_safe_remainder(value: number, step: number): number {
  const scale = 10 ** Math.max(decimals_of(value), decimals_of(step));
  return (Math.round(value * scale) % Math.round(step * scale)) / scale;
}

export function multiple_of_check(divisor: number | bigint, options?: CheckOptions): Check {
  if (divisor <= 0) throw new SchemaDefinitionError(`multiple_of divisor must be positive, got ${divisor}`);
  const params = normalize_params(options);
  return make_check('multiple_of', params, (payload) => {
    const v = payload.value;
    const ok =
      typeof v === 'bigint' && typeof divisor === 'bigint'
        ? v % divisor === BigInt(0)
        : typeof v === 'number' && typeof divisor === 'number'
          ? float_safe_remainder(v, divisor) === 0
          : true;
    if (!ok) push_issue(payload, { code: 'not_multiple_of', divisor }, params);
  });
}

/* ---------------------------
 *  字符串格式
 * ---------------------------*/

export function format_check(
  format: string,
  test: (value: string) => boolean,
  options?: CheckOptions,
  pattern?: string,
): Check {
  const params = normalize_params(options);
  return make_check(format, params, (payload) => {
    if (typeof payload.value !== 'string' || test(payload.value)) return;
    const body: IssueBody = pattern === undefined ? { code: 'invalid_format', format } : { code: 'invalid_format', format, pattern };
    push_issue(payload, body, params);
  });
}

/** 原地改写（trim / 大小写），不改变类型 */
export function overwrite_check(kind: string, fn: (value: unknown) => unknown): Check {
  return make_check(kind, {}, (payload) => {
    payload.value = fn(payload.value);
  });
}

/* ---------------------------
 *  用户精化
 * ---------------------------*/

export function refine_check(fn: (value: unknown) => unknown, options?: string | RefineParams): Check {
  const params: RefineParams = typeof options === 'string' ? { message: options } : (options ?? {});
  const body: IssueBody = params.params ? { code: 'custom', params: params.params } : { code: 'custom' };
  const settle = (payload: ParsePayload, passed: unknown): void => {
    if (!passed) push_issue(payload, body, params, params.path);
  };
  return make_check('refine', params, (payload) => {
    const result = fn(payload.value);
    if (is_promise(result)) return result.then((passed) => settle(payload, passed));
    settle(payload, result);
  });
}

/** super_refine 里 add_issue 接受的形状（问题码固定为 custom） */
export interface CustomIssueInput {
  message?: string;
  path?: PathSegment[];
  params?: Record<string, unknown>;
}

export interface RefinementContext {
  /** 当前值 */
  readonly value: unknown;
  add_issue(issue: string | CustomIssueInput): void;
}

export function super_refine_check(
  fn: (value: unknown, ctx: RefinementContext) => void | Promise<void>,
  options?: Pick<CheckParams, 'abort'>,
): Check {
  return make_check('super_refine', options ?? {}, (payload) => {
    const refinement: RefinementContext = {
      value: payload.value,
      add_issue(input) {
        const draft: CustomIssueInput = typeof input === 'string' ? { message: input } : input;
        const body: IssueBody = draft.params ? { code: 'custom', params: draft.params } : { code: 'custom' };
        push_issue(payload, body, { message: draft.message }, draft.path);
      },
    };
    return fn(payload.value, refinement);
  });
}

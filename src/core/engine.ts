import type { ErrorMap, Issue, PathSegment, RawIssue } from '../types';
import { is_promise, parsed_type } from '../utils/type.util';
import { get_config } from './config';
import { default_error_map } from './error-map';

/**
 * 单个节点的校验产物。每次 run 都新建，只属于本次调用：
 * 父节点可以直接改写子节点问题的 path（前插一步）。
 */
export interface ParsePayload {
  value: unknown;
  issues: RawIssue[];
}

/** 同步模式下只会是 ParsePayload；异步模式下可能是 Promise */
export type Outcome = ParsePayload | Promise<ParsePayload>;

/** forward = 解码（parse / decode），backward = 编码（encode） */
export type Direction = 'forward' | 'backward';

export interface ParseContext {
  readonly async: boolean;
  readonly direction: Direction;
  readonly abort_early: boolean;
  readonly report_input: boolean;
  readonly error_map: ErrorMap | undefined;
}

/**
 * 同步入口遇到异步步骤时的内部信号，由 parse 入口捕获并转成 async_in_sync 问题
 */
export class AsyncInSyncError extends Error {
  constructor() {
    super('Encountered a Promise during synchronous parse');
    this.name = 'AsyncInSyncError';
  }
}

export function ok_payload(value: unknown): ParsePayload {
  return { value, issues: [] };
}

export function fail_payload(issue: RawIssue): ParsePayload {
  return { value: issue.input, issues: [issue] };
}

/** 种类校验失败的标准结果 */
export function invalid_type(expected: string, input: unknown): ParsePayload {
  return fail_payload({ code: 'invalid_type', expected, received: parsed_type(input), path: [], input });
}

/**
 * coerce 模式下的宿主转换：转换抛错（如 BigInt("x")、Symbol 转字符串）时保留原输入，
 * 交给随后的种类校验报 invalid_type。
 */
export function coerce_with<T>(convert: (input: unknown) => T, input: unknown): unknown {
  try {
    return convert(input);
  } catch {
    return input;
  }
}

/**
 * 同步入口已经以 async_in_sync 失败，被放弃的 Promise 不再有人等待；
 * 挂一个拒绝处理器，避免用户回调的拒绝变成 unhandledRejection。
 */
function abandon(promise: Promise<unknown>): void {
  promise.then(undefined, (reason: unknown) => reason);
}

/** 用户回调返回了 Promise：只有异步模式能继续 */
export function ensure_async<T>(promise: Promise<T>, ctx: ParseContext): Promise<T> {
  if (!ctx.async) {
    abandon(promise);
    throw new AsyncInSyncError();
  }
  return promise;
}

/**
 * 用户回调（refine / transform / preprocess / codec）返回值的统一入口：
 * - 同步值：直接交给 next
 * - Promise：异步模式下串接；同步模式立即失败
 */
export function await_step<T>(value: T | Promise<T>, ctx: ParseContext, next: (resolved: T) => Outcome): Outcome {
  return is_promise(value) ? ensure_async(value, ctx).then(next) : next(value);
}

/** 单个子结果之后继续 */
export function then_one(outcome: Outcome, next: (payload: ParsePayload) => Outcome): Outcome {
  return is_promise(outcome) ? outcome.then(next) : next(outcome);
}

/**
 * 多个子结果全部就绪后合并。异步模式下兄弟节点并发等待，
 * Promise.all 保持声明顺序，所以合并出的问题顺序与到达先后无关。
 */
export function then_all(outcomes: Outcome[], merge: (payloads: ParsePayload[]) => Outcome): Outcome {
  const settled: ParsePayload[] = [];
  for (const outcome of outcomes) {
    if (is_promise(outcome)) return Promise.all(outcomes).then(merge);
    settled.push(outcome);
  }
  return merge(settled);
}

/** 递归回溯时把当前这一步前插到子问题路径上，并并入父结果 */
export function absorb(target: ParsePayload, segment: PathSegment, child: ParsePayload): void {
  for (const issue of child.issues) {
    issue.path.unshift(segment);
    target.issues.push(issue);
  }
}

/**
 * 问题定稿：确定 message，按需去掉 input。
 * 消息优先级：检查级 → 单次调用 error_map → 全局 error_map → 内置英文。
 */
export function finalize_issue(raw: RawIssue, ctx: ParseContext): Issue {
  const custom = raw.message;
  const global = get_config().error_map;
  const message =
    (typeof custom === 'function' ? custom(raw) : custom) ??
    ctx.error_map?.(raw) ??
    global?.(raw) ??
    default_error_map(raw);

  const issue: Issue = { ...raw, path: [...raw.path], message };
  if (!ctx.report_input) delete issue.input;
  return issue;
}

export function finalize_issues(raws: readonly RawIssue[], ctx: ParseContext): Issue[] {
  return raws.map((raw) => finalize_issue(raw, ctx));
}

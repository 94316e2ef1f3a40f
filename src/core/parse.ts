import type { ParseOptions, RawIssue, SafeParseResult } from '../types';
import { is_promise } from '../utils/type.util';
import { get_config } from './config';
import { AsyncInSyncError, finalize_issues, type Direction, type Outcome, type ParseContext, type ParsePayload } from './engine';
import { SchemaError } from './error';
import type { Schema, SchemaDef } from './schema';

/** 单次调用的上下文：调用参数优先，其次全局配置 */
function make_context(direction: Direction, is_async: boolean, options?: ParseOptions): ParseContext {
  return {
    async: is_async,
    direction,
    abort_early: options?.abort_early ?? false,
    report_input: options?.report_input ?? get_config().report_input,
    error_map: options?.error_map,
  };
}

function settle<T>(payload: ParsePayload, ctx: ParseContext): SafeParseResult<T> {
  if (payload.issues.length) {
    return { success: false, error: new SchemaError(finalize_issues(payload.issues, ctx)) };
  }
  // 节点的 run 只在无问题时交出值，这里是类型层面与运行期的交接点
  return { success: true, data: payload.value as T };
}

/** 同步调用中途遇到 Promise：整体以单个根问题失败，之前收集的问题作废 */
function async_in_sync<T>(value: unknown, ctx: ParseContext): SafeParseResult<T> {
  return settle({ value, issues: [{ code: 'async_in_sync', path: [], input: value }] }, ctx);
}

function run_sync<T>(schema: Schema<unknown, unknown, SchemaDef>, value: unknown, ctx: ParseContext): SafeParseResult<T> {
  let outcome: Outcome;
  try {
    outcome = schema.run(value, ctx);
  } catch (err) {
    if (err instanceof AsyncInSyncError) return async_in_sync(value, ctx);
    throw err;
  }
  // 同步模式下节点只会在 ensure_async 处遇到 Promise，这里仅作兜底
  if (is_promise(outcome)) {
    outcome.then(undefined, (reason: unknown) => reason);
    return async_in_sync(value, ctx);
  }
  return settle(outcome, ctx);
}

async function run_async<T>(
  schema: Schema<unknown, unknown, SchemaDef>,
  value: unknown,
  ctx: ParseContext,
): Promise<SafeParseResult<T>> {
  return settle(await schema.run(value, ctx), ctx);
}

/** 校验流程之外产生的单个问题（如函数 schema 的参数 / 返回值），按同样的消息规则定稿 */
export function issue_error(raw: RawIssue, options?: ParseOptions): SchemaError {
  return new SchemaError(finalize_issues([raw], make_context('forward', false, options)));
}

function unwrap<T>(result: SafeParseResult<T>): T {
  if (!result.success) throw result.error;
  return result.data;
}

/* ---------------------------
 *  正向：parse / decode
 * ---------------------------*/

export function safe_parse<T>(schema: Schema<T, unknown, SchemaDef>, input: unknown, options?: ParseOptions): SafeParseResult<T> {
  return run_sync(schema, input, make_context('forward', false, options));
}

export function parse<T>(schema: Schema<T, unknown, SchemaDef>, input: unknown, options?: ParseOptions): T {
  return unwrap(safe_parse(schema, input, options));
}

export function safe_parse_async<T>(
  schema: Schema<T, unknown, SchemaDef>,
  input: unknown,
  options?: ParseOptions,
): Promise<SafeParseResult<T>> {
  return run_async(schema, input, make_context('forward', true, options));
}

export async function parse_async<T>(schema: Schema<T, unknown, SchemaDef>, input: unknown, options?: ParseOptions): Promise<T> {
  return unwrap(await safe_parse_async(schema, input, options));
}

/** 与 parse 同语义，只是输入带类型 */
export function safe_decode<T, U>(schema: Schema<T, U, SchemaDef>, input: U, options?: ParseOptions): SafeParseResult<T> {
  return safe_parse(schema, input, options);
}

export function decode<T, U>(schema: Schema<T, U, SchemaDef>, input: U, options?: ParseOptions): T {
  return parse(schema, input, options);
}

export function safe_decode_async<T, U>(
  schema: Schema<T, U, SchemaDef>,
  input: U,
  options?: ParseOptions,
): Promise<SafeParseResult<T>> {
  return safe_parse_async(schema, input, options);
}

export function decode_async<T, U>(schema: Schema<T, U, SchemaDef>, input: U, options?: ParseOptions): Promise<T> {
  return parse_async(schema, input, options);
}

/* ---------------------------
 *  反向：encode（输出 → 输入）
 * ---------------------------*/

export function safe_encode<T, U>(schema: Schema<T, U, SchemaDef>, value: T, options?: ParseOptions): SafeParseResult<U> {
  return run_sync(schema, value, make_context('backward', false, options));
}

export function encode<T, U>(schema: Schema<T, U, SchemaDef>, value: T, options?: ParseOptions): U {
  return unwrap(safe_encode(schema, value, options));
}

export function safe_encode_async<T, U>(
  schema: Schema<T, U, SchemaDef>,
  value: T,
  options?: ParseOptions,
): Promise<SafeParseResult<U>> {
  return run_async(schema, value, make_context('backward', true, options));
}

export async function encode_async<T, U>(schema: Schema<T, U, SchemaDef>, value: T, options?: ParseOptions): Promise<U> {
  return unwrap(await safe_encode_async(schema, value, options));
}

import type { SchemaError } from '../core/error';
import type { ErrorMap } from './issue.type';

/** 单次校验调用的选项 */
export interface ParseOptions {
  /** 覆盖全局 error map */
  error_map?: ErrorMap;
  /**
   * fail-fast：每个节点的检查链在第一个失败处停止（等同所有检查都带 abort）。
   * 只影响出错的分支，兄弟字段照常校验。
   */
  abort_early?: boolean;
  /** 在问题里附带出错位置的原始输入 */
  report_input?: boolean;
}

export type SafeParseSuccess<T> = { success: true; data: T; error?: undefined };
export type SafeParseFailure = { success: false; error: SchemaError; data?: undefined };

/** safe_parse 的返回：成功不带问题，失败至少一个问题 */
export type SafeParseResult<T> = SafeParseSuccess<T> | SafeParseFailure;

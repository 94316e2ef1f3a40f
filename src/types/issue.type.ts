/** 编译期诊断（描述符编译器使用） */
export interface ValidationIssue {
  /** 机器可读错误码（如 SCHEMA_ERROR / REF_NOT_FOUND / INVALID_PATTERN）。 */
  code: string;
  /** JSON Pointer 风格路径（如 "/root/properties/name"）。 */
  path: string;
  /** 人类可读消息。 */
  message: string;
  /** 可选：修复建议。 */
  hint?: string;
}

/** ---------------------------
 *  运行期校验问题（引擎产出）
 * ---------------------------*/

export type Primitive = string | number | bigint | boolean | symbol | null | undefined;

/** 路径的一步：对象 key / 数组、元组、集合下标 / Map key */
export type PathSegment = PropertyKey;

/** too_small / too_big 的来源类型，决定消息里的单位 */
export type SizeOrigin = 'string' | 'number' | 'bigint' | 'array' | 'set' | 'date';

/** 每种问题码携带的元数据 */
export type IssueBody =
  | { code: 'invalid_type'; expected: string; received: string }
  | { code: 'invalid_literal'; expected: readonly Primitive[]; received: string }
  | { code: 'unrecognized_keys'; keys: string[] }
  | {
      code: 'invalid_union';
      /** 每个分支各自的问题列表（路径相对 union 节点）；判别式未命中时为空 */
      errors: Issue[][];
      discriminator?: string;
      note?: string;
    }
  | {
      code: 'too_small';
      origin: SizeOrigin;
      minimum: number | bigint;
      inclusive: boolean;
      exact?: boolean;
    }
  | {
      code: 'too_big';
      origin: SizeOrigin;
      maximum: number | bigint;
      inclusive: boolean;
      exact?: boolean;
    }
  | { code: 'invalid_format'; format: string; pattern?: string }
  | { code: 'not_multiple_of'; divisor: number | bigint }
  | { code: 'custom'; params?: Record<string, unknown> }
  | { code: 'invalid_key'; origin: 'record' | 'map'; issues: Issue[] }
  | { code: 'invalid_intersection'; merge_path: PathSegment[] }
  | { code: 'invalid_arguments'; issues: Issue[] }
  | { code: 'invalid_return_type'; issues: Issue[] }
  | { code: 'async_in_sync' };

export type IssueCode = IssueBody['code'];

/** 对外暴露的最终问题 */
export type Issue = IssueBody & {
  /** 从根到出错位置的路径 */
  path: PathSegment[];
  message: string;
  /** 仅在 report_input 打开时附带 */
  input?: unknown;
};

/** 交给 error map 的草稿（消息尚未确定） */
export type IssueDraft = IssueBody & {
  path: PathSegment[];
  input?: unknown;
};

/**
 * 错误消息映射：返回 undefined 表示交给下一级处理
 * （单个检查 → 单次调用 → 全局 configure → 内置英文）。
 */
export type ErrorMap = (issue: IssueDraft) => string | undefined;

/** 引擎内部的未定稿问题：路径相对当前节点，随递归回溯逐步前插 */
export type RawIssue = IssueDraft & {
  /** 检查级自定义消息 */
  message?: string | ErrorMap;
};

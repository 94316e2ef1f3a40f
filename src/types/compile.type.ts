import type { AnySchema } from '../core/schema';
import type { ValidationIssue } from './issue.type';

/** ---------------------------
 *  描述符编译（输入 / 诊断 / 输出）
 * ---------------------------*/

/** 编译入口参数 */
export interface CompileInput {
  /** 描述符源对象（已解析为 JS 对象；可能来自 JSON/YAML）。 */
  descriptor: unknown;
  options?: {
    /**
     * 严格模式：若为 true，warnings 全部升级为 errors。
     * 典型用途：CI 门禁更严格时使用。
     */
    strict?: boolean;
  };
}

/** 编译输出（含成功/失败两种分支） */
export interface CompileOutput {
  /** 是否编译成功（成功时 errors 为空；warnings 可能非空）。 */
  ok: boolean;
  /** 成功时给出根节点；失败为 null。 */
  schema: AnySchema | null;
  /** 描述符稳定哈希（sha256:...）；结构校验失败时为 null。 */
  schema_id: string | null;
  /** 致命错误列表（失败原因）。 */
  errors: ValidationIssue[];
  /** 非致命告警列表（建议修复/潜在风险）。 */
  warnings: ValidationIssue[];
  /** 编译耗时（毫秒）。 */
  time_ms: number;
}

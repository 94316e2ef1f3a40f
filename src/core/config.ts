import type { ErrorMap } from '../types';

/** 进程级默认配置；单次调用的 ParseOptions 优先 */
export interface SchemataConfig {
  /** 全局错误消息映射（如本地化） */
  error_map?: ErrorMap;
  /** 默认是否在问题里附带原始输入 */
  report_input: boolean;
}

const DEFAULT_CONFIG: SchemataConfig = { report_input: false };

let current: SchemataConfig = { ...DEFAULT_CONFIG };

/** 合并更新全局配置，返回更新后的快照 */
export function configure(patch: Partial<SchemataConfig>): Readonly<SchemataConfig> {
  current = { ...current, ...patch };
  return get_config();
}

export function get_config(): Readonly<SchemataConfig> {
  return Object.freeze({ ...current });
}

export function reset_config(): void {
  current = { ...DEFAULT_CONFIG };
}

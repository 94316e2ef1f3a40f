import type { PathSegment } from '../types';
import { is_plain_object, set_key } from './type.util';

/** 只看自有键：constructor / toString 这类继承来的名字不算已存在 */
function has_own(target: object, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(target, key);
}

export type MergeResult =
  | { ok: true; value: unknown }
  | { ok: false; merge_path: PathSegment[] };

/**
 * 合并交叉类型两侧的输出：
 * - 严格相等 / 同一时间点的 Date：直接取左值
 * - 普通对象：按 key 递归合并（左侧 key 顺序在前）
 * - 等长数组：逐元素递归合并
 * 其余情况视为冲突，返回冲突位置。
 */
export function merge_values(a: unknown, b: unknown): MergeResult {
  if (Object.is(a, b) || a === b) return { ok: true, value: a };

  if (a instanceof Date && b instanceof Date && a.getTime() === b.getTime()) {
    return { ok: true, value: a };
  }

  if (is_plain_object(a) && is_plain_object(b)) {
    const out: Record<string, unknown> = {};
    const keys = [...Object.keys(a), ...Object.keys(b).filter((k) => !has_own(a, k))];
    for (const key of keys) {
      const in_a = has_own(a, key);
      if (in_a && has_own(b, key)) {
        const merged = merge_values(a[key], b[key]);
        if (!merged.ok) return { ok: false, merge_path: [key, ...merged.merge_path] };
        set_key(out, key, merged.value);
      } else {
        set_key(out, key, in_a ? a[key] : b[key]);
      }
    }
    return { ok: true, value: out };
  }

  if (Array.isArray(a) && Array.isArray(b)) {
    if (a.length !== b.length) return { ok: false, merge_path: [] };
    const out: unknown[] = [];
    for (let i = 0; i < a.length; i++) {
      const merged = merge_values(a[i], b[i]);
      if (!merged.ok) return { ok: false, merge_path: [i, ...merged.merge_path] };
      out.push(merged.value);
    }
    return { ok: true, value: out };
  }

  return { ok: false, merge_path: [] };
}

import { createHash } from "crypto";

/**
 * 将输入对象转化为“规范化”的字符串：
 * - 删除所有 null / undefined 值
 * - 深度排序对象的 key
 * - 使用 JSON.stringify 序列化
 *
 * 语义相同的描述符（无关 key 顺序、无关 null 值）得到完全一致的字符串，
 * 用于生成 schema_id。
 */
export function canonical_stringify(input: unknown): string {
  return JSON.stringify(sort_deep(strip_nulls(input)));
}

/**
 * 计算输入字符串的 SHA-256 哈希值，并返回带前缀的十六进制表示。
 *
 * 示例：
 *   hash_sha256("hello")
 *   => "sha256:2cf24dba5...9824"
 */
export function hash_sha256(text: string): string {
  const h = createHash("sha256").update(text, "utf8").digest("hex");
  return `sha256:${h}`;
}

/**
 * 递归删除对象或数组中的 null / undefined 值。
 *
 * - 数组：逐元素 strip_nulls（数组里的 null 保留位置）
 * - 对象：忽略值为 null/undefined 的字段，并递归处理子对象
 * - 其他值：原样返回
 */
function strip_nulls(v: unknown): unknown {
  if (Array.isArray(v)) return v.map(strip_nulls);

  if (v && typeof v === "object") {
    const out: Record<string, unknown> = {};
    for (const [k, val] of Object.entries(v)) {
      if (val === null || typeof val === "undefined") continue;
      out[k] = strip_nulls(val);
    }
    return out;
  }

  return v;
}

/**
 * 深度排序对象的 key，以保证序列化输出的稳定性。
 */
function sort_deep(v: unknown): unknown {
  if (Array.isArray(v)) return v.map(sort_deep);

  if (v && typeof v === "object") {
    const out: Record<string, unknown> = {};
    for (const [k, val] of Object.entries(v).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
      out[k] = sort_deep(val);
    }
    return out;
  }

  return v;
}

import { format_path } from '../core/error';
import { issue, parse_descriptor } from '../schema';
import type { CompileInput, CompileOutput, ValidationIssue } from '../types';
import { canonical_stringify, hash_sha256 } from '../utils/canonical.util';
import { build_node, child_path, type BuildContext } from './nodes';

export async function compile(input: CompileInput): Promise<CompileOutput> {
  // 记时
  const t0 = Date.now();
  // zod safe parse 获取描述符结构校验结果
  const result = parse_descriptor(input.descriptor);
  // 错误列表
  const errors: ValidationIssue[] = [];
  // 警告列表
  const warnings: ValidationIssue[] = [];

  // 结构不合法：把 zod 的 issues 转成 ValidationIssue[] 直接返回
  if (!result.success) {
    for (const e of result.error.issues) {
      errors.push(issue('SCHEMA_ERROR', format_path(e.path), e.message));
    }
    return { ok: false, schema: null, schema_id: null, errors, warnings, time_ms: Date.now() - t0 };
  }

  const descriptor = result.data;
  const definitions = descriptor.definitions ?? {};

  const bc: BuildContext = {
    definitions,
    resolved: new Map(),
    used: new Set(),
    defaults: [],
    add_issue: (code, path, message, hint) => errors.push(issue(code, path, message, hint)),
  };

  // 先建具名节点：ref 只在校验时经 lazy 读取 resolved，所以 definitions 之间可以互相 / 递归引用
  for (const [name, node] of Object.entries(definitions)) {
    bc.resolved.set(name, build_node(node, child_path('/definitions', name), bc));
  }
  const root = build_node(descriptor.root, '/root', bc);

  for (const name of Object.keys(definitions)) {
    if (!bc.used.has(name)) {
      warnings.push(
        issue('UNUSED_DEFINITION', child_path('/definitions', name), `definition '${name}' is never referenced`),
      );
    }
  }

  // 默认值对照自身节点：有错误时引用可能没建好，跳过
  if (errors.length === 0) {
    for (const pending of bc.defaults) {
      const checked = pending.schema.safe_parse(pending.value);
      if (!checked.success) {
        const [first] = checked.error.issues;
        warnings.push(
          issue('DEFAULT_MISMATCH', pending.path, `default value is rejected by its own schema: ${first.message}`),
        );
      }
    }
  }

  // 严格模式：告警一律升级为错误
  if (input.options?.strict) {
    errors.push(...warnings.splice(0));
  }

  // 规范化后再哈希：key 顺序、null 字段不影响 schema_id
  const schema_id = hash_sha256(canonical_stringify(descriptor));
  const ok = errors.length === 0;

  return { ok, schema: ok ? root : null, schema_id, errors, warnings, time_ms: Date.now() - t0 };
}

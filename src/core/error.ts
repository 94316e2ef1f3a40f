import type { Issue, PathSegment } from '../types';
import { set_key } from '../utils/type.util';

/**
 * 路径转成 JSON Pointer 风格（与编译器诊断一致）：
 *   ["users", 0, "name"] => "/users/0/name"，根路径为 "/"
 */
export function format_path(path: readonly PathSegment[]): string {
  if (path.length === 0) return '/';
  return path
    .map((seg) => '/' + String(seg).replace(/~/g, '~0').replace(/\//g, '~1'))
    .join('');
}

/** 每个问题一行：  - [code] /path : message */
function summarize(issues: readonly Issue[]): string {
  const lines = issues.map((i) => `  - [${i.code}] ${format_path(i.path)} : ${i.message}`);
  return `Validation failed with ${issues.length} issue(s):\n${lines.join('\n')}`;
}

/**
 * 校验失败的聚合错误：parse() 抛出，safe_parse() 作为数据返回。
 * message 是给人看的摘要，issues 是给程序用的明细。
 */
export class SchemaError extends Error {
  readonly issues: Issue[];

  constructor(issues: Issue[]) {
    super(summarize(issues));
    this.name = 'SchemaError';
    this.issues = issues;
  }

  flatten(): FlattenedError {
    return flatten_error(this);
  }
}

/**
 * schema 本身定义错误（构造期抛出，例如空 union / 空 enum），
 * 也用于不可逆 transform 被 encode 这类用法错误。不属于校验问题。
 */
export class SchemaDefinitionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SchemaDefinitionError';
  }
}

export interface FlattenedError {
  /** 根路径上的问题 */
  form_errors: string[];
  /** 按首段 key 归类的问题 */
  field_errors: Record<string, string[]>;
}

/** 只认自有键："__proto__" 这类键名也按普通数据写入 */
function own_entry<T>(table: Record<string, T>, key: string, make: () => T): T {
  if (Object.prototype.hasOwnProperty.call(table, key)) return table[key];
  const created = make();
  set_key(table, key, created);
  return created;
}

/** 数组下标：非负安全整数；其余数字（如 Map 的 -1 / 1.5 键）按属性处理 */
function is_index(seg: PathSegment): seg is number {
  return typeof seg === 'number' && Number.isSafeInteger(seg) && seg >= 0;
}

/** 扁平化：适合一层表单 */
export function flatten_error(error: SchemaError): FlattenedError {
  const out: FlattenedError = { form_errors: [], field_errors: {} };
  for (const issue of error.issues) {
    if (issue.path.length === 0) {
      out.form_errors.push(issue.message);
      continue;
    }
    own_entry(out.field_errors, String(issue.path[0]), () => []).push(issue.message);
  }
  return out;
}

export interface ErrorTree {
  errors: string[];
  properties?: Record<string, ErrorTree>;
  items?: ErrorTree[];
}

/** 树形化：下标段进 items（稀疏数组，只建出错的位置），其余进 properties */
export function treeify_error(error: SchemaError): ErrorTree {
  const root: ErrorTree = { errors: [] };
  for (const issue of error.issues) {
    let node = root;
    for (const seg of issue.path) {
      if (is_index(seg)) {
        const items = (node.items ??= []);
        node = items[seg] ??= { errors: [] };
      } else {
        node = own_entry((node.properties ??= {}), String(seg), () => ({ errors: [] }));
      }
    }
    node.errors.push(issue.message);
  }
  return root;
}

/**
 * 人类可读的多行格式：
 *   ✖ Invalid input: expected string, received number
 *     → at username
 */
export function prettify_error(error: SchemaError): string {
  const lines: string[] = [];
  const sorted = [...error.issues].sort((a, b) => a.path.length - b.path.length);
  for (const issue of sorted) {
    lines.push(`✖ ${issue.message}`);
    if (issue.path.length) {
      const dotted = issue.path
        .map((seg, i) => (typeof seg === 'number' ? `[${seg}]` : i === 0 ? String(seg) : `.${String(seg)}`))
        .join('');
      lines.push(`  → at ${dotted}`);
    }
  }
  return lines.join('\n');
}

import { SchemaDefinitionError, format_path } from '../core/error';
import type { AnySchema } from '../core/schema';
import { array, tuple } from '../schemas/array';
import { record } from '../schemas/collection';
import { _enum, literal } from '../schemas/enum';
import { lazy } from '../schemas/lazy';
import { number } from '../schemas/number';
import { object } from '../schemas/object';
import { _null, any, boolean, never, unknown } from '../schemas/primitive';
import { string, type StringSchema } from '../schemas/string';
import { discriminated_union, intersection, union } from '../schemas/union';
import type { DescriptorNode, StringDescriptor } from '../types/descriptor.type';

export type AddIssue = (code: string, path: string, message: string, hint?: string) => void;

/** 默认值要等所有引用就绪后才能对照节点检查 */
export interface PendingDefault {
  schema: AnySchema;
  value: unknown;
  path: string;
}

export interface BuildContext {
  definitions: Readonly<Record<string, DescriptorNode>>;
  /** 已构建的具名节点（ref 通过 lazy 延迟读取） */
  resolved: Map<string, AnySchema>;
  /** 被引用过的 definition 名 */
  used: Set<string>;
  defaults: PendingDefault[];
  add_issue: AddIssue;
}

/** JSON Pointer 追加一段 */
export function child_path(path: string, segment: string | number): string {
  return path + format_path([segment]);
}

/** 非空列表：描述符结构校验已保证，这里只做类型收窄 */
function non_empty(items: AnySchema[], path: string): [AnySchema, ...AnySchema[]] {
  const [first, ...rest] = items;
  if (!first) throw new SchemaDefinitionError(`${path}: at least one option is required`);
  return [first, ...rest];
}

function build_string(node: StringDescriptor, path: string, bc: BuildContext): StringSchema {
  let s = string();
  // trim 先于长度 / 格式检查
  if (node.trim) s = s.trim();
  if (node.min_length !== undefined) s = s.min(node.min_length);
  if (node.max_length !== undefined) s = s.max(node.max_length);
  if (node.pattern !== undefined) {
    let re: RegExp | undefined;
    try {
      re = new RegExp(node.pattern);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      bc.add_issue('INVALID_PATTERN', child_path(path, 'pattern'), reason, 'pattern must be a valid regular expression source');
    }
    if (re) s = s.regex(re);
  }
  switch (node.format) {
    case 'email':
      return s.email();
    case 'url':
      return s.url();
    case 'uuid':
      return s.uuid();
    case 'ipv4':
      return s.ipv4();
    case 'ipv6':
      return s.ipv6();
    case 'datetime':
      return s.datetime();
    case 'date':
      return s.iso_date();
    case 'base64':
      return s.base64();
    default:
      return s;
  }
}

function build_base(node: DescriptorNode, path: string, bc: BuildContext): AnySchema {
  switch (node.type) {
    case 'string':
      return build_string(node, path, bc);

    case 'number': {
      let n = number();
      if (node.integer) n = n.int();
      if (node.minimum !== undefined) n = n.gte(node.minimum);
      if (node.maximum !== undefined) n = n.lte(node.maximum);
      if (node.exclusive_minimum !== undefined) n = n.gt(node.exclusive_minimum);
      if (node.exclusive_maximum !== undefined) n = n.lt(node.exclusive_maximum);
      if (node.multiple_of !== undefined) n = n.multiple_of(node.multiple_of);
      return n;
    }

    case 'boolean':
      return boolean();

    case 'null':
      return _null();

    case 'any':
      return any();

    case 'unknown':
      return unknown();

    case 'literal':
      return literal(node.value);

    case 'enum':
      return _enum(node.values);

    case 'array': {
      let a = array(build_node(node.items, child_path(path, 'items'), bc));
      if (node.min_items !== undefined) a = a.min(node.min_items);
      if (node.max_items !== undefined) a = a.max(node.max_items);
      return a;
    }

    case 'tuple': {
      const items = node.items.map((item, i) => build_node(item, child_path(child_path(path, 'items'), i), bc));
      return node.rest ? tuple(items, build_node(node.rest, child_path(path, 'rest'), bc)) : tuple(items);
    }

    case 'object': {
      const shape: Record<string, AnySchema> = {};
      const props_path = child_path(path, 'properties');
      for (const [key, prop] of Object.entries(node.properties)) {
        shape[key] = build_node(prop, child_path(props_path, key), bc);
      }
      const o = object(shape);
      if (node.unknown_keys === 'strict') return o.strict();
      if (node.unknown_keys === 'passthrough') return o.passthrough();
      return o;
    }

    case 'record':
      return record(string(), build_node(node.values, child_path(path, 'values'), bc));

    case 'union': {
      const options = node.any_of.map((item, i) => build_node(item, child_path(child_path(path, 'any_of'), i), bc));
      return union(non_empty(options, path));
    }

    case 'discriminated_union': {
      const options = node.options.map((item, i) => build_node(item, child_path(child_path(path, 'options'), i), bc));
      return discriminated_union(node.discriminator, non_empty(options, path));
    }

    case 'intersection': {
      const [left, right] = node.all_of;
      const all_of = child_path(path, 'all_of');
      return intersection(build_node(left, child_path(all_of, 0), bc), build_node(right, child_path(all_of, 1), bc));
    }

    case 'ref': {
      const name = node.ref;
      if (!Object.prototype.hasOwnProperty.call(bc.definitions, name)) {
        const known = Object.keys(bc.definitions);
        bc.add_issue(
          'REF_NOT_FOUND',
          child_path(path, 'ref'),
          `definition '${name}' not found`,
          known.length ? `available: ${known.join(', ')}` : 'no definitions declared',
        );
        return never();
      }
      bc.used.add(name);
      const resolved = bc.resolved;
      return lazy(() => {
        const target = resolved.get(name);
        if (!target) throw new SchemaDefinitionError(`definition '${name}' was never built`);
        return target;
      });
    }
  }
}

/**
 * 描述符节点 → Schema Node。
 * 构造期错误（如判别联合缺少字面量判别键）记为 INVALID_SCHEMA，节点以 never 占位继续编译，
 * 以便一次报告尽量多的问题。
 */
export function build_node(node: DescriptorNode, path: string, bc: BuildContext): AnySchema {
  let schema: AnySchema;
  try {
    schema = build_base(node, path, bc);
  } catch (err) {
    if (!(err instanceof SchemaDefinitionError)) throw err;
    bc.add_issue('INVALID_SCHEMA', path, err.message);
    schema = never();
  }

  if (node.description !== undefined) schema = schema.describe(node.description);
  if (node.nullable) schema = schema.nullable();
  if (node.default !== undefined) {
    bc.defaults.push({ schema, value: node.default, path: child_path(path, 'default') });
    return schema.default(node.default);
  }
  if (node.optional) schema = schema.optional();
  return schema;
}

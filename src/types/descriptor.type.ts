/** ---------------------------
 *  可序列化的 schema 描述符（JSON / YAML 均可表达）
 * ---------------------------*/

/** 所有节点共有的修饰 */
export interface DescriptorCommon {
  /** 允许缺省（undefined） */
  optional?: boolean;
  /** 允许 null */
  nullable?: boolean;
  /** 缺省时的默认值（会对照节点本身检查，不匹配给出 DEFAULT_MISMATCH 告警） */
  default?: unknown;
  description?: string;
}

export type StringFormat = 'email' | 'url' | 'uuid' | 'ipv4' | 'ipv6' | 'datetime' | 'date' | 'base64';

export interface StringDescriptor extends DescriptorCommon {
  type: 'string';
  min_length?: number;
  max_length?: number;
  /** 正则源码（不含 / /） */
  pattern?: string;
  format?: StringFormat;
  trim?: boolean;
}

export interface NumberDescriptor extends DescriptorCommon {
  type: 'number';
  integer?: boolean;
  minimum?: number;
  maximum?: number;
  exclusive_minimum?: number;
  exclusive_maximum?: number;
  multiple_of?: number;
}

export interface BooleanDescriptor extends DescriptorCommon {
  type: 'boolean';
}

export interface NullDescriptor extends DescriptorCommon {
  type: 'null';
}

export interface AnyDescriptor extends DescriptorCommon {
  type: 'any' | 'unknown';
}

export interface LiteralDescriptor extends DescriptorCommon {
  type: 'literal';
  value: string | number | boolean | null;
}

export interface EnumDescriptor extends DescriptorCommon {
  type: 'enum';
  values: string[];
}

export interface ArrayDescriptor extends DescriptorCommon {
  type: 'array';
  items: DescriptorNode;
  min_items?: number;
  max_items?: number;
}

export interface TupleDescriptor extends DescriptorCommon {
  type: 'tuple';
  items: DescriptorNode[];
  rest?: DescriptorNode;
}

export interface ObjectDescriptor extends DescriptorCommon {
  type: 'object';
  /** 属性默认必填；可缺省的属性在自身节点上写 optional: true */
  properties: Record<string, DescriptorNode>;
  unknown_keys?: 'strip' | 'strict' | 'passthrough';
}

export interface RecordDescriptor extends DescriptorCommon {
  type: 'record';
  values: DescriptorNode;
}

export interface UnionDescriptor extends DescriptorCommon {
  type: 'union';
  any_of: DescriptorNode[];
}

export interface DiscriminatedUnionDescriptor extends DescriptorCommon {
  type: 'discriminated_union';
  discriminator: string;
  options: DescriptorNode[];
}

export interface IntersectionDescriptor extends DescriptorCommon {
  type: 'intersection';
  all_of: [DescriptorNode, DescriptorNode];
}

/** 引用 definitions 里的具名节点；允许递归 */
export interface RefDescriptor extends DescriptorCommon {
  type: 'ref';
  ref: string;
}

export type DescriptorNode =
  | StringDescriptor
  | NumberDescriptor
  | BooleanDescriptor
  | NullDescriptor
  | AnyDescriptor
  | LiteralDescriptor
  | EnumDescriptor
  | ArrayDescriptor
  | TupleDescriptor
  | ObjectDescriptor
  | RecordDescriptor
  | UnionDescriptor
  | DiscriminatedUnionDescriptor
  | IntersectionDescriptor
  | RefDescriptor;

export type DescriptorType = DescriptorNode['type'];

/** 描述符文档 */
export interface SchemaDescriptor {
  /** 描述符格式版本，目前固定为 1 */
  schema_version: 1;
  id: string;
  name?: string;
  /** 具名节点，供 { type: 'ref' } 引用 */
  definitions?: Record<string, DescriptorNode>;
  root: DescriptorNode;
}

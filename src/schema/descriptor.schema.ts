import { z } from 'zod';
import type { DescriptorNode, SchemaDescriptor } from '../types/descriptor.type';

/**
 * 描述符的结构校验（只管形状；引用、正则、默认值等语义检查在 compiler 里做）。
 */

/** 递归引用：各节点的子节点字段都指向它 */
const Node_Ref: z.ZodType<DescriptorNode> = z.lazy(() => Descriptor_Node);

/** 所有节点共有的修饰 */
const Common = {
  optional: z.boolean().optional(),
  nullable: z.boolean().optional(),
  /** 默认值必须能被 JSON 表达；是否匹配节点由编译器给告警 */
  default: z.unknown(),
  description: z.string().optional(),
};

const Size = z.number().int('长度必须是整数').nonnegative('长度不能为负');

const String_Node = z
  .object({
    type: z.literal('string'),
    min_length: Size.optional(),
    max_length: Size.optional(),
    pattern: z.string().optional(),
    format: z.enum(['email', 'url', 'uuid', 'ipv4', 'ipv6', 'datetime', 'date', 'base64']).optional(),
    trim: z.boolean().optional(),
    ...Common,
  })
  .strict();

const Number_Node = z
  .object({
    type: z.literal('number'),
    integer: z.boolean().optional(),
    minimum: z.number().optional(),
    maximum: z.number().optional(),
    exclusive_minimum: z.number().optional(),
    exclusive_maximum: z.number().optional(),
    /** 倍数必须为正 */
    multiple_of: z.number().positive('multiple_of 必须为正数').optional(),
    ...Common,
  })
  .strict();

const Boolean_Node = z.object({ type: z.literal('boolean'), ...Common }).strict();

const Null_Node = z.object({ type: z.literal('null'), ...Common }).strict();

const Any_Node = z.object({ type: z.enum(['any', 'unknown']), ...Common }).strict();

const Literal_Node = z
  .object({
    type: z.literal('literal'),
    value: z.union([z.string(), z.number(), z.boolean(), z.null()]),
    ...Common,
  })
  .strict();

const Enum_Node = z
  .object({
    type: z.literal('enum'),
    values: z.array(z.string()).min(1, 'enum 至少需要一个取值'),
    ...Common,
  })
  .strict();

const Array_Node = z
  .object({
    type: z.literal('array'),
    items: Node_Ref,
    min_items: Size.optional(),
    max_items: Size.optional(),
    ...Common,
  })
  .strict();

const Tuple_Node = z
  .object({
    type: z.literal('tuple'),
    items: z.array(Node_Ref),
    rest: Node_Ref.optional(),
    ...Common,
  })
  .strict();

const Object_Node = z
  .object({
    type: z.literal('object'),
    /** 属性默认必填；可缺省的写 optional: true */
    properties: z.record(z.string(), Node_Ref),
    unknown_keys: z.enum(['strip', 'strict', 'passthrough']).optional(),
    ...Common,
  })
  .strict();

const Record_Node = z.object({ type: z.literal('record'), values: Node_Ref, ...Common }).strict();

const Union_Node = z
  .object({
    type: z.literal('union'),
    any_of: z.array(Node_Ref).min(1, 'union 至少需要一个分支'),
    ...Common,
  })
  .strict();

const Discriminated_Union_Node = z
  .object({
    type: z.literal('discriminated_union'),
    discriminator: z.string().min(1),
    options: z.array(Node_Ref).min(1, 'discriminated_union 至少需要一个分支'),
    ...Common,
  })
  .strict();

const Intersection_Node = z
  .object({
    type: z.literal('intersection'),
    all_of: z.tuple([Node_Ref, Node_Ref]),
    ...Common,
  })
  .strict();

const Ref_Node = z
  .object({
    type: z.literal('ref'),
    /** definitions 里的名字 */
    ref: z.string().min(1),
    ...Common,
  })
  .strict();

export const Descriptor_Node: z.ZodType<DescriptorNode> = z.discriminatedUnion('type', [
  String_Node,
  Number_Node,
  Boolean_Node,
  Null_Node,
  Any_Node,
  Literal_Node,
  Enum_Node,
  Array_Node,
  Tuple_Node,
  Object_Node,
  Record_Node,
  Union_Node,
  Discriminated_Union_Node,
  Intersection_Node,
  Ref_Node,
]);

/**
 * 描述符文档
 */
export const Descriptor: z.ZodType<SchemaDescriptor> = z
  .object({
    /** 描述符格式版本 */
    schema_version: z.literal(1),
    /** 描述符 ID（参与 schema_id 计算） */
    id: z.string().min(1, 'id 不能为空'),
    name: z.string().optional(),
    /** 具名节点 */
    definitions: z.record(z.string(), Node_Ref).optional(),
    root: Node_Ref,
  })
  .strict();

/** 安全解析描述符：成功返回 { success:true, data }；失败返回 { success:false, error } */
export function parse_descriptor(input: unknown) {
  return Descriptor.safeParse(input);
}

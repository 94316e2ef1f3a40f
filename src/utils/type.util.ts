/**
 * 输入值的类型名（用于 invalid_type 的 received 字段与消息）
 */
export function parsed_type(value: unknown): string {
  switch (typeof value) {
    case 'number':
      if (Number.isNaN(value)) return 'nan';
      return Number.isFinite(value) ? 'number' : 'infinity';
    case 'object':
      if (value === null) return 'null';
      if (Array.isArray(value)) return 'array';
      if (value instanceof Date) return Number.isNaN(value.getTime()) ? 'invalid_date' : 'date';
      if (value instanceof Map) return 'map';
      if (value instanceof Set) return 'set';
      if (value instanceof Promise) return 'promise';
      return 'object';
    default:
      // string / bigint / boolean / symbol / undefined / function
      return typeof value;
  }
}

/** 非 null、非数组的对象（对象 schema 接受的输入形状） */
export function is_record(value: unknown): value is Record<PropertyKey, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** 仅普通对象（字面量或 Object.create(null)），用于交叉类型合并 */
export function is_plain_object(value: unknown): value is Record<string, unknown> {
  if (!is_record(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * 写入对象字段；"__proto__" 需要 defineProperty，否则会改写原型
 */
export function set_key(target: Record<string, unknown>, key: string, value: unknown): void {
  if (key === '__proto__') {
    Object.defineProperty(target, key, { value, writable: true, enumerable: true, configurable: true });
  } else {
    target[key] = value;
  }
}

export function is_promise<T>(value: T | Promise<T>): value is Promise<T> {
  return value instanceof Promise;
}

import { size_check, type CheckOptions } from '../core/checks';
import {
  absorb,
  finalize_issues,
  invalid_type,
  then_all,
  type Outcome,
  type ParseContext,
  type ParsePayload,
} from '../core/engine';
import { Schema, type AnySchema, type input, type output, type SchemaDef } from '../core/schema';
import type { PathSegment, RawIssue } from '../types';
import { is_record, set_key } from '../utils/type.util';
import { EnumSchema, LiteralSchema } from './enum';

/**
 * 键校验失败：不展开子问题，而是在该键的位置报一条 invalid_key，
 * 子问题在此定稿后挂在 issues 上
 */
function key_issue(
  origin: 'record' | 'map',
  segment: PathSegment,
  key: ParsePayload,
  input: unknown,
  ctx: ParseContext,
): RawIssue {
  return { code: 'invalid_key', origin, issues: finalize_issues(key.issues, ctx), path: [segment], input };
}

/* ---------------------------
 *  record / partial_record
 * ---------------------------*/

type KeyOf<K extends AnySchema> = output<K> extends PropertyKey ? output<K> : never;
type KeyIn<K extends AnySchema> = input<K> extends PropertyKey ? input<K> : never;

export interface RecordDef<K extends AnySchema, V extends AnySchema> extends SchemaDef {
  readonly key: K;
  readonly value: V;
  /** 键 schema 是有限集合（enum / literal）时，要求每个键都出现 */
  readonly exhaustive: boolean;
}

/** 有限键集合：enum / 字符串或数字字面量 */
function finite_keys(schema: AnySchema): string[] | undefined {
  if (schema instanceof EnumSchema || schema instanceof LiteralSchema) {
    const values: readonly unknown[] = schema.def.values;
    return values.filter((v) => typeof v === 'string' || typeof v === 'number').map(String);
  }
  return undefined;
}

export class RecordSchema<K extends AnySchema, V extends AnySchema> extends Schema<
  Record<KeyOf<K>, output<V>>,
  Record<KeyIn<K>, input<V>>,
  RecordDef<K, V>
> {
  protected parse_base(input: unknown, ctx: ParseContext): Outcome {
    if (!is_record(input)) return invalid_type('record', input);
    const { key: key_schema, value: value_schema, exhaustive } = this.def;

    const keys = Object.keys(input);
    // 有限键集合里缺失的键：按 undefined 交给值 schema（通常报 invalid_type）
    const missing = exhaustive ? (finite_keys(key_schema) ?? []).filter((k) => !keys.includes(k)) : [];

    const outcomes: Outcome[] = [];
    for (const key of keys) {
      outcomes.push(key_schema.run(key, ctx), value_schema.run(input[key], ctx));
    }
    for (const key of missing) outcomes.push(value_schema.run(undefined, ctx));

    return then_all(outcomes, (payloads) => {
      const result: ParsePayload = { value: undefined, issues: [] };
      const out: Record<string, unknown> = {};
      keys.forEach((key, i) => {
        const k = payloads[i * 2];
        const v = payloads[i * 2 + 1];
        if (k.issues.length) {
          result.issues.push(key_issue('record', key, k, input, ctx));
          return;
        }
        absorb(result, key, v);
        set_key(out, String(k.value), v.value);
      });
      missing.forEach((key, i) => {
        const v = payloads[keys.length * 2 + i];
        absorb(result, key, v);
        if (v.value !== undefined) set_key(out, key, v.value);
      });
      result.value = out;
      return result;
    });
  }

  get key_schema(): K {
    return this.def.key;
  }

  get value_schema(): V {
    return this.def.value;
  }
}

export function record<K extends AnySchema, V extends AnySchema>(key: K, value: V): RecordSchema<K, V> {
  return new RecordSchema({ kind: 'record', checks: [], key, value, exhaustive: finite_keys(key) !== undefined });
}

/** 键不要求齐全 */
export function partial_record<K extends AnySchema, V extends AnySchema>(
  key: K,
  value: V,
): Schema<Partial<Record<KeyOf<K>, output<V>>>, Partial<Record<KeyIn<K>, input<V>>>, RecordDef<K, V>> {
  return new RecordSchema({ kind: 'record', checks: [], key, value, exhaustive: false });
}

/* ---------------------------
 *  map
 * ---------------------------*/

export interface MapDef<K extends AnySchema, V extends AnySchema> extends SchemaDef {
  readonly key: K;
  readonly value: V;
}

export class MapSchema<K extends AnySchema, V extends AnySchema> extends Schema<
  Map<output<K>, output<V>>,
  Map<input<K>, input<V>>,
  MapDef<K, V>
> {
  protected parse_base(input: unknown, ctx: ParseContext): Outcome {
    if (!(input instanceof Map)) return invalid_type('map', input);
    const entries: [unknown, unknown][] = [...input.entries()];
    const outcomes: Outcome[] = [];
    for (const [key, value] of entries) {
      outcomes.push(this.def.key.run(key, ctx), this.def.value.run(value, ctx));
    }

    return then_all(outcomes, (payloads) => {
      const result: ParsePayload = { value: undefined, issues: [] };
      const out = new Map<unknown, unknown>();
      entries.forEach(([key], i) => {
        const k = payloads[i * 2];
        const v = payloads[i * 2 + 1];
        // Map 的路径段就是键本身（对象键以外的键用下标表示）
        const segment: PathSegment = typeof key === 'string' || typeof key === 'number' || typeof key === 'symbol' ? key : i;
        if (k.issues.length) {
          result.issues.push(key_issue('map', segment, k, input, ctx));
          return;
        }
        absorb(result, segment, v);
        out.set(k.value, v.value);
      });
      result.value = out;
      return result;
    });
  }
}

export function map<K extends AnySchema, V extends AnySchema>(key: K, value: V): MapSchema<K, V> {
  return new MapSchema({ kind: 'map', checks: [], key, value });
}

/* ---------------------------
 *  set
 * ---------------------------*/

export interface SetDef<E extends AnySchema> extends SchemaDef {
  readonly element: E;
}

export class SetSchema<E extends AnySchema> extends Schema<Set<output<E>>, Set<input<E>>, SetDef<E>> {
  protected parse_base(input: unknown, ctx: ParseContext): Outcome {
    if (!(input instanceof Set)) return invalid_type('set', input);
    const items: unknown[] = [...input];
    return then_all(
      items.map((item) => this.def.element.run(item, ctx)),
      (payloads) => {
        const result: ParsePayload = { value: undefined, issues: [] };
        const out = new Set<unknown>();
        payloads.forEach((child, i) => {
          absorb(result, i, child);
          out.add(child.value);
        });
        result.value = out;
        return result;
      },
    );
  }

  min(n: number, options?: CheckOptions): this {
    return this.check(size_check('set', 'min', n, options));
  }

  max(n: number, options?: CheckOptions): this {
    return this.check(size_check('set', 'max', n, options));
  }

  size(n: number, options?: CheckOptions): this {
    return this.check(size_check('set', 'exact', n, options));
  }
}

export function set<E extends AnySchema>(element: E): SetSchema<E> {
  return new SetSchema({ kind: 'set', checks: [], element });
}

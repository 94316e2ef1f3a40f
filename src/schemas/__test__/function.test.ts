/**
 * 函数 schema 与 codec UT
 *
 * 覆盖范围：
 * - implement 包装后的参数 / 返回值校验，失败抛 SchemaError
 * - implement_async 的异步校验
 * - 作为方法调用时保留 this
 * - codec 的双向转换与 async codec
 */
import { describe, it, expect } from 'vitest';

import * as s from '../../index';

/** 捕获同步抛出的错误 */
function capture(fn: () => unknown): unknown {
	try {
		fn();
	} catch (err) {
		return err;
	}
	return undefined;
}

describe('function', () => {
	const add = s.function({ input: s.tuple([s.number(), s.number()]), output: s.number() });

	it('should call through with validated arguments', () => {
		const sum = add.implement((a, b) => a + b);

		expect(sum(1, 2)).toBe(3);
	});

	it('should throw invalid_arguments for bad arguments', () => {
		const sum = add.implement((a, b) => a + b);
		const err = capture(() => Reflect.apply(sum, undefined, [1, 'x']));

		expect(err).toBeInstanceOf(s.SchemaError);
		expect(err).toMatchObject({
			issues: [
				{
					code: 'invalid_arguments',
					path: [],
					message: 'Invalid function arguments',
					issues: [{ code: 'invalid_type', path: [1] }],
				},
			],
		});
	});

	it('should throw invalid_return_type for bad results', () => {
		const broken = s.function({ input: s.tuple([]), output: s.number() }).implement(() => Number.NaN);

		expect(capture(() => broken())).toMatchObject({
			issues: [{ code: 'invalid_return_type', message: 'Invalid function return type' }],
		});
	});

	it('should forward the receiver to implemented methods', async () => {
		const scale = s
			.function({ input: s.tuple([s.number()]), output: s.number() })
			.implement(function (this: { factor: number }, n) {
				return n * this.factor;
			});
		const scale_async = s
			.function({ input: s.tuple([s.number()]), output: s.number() })
			.implement_async(async function (this: { factor: number }, n) {
				return n * this.factor;
			});
		const holder = { factor: 3, scale, scale_async };

		expect(holder.scale(2)).toBe(6);
		await expect(holder.scale_async(4)).resolves.toBe(12);
	});

	it('should wrap plain functions on parse', () => {
		const wrapped = s.function().parse(() => 1);

		expect(wrapped()).toBe(1);
		expect(s.function().safe_parse(1).error?.issues[0]).toMatchObject({ expected: 'function', received: 'number' });
		expect(add.parameters.items).toHaveLength(2);
		expect(add.return_type.kind).toBe('number');
	});

	it('should validate asynchronously with implement_async', async () => {
		const lookup = s
			.function({ input: s.tuple([s.string()]), output: s.string().refine(async (v) => v.length > 0) })
			.implement_async(async (key) => key.toUpperCase());

		await expect(lookup('ab')).resolves.toBe('AB');
		await expect(lookup('')).rejects.toBeInstanceOf(s.SchemaError);
	});
});

describe('codec', () => {
	const csv = s.codec(s.string(), s.array(s.string().min(1)), {
		decode: (text) => text.split(','),
		encode: (items) => items.join(','),
	});

	it('should validate both sides while decoding', () => {
		expect(csv.decode('a,b')).toEqual(['a', 'b']);
		expect(csv.safe_decode('a,,b').error?.issues[0].path).toEqual([1]);
	});

	it('should encode in reverse', () => {
		expect(csv.encode(['x', 'y'])).toBe('x,y');
		expect(s.encode(csv, ['z'])).toBe('z');
	});

	it('should reverse codecs nested in objects', () => {
		const row = s.object({ tags: csv });

		expect(row.decode({ tags: 'a,b' })).toEqual({ tags: ['a', 'b'] });
		expect(row.encode({ tags: ['a', 'b'] })).toEqual({ tags: 'a,b' });
	});

	it('should support async conversions under the async entry points', async () => {
		const slow = s.codec(s.string(), s.number(), {
			decode: async (text) => Number(text),
			encode: async (n) => String(n),
		});

		expect(slow.safe_decode('1').error?.issues[0].code).toBe('async_in_sync');
		await expect(slow.decode_async('42')).resolves.toBe(42);
		await expect(slow.encode_async(7)).resolves.toBe('7');
	});
});

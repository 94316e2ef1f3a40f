/**
 * 组合类 UT：union / discriminated_union / intersection / lazy / custom
 *
 * 覆盖范围：
 * - union 按声明顺序逐个尝试、取第一个成功分支（同步 / 异步一致），全部失败时只报一条 invalid_union
 * - discriminated_union 的派发、未命中与构造期错误
 * - intersection 合并输出与冲突位置
 * - lazy 递归结构的问题路径
 */
import { describe, it, expect, vi } from 'vitest';

import * as s from '../../index';

describe('union', () => {
	it('should return the first matching option in declared order', () => {
		const schema = s.union([s.string().transform((v) => v.length), s.string()]);

		expect(schema.parse('abc')).toBe(3);
		expect(s.union([s.string(), s.number()]).parse(1)).toBe(1);
	});

	it('should collect per-option issues in a single invalid_union', () => {
		const result = s.union([s.string(), s.number()]).safe_parse(true);
		const [issue] = result.error?.issues ?? [];

		expect(result.error?.issues).toHaveLength(1);
		expect(issue).toMatchObject({
			code: 'invalid_union',
			path: [],
			message: 'Invalid input',
			errors: [[{ expected: 'string', received: 'boolean' }], [{ expected: 'number', received: 'boolean' }]],
		});
	});

	it('should pick the declared-first success in async mode', async () => {
		const slow_ok = s.string().refine(async () => {
			await new Promise<void>((resolve) => setTimeout(resolve, 10));
			return true;
		});
		const schema = s.union([slow_ok.transform(() => 'slow'), s.string().transform(() => 'fast')]);

		await expect(schema.parse_async('x')).resolves.toBe('slow');
	});

	it('should not run later options once an earlier one matches', async () => {
		const later = vi.fn(async () => {
			throw new Error('later option ran');
		});
		const schema = s.union([s.string(), s.string().refine(later)]);

		expect(schema.safe_parse('x')).toEqual({ success: true, data: 'x' });
		await expect(schema.safe_parse_async('x')).resolves.toEqual({ success: true, data: 'x' });
		expect(later).not.toHaveBeenCalled();
	});

	it('should agree between sync and async modes', async () => {
		const schema = s.union([s.number(), s.string().transform((v) => v.length)]);

		expect(await schema.safe_parse_async('abc')).toEqual(schema.safe_parse('abc'));
		expect((await schema.safe_parse_async(true)).error?.issues).toEqual(schema.safe_parse(true).error?.issues);
	});
});

describe('discriminated_union', () => {
	const shape = s.discriminated_union('type', [
		s.object({ type: s.literal('circle'), radius: s.number() }),
		s.object({ type: s.enum(['square', 'box']), side: s.number() }),
	]);

	it('should dispatch on the discriminator value', () => {
		expect(shape.parse({ type: 'circle', radius: 1 })).toEqual({ type: 'circle', radius: 1 });
		expect(shape.parse({ type: 'box', side: 2 })).toEqual({ type: 'box', side: 2 });
	});

	it('should report the selected option issues directly', () => {
		const result = shape.safe_parse({ type: 'circle', radius: 'big' });

		expect(result.error?.issues.map((i) => [i.code, i.path])).toEqual([['invalid_type', ['radius']]]);
	});

	it('should require an object input', () => {
		expect(shape.safe_parse('circle').error?.issues[0]).toMatchObject({ expected: 'object', received: 'string' });
	});

	it('should validate options at construction', () => {
		expect(() => s.discriminated_union('type', [s.string()])).toThrow('option 0 is not an object schema');
		expect(() => s.discriminated_union('type', [s.object({ kind: s.literal('a') })])).toThrow(
			'option 0 has no "type" field',
		);
		expect(() => s.discriminated_union('type', [s.object({ type: s.string() })])).toThrow(
			'option 0 field "type" must be a literal or enum',
		);
		expect(() =>
			s.discriminated_union('type', [s.object({ type: s.literal('a') }), s.object({ type: s.literal('a') })]),
		).toThrow('duplicate discriminator value a for "type"');
	});
});

describe('intersection', () => {
	it('should merge both sides', () => {
		const schema = s.intersection(s.object({ a: s.string() }), s.object({ b: s.number() }));

		expect(schema.parse({ a: 'x', b: 1 })).toEqual({ a: 'x', b: 1 });
	});

	it('should keep keys named like Object.prototype members', () => {
		const schema = s.intersection(s.object({ a: s.string() }), s.object({ constructor: s.string() }));

		expect(schema.parse({ a: 'x', constructor: 'y' })).toEqual({ a: 'x', constructor: 'y' });
	});

	it('should report both sides when either fails', () => {
		const schema = s.intersection(s.object({ a: s.string() }), s.object({ b: s.number() }));

		expect(schema.safe_parse({}).error?.issues.map((i) => i.path)).toEqual([['a'], ['b']]);
	});

	it('should report where the outputs conflict', () => {
		const schema = s.intersection(
			s.object({ a: s.number().transform((n) => n + 1) }),
			s.object({ a: s.number() }),
		);

		expect(schema.safe_parse({ a: 1 }).error?.issues).toEqual([
			{ code: 'invalid_intersection', merge_path: ['a'], path: [], message: 'Intersection results could not be merged' },
		]);
	});
});

describe('lazy / custom', () => {
	interface Category {
		name: string;
		children: Category[];
	}

	const category: s.Schema<Category> = s.lazy(() =>
		s.object({ name: s.string(), children: s.array(category) }),
	);

	it('should validate recursive structures', () => {
		const tree = { name: 'root', children: [{ name: 'leaf', children: [] }] };

		expect(category.parse(tree)).toEqual(tree);
		expect(
			category.safe_parse({ name: 'root', children: [{ name: 1, children: [] }] }).error?.issues[0].path,
		).toEqual(['children', 0, 'name']);
	});

	it('should run custom predicates', () => {
		const even = s.custom<number>((v) => typeof v === 'number' && v % 2 === 0, 'must be even');

		expect(even.parse(2)).toBe(2);
		expect(even.safe_parse(3).error?.issues[0]).toMatchObject({ code: 'custom', message: 'must be even' });
	});

	it('should check class instances', () => {
		class Money {}

		expect(s.instance_of(Money).safe_parse(new Money()).success).toBe(true);
		expect(s.instance_of(Money).safe_parse({}).error?.issues[0].message).toBe('Input not instance of Money');
	});

	it('should await async custom predicates', async () => {
		const schema = s.custom<string>(async (v) => v === 'ok');

		expect(schema.safe_parse('ok').error?.issues[0].code).toBe('async_in_sync');
		await expect(schema.parse_async('ok')).resolves.toBe('ok');
	});
});

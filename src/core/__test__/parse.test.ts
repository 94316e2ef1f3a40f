/**
 * 校验入口的端到端 UT
 *
 * 覆盖范围：
 * - 多字段同时出错时一次报出全部问题，路径逐层前插
 * - default / catch / enum / discriminated_union 的典型结果
 * - codec 往返、sync 调用遇到异步步骤、abort / abort_early
 * - 异步模式下问题顺序与声明顺序一致
 * - 消息优先级：检查级 → 单次调用 → 全局 → 内置
 */
import { afterEach, describe, expect, it } from 'vitest';

import * as s from '../../index';

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe('safe_parse: collect-all', () => {
	it('should report one invalid_type issue per bad field', () => {
		const user = s.object({ username: s.string(), xp: s.number() });
		const result = user.safe_parse({ username: 42, xp: '100' });

		expect(result.success).toBe(false);
		expect(result.error?.issues).toEqual([
			{
				code: 'invalid_type',
				expected: 'string',
				received: 'number',
				path: ['username'],
				message: 'Invalid input: expected string, received number',
			},
			{
				code: 'invalid_type',
				expected: 'number',
				received: 'string',
				path: ['xp'],
				message: 'Invalid input: expected number, received string',
			},
		]);
	});

	it('should summarize every issue in the thrown error message', () => {
		const user = s.object({ username: s.string(), xp: s.number() });

		expect(() => user.parse({ username: 42, xp: '100' })).toThrow(s.SchemaError);
		const result = user.safe_parse({ username: 42, xp: '100' });
		expect(result.error?.message).toBe(
			'Validation failed with 2 issue(s):\n' +
				'  - [invalid_type] /username : Invalid input: expected string, received number\n' +
				'  - [invalid_type] /xp : Invalid input: expected number, received string',
		);
	});

	it('should prefix nested paths as recursion unwinds', () => {
		const schema = s.object({ users: s.array(s.object({ name: s.string() })) });
		const result = schema.safe_parse({ users: [{ name: 'a' }, { name: 1 }] });

		expect(result.error?.issues.map((i) => i.path)).toEqual([['users', 1, 'name']]);
	});

	it('should expose the same behaviour through free functions', () => {
		const result = s.safe_parse(s.number(), 3);
		expect(result).toEqual({ success: true, data: 3 });
		expect(s.parse(s.string(), 'x')).toBe('x');
	});
});

describe('defaults / catch / enum / discriminated_union', () => {
	it('should substitute the default for undefined input', () => {
		expect(s.string().default('x').safe_parse(undefined)).toEqual({ success: true, data: 'x' });
	});

	it('should recover from failure with catch', () => {
		expect(s.number().catch(42).safe_parse('bad')).toEqual({ success: true, data: 42 });
	});

	it('should report a single invalid_literal for an unknown enum value', () => {
		const result = s.enum(['a', 'b']).safe_parse('c');

		expect(result.error?.issues).toEqual([
			{
				code: 'invalid_literal',
				expected: ['a', 'b'],
				received: 'string',
				path: [],
				message: 'Invalid option: expected one of "a"|"b"',
			},
		]);
	});

	it('should report exactly one invalid_union at the discriminator for an unknown tag', () => {
		const shape = s.discriminated_union('type', [
			s.object({ type: s.literal('circle'), radius: s.number() }),
			s.object({ type: s.literal('square'), side: s.number() }),
		]);
		const result = shape.safe_parse({ type: 'triangle' });

		expect(result.error?.issues).toEqual([
			{
				code: 'invalid_union',
				errors: [],
				discriminator: 'type',
				note: 'No matching discriminator',
				path: ['type'],
				message: 'Invalid input: no option matches discriminator "type"',
			},
		]);
	});
});

describe('codec', () => {
	const iso_date = s.codec(s.string().datetime(), s.date(), {
		decode: (text) => new Date(text),
		encode: (date) => date.toISOString(),
	});

	it('should round-trip decode and encode', () => {
		const text = '2024-01-02T03:04:05.000Z';
		const decoded = iso_date.decode(text);

		expect(decoded).toBeInstanceOf(Date);
		expect(decoded.getTime()).toBe(Date.UTC(2024, 0, 2, 3, 4, 5));
		expect(iso_date.encode(decoded)).toBe(text);
	});

	it('should validate the encoded side as well', () => {
		const result = iso_date.safe_encode(new Date('not a date'));

		expect(result.error?.issues[0]).toMatchObject({ code: 'invalid_type', expected: 'date', received: 'invalid_date' });
	});
});

describe('async_in_sync', () => {
	it('should fail a sync call that meets an async refinement with one issue', () => {
		const schema = s.string().refine(async (v) => v.length > 0);
		const result = schema.safe_parse('a');

		expect(result.error?.issues).toEqual([
			{
				code: 'async_in_sync',
				path: [],
				message: 'Encountered an asynchronous step during a synchronous parse; use parse_async()',
			},
		]);
	});

	it('should run the same schema under parse_async', async () => {
		const schema = s.string().refine(async (v) => v.length > 0);

		await expect(schema.parse_async('a')).resolves.toBe('a');
		const failed = await schema.safe_parse_async('');
		expect(failed.error?.issues.map((i) => i.code)).toEqual(['custom']);
	});

	it('should not hide async steps nested deep inside objects', () => {
		const schema = s.object({ inner: s.object({ v: s.string().transform(async (v) => v.length) }) });

		expect(schema.safe_parse({ inner: { v: 'abc' } }).error?.issues[0].code).toBe('async_in_sync');
	});
});

describe('abort / abort_early', () => {
	it('should run later checks after a non-abort failure', () => {
		const result = s.string().min(5).regex(/^a/).safe_parse('xyz');

		expect(result.error?.issues.map((i) => i.message)).toEqual([
			'Too small: expected string to have >=5 characters',
			'Invalid string: must match pattern /^a/',
		]);
	});

	it('should stop the chain at an abort check', () => {
		const result = s.string().min(5, { abort: true }).regex(/^a/).safe_parse('xyz');

		expect(result.error?.issues.map((i) => i.code)).toEqual(['too_small']);
	});

	it('should stop only the failing branch with abort_early', () => {
		const schema = s.object({ a: s.string().min(5).regex(/^a/), b: s.number() });
		const result = schema.safe_parse({ a: 'xyz', b: 'x' }, { abort_early: true });

		expect(result.error?.issues.map((i) => [i.code, i.path])).toEqual([
			['too_small', ['a']],
			['invalid_type', ['b']],
		]);
	});
});

describe('async ordering', () => {
	it('should keep declared order regardless of completion order', async () => {
		const schema = s.object({
			slow: s.string().refine(async () => {
				await delay(20);
				return false;
			}, 'slow failed'),
			fast: s.string().refine(async () => false, 'fast failed'),
		});
		const result = await schema.safe_parse_async({ slow: 'a', fast: 'b' });

		expect(result.error?.issues.map((i) => [i.path, i.message])).toEqual([
			[['slow'], 'slow failed'],
			[['fast'], 'fast failed'],
		]);
	});

	it('should keep array element order in async mode', async () => {
		const item = s.number().refine(async (n) => {
			await delay(n);
			return n < 5;
		});
		const result = await s.array(item).safe_parse_async([30, 1, 10]);

		expect(result.error?.issues.map((i) => i.path)).toEqual([[0], [2]]);
	});
});

describe('message precedence', () => {
	afterEach(() => {
		s.reset_config();
	});

	it('should prefer the per-check message', () => {
		const result = s.string().min(3, 'too short').safe_parse('a', { error_map: () => 'per call' });

		expect(result.error?.issues[0].message).toBe('too short');
	});

	it('should use the per-call error map before the global one', () => {
		s.configure({ error_map: () => 'global' });
		const result = s.number().safe_parse('x', {
			error_map: (issue) => (issue.code === 'invalid_type' ? `need ${issue.expected}` : undefined),
		});

		expect(result.error?.issues[0].message).toBe('need number');
	});

	it('should defer to the global map when the per-call map returns undefined', () => {
		s.configure({ error_map: () => 'global' });
		const result = s.number().safe_parse('x', { error_map: () => undefined });

		expect(result.error?.issues[0].message).toBe('global');
	});

	it('should accept a message function on a check', () => {
		const result = s.number().max(3, { message: (issue) => `bad ${issue.code}` }).safe_parse(4);

		expect(result.error?.issues[0].message).toBe('bad too_big');
	});

	it('should attach the offending input only when report_input is on', () => {
		expect(s.number().safe_parse('x').error?.issues[0].input).toBeUndefined();
		expect(s.number().safe_parse('x', { report_input: true }).error?.issues[0].input).toBe('x');

		s.configure({ report_input: true });
		expect(s.number().safe_parse('y').error?.issues[0].input).toBe('y');
	});
});

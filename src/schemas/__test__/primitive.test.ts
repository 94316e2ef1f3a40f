/**
 * 标量种类 UT：string / number / bigint / boolean / date / literal / enum / coerce
 *
 * 覆盖范围：
 * - 种类校验失败时的 expected / received
 * - 长度、比较、倍数、格式等约束及其默认消息
 * - 改写类检查（trim / 大小写）在后续检查之前生效
 * - coerce 的宿主转换，以及转换失败时回落到 invalid_type
 */
import { describe, it, expect } from 'vitest';

import * as s from '../../index';

describe('string', () => {
	it('should reject non-strings with invalid_type', () => {
		const result = s.string().safe_parse(1);

		expect(result.error?.issues[0]).toMatchObject({ code: 'invalid_type', expected: 'string', received: 'number' });
	});

	it('should report exact length with no comparator in the message', () => {
		const result = s.string().length(2).safe_parse('abc');

		expect(result.error?.issues).toEqual([
			{
				code: 'too_big',
				origin: 'string',
				maximum: 2,
				inclusive: true,
				exact: true,
				path: [],
				message: 'Too big: expected string to have 2 characters',
			},
		]);
	});

	it('should validate common formats', () => {
		expect(s.string().email().safe_parse('user@example.com').success).toBe(true);
		expect(s.string().email().safe_parse('not-an-email').error?.issues[0]).toMatchObject({
			code: 'invalid_format',
			format: 'email',
			message: 'Invalid email',
		});
		expect(s.string().uuid().safe_parse('123e4567-e89b-12d3-a456-426614174000').success).toBe(true);
		expect(s.string().ipv4().safe_parse('192.168.0.1').success).toBe(true);
		expect(s.string().ipv4().safe_parse('256.1.1.1').success).toBe(false);
		expect(s.string().url().safe_parse('https://example.com').success).toBe(true);
		expect(s.string().url().safe_parse('nope').success).toBe(false);
		expect(s.string().iso_date().safe_parse('2024-02-29').success).toBe(true);
		expect(s.string().iso_date().safe_parse('2023-02-29').success).toBe(false);
		expect(s.string().base64().safe_parse('aGVsbG8=').success).toBe(true);
	});

	it('should describe prefix / pattern failures', () => {
		expect(s.string().starts_with('ab').safe_parse('xy').error?.issues[0].message).toBe(
			'Invalid string: must start with "ab"',
		);
		expect(s.string().regex(/^\d+$/).safe_parse('x').error?.issues[0]).toMatchObject({
			format: 'regex',
			pattern: '/^\\d+$/',
		});
	});

	it('should not keep regex state between parses', () => {
		const schema = s.string().regex(/a/g);

		expect(schema.safe_parse('a').success).toBe(true);
		expect(schema.safe_parse('a').success).toBe(true);
	});

	it('should apply rewrites before later checks', () => {
		expect(s.string().trim().to_lower_case().parse('  HeLLo ')).toBe('hello');
		expect(s.string().trim().min(3).safe_parse('  a  ').error?.issues[0].code).toBe('too_small');
	});

	it('should reject negative or fractional size bounds at construction', () => {
		expect(() => s.string().min(-1)).toThrow(s.SchemaDefinitionError);
		expect(() => s.array(s.string()).max(1.5)).toThrow(s.SchemaDefinitionError);
	});
});

describe('number / bigint', () => {
	it('should reject NaN and infinities', () => {
		expect(s.number().safe_parse(Number.NaN).error?.issues[0]).toMatchObject({ received: 'nan' });
		expect(s.number().safe_parse(Number.POSITIVE_INFINITY).error?.issues[0]).toMatchObject({ received: 'infinity' });
	});

	it('should report non-integers as expected int', () => {
		expect(s.int().safe_parse(1.5).error?.issues[0].message).toBe('Invalid input: expected int, received number');
	});

	it('should format exclusive and inclusive bounds', () => {
		expect(s.number().gt(5).safe_parse(5).error?.issues[0].message).toBe('Too small: expected number to be >5');
		expect(s.number().max(10).safe_parse(11).error?.issues[0].message).toBe('Too big: expected number to be <=10');
		expect(s.number().positive().nonnegative().safe_parse(-1).error?.issues.map((i) => i.code)).toEqual([
			'too_small',
			'too_small',
		]);
	});

	it('should compare decimal steps without float drift', () => {
		expect(s.number().multiple_of(0.1).safe_parse(0.3).success).toBe(true);
		expect(s.number().multiple_of(0.1).safe_parse(0.35).error?.issues[0].message).toBe(
			'Invalid number: must be a multiple of 0.1',
		);
		expect(() => s.number().multiple_of(0)).toThrow(s.SchemaDefinitionError);
	});

	it('should format bigint bounds with the n suffix', () => {
		const result = s.bigint().positive().safe_parse(BigInt(0));

		expect(result.error?.issues[0].message).toBe('Too small: expected bigint to be >0n');
		expect(s.bigint().multiple_of(BigInt(3)).safe_parse(BigInt(9)).success).toBe(true);
	});
});

describe('date', () => {
	it('should reject invalid dates', () => {
		expect(s.date().safe_parse(new Date('invalid')).error?.issues[0]).toMatchObject({
			expected: 'date',
			received: 'invalid_date',
		});
	});

	it('should print date bounds as ISO strings', () => {
		const schema = s.date().min(new Date('2024-01-01T00:00:00.000Z'));
		const result = schema.safe_parse(new Date('2023-12-31T00:00:00.000Z'));

		expect(result.error?.issues[0].message).toBe('Too small: expected date to be >=2024-01-01T00:00:00.000Z');
	});
});

describe('literal / enum', () => {
	it('should accept any of several literal values', () => {
		const schema = s.literal(['on', 'off', 1]);

		expect(schema.parse(1)).toBe(1);
		expect(schema.safe_parse('x').error?.issues[0].message).toBe('Invalid option: expected one of "on"|"off"|1');
		expect(s.literal('on').safe_parse('x').error?.issues[0].message).toBe('Invalid input: expected "on"');
	});

	it('should match NaN literals', () => {
		expect(s.literal(Number.NaN).safe_parse(Number.NaN).success).toBe(true);
	});

	it('should refuse empty enums and literals', () => {
		expect(() => s.enum([])).toThrow(s.SchemaDefinitionError);
		expect(() => s.literal([])).toThrow(s.SchemaDefinitionError);
	});

	it('should derive narrower enums', () => {
		const color = s.enum(['red', 'green', 'blue']);

		expect(color.enum).toEqual({ red: 'red', green: 'green', blue: 'blue' });
		expect(color.extract(['red']).options).toEqual(['red']);
		expect(color.exclude(['red']).options).toEqual(['green', 'blue']);
	});

	it('should drop numeric reverse mappings from native enums', () => {
		// TS 数值 enum 编译后的形状
		const Level = { Low: 0, High: 1, 0: 'Low', 1: 'High' } as const;
		const schema = s.native_enum(Level);

		expect(schema.options).toEqual([0, 1]);
		expect(schema.safe_parse('Low').success).toBe(false);
	});
});

describe('coerce', () => {
	it('should convert with host constructors', () => {
		expect(s.coerce.string().parse(12)).toBe('12');
		expect(s.coerce.number().parse('42')).toBe(42);
		expect(s.coerce.boolean().parse('')).toBe(false);
		expect(s.coerce.bigint().parse('10')).toBe(BigInt(10));
		expect(s.coerce.date().parse('2024-01-01T00:00:00.000Z').getTime()).toBe(Date.UTC(2024, 0, 1));
	});

	it('should fall back to invalid_type when conversion fails', () => {
		expect(s.coerce.number().safe_parse('abc').error?.issues[0]).toMatchObject({ received: 'nan' });
		expect(s.coerce.bigint().safe_parse('1.5').error?.issues[0]).toMatchObject({
			code: 'invalid_type',
			expected: 'bigint',
			received: 'string',
		});
	});
});

describe('guards', () => {
	it('should check the simple kinds', () => {
		expect(s.null().parse(null)).toBeNull();
		expect(s.undefined().safe_parse(null).success).toBe(false);
		expect(s.nan().safe_parse(1).error?.issues[0].message).toBe('Invalid input: expected nan, received number');
		expect(s.never().safe_parse(1).success).toBe(false);
		expect(s.unknown().parse({ a: 1 })).toEqual({ a: 1 });
		expect(s.symbol().safe_parse(Symbol('x')).success).toBe(true);
	});
});

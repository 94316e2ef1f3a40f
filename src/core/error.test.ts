/**
 * 错误辅助函数 UT：format_path / flatten_error / treeify_error / prettify_error / configure
 */
import { afterEach, describe, it, expect } from 'vitest';

import * as s from '../index';

/** 取出失败结果里的错误；成功时直接让用例失败 */
function failure(result: s.SafeParseResult<unknown>): s.SchemaError {
	if (result.success) throw new Error('expected the parse to fail');
	return result.error;
}

describe('format_path', () => {
	it('should render JSON Pointer paths', () => {
		expect(s.format_path([])).toBe('/');
		expect(s.format_path(['users', 0, 'name'])).toBe('/users/0/name');
		expect(s.format_path(['a/b', 'c~d'])).toBe('/a~1b/c~0d');
	});
});

describe('flatten_error', () => {
	it('should group messages by their first key', () => {
		const err = failure(s.object({ name: s.string(), age: s.number() }).safe_parse({ name: 1, age: 'x' }));

		expect(s.flatten_error(err)).toEqual({
			form_errors: [],
			field_errors: {
				name: ['Invalid input: expected string, received number'],
				age: ['Invalid input: expected number, received string'],
			},
		});
		expect(err.flatten()).toEqual(s.flatten_error(err));
	});

	it('should keep root issues as form errors', () => {
		const err = failure(s.object({ a: s.string() }).refine(() => false, 'bad form').safe_parse({ a: 'x' }));

		expect(s.flatten_error(err)).toEqual({ form_errors: ['bad form'], field_errors: {} });
	});

	it('should group "__proto__" keys without touching the prototype', () => {
		const input: unknown = JSON.parse('{"__proto__": "x"}');
		const flat = s.flatten_error(failure(s.record(s.string(), s.number()).safe_parse(input)));

		expect(Object.keys(flat.field_errors)).toEqual(['__proto__']);
		expect(flat.field_errors['__proto__']).toEqual(['Invalid input: expected number, received string']);
		expect(Object.getPrototypeOf(flat.field_errors)).toBe(Object.prototype);
	});
});

describe('treeify_error', () => {
	it('should nest issues into properties and items', () => {
		const err = failure(s.object({ list: s.array(s.number()) }).safe_parse({ list: [1, 'x'] }));

		const tree = s.treeify_error(err);
		const items = tree.properties?.list.items ?? [];

		expect(tree.errors).toEqual([]);
		expect(tree.properties?.list.errors).toEqual([]);
		// 只建出错的下标，未出错的位置是空洞
		expect(items).toHaveLength(2);
		expect(0 in items).toBe(false);
		expect(items[1]).toEqual({ errors: ['Invalid input: expected number, received string'] });
	});

	it('should keep "__proto__" keys as ordinary properties', () => {
		const input: unknown = JSON.parse('{"__proto__": "x"}');
		const err = failure(s.record(s.string(), s.number()).safe_parse(input));
		const tree = s.treeify_error(err);

		expect(Object.keys(tree.properties ?? {})).toEqual(['__proto__']);
		expect(tree.properties?.['__proto__'].errors).toEqual(['Invalid input: expected number, received string']);
	});

	it('should file non-index numeric segments under properties', () => {
		const err = failure(s.map(s.number(), s.string()).safe_parse(new Map([[-1, 5], [1.5, 6]])));
		const tree = s.treeify_error(err);

		expect(tree.items).toBeUndefined();
		expect(Object.keys(tree.properties ?? {})).toEqual(['-1', '1.5']);
		expect(tree.properties?.['-1'].errors).toEqual(['Invalid input: expected string, received number']);
	});
});

describe('prettify_error', () => {
	it('should print one block per issue, shallow paths first', () => {
		const schema = s.object({ list: s.array(s.number()), name: s.string() });
		const err = failure(schema.safe_parse({ list: [1, 'x'], name: 1 }));

		expect(s.prettify_error(err)).toBe(
			[
				'✖ Invalid input: expected string, received number',
				'  → at name',
				'✖ Invalid input: expected number, received string',
				'  → at list[1]',
			].join('\n'),
		);
	});

	it('should omit the location line for root issues', () => {
		const err = failure(s.string().safe_parse(1));

		expect(s.prettify_error(err)).toBe('✖ Invalid input: expected string, received number');
	});
});

describe('configure', () => {
	afterEach(() => {
		s.reset_config();
	});

	it('should merge patches and return a frozen snapshot', () => {
		const snapshot = s.configure({ report_input: true });

		expect(snapshot.report_input).toBe(true);
		expect(Object.isFrozen(snapshot)).toBe(true);
		expect(s.get_config().report_input).toBe(true);
	});

	it('should restore defaults on reset', () => {
		s.configure({ report_input: true, error_map: () => 'x' });
		s.reset_config();

		expect(s.get_config()).toEqual({ report_input: false });
	});

	it('should localize messages through a global error map', () => {
		s.configure({
			error_map: (issue) => (issue.code === 'too_small' ? `至少 ${String(issue.minimum)} 个字符` : undefined),
		});

		expect(s.string().min(2).safe_parse('a').error?.issues[0].message).toBe('至少 2 个字符');
		expect(s.string().safe_parse(1).error?.issues[0].message).toBe('Invalid input: expected string, received number');
	});
});

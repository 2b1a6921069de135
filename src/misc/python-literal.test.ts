import { describe, expect, test } from 'vitest';
import { renderPythonLiteral, reprNumber, reprString } from './python-literal.js';

describe('reprString', () => {
	test('plain', () => {
		expect(reprString('Monday')).toBe("'Monday'");
	});

	test('single quote switches to double quotes', () => {
		expect(reprString("aujourd'hui")).toBe('"aujourd\'hui"');
	});

	test('both quotes keep single quotes', () => {
		expect(reprString(`it's "x"`)).toBe(`'it\\'s "x"'`);
	});

	test('backslash and control characters', () => {
		expect(reprString('a\\b\nc\td')).toBe("'a\\\\b\\nc\\td'");
	});

	test('non-printable separators are escaped', () => {
		expect(reprString('{0}\u00a0h')).toBe("'{0}\\xa0h'");
		expect(reprString('h:mm\u202fa')).toBe("'h:mm\\u202fa'");
		expect(reprString('\u200e-{0}')).toBe("'\\u200e-{0}'");
	});

	test('printable non-ASCII characters are kept', () => {
		expect(reprString('月曜日')).toBe("'月曜日'");
		expect(reprString('éé ü')).toBe("'éé ü'");
	});
});

describe('reprNumber', () => {
	test('integers', () => {
		expect(reprNumber(0)).toBe('0');
		expect(reprNumber(12)).toBe('12');
	});

	test('non-finite values are rejected', () => {
		expect(() => reprNumber(Number.NaN)).toThrowError(RangeError);
	});
});

describe('renderPythonLiteral', () => {
	test('scalars', () => {
		expect(renderPythonLiteral(null)).toBe('None');
		expect(renderPythonLiteral(true)).toBe('True');
		expect(renderPythonLiteral(false)).toBe('False');
		expect(renderPythonLiteral(3)).toBe('3');
	});

	test('empty dict', () => {
		expect(renderPythonLiteral({})).toBe('{}');
		expect(renderPythonLiteral(new Map())).toBe('{}');
	});

	test('nested dict keeps insertion order and indents per depth', () => {
		const value = {
			days: {
				wide: new Map([
					[0, 'Monday'],
					[1, 'Tuesday'],
				]),
			},
			week_data: { min_days: 1 },
		};

		expect(renderPythonLiteral(value)).toBe(
			[
				'{',
				"    'days': {",
				"        'wide': {",
				"            0: 'Monday',",
				"            1: 'Tuesday',",
				'        },',
				'    },',
				"    'week_data': {",
				"        'min_days': 1,",
				'    },',
				'}',
			].join('\n'),
		);
	});

	test('depth shifts the whole block', () => {
		expect(renderPythonLiteral({ a: 'b' }, 2)).toBe("{\n        'a': 'b',\n    }");
	});
});

test('undefined values are skipped', () => {
	expect(renderPythonLiteral({ one: '{0} year', per: undefined })).toBe("{\n    'one': '{0} year',\n}");
});

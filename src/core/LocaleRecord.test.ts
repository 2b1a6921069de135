import { describe, expect, test, vi } from 'vitest';
import { buildLocaleRecord } from './LocaleRecord.js';
import { renderPythonLiteral } from '../misc/python-literal.js';
import { englishLocaleData } from '../test-utils.js';
import Logger from '../misc/logger.js';

describe('buildLocaleRecord', () => {
	test('units drop `per` and keep the other forms', () => {
		const record = buildLocaleRecord(englishLocaleData());

		expect(record.translations.units).toEqual({
			year: { one: '{0} year', other: '{0} years' },
			second: { one: '{0} second', other: '{0} seconds' },
		});
	});

	test('missing units are reported and skipped', () => {
		const logger = new Logger('test');
		const warn = vi.spyOn(logger, 'warn');

		buildLocaleRecord(englishLocaleData(), logger);

		expect(warn.mock.calls.map(([message]) => message)).toEqual(
			['month', 'week', 'day', 'hour', 'minute', 'microsecond'].map(
				(unit) => `en has no long pattern for duration-${unit}`,
			),
		);
	});

	test('relative keeps only whitelisted fields in a fixed order', () => {
		const record = buildLocaleRecord(englishLocaleData());

		expect(Object.keys(record.translations.relative)).toEqual(['year', 'day']);
	});

	test('days are sorted by weekday and only the format context is kept', () => {
		const record = buildLocaleRecord(englishLocaleData());

		expect(renderPythonLiteral(record.translations.days)).toBe(
			['{', "    'abbreviated': {", "        0: 'Mon',", "        6: 'Sun',", '    },', '}'].join('\n'),
		);
	});

	test('day periods and week data', () => {
		const record = buildLocaleRecord(englishLocaleData());

		expect(record.translations.day_periods).toEqual({ am: 'am', pm: 'pm' });
		expect(record.translations.week_data).toEqual({
			min_days: 1,
			first_day: 6,
			weekend_start: 5,
			weekend_end: 6,
		});
	});

	test('rules are parsed', () => {
		const record = buildLocaleRecord(englishLocaleData());

		expect(record.plural.select(1)).toBe('one');
		expect(record.plural.select(1.5)).toBe('other');
		expect(record.ordinal.select(22)).toBe('two');
		expect(record.ordinal.select(13)).toBe('other');
	});
});

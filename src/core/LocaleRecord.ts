import { PluralRules } from '../plural/index.js';
import { mapValues, omitKeys, pickInOrder } from '../misc/typed-utils.js';
import type { PythonDict } from '../misc/python-literal.js';
import type { LocaleData, NameTable, UnitPattern } from '../data/LocaleDataSource.js';
import type Logger from '../misc/logger.js';

/** 書き出す単位。`duration-<unit>`の`long`を使う。 */
export const UNITS = [
	'year',
	'month',
	'week',
	'day',
	'hour',
	'minute',
	'second',
	'microsecond',
] as const;

/** 書き出す相対時間の項目 */
export const RELATIVE_FIELDS = ['year', 'month', 'week', 'day', 'hour', 'minute', 'second'] as const;

export type LocaleRecord = {
	id: string;
	plural: PluralRules;
	ordinal: PluralRules;
	/** `locale.py`の`translations`にそのまま書き出される辞書 */
	translations: {
		days: PythonDict;
		months: PythonDict;
		units: PythonDict;
		relative: PythonDict;
		day_periods: PythonDict;
		week_data: PythonDict;
	};
};

const sortByKey = (table: NameTable): NameTable =>
	new Map([...table.entries()].sort(([a], [b]) => a - b));

const widthsOf = (
	names: LocaleData['days'],
	sort: (table: NameTable) => NameTable,
): Record<string, NameTable> => {
	return mapValues(names['format'] ?? {}, (table) => sort(table));
};

/**
 * データ源から得た情報を、生成するモジュールの形に組み替える。
 */
export const buildLocaleRecord = (data: LocaleData, logger?: Logger): LocaleRecord => {
	const units: Record<string, UnitPattern> = {};
	for (const unit of UNITS) {
		const pattern = data.unitPatterns[`duration-${unit}`]?.['long'];
		if (pattern === undefined) {
			logger?.warn(`${data.id} has no long pattern for duration-${unit}`);
			continue;
		}
		units[unit] = omitKeys(pattern, ['per']);
	}

	const relative = pickInOrder(data.dateFields, RELATIVE_FIELDS);

	return {
		id: data.id,
		plural: PluralRules.parse(data.pluralRules),
		ordinal: PluralRules.parse(data.ordinalRules),
		translations: {
			days: widthsOf(data.days, sortByKey),
			months: widthsOf(data.months, (table) => table),
			units,
			relative,
			day_periods: data.dayPeriods['format']?.['wide'] ?? {},
			week_data: {
				min_days: data.weekData.minDays,
				first_day: data.weekData.firstDay,
				weekend_start: data.weekData.weekendStart,
				weekend_end: data.weekData.weekendEnd,
			},
		},
	};
};

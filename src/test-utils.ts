import type {
	LocaleData,
	LocaleDataSource,
	TimezoneRegistry,
} from './data/LocaleDataSource.js';

export const englishLocaleData = (id = 'en', overrides: Partial<LocaleData> = {}): LocaleData => ({
	id,
	pluralRules: { one: 'i = 1 and v = 0' },
	ordinalRules: {
		one: 'n % 10 = 1 and n % 100 != 11',
		two: 'n % 10 = 2 and n % 100 != 12',
		few: 'n % 10 = 3 and n % 100 != 13',
	},
	days: {
		format: {
			abbreviated: new Map([
				[6, 'Sun'],
				[0, 'Mon'],
			]),
		},
		'stand-alone': {
			narrow: new Map([[0, 'M']]),
		},
	},
	months: {
		format: {
			wide: new Map([
				[1, 'January'],
				[2, 'February'],
			]),
		},
	},
	unitPatterns: {
		'duration-year': {
			long: { one: '{0} year', other: '{0} years', per: '{0} per year' },
			short: { one: '{0} yr', other: '{0} yrs' },
		},
		'duration-second': {
			long: { one: '{0} second', other: '{0} seconds' },
		},
	},
	dateFields: {
		'year-short': { future: { other: 'in {0} yr.' } },
		day: {
			future: { one: 'in {0} day', other: 'in {0} days' },
			past: { one: '{0} day ago', other: '{0} days ago' },
		},
		year: { future: { one: 'in {0} year', other: 'in {0} years' } },
		quarter: { future: { other: 'in {0} quarters' } },
	},
	dayPeriods: {
		format: {
			wide: { am: 'am', pm: 'pm' },
			narrow: { am: 'a', pm: 'p' },
		},
	},
	weekData: { minDays: 1, firstDay: 6, weekendStart: 5, weekendEnd: 6 },
	...overrides,
});

/** テスト用のメモリ上のデータ源 */
export class InMemoryDataSource implements LocaleDataSource, TimezoneRegistry {
	public readonly resolved: string[] = [];

	constructor(
		private readonly locales: readonly LocaleData[],
		private readonly zones: ReadonlyMap<string, string> = new Map(),
	) {}

	public resolve(id: string): LocaleData | undefined {
		this.resolved.push(id);
		return this.locales.find((locale) => locale.id === id);
	}

	public windowsZones(): ReadonlyMap<string, string> {
		return this.zones;
	}
}

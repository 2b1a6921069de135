import * as fs from 'node:fs';
import { createRequire } from 'node:module';
import { dirname, join } from 'node:path';
import { isIncludes, mapValues, omitBy } from '../misc/typed-utils.js';
import { isWellFormedLocaleId, normalizeLocaleId, splitLocaleId } from '../misc/locale-id.js';
import { PLURAL_CATEGORIES, type PluralRuleSource } from '../plural/index.js';
import {
	DateFieldsSchema,
	DefaultContentSchema,
	GregorianCalendarSchema,
	LikelySubtagsSchema,
	PluralsSchema,
	UnitsSchema,
	WeekDataSchema,
	WindowsZonesSchema,
} from './schemas.js';
import {
	WEEKDAYS,
	type CalendarNames,
	type LocaleData,
	type LocaleDataSource,
	type RelativeTimeField,
	type RelativeTimePatterns,
	type TimezoneRegistry,
	type UnitPattern,
	type UnitPatterns,
	type WeekData,
} from './LocaleDataSource.js';
import type { ValueOf } from 'type-fest';
import type { z } from 'zod';

/** cldr-jsonの各パッケージのディレクトリ */
export type CldrPackageDirs = {
	/** `cldr-core` */
	core: string;
	/** `cldr-dates-full` */
	dates: string;
	/** `cldr-units-full` */
	units: string;
};

/** ロケールごとのデータ（`main.<locale>`） */
type DateFields = ValueOf<z.infer<typeof DateFieldsSchema>['main']>['dates']['fields'];
type Units = ValueOf<z.infer<typeof UnitsSchema>['main']>['units'];

const WORLD = '001';

const readJson = <T extends z.ZodType>(path: string, schema: T): z.infer<T> => {
	const content = fs.readFileSync(path, 'utf-8');
	const data: unknown = JSON.parse(content);
	return schema.parse(data);
};

const weekdayIndex = (day: string): number => {
	const index = WEEKDAYS.findIndex((weekday) => weekday === day);
	if (index === -1) throw new Error(`Unknown weekday '${day}' in CLDR data`);
	return index;
};

/** `pluralRule-count-one` → `one`のように、接頭辞つきのキーから複数形カテゴリを取り出す。 */
const byCategory = (
	source: Readonly<Record<string, unknown>>,
	prefix: string,
): PluralRuleSource => {
	const result: PluralRuleSource = {};
	for (const [key, value] of Object.entries(source)) {
		if (!key.startsWith(prefix) || typeof value !== 'string') continue;
		const category = key.slice(prefix.length);
		if (isIncludes(PLURAL_CATEGORIES, category)) result[category] = value;
	}
	return result;
};

const toNameTables = (
	contexts: Record<string, Record<string, Record<string, string>>>,
	toIndex: (key: string) => number,
): CalendarNames => {
	return mapValues(contexts, (widths) =>
		mapValues(
			widths,
			(names) => new Map(Object.entries(names).map(([key, name]) => [toIndex(key), name] as const)),
		),
	);
};

const toUnitPattern = (unit: Readonly<Record<string, unknown>>): UnitPattern => {
	const pattern: Partial<Record<string, string>> = byCategory(unit, 'unitPattern-count-');
	const per = unit['perUnitPattern'];
	if (typeof per === 'string') pattern['per'] = per;
	return pattern;
};

const toRelativeTimeField = (
	field: ValueOf<DateFields>,
): RelativeTimeField | undefined => {
	const patterns = (key: string): RelativeTimePatterns | undefined => {
		const value = field[key];
		if (value === undefined || typeof value === 'string') return undefined;
		return byCategory(value, 'relativeTimePattern-count-');
	};

	const future = patterns('relativeTime-type-future');
	const past = patterns('relativeTime-type-past');
	if (future === undefined && past === undefined) return undefined;

	return {
		...(future !== undefined ? { future } : {}),
		...(past !== undefined ? { past } : {}),
	};
};

/**
 * npmで配布されているUnicode CLDRのJSON（cldr-json）を読むデータ源
 *
 * 補足データ（`supplemental/*.json`）は初めて必要になったときに一度だけ読む。
 */
export class CldrDataSource implements LocaleDataSource, TimezoneRegistry {
	private localeDirs: Map<string, string> | null = null;
	private defaultContent: Set<string> | null = null;
	private plurals: z.infer<typeof PluralsSchema> | null = null;
	private ordinals: z.infer<typeof PluralsSchema> | null = null;
	private weekData: z.infer<typeof WeekDataSchema> | null = null;
	private likelySubtags: z.infer<typeof LikelySubtagsSchema> | null = null;

	constructor(private readonly dirs: CldrPackageDirs) {}

	/** インストールされている`cldr-core`などのパッケージを使う。 */
	public static fromInstalledPackages(): CldrDataSource {
		const require = createRequire(import.meta.url);
		const packageDir = (name: string): string =>
			dirname(require.resolve(`${name}/package.json`));

		return new CldrDataSource({
			core: packageDir('cldr-core'),
			dates: packageDir('cldr-dates-full'),
			units: packageDir('cldr-units-full'),
		});
	}

	/** 3つのパッケージを子ディレクトリとして持つディレクトリ（`node_modules`など）を使う。 */
	public static fromDirectory(dir: string): CldrDataSource {
		return new CldrDataSource({
			core: join(dir, 'cldr-core'),
			dates: join(dir, 'cldr-dates-full'),
			units: join(dir, 'cldr-units-full'),
		});
	}

	/** 小文字にした`en-gb`のような名前 → 実際のディレクトリ名 */
	private getLocaleDirs(): Map<string, string> {
		this.localeDirs ??= new Map(
			fs
				.readdirSync(join(this.dirs.dates, 'main'), { withFileTypes: true })
				.filter((entry) => entry.isDirectory())
				.map((entry) => [entry.name.toLowerCase(), entry.name]),
		);
		return this.localeDirs;
	}

	/** 既定の内容として親に含まれている、小文字にしたロケール名 */
	private getDefaultContent(): Set<string> {
		this.defaultContent ??= new Set(
			readJson(join(this.dirs.core, 'defaultContent.json'), DefaultContentSchema).defaultContent.map(
				(name) => name.toLowerCase(),
			),
		);
		return this.defaultContent;
	}

	/**
	 * ロケールのデータがあるディレクトリ
	 *
	 * `en-US`や`zh-Hant-TW`のように既定の内容であるロケールは自身のディレクトリを持たないので、
	 * ディレクトリが見つかるまで末尾のサブタグを落としていく。
	 */
	private findLocaleDir(name: string): { dir: string; isDefaultContent: boolean } | undefined {
		const dirs = this.getLocaleDirs();

		const own = dirs.get(name);
		if (own !== undefined) return { dir: own, isDefaultContent: false };

		let current = name;
		while (this.getDefaultContent().has(current) && current.includes('-')) {
			current = current.slice(0, current.lastIndexOf('-'));
			const dir = dirs.get(current);
			if (dir !== undefined) return { dir, isDefaultContent: true };
		}

		return undefined;
	}

	public resolve(id: string): LocaleData | undefined {
		if (!isWellFormedLocaleId(id)) return undefined;

		const found = this.findLocaleDir(id.replaceAll('_', '-').toLowerCase());
		if (found === undefined) return undefined;

		const { dir } = found;
		// 既定の内容なら、親のデータを要求された識別子のものとして返す
		const canonicalId = found.isDefaultContent ? id : normalizeLocaleId(dir);
		const { language } = splitLocaleId(canonicalId);
		const cldrId = canonicalId.replaceAll('_', '-');

		const calendar = this.mainData(
			readJson(join(this.dirs.dates, 'main', dir, 'ca-gregorian.json'), GregorianCalendarSchema),
			dir,
		).dates.calendars.gregorian;
		const fields = this.mainData(
			readJson(join(this.dirs.dates, 'main', dir, 'dateFields.json'), DateFieldsSchema),
			dir,
		).dates.fields;
		const units = this.mainData(
			readJson(join(this.dirs.units, 'main', dir, 'units.json'), UnitsSchema),
			dir,
		).units;

		this.plurals ??= readJson(join(this.dirs.core, 'supplemental', 'plurals.json'), PluralsSchema);
		this.ordinals ??= readJson(join(this.dirs.core, 'supplemental', 'ordinals.json'), PluralsSchema);

		return {
			id: canonicalId,
			pluralRules: this.pluralRules(this.plurals.supplemental['plurals-type-cardinal'], cldrId, language),
			ordinalRules: this.pluralRules(this.ordinals.supplemental['plurals-type-ordinal'], cldrId, language),
			days: toNameTables(calendar.days, weekdayIndex),
			months: toNameTables(calendar.months, (key) => Number.parseInt(key, 10)),
			unitPatterns: this.unitPatterns(units),
			dateFields: this.dateFields(fields),
			dayPeriods: mapValues(calendar.dayPeriods, (widths) =>
				mapValues(widths, (periods) => omitBy(periods, (period) => period.includes('-alt-'))),
			),
			weekData: this.weekDataOf(canonicalId),
		};
	}

	public windowsZones(): ReadonlyMap<string, string> {
		const data = readJson(join(this.dirs.core, 'supplemental', 'windowsZones.json'), WindowsZonesSchema);
		const zones = new Map<string, string>();

		for (const { mapZone } of data.supplemental.windowsZones.mapTimezones) {
			if (mapZone._territory !== WORLD) continue;
			const [tzid] = mapZone._type.split(' ');
			if (tzid !== undefined && tzid !== '') zones.set(mapZone._other, tzid);
		}

		return zones;
	}

	private mainData<T>(data: { main: Record<string, T> }, dir: string): T {
		const locale = data.main[dir];
		if (locale === undefined) {
			throw new Error(`CLDR data for '${dir}' does not contain the locale itself`);
		}
		return locale;
	}

	private dateFields(fields: DateFields): Record<string, RelativeTimeField> {
		const result: Record<string, RelativeTimeField> = {};
		for (const [key, field] of Object.entries(fields)) {
			const relative = toRelativeTimeField(field);
			if (relative !== undefined) result[key] = relative;
		}
		return result;
	}

	/** 地域つきのロケールに規則がなければ言語の規則を使う。 */
	private pluralRules(
		table: Record<string, Record<string, string>> | undefined,
		cldrId: string,
		language: string,
	): PluralRuleSource {
		const rules = table?.[cldrId] ?? table?.[language];
		if (rules === undefined) return {};
		return byCategory(rules, 'pluralRule-count-');
	}

	private unitPatterns(units: Units): UnitPatterns {
		const result: Record<string, Record<string, UnitPattern>> = {};

		for (const width of ['long', 'short', 'narrow'] as const) {
			for (const [unit, patterns] of Object.entries(units[width] ?? {})) {
				(result[unit] ??= {})[width] = toUnitPattern(patterns);
			}
		}

		return result;
	}

	/** 地域が明示されていなければ、言語からもっともありそうな地域を推測する。 */
	private territoryOf(id: string): string {
		const { language, script, region } = splitLocaleId(id);
		if (region !== undefined) return region;

		this.likelySubtags ??= readJson(
			join(this.dirs.core, 'supplemental', 'likelySubtags.json'),
			LikelySubtagsSchema,
		);
		const likely = this.likelySubtags.supplemental.likelySubtags;
		const expanded =
			(script !== undefined ? likely[`${language}-${script}`] : undefined) ?? likely[language];

		return (expanded !== undefined ? splitLocaleId(normalizeLocaleId(expanded)).region : undefined) ?? WORLD;
	}

	private weekDataOf(id: string): WeekData {
		this.weekData ??= readJson(join(this.dirs.core, 'supplemental', 'weekData.json'), WeekDataSchema);
		const { minDays, firstDay, weekendStart, weekendEnd } = this.weekData.supplemental.weekData;
		const territory = this.territoryOf(id);

		const lookup = (table: Record<string, string>): string => {
			const value = table[territory] ?? table[WORLD];
			if (value === undefined) throw new Error(`CLDR week data has no entry for ${territory}`);
			return value;
		};

		return {
			minDays: Number.parseInt(lookup(minDays), 10),
			firstDay: weekdayIndex(lookup(firstDay)),
			weekendStart: weekdayIndex(lookup(weekendStart)),
			weekendEnd: weekdayIndex(lookup(weekendEnd)),
		};
	}
}

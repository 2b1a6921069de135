import type { PluralCategory, PluralRuleSource } from '../plural/index.js';

/** 曜日は月曜日を0、日曜日を6とする。 */
export const WEEKDAYS = ['mon', 'tue', 'wed', 'thu', 'fri', 'sat', 'sun'] as const;

export type Weekday = (typeof WEEKDAYS)[number];

/** 番号（曜日なら0–6、月なら1–12） → 名前 */
export type NameTable = ReadonlyMap<number, string>;

/** 文脈（`format`, `stand-alone`） → 幅（`wide`, `abbreviated`, …） → 表 */
export type CalendarNames = Readonly<Record<string, Readonly<Record<string, NameTable>>>>;

/** 複数形カテゴリ、または`per` → パターン */
export type UnitPattern = Readonly<Partial<Record<PluralCategory | 'per', string>>>;

/** `duration-year`などの単位 → 幅（`long`, `short`, `narrow`） → パターン */
export type UnitPatterns = Readonly<Record<string, Readonly<Record<string, UnitPattern>>>>;

export type RelativeTimePatterns = Readonly<Partial<Record<PluralCategory, string>>>;

export type RelativeTimeField = Readonly<{
	future?: RelativeTimePatterns;
	past?: RelativeTimePatterns;
}>;

export type WeekData = Readonly<{
	minDays: number;
	firstDay: number;
	weekendStart: number;
	weekendEnd: number;
}>;

/** データ源から取り出した、あるロケールについての情報 */
export type LocaleData = Readonly<{
	/** 正規化された識別子（`en_GB`） */
	id: string;
	pluralRules: PluralRuleSource;
	ordinalRules: PluralRuleSource;
	days: CalendarNames;
	months: CalendarNames;
	unitPatterns: UnitPatterns;
	/** `year`, `year-short`, `hour`, … → 相対時間のパターン */
	dateFields: Readonly<Record<string, RelativeTimeField>>;
	/** 文脈 → 幅 → 時間帯（`am`, `noon`, `morning1`, …） → 名前 */
	dayPeriods: Readonly<Record<string, Readonly<Record<string, Readonly<Record<string, string>>>>>>;
	weekData: WeekData;
}>;

export interface LocaleDataSource {
	/** 存在しないロケールなら`undefined` */
	resolve(id: string): LocaleData | undefined;
}

export interface TimezoneRegistry {
	/** Windowsのタイムゾーン名 → IANAのタイムゾーン識別子 */
	windowsZones(): ReadonlyMap<string, string>;
}

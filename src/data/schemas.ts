/**
 * cldr-jsonの各ファイルのスキーマ
 *
 * 使う部分だけを定義している。それ以外のキーは読み捨てる。
 */

import { z } from 'zod';

const StringRecord = z.record(z.string(), z.string());

/** `supplemental/plurals.json`, `supplemental/ordinals.json` */
export const PluralsSchema = z.object({
	supplemental: z.object({
		'plurals-type-cardinal': z.record(z.string(), StringRecord).optional(),
		'plurals-type-ordinal': z.record(z.string(), StringRecord).optional(),
	}),
});

/** `defaultContent.json`: 既定の内容として親のロケールに含まれているロケール */
export const DefaultContentSchema = z.object({
	defaultContent: z.array(z.string()),
});

/** `supplemental/weekData.json` */
export const WeekDataSchema = z.object({
	supplemental: z.object({
		weekData: z.object({
			minDays: StringRecord,
			firstDay: StringRecord,
			weekendStart: StringRecord,
			weekendEnd: StringRecord,
		}),
	}),
});

/** `supplemental/likelySubtags.json` */
export const LikelySubtagsSchema = z.object({
	supplemental: z.object({
		likelySubtags: StringRecord,
	}),
});

/** `supplemental/windowsZones.json` */
export const WindowsZonesSchema = z.object({
	supplemental: z.object({
		windowsZones: z.object({
			mapTimezones: z.array(
				z.object({
					mapZone: z.object({
						_other: z.string(),
						_type: z.string(),
						_territory: z.string(),
					}),
				}),
			),
		}),
	}),
});

/** 文脈 → 幅 → キー → 名前 */
const CalendarContextSchema = z.record(z.string(), z.record(z.string(), StringRecord));

/** `main/<locale>/ca-gregorian.json` */
export const GregorianCalendarSchema = z.object({
	main: z.record(
		z.string(),
		z.object({
			dates: z.object({
				calendars: z.object({
					gregorian: z.object({
						months: CalendarContextSchema,
						days: CalendarContextSchema,
						dayPeriods: CalendarContextSchema,
					}),
				}),
			}),
		}),
	),
});

/** `main/<locale>/dateFields.json` */
export const DateFieldsSchema = z.object({
	main: z.record(
		z.string(),
		z.object({
			dates: z.object({
				fields: z.record(z.string(), z.record(z.string(), z.union([z.string(), StringRecord]))),
			}),
		}),
	),
});

const UnitWidthSchema = z.record(z.string(), z.record(z.string(), z.unknown()));

/** `main/<locale>/units.json` */
export const UnitsSchema = z.object({
	main: z.record(
		z.string(),
		z.object({
			units: z.object({
				long: UnitWidthSchema.optional(),
				short: UnitWidthSchema.optional(),
				narrow: UnitWidthSchema.optional(),
			}),
		}),
	),
});

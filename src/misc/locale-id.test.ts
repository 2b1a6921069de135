import { describe, expect, test } from 'vitest';
import {
	isWellFormedLocaleId,
	normalizeLocaleId,
	splitLocaleId,
	toLocaleDirName,
} from './locale-id.js';

describe('normalizeLocaleId', () => {
	test.each([
		['en', 'en'],
		['en-gb', 'en_GB'],
		['en_GB', 'en_GB'],
		['EN-us', 'en_US'],
		['zh-hant-tw', 'zh_Hant_TW'],
		['zh_hans', 'zh_Hans'],
		['es-419', 'es_419'],
		['pt_br', 'pt_BR'],
		['ca-es-VALENCIA', 'ca_ES_valencia'],
		['be_tarask', 'be_tarask'],
		['de-1901', 'de_1901'],
	])('%s → %s', (input, expected) => {
		expect(normalizeLocaleId(input)).toBe(expected);
	});

	test('ディレクトリ名から戻しても同じ識別子になる', () => {
		for (const id of ['en_GB', 'zh_Hant_TW', 'fr', 'es_419', 'ca_ES_valencia']) {
			expect(normalizeLocaleId(toLocaleDirName(id))).toBe(id);
		}
	});
});

describe('isWellFormedLocaleId', () => {
	test('valid', () => {
		expect(isWellFormedLocaleId('en')).toBe(true);
		expect(isWellFormedLocaleId('en_GB')).toBe(true);
		expect(isWellFormedLocaleId('zh_Hant_TW')).toBe(true);
		expect(isWellFormedLocaleId('es_419')).toBe(true);
		expect(isWellFormedLocaleId('ca_ES_valencia')).toBe(true);
		expect(isWellFormedLocaleId('el_polyton')).toBe(true);
	});

	test('invalid', () => {
		expect(isWellFormedLocaleId('')).toBe(false);
		expect(isWellFormedLocaleId('english')).toBe(false);
		expect(isWellFormedLocaleId('en_GB_EX')).toBe(false);
		expect(isWellFormedLocaleId('../en')).toBe(false);
	});
});

test('splitLocaleId', () => {
	expect(splitLocaleId('en_GB')).toStrictEqual({
		language: 'en',
		script: undefined,
		region: 'GB',
	});
	expect(splitLocaleId('zh_Hant')).toStrictEqual({
		language: 'zh',
		script: 'Hant',
		region: undefined,
	});
});

import * as fs from 'node:fs';
import * as os from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import { LocaleGenerateService } from './LocaleGenerateService.js';
import { buildLocaleRecord } from './LocaleRecord.js';
import { renderCustomModule, renderLocaleModule } from './templates.js';
import { CldrDataSource } from '../data/CldrDataSource.js';
import { InMemoryDataSource, englishLocaleData } from '../test-utils.js';
import Logger from '../misc/logger.js';

describe('LocaleGenerateService', () => {
	let tmp: string;
	let localesDir: string;
	const dataSource = new InMemoryDataSource([englishLocaleData(), englishLocaleData('en_GB')]);

	beforeEach(() => {
		tmp = fs.mkdtempSync(join(os.tmpdir(), 'localegen-'));
		localesDir = join(tmp, 'locales');
		fs.mkdirSync(localesDir);
	});

	afterEach(() => {
		fs.rmSync(tmp, { recursive: true, force: true });
		vi.restoreAllMocks();
	});

	const createService = () => new LocaleGenerateService(dataSource, localesDir, new Logger('test'));

	test('writes the file triple into a lowercase directory', () => {
		const report = createService().generate(['en-gb']);
		const dir = join(localesDir, 'en_gb');

		expect(report).toEqual({
			generated: [{ id: 'en_GB', dir, created: ['__init__.py', 'custom.py'] }],
			failed: [],
		});
		expect(fs.readFileSync(join(dir, '__init__.py'), 'utf-8')).toBe('');
		expect(fs.readFileSync(join(dir, 'custom.py'), 'utf-8')).toBe(renderCustomModule('en_GB'));
		expect(fs.readFileSync(join(dir, 'locale.py'), 'utf-8')).toBe(
			renderLocaleModule(buildLocaleRecord(englishLocaleData('en_GB'))),
		);
	});

	test('custom.py is created once and never overwritten', () => {
		const service = createService();
		const custom = join(localesDir, 'en', 'custom.py');

		service.generate(['en']);
		fs.writeFileSync(custom, "translations = {'ordinal': 'x'}\n");
		const report = service.generate(['en']);

		expect(report.generated[0]?.created).toEqual([]);
		expect(fs.readFileSync(custom, 'utf-8')).toBe("translations = {'ordinal': 'x'}\n");
	});

	test('locale.py is always rewritten', () => {
		const service = createService();
		const path = join(localesDir, 'en', 'locale.py');

		service.generate(['en']);
		const generated = fs.readFileSync(path, 'utf-8');
		fs.writeFileSync(path, 'locale = {}\n');
		service.generate(['en']);

		expect(fs.readFileSync(path, 'utf-8')).toBe(generated);
	});

	test('unknown locales are skipped and reported', () => {
		const report = createService().generate(['xx', 'en', 'en-ZZ']);

		expect(report.failed).toEqual(['xx', 'en-ZZ']);
		expect(report.generated.map(({ id }) => id)).toEqual(['en']);
		expect(fs.readdirSync(localesDir)).toEqual(['en']);
	});

	test('unknown locales are logged with the normalized identifier', () => {
		const error = vi.spyOn(Logger.prototype, 'error');

		createService().generate(['xx-yy']);

		expect(error).toHaveBeenCalledWith('Locale [xx_YY] does not exist.');
	});

	test('default content locales are written under the requested identifier', () => {
		const cldr = CldrDataSource.fromDirectory(
			fileURLToPath(new URL('../data/__fixtures__/', import.meta.url)),
		);

		const report = new LocaleGenerateService(cldr, localesDir, new Logger('test')).generate(['en-us']);

		expect(report.generated.map(({ id, dir }) => [id, dir])).toEqual([
			['en_US', join(localesDir, 'en_us')],
		]);
		expect(fs.readFileSync(join(localesDir, 'en_us', 'locale.py'), 'utf-8')).toContain(
			'\nen_US locale file.\n',
		);
	});

	test('a missing locales directory is an error', () => {
		fs.rmSync(localesDir, { recursive: true });

		expect(() => createService().generate(['en'])).toThrowError(/ENOENT/);
	});
});

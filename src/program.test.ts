import * as fs from 'node:fs';
import * as os from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { createProgram } from './program.js';
import { InMemoryDataSource, englishLocaleData } from './test-utils.js';
import Logger from './misc/logger.js';

describe('createProgram', () => {
	let tmp: string;
	const dataSource = new InMemoryDataSource(
		[englishLocaleData(), englishLocaleData('fr')],
		new Map([['UTC', 'Etc/UTC']]),
	);

	beforeEach(() => {
		tmp = fs.mkdtempSync(join(os.tmpdir(), 'localegen-'));
	});

	afterEach(() => {
		fs.rmSync(tmp, { recursive: true, force: true });
	});

	const run = (...args: string[]) =>
		createProgram({ cwd: tmp, logger: new Logger('test'), createDataSource: () => dataSource })
			.exitOverride()
			.parse(args, { from: 'user' });

	test('locale create', () => {
		fs.mkdirSync(join(tmp, 'out'));

		run('--locales-dir', 'out', 'locale', 'create', 'fr', 'xx', 'EN');

		expect(fs.readdirSync(join(tmp, 'out')).sort()).toEqual(['en', 'fr']);
		expect(fs.readdirSync(join(tmp, 'out', 'fr')).sort()).toEqual([
			'__init__.py',
			'custom.py',
			'locale.py',
		]);
	});

	test('locale recreate reads the locales directory from localegen.yml', () => {
		fs.writeFileSync(join(tmp, 'localegen.yml'), 'localesDir: generated\n');
		fs.mkdirSync(join(tmp, 'generated'));
		fs.mkdirSync(join(tmp, 'generated', 'fr'));
		fs.writeFileSync(join(tmp, 'generated', 'fr', 'locale.py'), 'locale = {}\n');

		run('locale', 'recreate');

		expect(fs.readFileSync(join(tmp, 'generated', 'fr', 'locale.py'), 'utf-8')).toMatch(
			/^from \.custom import translations as custom_translations\n/,
		);
		expect(fs.existsSync(join(tmp, 'generated', 'fr', 'custom.py'))).toBe(true);
	});

	test('windows dump-timezones', () => {
		run('--timezones-dir', 'tz', 'windows', 'dump-timezones');

		expect(fs.readFileSync(join(tmp, 'tz', 'windows.py'), 'utf-8')).toBe(
			"windows_timezones = {\n    'UTC': 'Etc/UTC',\n}\n",
		);
	});
});

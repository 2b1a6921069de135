import * as fs from 'node:fs';
import { join } from 'node:path';
import { LOCALE_MODULE_FILE } from '../const.js';
import type { LocaleGenerateService, LocaleGenerationReport } from './LocaleGenerateService.js';
import type Logger from '../misc/logger.js';

/**
 * `locale recreate`
 *
 * 既に生成されているロケールをすべて作り直す。CLDRを更新したあとに使う。
 */
export class LocaleRegenerateService {
	private readonly logger: Logger;

	constructor(
		private readonly localeGenerateService: LocaleGenerateService,
		private readonly localesDir: string,
		parentLogger: Logger,
	) {
		this.logger = parentLogger.createSubLogger('recreate', 'cyan');
	}

	/** `locale.py`を含むディレクトリの名前 */
	public findGeneratedLocales(): string[] {
		if (!fs.existsSync(this.localesDir)) return [];

		return fs
			.readdirSync(this.localesDir, { withFileTypes: true })
			.filter((entry) => entry.isDirectory())
			.filter((entry) => fs.existsSync(join(this.localesDir, entry.name, LOCALE_MODULE_FILE)))
			.map((entry) => entry.name)
			.sort();
	}

	public regenerate(): LocaleGenerationReport {
		const locales = this.findGeneratedLocales();

		if (locales.length === 0) {
			this.logger.info(`No generated locales found in ${this.localesDir}`);
			return { generated: [], failed: [] };
		}

		this.logger.info(`Regenerating ${locales.length} locale(s)`);
		return this.localeGenerateService.generate(locales);
	}
}

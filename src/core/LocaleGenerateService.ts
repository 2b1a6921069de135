import { join } from 'node:path';
import { CUSTOM_MODULE_FILE, LOCALE_MODULE_FILE, PACKAGE_MARKER_FILE } from '../const.js';
import { normalizeLocaleId, toLocaleDirName } from '../misc/locale-id.js';
import { ensureDir, overwriteFile, writeFileIfAbsent } from '../misc/write-file.js';
import { buildLocaleRecord } from './LocaleRecord.js';
import { renderCustomModule, renderLocaleModule } from './templates.js';
import type { LocaleDataSource } from '../data/LocaleDataSource.js';
import type Logger from '../misc/logger.js';

export type GeneratedLocale = {
	id: string;
	dir: string;
	/** 今回新たに作られたファイル（`locale.py`は毎回書き込まれるので含めない） */
	created: string[];
};

export type LocaleGenerationReport = {
	generated: GeneratedLocale[];
	/** 存在しなかったロケール（入力されたままの表記） */
	failed: string[];
};

/**
 * `locale create`
 *
 * 指定されたロケールごとに`__init__.py`, `locale.py`, `custom.py`を書き出す。
 * 存在しないロケールはエラーとして表示するが、残りのロケールの処理は続ける。
 */
export class LocaleGenerateService {
	private readonly logger: Logger;

	constructor(
		private readonly dataSource: LocaleDataSource,
		private readonly localesDir: string,
		parentLogger: Logger,
	) {
		this.logger = parentLogger.createSubLogger('create', 'cyan');
	}

	public generate(inputs: readonly string[]): LocaleGenerationReport {
		const report: LocaleGenerationReport = { generated: [], failed: [] };

		for (const input of inputs) {
			const id = normalizeLocaleId(input);
			const data = this.dataSource.resolve(id);

			if (data === undefined) {
				this.logger.error(`Locale [${id}] does not exist.`);
				report.failed.push(input);
				continue;
			}

			this.logger.info(`Generating ${data.id} locale.`);

			const record = buildLocaleRecord(data, this.logger);
			const dir = join(this.localesDir, toLocaleDirName(record.id));
			const created: string[] = [];

			ensureDir(dir);

			if (writeFileIfAbsent(join(dir, PACKAGE_MARKER_FILE), '')) {
				created.push(PACKAGE_MARKER_FILE);
			}

			overwriteFile(join(dir, LOCALE_MODULE_FILE), renderLocaleModule(record));
			this.logger.debug(`Wrote ${join(dir, LOCALE_MODULE_FILE)}`);

			if (writeFileIfAbsent(join(dir, CUSTOM_MODULE_FILE), renderCustomModule(record.id))) {
				created.push(CUSTOM_MODULE_FILE);
			}

			for (const file of created) {
				this.logger.debug(`Created ${join(dir, file)}`);
			}

			report.generated.push({ id: record.id, dir, created });
		}

		const summary = `${report.generated.length} locale(s) generated`;
		if (report.failed.length > 0) {
			this.logger.warn(`${summary}, ${report.failed.length} failed: ${report.failed.join(', ')}`);
		} else {
			this.logger.succ(summary);
		}

		return report;
	}
}

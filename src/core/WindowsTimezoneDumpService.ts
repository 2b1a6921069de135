import { join } from 'node:path';
import { WINDOWS_TIMEZONES_FILE } from '../const.js';
import { ensureDir, overwriteFile } from '../misc/write-file.js';
import { renderWindowsTimezonesModule } from './templates.js';
import type { TimezoneRegistry } from '../data/LocaleDataSource.js';
import type Logger from '../misc/logger.js';

/** Pythonの`sorted()`と同じく、コードユニット単位で比べる。 */
const compareNames = ([a]: [string, string], [b]: [string, string]): number =>
	a < b ? -1 : a > b ? 1 : 0;

/**
 * `windows dump-timezones`
 *
 * Windowsのタイムゾーン名とIANAの識別子の対応表を`windows.py`として書き出す。
 */
export class WindowsTimezoneDumpService {
	private readonly logger: Logger;

	constructor(
		private readonly registry: TimezoneRegistry,
		private readonly timezonesDir: string,
		parentLogger: Logger,
	) {
		this.logger = parentLogger.createSubLogger('dump-timezones', 'cyan');
	}

	public sortedZones(): Map<string, string> {
		return new Map([...this.registry.windowsZones()].sort(compareNames));
	}

	public dump(): { path: string; count: number } {
		const zones = this.sortedZones();
		const path = join(this.timezonesDir, WINDOWS_TIMEZONES_FILE);

		ensureDir(this.timezonesDir);
		overwriteFile(path, renderWindowsTimezonesModule(zones));

		this.logger.succ(`Dumped ${zones.size} time zone(s) to ${path}`);
		return { path, count: zones.size };
	}
}

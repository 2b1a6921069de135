import { renderPythonLiteral, type PythonDict } from '../misc/python-literal.js';
import type { LocaleRecord } from './LocaleRecord.js';

/** `locale.py`: 毎回上書きされる */
export const renderLocaleModule = (record: LocaleRecord): string => `from .custom import translations as custom_translations


"""
${record.id} locale file.

It has been generated automatically and must not be modified directly.
"""


locale = {
    'plural': ${record.plural.toPythonLambda()},
    'ordinal': ${record.ordinal.toPythonLambda()},
    'translations': ${renderPythonLiteral(record.translations, 2)},
    'custom': custom_translations,
}
`;

/** `custom.py`: 初回のみ作られ、以後は利用者が編集する */
export const renderCustomModule = (id: string): string => `"""
${id} custom locale file.
"""

translations = {}
`;

/** `windows.py` */
export const renderWindowsTimezonesModule = (zones: PythonDict): string =>
	`windows_timezones = ${renderPythonLiteral(zones)}\n`;

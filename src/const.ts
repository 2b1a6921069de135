export const CONFIG_FILE_NAME = 'localegen.yml';

/** ロケールごとのディレクトリに置かれるファイル */
export const PACKAGE_MARKER_FILE = '__init__.py';
export const LOCALE_MODULE_FILE = 'locale.py';
export const CUSTOM_MODULE_FILE = 'custom.py';

export const WINDOWS_TIMEZONES_FILE = 'windows.py';

export const DEFAULT_LOCALES_DIR = 'locales';
export const DEFAULT_TIMEZONES_DIR = 'tz/data';

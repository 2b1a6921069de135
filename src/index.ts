export * from './plural/index.js';
export {
	renderPythonLiteral,
	reprNumber,
	reprString,
	type PythonDict,
	type PythonDictKey,
	type PythonLiteral,
} from './misc/python-literal.js';
export {
	InvalidFieldLengthError,
	UnknownPatternFieldError,
	convertLdmlPattern,
} from './misc/ldml-pattern.js';
export { normalizeLocaleId, toLocaleDirName } from './misc/locale-id.js';
export type * from './data/LocaleDataSource.js';
export { CldrDataSource, type CldrPackageDirs } from './data/CldrDataSource.js';
export { buildLocaleRecord, type LocaleRecord } from './core/LocaleRecord.js';
export {
	LocaleGenerateService,
	type GeneratedLocale,
	type LocaleGenerationReport,
} from './core/LocaleGenerateService.js';
export { LocaleRegenerateService } from './core/LocaleRegenerateService.js';
export { WindowsTimezoneDumpService } from './core/WindowsTimezoneDumpService.js';
export { loadConfig, type Config, type ConfigOverrides } from './config.js';
export { createProgram, type ProgramDeps } from './program.js';
export { default as Logger } from './misc/logger.js';

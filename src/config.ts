/**
 * Config loader
 */

import * as fs from 'node:fs';
import { dirname, resolve } from 'node:path';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import { LOCALEGEN_CONFIG_YML } from './env.js';
import { CONFIG_FILE_NAME, DEFAULT_LOCALES_DIR, DEFAULT_TIMEZONES_DIR } from './const.js';

/** `localegen.yml`で設定できる項目 */
const SourceSchema = z
	.object({
		localesDir: z.string().min(1).default(DEFAULT_LOCALES_DIR),
		timezonesDir: z.string().min(1).default(DEFAULT_TIMEZONES_DIR),
		/** `cldr-core`, `cldr-dates-full`, `cldr-units-full`を含むディレクトリ */
		cldrDir: z.string().min(1).optional(),
	})
	.strict();

export type ConfigSource = z.infer<typeof SourceSchema>;

/** コマンドラインで指定された、設定ファイルより優先される値 */
export type ConfigOverrides = {
	config?: string;
	localesDir?: string;
	timezonesDir?: string;
	cldrDir?: string;
};

export type Config = {
	/** 読み込んだ設定ファイル。使わなかった場合は`null` */
	configFile: string | null;
	localesDir: string;
	timezonesDir: string;
	cldrDir: string | null;
};

/**
 * YAMLファイルを読み、スキーマに基づいてパースする。
 * 空のファイルはすべて既定値として扱う。
 */
const loadConfigSource = (path: string): ConfigSource => {
	const content = fs.readFileSync(path, 'utf-8');
	const data: unknown = yaml.load(content);
	return SourceSchema.parse(data ?? {});
};

/**
 * 設定ファイルの場所は`--config`、`LOCALEGEN_CONFIG_YML`、作業ディレクトリの`localegen.yml`の順に探す。
 * 明示されたファイルがなければエラーになるが、`localegen.yml`がないだけなら既定値を使う。
 *
 * 設定ファイル中の相対パスはそのファイルのあるディレクトリから、
 * コマンドラインで指定された相対パスは作業ディレクトリから解決する。
 */
export const loadConfig = (cwd: string, overrides: ConfigOverrides = {}): Config => {
	const explicitFile = overrides.config ?? LOCALEGEN_CONFIG_YML;
	const configFile =
		explicitFile !== undefined
			? resolve(cwd, explicitFile)
			: fs.existsSync(resolve(cwd, CONFIG_FILE_NAME))
			? resolve(cwd, CONFIG_FILE_NAME)
			: null;

	const source = configFile !== null ? loadConfigSource(configFile) : SourceSchema.parse({});
	const baseDir = configFile !== null ? dirname(configFile) : cwd;

	const pick = (override: string | undefined, value: string): string =>
		override !== undefined ? resolve(cwd, override) : resolve(baseDir, value);

	const cldrDir =
		overrides.cldrDir !== undefined
			? resolve(cwd, overrides.cldrDir)
			: source.cldrDir !== undefined
			? resolve(baseDir, source.cldrDir)
			: null;

	return {
		configFile,
		localesDir: pick(overrides.localesDir, source.localesDir),
		timezonesDir: pick(overrides.timezonesDir, source.timezonesDir),
		cldrDir,
	};
};

import { Command } from 'commander';
import { z } from 'zod';
import { loadConfig, type Config } from './config.js';
import { CldrDataSource } from './data/CldrDataSource.js';
import { LocaleGenerateService } from './core/LocaleGenerateService.js';
import { LocaleRegenerateService } from './core/LocaleRegenerateService.js';
import { WindowsTimezoneDumpService } from './core/WindowsTimezoneDumpService.js';
import Logger from './misc/logger.js';
import type { LocaleDataSource, TimezoneRegistry } from './data/LocaleDataSource.js';

const GlobalOptionsSchema = z.object({
	config: z.string().optional(),
	localesDir: z.string().optional(),
	timezonesDir: z.string().optional(),
	cldrDir: z.string().optional(),
});

export type ProgramDeps = {
	cwd?: string;
	logger?: Logger;
	createDataSource?: (config: Config) => LocaleDataSource & TimezoneRegistry;
};

const defaultDataSource = (config: Config): CldrDataSource =>
	config.cldrDir !== null
		? CldrDataSource.fromDirectory(config.cldrDir)
		: CldrDataSource.fromInstalledPackages();

export const createProgram = (deps: ProgramDeps = {}): Command => {
	const cwd = deps.cwd ?? process.cwd();
	const logger = deps.logger ?? new Logger('localegen', 'green');
	const createDataSource = deps.createDataSource ?? defaultDataSource;

	const setup = (command: Command) => {
		const options = GlobalOptionsSchema.parse(command.optsWithGlobals());
		const config = loadConfig(cwd, options);
		if (config.configFile !== null) {
			logger.debug(`Loaded config from ${config.configFile}`);
		}
		return { config, dataSource: createDataSource(config) };
	};

	const program = new Command('localegen')
		.description('Generate Python locale modules from Unicode CLDR data')
		.option('-c, --config <path>', 'configuration file (default: localegen.yml)')
		.option('--locales-dir <dir>', 'directory holding the generated locales')
		.option('--timezones-dir <dir>', 'directory receiving windows.py')
		.option('--cldr-dir <dir>', 'directory containing the cldr-json packages');

	const locale = program.command('locale').description('Locale related commands');

	locale
		.command('create')
		.description('Generate locale files for the given locales')
		.argument('<locales...>', 'locale identifiers such as en, en_GB or zh-hant-tw')
		.action((locales: string[], _options: unknown, command: Command) => {
			const { config, dataSource } = setup(command);
			new LocaleGenerateService(dataSource, config.localesDir, logger).generate(locales);
		});

	locale
		.command('recreate')
		.description('Regenerate every locale that has already been generated')
		.action((_options: unknown, command: Command) => {
			const { config, dataSource } = setup(command);
			const generator = new LocaleGenerateService(dataSource, config.localesDir, logger);
			new LocaleRegenerateService(generator, config.localesDir, logger).regenerate();
		});

	program
		.command('windows')
		.description('Windows related commands')
		.command('dump-timezones')
		.description('Dump the Windows to IANA time zone table')
		.action((_options: unknown, command: Command) => {
			const { config, dataSource } = setup(command);
			new WindowsTimezoneDumpService(dataSource, config.timezonesDir, logger).dump();
		});

	return program;
};

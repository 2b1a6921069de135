import chalk, { type ChalkInstance } from 'chalk';
import convertColor from 'color-convert';
import { format as dateFormat } from 'date-fns';
import type { KEYWORD } from 'color-convert/conversions.js';

/** ログ種別と接頭辞の対応 */
const logPrefixes = {
	error: 'ERR',
	success: 'DONE',
	warning: 'WARN',
	debug: 'VERB',
	info: 'INFO',
} as const satisfies Record<string, string>;

/** ログ種別 */
export type LogLevel = keyof typeof logPrefixes;

/** ログがどの処理から出力されたものかを表す文脈 */
export type LoggerContext = {
	name: string;
	/** 文脈名を装飾する色 */
	color?: KEYWORD;
};

const LOG_PREFIX_MAX_LENGTH = 4;

const levelColor = (level: LogLevel, important: boolean): ChalkInstance => {
	switch (level) {
		case 'error':
			return important ? chalk.bgRed.white : chalk.red;
		case 'success':
			return important ? chalk.bgGreen.white : chalk.green;
		case 'warning':
			return chalk.yellow;
		case 'debug':
			return chalk.gray;
		case 'info':
			return chalk.blue;
		default:
			return level satisfies never;
	}
};

/**
 * 1行分のログ文字列を組み立てる。
 *
 * ```
 * 12:34:56 INFO [localegen locale] Generating en_GB locale.
 * ```
 */
export class LogBuilder {
	private readonly levelPrefix: string;
	private timestamp = false;
	private contexts = '';
	private message = '';

	constructor(
		private readonly level: LogLevel,
		private readonly important = false,
	) {
		this.levelPrefix = levelColor(level, important)(
			logPrefixes[level].padEnd(LOG_PREFIX_MAX_LENGTH),
		);
	}

	/** 文脈は親から子の順に並べて渡す。 */
	public withContexts(contexts: LoggerContext[]): this {
		this.contexts = contexts
			.map((context) =>
				context.color !== undefined
					? chalk.rgb(...convertColor.keyword.rgb(context.color))(context.name)
					: chalk.white(context.name),
			)
			.join(' ');

		return this;
	}

	/**
	 * タイムスタンプを含めるかどうか。
	 * 時刻そのものは`build()`の時点で取得される。
	 */
	public withTimestamp(yes: boolean): this {
		this.timestamp = yes;

		return this;
	}

	public withMessage(message: string): this {
		this.message = this.tint(message);

		return this;
	}

	public withError(error: Error): this {
		this.message = this.tint(`${error.name}: ${error.message}`);

		return this;
	}

	private tint(message: string): string {
		switch (this.level) {
			case 'error':
				return chalk.red(message);
			case 'success':
				return chalk.green(message);
			case 'warning':
				return chalk.yellow(message);
			case 'debug':
				return chalk.gray(message);
			case 'info':
				return message;
			default:
				return this.level satisfies never;
		}
	}

	public build(): string {
		const time = this.timestamp ? `${dateFormat(new Date(), 'HH:mm:ss')} ` : '';
		const log = `${time}${this.levelPrefix} [${this.contexts}]\t${this.message}`;

		return this.important ? chalk.bold(log) : log;
	}
}

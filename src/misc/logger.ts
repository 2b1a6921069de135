import { NODE_ENV, envOption } from '../env.js';
import { LogBuilder, type LoggerContext, type LogLevel } from './LogBuilder.js';
import type { KEYWORD } from 'color-convert/conversions.js';

/**
 * 文脈つきのロガー
 *
 * コマンドやサービスごとに`createSubLogger()`で子を作り、出力は最上位のロガーに任せる。
 */
// eslint-disable-next-line import/no-default-export
export default class Logger {
	private readonly context: LoggerContext;
	private parentLogger: Logger | null = null;

	constructor(contextName: string, contextColor?: KEYWORD) {
		this.context = {
			name: contextName,
			color: contextColor,
		};
	}

	public createSubLogger(contextName: string, contextColor?: KEYWORD): Logger {
		const logger = new Logger(contextName, contextColor);
		logger.parentLogger = this;
		return logger;
	}

	private log(
		level: LogLevel,
		build: (builder: LogBuilder) => LogBuilder,
		important: boolean,
		subContexts: LoggerContext[] = [],
	): void {
		if (envOption.quiet) return;

		const contexts = [this.context, ...subContexts];

		if (this.parentLogger !== null) {
			this.parentLogger.log(level, build, important, contexts);
			return;
		}

		const line = build(
			new LogBuilder(level, important)
				.withContexts(contexts)
				.withTimestamp(envOption.withLogTime),
		).build();

		if (level === 'error') {
			console.error(line);
		} else {
			console.log(line);
		}
	}

	/** 処理を続けられない、または利用者の入力が誤っている場面で使う。 */
	public error(value: string | Error, important = false): void {
		if (value instanceof Error) {
			this.log('error', (builder) => builder.withError(value), important);
			if (envOption.verbose && value.stack !== undefined) {
				this.log('debug', (builder) => builder.withMessage(value.stack ?? ''), false);
			}
		} else {
			this.log('error', (builder) => builder.withMessage(value), important);
		}
	}

	/** 処理は続けられるが結果が欠けている場面で使う。 */
	public warn(message: string, important = false): void {
		this.log('warning', (builder) => builder.withMessage(message), important);
	}

	public succ(message: string, important = false): void {
		this.log('success', (builder) => builder.withMessage(message), important);
	}

	/**
	 * 開発時にのみ必要な情報。
	 * `NODE_ENV`が`'production'`の場合は`LG_VERBOSE`がない限り表示されない。
	 */
	public debug(message: string, important = false): void {
		if (NODE_ENV !== 'production' || envOption.verbose) {
			this.log('debug', (builder) => builder.withMessage(message), important);
		}
	}

	public info(message: string, important = false): void {
		this.log('info', (builder) => builder.withMessage(message), important);
	}
}

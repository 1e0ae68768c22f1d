/*
 * SPDX-FileCopyrightText: syuilo and misskey-project
 * SPDX-License-Identifier: AGPL-3.0-only
 */

import chalk from 'chalk';
import { renderInlineError } from '@/misc/render-inline-error.js';
import type { EnvService } from '@/global/EnvService.js';
import type { TimeService } from '@/global/TimeService.js';

/**
 * Subset of the global console that loggers write to.
 */
export interface Console {
	error(...args: unknown[]): void;
	warn(...args: unknown[]): void;
	info(...args: unknown[]): void;
	log(...args: unknown[]): void;
	debug(...args: unknown[]): void;
}

type Context = {
	name: string;
	color?: string;
};

type Level = 'error' | 'success' | 'warning' | 'debug' | 'info';

type Data = Record<string, unknown>;

export default class Logger {
	private readonly context: Context;
	private parentLogger: Logger | null = null;

	constructor(
		context: string,
		color: string | undefined,
		private readonly envService: EnvService,
		private readonly timeService: TimeService,
		private readonly console: Console,
	) {
		this.context = {
			name: context,
			color: color,
		};
	}

	public get verbose(): boolean {
		return this.envService.options.verbose;
	}

	public createSubLogger(context: string, color?: string): Logger {
		const logger = new Logger(context, color, this.envService, this.timeService, this.console);
		logger.parentLogger = this;
		return logger;
	}

	private log(level: Level, message: string, data?: Data | null, important = false, subContexts: Context[] = []): void {
		if (this.envService.options.quiet) return;

		if (this.parentLogger) {
			this.parentLogger.log(level, message, data, important, [this.context, ...subContexts]);
			return;
		}

		const l =
			level === 'error' ? important ? chalk.bgRed.white('ERR ') : chalk.red('ERR ') :
			level === 'warning' ? chalk.yellow('WARN') :
			level === 'success' ? important ? chalk.bgGreen.white('DONE') : chalk.green('DONE') :
			level === 'debug' ? chalk.gray('VERB') :
			chalk.blue('INFO');
		const contexts = [this.context, ...subContexts].map(d => d.color ? chalk.keyword(d.color)(d.name) : chalk.white(d.name));
		const m =
			level === 'error' ? chalk.red(message) :
			level === 'warning' ? chalk.yellow(message) :
			level === 'success' ? chalk.green(message) :
			level === 'debug' ? chalk.gray(message) :
			message;

		let log = `${l}\t[${contexts.join(' ')}]\t${m}`;
		if (this.envService.options.withLogTime) log = chalk.gray(this.timeService.date.toISOString()) + ' ' + log;

		const args: unknown[] = [important ? chalk.bold(log) : log];
		if (data != null) {
			args.push(data);
		}

		switch (level) {
			case 'error': this.console.error(...args); break;
			case 'warning': this.console.warn(...args); break;
			case 'debug': this.console.debug(...args); break;
			case 'info': this.console.info(...args); break;
			default: this.console.log(...args); break;
		}
	}

	public error(x: string | Error, data?: Data | null, important = false): void { // 実行を継続できない状況で使う
		if (x instanceof Error) {
			this.log('error', renderInlineError(x), data ?? { error: x }, important);
		} else {
			this.log('error', x, data, important);
		}
	}

	public warn(message: string, data?: Data | null, important = false): void { // 実行を継続できるが改善すべき状況で使う
		this.log('warning', message, data, important);
	}

	public succ(message: string, data?: Data | null, important = false): void { // 何かに成功した状況で使う
		this.log('success', message, data, important);
	}

	public debug(message: string, data?: Data | null, important = false): void { // デバッグ用に使う(開発者に必要だが利用者に不要な情報)
		if (this.verbose) {
			this.log('debug', message, data, important);
		}
	}

	public info(message: string, data?: Data | null, important = false): void { // それ以外
		this.log('info', message, data, important);
	}
}

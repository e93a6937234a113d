import fs from 'fs';
import path from 'path';
import chalk from 'chalk';

import { ILogger, ILoggerOptions } from '../types';

type LogMessage = string | Error;
type Level = 'SUCCESS' | 'LOG' | 'ERROR' | 'WARN' | 'INFO' | 'DEBUG';

const COLORS: Record<Level, (text: string) => string> = {
	SUCCESS: chalk.green,
	LOG: chalk.blue,
	ERROR: chalk.red,
	WARN: chalk.yellow,
	INFO: chalk.cyan,
	DEBUG: chalk.magenta,
};

const pad = (value: number): string => value.toString().padStart(2, '0');

/**
 * Console and file logger. File output goes to
 * `<logsDir>/<year>/<month name>/luxweb-<yyyy-mm-dd>.log`, without colours;
 * a `logsDir` of null keeps output on the console only.
 */
class Logger implements ILogger {
	private readonly logsDir: string | null;
	private readonly debugEnabled: boolean;

	constructor(options: ILoggerOptions = {}) {
		const logsDir = options.logsDir === undefined ? path.join(__dirname, '../../logs') : options.logsDir;
		this.logsDir = logsDir === null ? null : path.resolve(logsDir);
		this.debugEnabled = options.debug ?? false;
		if (this.debugEnabled) {
			this.info('Debug mode is enabled');
		}
	}

	/** The file for `date`; its directories are created on first use */
	private fileFor(date: Date): string | null {
		if (!this.logsDir) return null;

		const month = date.toLocaleDateString('default', { month: 'long' });
		const directory = path.join(this.logsDir, date.getFullYear().toString(), month);
		fs.mkdirSync(directory, { recursive: true });

		return path.join(directory, `luxweb-${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}.log`);
	}

	private write(level: Level, message: LogMessage): void {
		if (level === 'DEBUG' && !this.debugEnabled) return;

		const now = new Date();
		const text = message instanceof Error ? `${message.message}\nStack trace:\n${message.stack}` : message;
		console.log(COLORS[level](`[${level}]`), text);

		const file = this.fileFor(now);
		if (file) {
			fs.appendFileSync(file, `[${now.toISOString()}] ${level} ${text}\n`, 'utf8');
		}
	}

	public success(message: LogMessage): void {
		this.write('SUCCESS', message);
	}

	public log(message: LogMessage): void {
		this.write('LOG', message);
	}

	public error(message: LogMessage): void {
		this.write('ERROR', message);
	}

	public warn(message: LogMessage): void {
		this.write('WARN', message);
	}

	public info(message: LogMessage): void {
		this.write('INFO', message);
	}

	public debug(message: LogMessage): void {
		this.write('DEBUG', message);
	}
}

export default Logger;

export interface ILogger {
    success(message: string | Error): void;
    log(message: string | Error): void;
    error(message: string | Error): void;
    warn(message: string | Error): void;
    info(message: string | Error): void;
    debug(message: string | Error): void;
}

export interface ILoggerOptions {
    /** Directory the dated log files go under; `null` disables file output. */
    logsDir?: string | null;
    debug?: boolean;
}

import chalk from 'chalk';

export enum LogLevel {
    DEBUG = 0,
    INFO = 1,
    WARN = 2,
    ERROR = 3,
    SILENT = 4,
}

function initialLevel(): LogLevel {
    return process.env.TOOLSTAGE_DEBUG === '1' ? LogLevel.DEBUG : LogLevel.INFO;
}

export class Logger {
    private static level: LogLevel = initialLevel();

    static setLevel(level: LogLevel) {
        this.level = level;
    }

    static getLevel(): LogLevel {
        return this.level;
    }

    static info(message: string) {
        if (this.level <= LogLevel.INFO) {
            console.log(chalk.blue('info: ') + message);
        }
    }

    static warn(message: string) {
        if (this.level <= LogLevel.WARN) {
            console.error(chalk.yellow('warn: ') + message);
        }
    }

    static error(message: string, error?: unknown) {
        if (this.level <= LogLevel.ERROR) {
            console.error(chalk.red('error: ') + message);
            if (error) {
                console.error(error);
            }
        }
    }

    static debug(message: string) {
        if (this.level <= LogLevel.DEBUG) {
            console.error(chalk.dim('debug: ') + message);
        }
    }
}

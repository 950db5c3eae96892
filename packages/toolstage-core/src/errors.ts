/**
 * Error types raised by the installer and the config loader.
 */

export class InstallError extends Error {
    /** Index of the failed step in the manifest, or -1 before any step ran */
    readonly step: number;
    /** Destination path of the failed step, relative to the project root */
    readonly destination?: string;
    /** File-system error code of the cause (ENOENT, EACCES, ...) */
    readonly code?: string;

    constructor(
        message: string,
        options?: { step?: number; destination?: string; cause?: unknown },
    ) {
        super(message, { cause: options?.cause });
        this.name = 'InstallError';
        this.step = options?.step ?? -1;
        this.destination = options?.destination;
        this.code = errorCode(options?.cause);
    }
}

export class ConfigError extends Error {
    readonly path: string;

    constructor(path: string, message: string, options?: { cause?: unknown }) {
        super(message, { cause: options?.cause });
        this.name = 'ConfigError';
        this.path = path;
    }
}

export function errorCode(error: unknown): string | undefined {
    if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return undefined;
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

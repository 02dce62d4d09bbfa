export type CombinerErrorCode = 'configuration' | 'no-tiles' | 'tile-read' | 'cancelled' | 'internal';

export type ConfigurationErrorReason =
    | 'not-a-directory'
    | 'invalid-zoom'
    | 'unknown-world'
    | 'invalid-area'
    | 'invalid-crop'
    | 'invalid-style'
    | 'invalid-grid-step'
    | 'invalid-tile-size'
    | 'invalid-concurrency';

const REPORT_BUG = 'This is likely a bug; please report it along with the steps that led to it.';

/**
 * Base for every error `Combiner` raises on purpose. `code` tells user-caused
 * problems apart from internal faults.
 */
export class CombinerError extends Error {
    readonly code: CombinerErrorCode;

    constructor(code: CombinerErrorCode, message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = 'CombinerError';
        this.code = code;
    }
}

/** Bad input detected before any expensive work starts. */
export class ConfigurationError extends CombinerError {
    readonly reason: ConfigurationErrorReason;

    constructor(reason: ConfigurationErrorReason, message: string) {
        super('configuration', message);
        this.name = 'ConfigurationError';
        this.reason = reason;
    }
}

export class NoTilesFoundError extends CombinerError {
    readonly directory: string;

    constructor(directory: string, tileExt: string) {
        super(
            'no-tiles',
            `No tile images matching "{col}_{row}.${tileExt}" were found in ${directory}; ` +
                'check that the tiles directory, world and zoom level are correct.',
        );
        this.name = 'NoTilesFoundError';
        this.directory = directory;
    }
}

/** A tile file exists but could not be read or decoded. */
export class TileReadError extends CombinerError {
    readonly path: string;

    constructor(path: string, cause: unknown) {
        const detail = cause instanceof Error ? cause.message : String(cause);
        super('tile-read', `Failed to read tile image ${path}: ${detail}`, { cause });
        this.name = 'TileReadError';
        this.path = path;
    }
}

export class CombineCancelledError extends CombinerError {
    constructor(message = 'Combine cancelled') {
        super('cancelled', message);
        this.name = 'CombineCancelledError';
    }
}

export class InternalError extends CombinerError {
    constructor(message: string) {
        super('internal', `${message} ${REPORT_BUG}`);
        this.name = 'InternalError';
    }
}

export const isCombinerError = (error: unknown): error is CombinerError => error instanceof CombinerError;

/** Throws {@link CombineCancelledError} once `signal` has been aborted. */
export const throwIfAborted = (signal: AbortSignal | undefined): void => {
    if (signal?.aborted) {
        throw new CombineCancelledError('Combine aborted');
    }
};

/**
 * Invalid or incomplete configuration (bad config file, missing geocoder credentials,
 * malformed alias table). Fatal for the run.
 */
export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

/**
 * The resolution cache could not be read or written. Fatal for the run.
 */
export class CachePersistenceError extends Error {
    constructor(
        message: string,
        public readonly path: string,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'CachePersistenceError';
    }
}

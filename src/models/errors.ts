// Error types. Data problems (missing keys, odd shapes, unparseable dates)
// are never thrown; only caller mistakes are.

/** An option value the library does not understand. */
export class ConfigurationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "ConfigurationError";
    }
}

/** A table handed to dataset helpers lacks a column the helper is defined on. */
export class DatasetError extends Error {
    readonly column: string;

    constructor(message: string, column: string) {
        super(message);
        this.name = "DatasetError";
        this.column = column;
    }
}

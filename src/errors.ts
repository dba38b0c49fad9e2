export class KeyFormatError extends Error {
    constructor(public readonly key: string) {
        super(`Invalid prototype key format: ${key}`);
        this.name = 'KeyFormatError';
    }
}

export class IngestionError extends Error {
    constructor(message: string, public readonly source: string) {
        super(`${source}: ${message}`);
        this.name = 'IngestionError';
    }
}

export class ConfigError extends Error {
    constructor(message: string, public readonly source: string) {
        super(`${source}: ${message}`);
        this.name = 'ConfigError';
    }
}

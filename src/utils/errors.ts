/**
 * Base class for every fault cardlink raises on purpose.
 */
export class CardLinkError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'CardLinkError';
    }
}

/**
 * The knowledge graph to enrich does not exist. Fatal: nothing is written.
 */
export class InputGraphNotFoundError extends CardLinkError {
    constructor(public readonly path: string) {
        super(`Knowledge graph not found: ${path}`);
        this.name = 'InputGraphNotFoundError';
    }
}

/**
 * The knowledge graph file is not valid Turtle.
 */
export class GraphParseError extends CardLinkError {
    constructor(
        public readonly path: string,
        cause: unknown
    ) {
        super(`Failed to parse ${path}: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
        this.name = 'GraphParseError';
    }
}

/**
 * The merged configuration failed validation.
 */
export class ConfigError extends CardLinkError {
    constructor(public readonly issues: string[]) {
        super(`Invalid configuration: ${issues.join('; ')}`);
        this.name = 'ConfigError';
    }
}

/**
 * A state change was requested on a finalized statement collection.
 */
export class FinalizedBuilderError extends CardLinkError {
    constructor() {
        super('Statement builder has been finalized');
        this.name = 'FinalizedBuilderError';
    }
}

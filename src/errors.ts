export type SubwayErrorCode =
    | "EMPTY_DATASET"
    | "UNKNOWN_STOP"
    | "NO_ROUTE_FOUND"
    | "UPSTREAM_FETCH"
    | "UPSTREAM_VALIDATION"
    | "CONFIG";

export abstract class SubwayError extends Error {
    abstract readonly code: SubwayErrorCode;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

export class EmptyDatasetError extends SubwayError {
    readonly code = "EMPTY_DATASET";

    constructor() {
        super("no subway lines in dataset");
    }
}

export class UnknownStopError extends SubwayError {
    readonly code = "UNKNOWN_STOP";

    constructor(readonly stop: string) {
        super(`unknown stop: ${stop}`);
    }
}

export class NoRouteFoundError extends SubwayError {
    readonly code = "NO_ROUTE_FOUND";

    constructor(readonly from: string, readonly to: string) {
        super(`no route found from ${from} to ${to}`);
    }
}

// Anything that went wrong talking to the transit API. The core never looks inside.
export class UpstreamFetchError extends SubwayError {
    readonly code: SubwayErrorCode = "UPSTREAM_FETCH";

    constructor(readonly path: string, message: string, options?: { cause?: unknown }) {
        super(`${path}: ${message}`, options);
    }
}

export class UpstreamValidationError extends UpstreamFetchError {
    override readonly code: SubwayErrorCode = "UPSTREAM_VALIDATION";
}

export class ConfigError extends SubwayError {
    readonly code = "CONFIG";
}

/**
 * Raised when a stored record (chunk, document) cannot be found by id.
 */
export class NotFoundError extends Error {
    readonly resource: string;
    readonly id: string;

    constructor(resource: string, id: string) {
        super(`${resource} not found: ${id}`);
        this.name = "NotFoundError";
        this.resource = resource;
        this.id = id;
    }
}

/**
 * Raised when an external collaborator (chunk storage, embedding service) fails.
 * Nothing in this package retries; callers replay the document instead.
 */
export class UpstreamUnavailableError extends Error {
    readonly service: string;

    constructor(service: string, message: string, options?: { cause?: unknown }) {
        super(`${service}: ${message}`, options);
        this.name = "UpstreamUnavailableError";
        this.service = service;
    }
}

/**
 * Render an unknown thrown value as a message
 */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

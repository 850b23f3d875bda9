/**
 * Error taxonomy for the ingestion service
 */

export class AppError extends Error {
    constructor(
        message: string,
        public code: string,
        public details?: Record<string, unknown>
    ) {
        super(message);
        this.name = this.constructor.name;
        Error.captureStackTrace(this, this.constructor);
    }
}

/**
 * Missing or invalid environment configuration. Fatal at process start.
 */
export class ConfigurationError extends AppError {
    constructor(message: string, public issues: string[] = []) {
        super(message, 'CONFIGURATION_ERROR', { issues });
    }
}

/**
 * The actor run could not be placed, or the remote run did not succeed.
 */
export class ActorInvocationError extends AppError {
    constructor(message: string, details?: Record<string, unknown>) {
        super(message, 'ACTOR_INVOCATION_ERROR', details);
    }
}

/**
 * The actor run finished but exposed no dataset to read.
 */
export class EmptyDatasetError extends AppError {
    constructor(runId: string | undefined) {
        super(`Actor run ${runId ?? '<unknown>'} returned no dataset`, 'EMPTY_DATASET', { runId });
    }
}

export class EnrichmentTransportError extends AppError {
    constructor(message: string, details?: Record<string, unknown>) {
        super(message, 'ENRICHMENT_TRANSPORT_ERROR', details);
    }
}

export class UserNotFoundError extends AppError {
    constructor(userId: number) {
        super(`User ${userId} not found`, 'USER_NOT_FOUND', { userId });
    }
}

/**
 * Extract a loggable message from an unknown thrown value
 */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

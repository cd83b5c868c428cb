/**
 * Aggregate of one or more effect failures. Thrown when an effect the
 * operation depends on fails; built but only logged and alerted when the
 * failures come from best-effort work after a commit.
 */
export class EffectsError extends Error {
    readonly errors: Error[];

    constructor(errors: Error[]) {
        super(errors.map(e => e.message).join('; '));
        this.name = 'EffectsError';
        this.errors = errors;
    }
}

/**
 * The store could not be reached or gave up on the statement (connection
 * failure, timeout, serialization failure, deadlock). The whole call is safe
 * to retry; nothing was committed.
 */
export class PersistenceUnavailableError extends EffectsError {
    readonly code: string | null;

    constructor(cause: Error, code: string | null) {
        super([cause]);
        this.name = 'PersistenceUnavailableError';
        this.code = code;
    }
}

export function toError(value: unknown): Error {
    return value instanceof Error ? value : new Error(String(value));
}

/**
 * Two-attempt execution: run with the primary parameters, and on failure
 * run exactly once more with the degraded parameters.
 */

export type AttemptKind = 'primary' | 'degraded';

export interface DegradedRetryPlan<P> {
    readonly primary: P;
    readonly degraded: P;
}

export interface DegradedRetryResult<T> {
    value: T;
    attempt: AttemptKind;
}

export class DegradedRetryError extends Error {
    constructor(
        public readonly primaryError: unknown,
        public readonly degradedError: unknown
    ) {
        super(`Primary and degraded attempts both failed: ${describe(degradedError)}`);
        this.name = 'DegradedRetryError';
    }
}

function describe(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

export async function withDegradedRetry<P, T>(
    plan: DegradedRetryPlan<P>,
    run: (params: P, attempt: AttemptKind) => Promise<T>,
    onDegrade?: (error: unknown) => void
): Promise<DegradedRetryResult<T>> {
    let primaryError: unknown;
    try {
        return { value: await run(plan.primary, 'primary'), attempt: 'primary' };
    } catch (error: unknown) {
        primaryError = error;
    }

    onDegrade?.(primaryError);

    try {
        return { value: await run(plan.degraded, 'degraded'), attempt: 'degraded' };
    } catch (error: unknown) {
        throw new DegradedRetryError(primaryError, error);
    }
}

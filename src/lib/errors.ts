export type CoordinatorError = 'NoSuchView' | 'UnknownGateway';

export type Failure = { ok: false; error: CoordinatorError };

/** Result of a coordinator call. Failures are no-ops, never exceptions. */
export type Outcome<T extends object = object> = ({ ok: true } & T) | Failure;

export function failure(error: CoordinatorError): Failure {
    return { ok: false, error };
}

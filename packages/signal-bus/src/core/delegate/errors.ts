export const DELEGATE_UNBOUND = "DELEGATE_UNBOUND";

/** Raised when an unbound {@link Delegate} is invoked. */
export class UnboundDelegateError extends Error {
    readonly code = DELEGATE_UNBOUND;

    constructor(message = "Cannot invoke a delegate that is not bound") {
        super(message);
        this.name = "UnboundDelegateError";
    }
}

export function isUnboundDelegateError(error: unknown): error is UnboundDelegateError {
    return error instanceof UnboundDelegateError;
}

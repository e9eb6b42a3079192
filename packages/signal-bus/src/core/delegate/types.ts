/** Free function a delegate can bind to. */
export type DelegateFunction<TArgs extends unknown[], TResult> = (...args: TArgs) => TResult;

/** Method of `TInstance` a delegate can bind to, called with `this` set to the instance. */
export type DelegateMethod<TInstance extends object, TArgs extends unknown[], TResult> = (
    this: TInstance,
    ...args: TArgs
) => TResult;

/**
 * Trampoline installed at bind time. It closes over the bound instance,
 * so invocation never has to recover the instance's type.
 */
export type DelegateInvoker<TArgs extends unknown[], TResult> = (...args: TArgs) => TResult;

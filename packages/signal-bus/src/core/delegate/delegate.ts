import { UnboundDelegateError } from "./errors";
import type { DelegateFunction, DelegateInvoker, DelegateMethod } from "./types";

/**
 * Type-safe callable wrapper bound to at most one target: a free function,
 * or an instance paired with one of its methods.
 *
 * The delegate keeps a non-owning view of the target (`target` + `method`)
 * purely for identity matching; calls go through the invoker closure.
 *
 * State: `unbound → bound(function) | bound(method)`, rebinding overwrites.
 */
export class Delegate<TArgs extends unknown[], TResult = void> {
    private _target: object | null = null;
    private _method: unknown = null;
    private _invoker: DelegateInvoker<TArgs, TResult> | null = null;

    /** Bound instance, or `null` for a free function / unbound delegate. */
    get target(): object | null {
        return this._target;
    }

    get isBound(): boolean {
        return this._invoker !== null;
    }

    // ── Binding ──────────────────────────────────────────────────────────

    bindFunction(fn: DelegateFunction<TArgs, TResult>): this {
        this._target = null;
        this._method = fn;
        this._invoker = fn;
        return this;
    }

    bindMethod<TInstance extends object>(instance: TInstance, method: DelegateMethod<TInstance, TArgs, TResult>): this {
        this._target = instance;
        this._method = method;
        this._invoker = (...args) => method.apply(instance, args);
        return this;
    }

    reset(): void {
        this._target = null;
        this._method = null;
        this._invoker = null;
    }

    // ── Invocation ───────────────────────────────────────────────────────

    /** Throws {@link UnboundDelegateError} if nothing is bound. */
    invoke(...args: TArgs): TResult {
        if (!this._invoker) {
            throw new UnboundDelegateError();
        }
        return this._invoker(...args);
    }

    // ── Identity ─────────────────────────────────────────────────────────

    /**
     * True when bound to exactly this instance and this method, compared by
     * identity. Never true for a free-function binding.
     */
    matches(instance: object, method: unknown): boolean {
        return this._target !== null && this._target === instance && this._method === method;
    }

    matchesFunction(fn: unknown): boolean {
        return this._target === null && this._method !== null && this._method === fn;
    }

    /** True when bound to `instance` through any method. */
    targets(instance: object): boolean {
        return this._target !== null && this._target === instance;
    }

    equals(other: Delegate<TArgs, TResult>): boolean {
        return this._target === other._target && this._method === other._method;
    }

    clone(): Delegate<TArgs, TResult> {
        const copy = new Delegate<TArgs, TResult>();
        copy._target = this._target;
        copy._method = this._method;
        copy._invoker = this._invoker;
        return copy;
    }
}

/** Shorthand for a delegate bound to a free function. */
export function delegateOf<TArgs extends unknown[], TResult>(
    fn: DelegateFunction<TArgs, TResult>,
): Delegate<TArgs, TResult> {
    return new Delegate<TArgs, TResult>().bindFunction(fn);
}

import { Delegate } from "../delegate/delegate";
import type { EventListener, EventMethod, EventType, SubscriptionHandle } from "./types";

/** Class name of `value`, or `"Object"` when it has no named constructor. */
export function className(value: object): string {
    return value.constructor?.name || "Object";
}

/**
 * Holds one delegate bound for event type `T`.
 *
 * The bus keeps handles behind {@link SubscriptionHandle}; `emit` narrows
 * the incoming event back to `T` against the handle's own event type.
 */
export class DelegateHandle<T extends object> implements SubscriptionHandle {
    constructor(
        readonly eventType: EventType<T>,
        private readonly delegate: Delegate<[Readonly<T>]>,
    ) {}

    static forMethod<TInstance extends object, T extends object>(
        eventType: EventType<T>,
        instance: TInstance,
        method: EventMethod<TInstance, T>,
    ): DelegateHandle<T> {
        return new DelegateHandle(eventType, new Delegate<[Readonly<T>]>().bindMethod(instance, method));
    }

    static forFunction<T extends object>(eventType: EventType<T>, listener: EventListener<T>): DelegateHandle<T> {
        return new DelegateHandle(eventType, new Delegate<[Readonly<T>]>().bindFunction(listener));
    }

    emit(event: object): void {
        if (!(event instanceof this.eventType)) {
            throw new TypeError(`Handle for "${this.eventType.name}" received a "${className(event)}"`);
        }
        this.delegate.invoke(event);
    }

    matches(instance: object, method: unknown): boolean {
        return this.delegate.matches(instance, method);
    }

    matchesFunction(listener: unknown): boolean {
        return this.delegate.matchesFunction(listener);
    }

    targets(instance: object): boolean {
        return this.delegate.targets(instance);
    }
}

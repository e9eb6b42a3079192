import type { SignalBus } from "./signal-bus";
import type { EventMethod, EventType } from "./types";

/**
 * Subscriptions on behalf of a single instance.
 *
 * - `on(Type, method)` -> `bus.bind(Type, instance, method)`
 * - `off(Type, method)` -> `bus.unbind(Type, instance, method)`
 * - `dispose()` -> `bus.unbindAll(instance)`
 */
export class SubscriberAccessor<TInstance extends object> {
    constructor(
        private readonly bus: SignalBus,
        readonly instance: TInstance,
    ) {}

    on<T extends object>(type: EventType<T>, method: EventMethod<TInstance, T>): this {
        this.bus.bind(type, this.instance, method);
        return this;
    }

    off<T extends object>(type: EventType<T>, method: EventMethod<TInstance, T>): this {
        this.bus.unbind(type, this.instance, method);
        return this;
    }

    dispose(): void {
        this.bus.unbindAll(this.instance);
    }
}

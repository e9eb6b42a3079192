import { remove } from "es-toolkit";
import { createConsoleHandler } from "../logger/console-handler";
import { Logger } from "../logger/logger";
import { SubscriberAccessor } from "./accessor";
import { className, DelegateHandle } from "./handle";
import type {
    EventInterceptor,
    EventListener,
    EventMethod,
    EventType,
    SignalBusConfig,
    SubscriptionHandle,
} from "./types";

function describeError(error: unknown): string {
    return error instanceof Error ? `${error.name}: ${error.message}` : String(error);
}

/**
 * Synchronous, type-keyed publish/subscribe registry.
 *
 * - Subscriptions are grouped per event class and delivered in registration order
 * - `emit` dispatches on the event's own constructor (exact type match)
 * - Delivery iterates a snapshot: bind/unbind from inside a handler applies to the next emit
 * - Handler errors are logged and rethrown; the remaining handlers of that emit are skipped
 *
 * The bus holds its subscribers strongly. Call `unbind`/`unbindAll` to release them.
 */
export class SignalBus {
    readonly logger: Logger;
    // Keyed by event constructor; `unknown` so `event.constructor` can be looked up directly.
    private readonly subscriptions: Map<unknown, SubscriptionHandle[]> = new Map();
    private readonly interceptors: Set<EventInterceptor> = new Set();

    constructor(config?: SignalBusConfig) {
        this.logger = new Logger();

        if (config?.logger?.console) {
            this.logger.addHandler(createConsoleHandler());
        }
        for (const handler of config?.logger?.handlers ?? []) {
            this.logger.addHandler(handler);
        }
    }

    // ── Subscribe ────────────────────────────────────────────────────────

    /** Subscribe `method` on `instance` to `type`. Binding the same pair twice delivers twice. */
    bind<T extends object, TInstance extends object>(
        type: EventType<T>,
        instance: TInstance,
        method: EventMethod<TInstance, T>,
    ): void {
        const count = this.append(DelegateHandle.forMethod(type, instance, method));
        this.logger.debug("bind", type.name, { method: method.name, listeners: count });
    }

    bindFunction<T extends object>(type: EventType<T>, listener: EventListener<T>): void {
        const count = this.append(DelegateHandle.forFunction(type, listener));
        this.logger.debug("bind", type.name, { function: listener.name, listeners: count });
    }

    /** Per-instance view over this bus. */
    scope<TInstance extends object>(instance: TInstance): SubscriberAccessor<TInstance> {
        return new SubscriberAccessor(this, instance);
    }

    // ── Unsubscribe ──────────────────────────────────────────────────────

    /** Remove every subscription of `method` on `instance` for `type`. No-op when none match. */
    unbind<T extends object, TInstance extends object>(
        type: EventType<T>,
        instance: TInstance,
        method: EventMethod<TInstance, T>,
    ): void {
        const removed = this.prune(type, (handle) => handle.matches(instance, method));
        if (removed > 0) {
            this.logger.debug("unbind", type.name, { method: method.name, removed });
        }
    }

    unbindFunction<T extends object>(type: EventType<T>, listener: EventListener<T>): void {
        const removed = this.prune(type, (handle) => handle.matchesFunction(listener));
        if (removed > 0) {
            this.logger.debug("unbind", type.name, { function: listener.name, removed });
        }
    }

    /** Remove every subscription bound to `instance`, across all event types. */
    unbindAll(instance: object): void {
        let removed = 0;
        for (const type of [...this.subscriptions.keys()]) {
            removed += this.prune(type, (handle) => handle.targets(instance));
        }
        if (removed > 0) {
            this.logger.debug("unbind-all", className(instance), { removed });
        }
    }

    /** Drop every subscription. Interceptors are kept. */
    clear(): void {
        const types = this.subscriptions.size;
        this.subscriptions.clear();
        this.logger.debug("clear", "All subscriptions removed", { types });
    }

    // ── Publish ──────────────────────────────────────────────────────────

    emit(event: object): void {
        const handles = this.subscriptions.get(event.constructor);
        if (handles) {
            for (const handle of [...handles]) {
                try {
                    handle.emit(event);
                } catch (error) {
                    this.logger.error("handler-failed", handle.eventType.name, { error: describeError(error) });
                    throw error;
                }
            }
        }
        for (const interceptor of this.interceptors) {
            interceptor(event);
        }
    }

    /** Register an interceptor that receives every emitted event. Returns an unregister function. */
    addInterceptor(fn: EventInterceptor): () => void {
        this.interceptors.add(fn);
        return () => {
            this.interceptors.delete(fn);
        };
    }

    // ── Introspection ────────────────────────────────────────────────────

    listenerCount(type: EventType): number {
        return this.subscriptions.get(type)?.length ?? 0;
    }

    hasListeners(type: EventType): boolean {
        return this.subscriptions.has(type);
    }

    // ── Internals ────────────────────────────────────────────────────────

    private append(handle: SubscriptionHandle): number {
        let handles = this.subscriptions.get(handle.eventType);
        if (!handles) {
            handles = [];
            this.subscriptions.set(handle.eventType, handles);
        }
        handles.push(handle);
        return handles.length;
    }

    /** Removes matching handles; the per-type entry goes away iff nothing is left. */
    private prune(type: unknown, predicate: (handle: SubscriptionHandle) => boolean): number {
        const handles = this.subscriptions.get(type);
        if (!handles) return 0;

        const removed = remove(handles, predicate);
        if (handles.length === 0) {
            this.subscriptions.delete(type);
        }
        return removed.length;
    }
}

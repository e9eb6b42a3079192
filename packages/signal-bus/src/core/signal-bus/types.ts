import type { LogHandler } from "../logger/types";

/**
 * Runtime key of an event type. Event types are classes; the constructor
 * itself identifies the type.
 */
export type EventType<T extends object = object> = new (...args: never[]) => T;

/** Method on `TInstance` that accepts `T` as its only argument. Handlers see the event read-only. */
export type EventMethod<TInstance extends object, T extends object> = (this: TInstance, event: Readonly<T>) => void;

/** Free-function subscriber. */
export type EventListener<T extends object> = (event: Readonly<T>) => void;

/** Receives every emitted event after its subscribers, whether or not any exist. */
export type EventInterceptor = (event: object) => void;

/**
 * Type-erased subscription stored by the bus. Each per-type list holds
 * handles created for that exact event type only.
 */
export interface SubscriptionHandle {
    readonly eventType: EventType;
    emit(event: object): void;
    matches(instance: object, method: unknown): boolean;
    matchesFunction(listener: unknown): boolean;
    targets(instance: object): boolean;
}

export type SignalBusConfig = {
    logger?: {
        /** Attach the console handler. Defaults to `false`. */
        console?: boolean;
        handlers?: LogHandler[];
    };
};

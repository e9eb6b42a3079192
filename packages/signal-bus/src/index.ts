// ── Delegate ────────────────────────────────────────────────────────
export { Delegate, delegateOf } from "./core/delegate/delegate";
export { DELEGATE_UNBOUND, isUnboundDelegateError, UnboundDelegateError } from "./core/delegate/errors";
export type { DelegateFunction, DelegateInvoker, DelegateMethod } from "./core/delegate/types";
// ── Logger ──────────────────────────────────────────────────────────
export { createConsoleHandler } from "./core/logger/console-handler";
export { Logger } from "./core/logger/logger";
export type { LogEntry, LoggerContext, LogHandler, LogLevel } from "./core/logger/types";
// ── Signal bus ──────────────────────────────────────────────────────
export { SubscriberAccessor } from "./core/signal-bus/accessor";
export { DelegateHandle } from "./core/signal-bus/handle";
export { createSignalBus } from "./core/signal-bus/helpers";
export { SignalBus } from "./core/signal-bus/signal-bus";
export type {
    EventInterceptor,
    EventListener,
    EventMethod,
    EventType,
    SignalBusConfig,
    SubscriptionHandle,
} from "./core/signal-bus/types";

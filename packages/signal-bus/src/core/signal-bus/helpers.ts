import { SignalBus } from "./signal-bus";
import type { SignalBusConfig } from "./types";

export function createSignalBus(config?: SignalBusConfig): SignalBus {
    return new SignalBus(config);
}

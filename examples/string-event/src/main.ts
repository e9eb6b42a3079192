/**
 * Minimal walkthrough: one subscriber, two emits, then cleanup.
 */
import { createSignalBus } from "signal-bus";

class StringEvent {
    constructor(readonly s: string) {}
}

class A {
    say(event: StringEvent): void {
        console.log(event.s);
    }
}

const bus = createSignalBus({ logger: { console: true } });
const a = new A();

bus.bind(StringEvent, a, a.say);

bus.emit(new StringEvent("Test1"));
bus.emit(new StringEvent("Test2"));

bus.unbind(StringEvent, a, a.say);
bus.emit(new StringEvent("Test3"));

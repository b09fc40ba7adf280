/**
 * @file nodes.ts
 * @description Source, transform and sink nodes. A node wraps one processing
 *              unit and exclusively owns its Observer and/or Observable.
 *              Data delivered to a consuming node's Observer triggers `run()`,
 *              which executes the unit once every required input holds a value
 *              and hands the outputs on to subscribers.
 */

import { validatePortBinding } from "./binding.js";
import { ErrorEvent, LogEvent, NodeRunEvent, type NodeEvent, type NodeEventListener } from "./events.js";
import { measure } from "./helpers.js";
import { Observable } from "./observable.js";
import { Observer } from "./observer.js";
import { defaultGuard, type PropagationGuard } from "./propagation.js";
import type { PortDeclaration, PortShape, Producer, Sink, Transform, UnitKind } from "./unit.js";

/**
 * Configuration options for a node.
 */
export type NodeOptions = {
    /**
     * Name used in events and errors. Defaults to the unit's name, then its kind.
     */
    name?: string;
    /**
     * Guard bounding the propagation depth. Nodes of one graph should share one.
     */
    guard?: PropagationGuard;
    /**
     * Receives the events this node emits.
     */
    onEvent?: NodeEventListener;
};

/**
 * Readiness of a consuming node.
 * - `awaiting-input`: some required input holds no value
 * - `ready`: every required input holds a value
 * - `executed`: the unit ran and no input has arrived since
 */
export type NodeState = "awaiting-input" | "ready" | "executed";

/**
 * Any node, as seen by pipelines.
 */
export interface GraphNode {
    readonly name: string;
    readonly kind: UnitKind;
    readonly unit: PortDeclaration;
    /**
     * @returns true when the unit executed, false when inputs were incomplete.
     */
    run(): boolean;
}

/**
 * A node with an Observer: a transform or a sink.
 */
export interface ConsumingNode extends GraphNode {
    readonly observer: Observer;
    readonly state: NodeState;
}

abstract class BaseNode {
    readonly name: string;

    protected readonly guard: PropagationGuard;

    readonly #onEvent: NodeEventListener | undefined;

    #runCount = 0;

    protected constructor(unit: PortDeclaration, options: NodeOptions) {
        this.name = options.name ?? unit.name ?? unit.kind;
        this.guard = options.guard ?? defaultGuard;
        this.#onEvent = options.onEvent;
    }

    /**
     * Number of times the wrapped unit executed.
     */
    get runCount(): number {
        return this.#runCount;
    }

    protected emit(event: NodeEvent): void {
        this.#onEvent?.(event);
    }

    protected eventMetadata(): { nodeName: string; depth: number } {
        return { nodeName: this.name, depth: this.guard.depth };
    }

    /**
     * Runs the wrapped unit, reporting failures before rethrowing them.
     */
    protected execute<T>(fn: () => T): T {
        try {
            const { result, durationMs } = measure(fn);
            this.#runCount++;
            this.emit(new NodeRunEvent("executed", { ...this.eventMetadata(), durationMs }));
            return result;
        } catch (err) {
            this.emit(new ErrorEvent(err, this.eventMetadata()));
            throw err;
        }
    }

    /**
     * Readiness check shared by transforms and sinks.
     * @returns the missing required ports; empty when ready.
     */
    protected checkReady(observer: Observer, unit: PortDeclaration): string[] {
        const missing = observer.missing(unit.requiredInputs);
        if (missing.length > 0) {
            this.emit(new NodeRunEvent("waiting", { ...this.eventMetadata(), missing }));
        }
        return missing;
    }

    protected consumingState(observer: Observer, unit: PortDeclaration): NodeState {
        if (this.#runCount > 0 && observer.consuming.size === 0) {
            return "executed";
        }
        return observer.missing(unit.requiredInputs).length === 0 ? "ready" : "awaiting-input";
    }
}

/**
 * A node with an Observable: a source or a transform. Provides the wiring
 * operations.
 */
export abstract class ObservableNode extends BaseNode implements GraphNode {
    abstract readonly kind: UnitKind;

    abstract readonly unit: PortDeclaration;

    readonly observable: Observable;

    protected constructor(unit: PortDeclaration, options: NodeOptions) {
        super(unit, options);
        this.observable = new Observable(this.name);
    }

    abstract run(): boolean;

    /**
     * Subscribes `consumer` to this node: whenever this node runs, its
     * `sourcePort` output is delivered to the consumer's `destPort` input.
     * @throws PortError when either port is undeclared or their schemas are incompatible.
     */
    attach(consumer: ConsumingNode, sourcePort: string, destPort: string): void {
        const warnings = validatePortBinding({
            producer: this.unit,
            consumer: consumer.unit,
            sourcePort,
            destPort,
            producerName: this.name,
            consumerName: consumer.name,
        });
        for (const message of warnings) {
            this.emit(new LogEvent("warn", message, { nodeName: this.name }));
        }

        this.observable.register(consumer.observer, sourcePort, destPort);
        this.emit(
            new LogEvent("debug", `Attached '${consumer.name}' (${sourcePort} -> ${destPort})`, {
                nodeName: this.name,
                details: { consumer: consumer.name, sourcePort, destPort },
            })
        );
    }

    /**
     * Removes every subscription of `consumer`. No-op when it is not attached.
     */
    detach(consumer: ConsumingNode): void {
        this.observable.unregister(consumer.observer);
    }

    /**
     * Stores outputs and delivers them downstream.
     */
    protected publish(outputs: Readonly<Record<string, unknown>>): void {
        this.observable.provide(outputs);
        this.observable.notify();
    }
}

/**
 * Entry point of a graph: wraps a producer and is always ready.
 */
export class NodeIn<Out extends PortShape = PortShape> extends ObservableNode {
    readonly kind = "producer";

    constructor(readonly unit: Producer<Out>, options: NodeOptions = {}) {
        super(unit, options);
    }

    /**
     * Runs the producer and propagates its outputs. Always returns true.
     */
    run(): boolean {
        return this.guard.track(this.name, () => {
            this.publish(this.execute(() => this.unit.run()));
            return true;
        });
    }
}

/**
 * Wraps a transform: consumes through its Observer and produces through its
 * Observable. `run()` is bound as the Observer's update hook.
 */
export class NodeProc<In extends PortShape = PortShape, Out extends PortShape = PortShape>
    extends ObservableNode
    implements ConsumingNode
{
    readonly kind = "transform";

    readonly observer: Observer;

    constructor(readonly unit: Transform<In, Out>, options: NodeOptions = {}) {
        super(unit, options);
        this.observer = new Observer(() => {
            this.run();
        });
    }

    get state(): NodeState {
        return this.consumingState(this.observer, this.unit);
    }

    /**
     * Executes the transform if every required input holds a value.
     * Otherwise returns false and leaves inputs and outputs untouched.
     * On success the outputs are merged into `providing`, the consumed
     * inputs are cleared and subscribers are notified.
     */
    run(): boolean {
        if (this.checkReady(this.observer, this.unit).length > 0) {
            return false;
        }

        return this.guard.track(this.name, () => {
            const outputs = this.execute(() => this.unit.run(this.observer.snapshot()));
            this.observable.provide(outputs);
            this.observer.clear();
            this.observable.notify();
            return true;
        });
    }
}

/**
 * Terminal node: wraps a sink, which performs a side effect and returns nothing.
 */
export class NodeOut<In extends PortShape = PortShape> extends BaseNode implements ConsumingNode {
    readonly kind = "sink";

    readonly observer: Observer;

    constructor(readonly unit: Sink<In>, options: NodeOptions = {}) {
        super(unit, options);
        this.observer = new Observer(() => {
            this.run();
        });
    }

    get state(): NodeState {
        return this.consumingState(this.observer, this.unit);
    }

    /**
     * Executes the sink if every required input holds a value, then clears
     * the consumed inputs.
     */
    run(): boolean {
        if (this.checkReady(this.observer, this.unit).length > 0) {
            return false;
        }

        return this.guard.track(this.name, () => {
            this.execute(() => this.unit.run(this.observer.snapshot()));
            this.observer.clear();
            return true;
        });
    }
}

/**
 * Wires `sourcePort` of `producer` to `destPort` of `consumer`.
 */
export function attach(
    producer: ObservableNode,
    consumer: ConsumingNode,
    sourcePort: string,
    destPort: string
): void {
    producer.attach(consumer, sourcePort, destPort);
}

/**
 * Removes every edge from `producer` to `consumer`.
 */
export function detach(producer: ObservableNode, consumer: ConsumingNode): void {
    producer.detach(consumer);
}

/**
 * @file pipeline.ts
 * @description Assembles nodes into a named graph. A pipeline owns the nodes it
 *              creates, shares one propagation guard between them, forwards
 *              their events to its listeners and runs its entry sources.
 */

import { validatePortBinding } from "./binding.js";
import { resolvePipelineOptions, type PipelineOptions, type ResolvedPipelineOptions } from "./config.js";
import { PipelineError } from "./errors.js";
import type { NodeEvent, NodeEventListener } from "./events.js";
import { PerformanceTimer, type PerformanceStats } from "./helpers.js";
import {
    NodeIn,
    NodeOut,
    NodeProc,
    type ConsumingNode,
    type GraphNode,
    type NodeOptions,
    type ObservableNode,
} from "./nodes.js";
import { PipelineBuilder } from "./pipelineBuilder.js";
import { PropagationGuard } from "./propagation.js";
import { validateSchemaExists, type ValidationResult } from "./schema-validator.js";
import type { PortShape, Producer, Sink, Transform, UnitKind } from "./unit.js";

/**
 * Edge connecting two pipeline nodes
 */
export type PipelineEdge = {
    /**
     * Source node ID
     */
    from: string;
    /**
     * Target node ID
     */
    to: string;
    /**
     * Output port of the source node
     */
    fromOutput: string;
    /**
     * Input port of the target node
     */
    toInput: string;
};

/**
 * Connection configuration. `toInput` defaults to `fromOutput`.
 */
export type ConnectConfig = {
    fromOutput: string;
    toInput?: string;
};

/**
 * Outcome of `Pipeline.run()`.
 */
export type PipelineRunReport = {
    /**
     * IDs of the nodes whose unit executed, in execution order. A node
     * appears once per execution.
     */
    executed: string[];
    /**
     * IDs of consuming nodes left holding a partial input set.
     */
    waiting: string[];
    durationMs: number;
};

type PipelineNode = {
    id: string;
    kind: UnitKind;
    node: GraphNode;
    producer?: ObservableNode;
    consumer?: ConsumingNode;
};

export class Pipeline {
    /**
     * Creates a builder for constructing pipelines fluently.
     */
    static builder(options?: PipelineOptions): PipelineBuilder {
        return new PipelineBuilder(options);
    }

    readonly options: ResolvedPipelineOptions;

    #nodes: Map<string, PipelineNode> = new Map();

    #edges: PipelineEdge[] = [];

    #entryNodes: string[] = [];

    #listeners: Set<NodeEventListener> = new Set();

    readonly #guard: PropagationGuard;

    readonly #timer: PerformanceTimer;

    constructor(options: PipelineOptions = {}) {
        this.options = resolvePipelineOptions(options);
        this.#guard = new PropagationGuard({ maxDepth: this.options.maxDepth });
        this.#timer = new PerformanceTimer(this.options.name);
    }

    get name(): string {
        return this.options.name;
    }

    readonly #dispatch = (event: NodeEvent): void => {
        for (const listener of this.#listeners) {
            listener(event);
        }
    };

    /**
     * Registers a listener for every event emitted by this pipeline's nodes.
     * @returns A function removing the listener.
     */
    on(listener: NodeEventListener): () => void {
        this.#listeners.add(listener);
        return () => {
            this.#listeners.delete(listener);
        };
    }

    #register(id: string): void {
        if (this.#nodes.has(id)) {
            throw new PipelineError(`Node with id '${id}' already exists`, id);
        }
    }

    #nodeOptions(id: string): NodeOptions {
        return { name: id, guard: this.#guard, onEvent: this.#dispatch };
    }

    addSource<Out extends PortShape>(id: string, unit: Producer<Out>): NodeIn<Out> {
        this.#register(id);
        const node = new NodeIn(unit, this.#nodeOptions(id));
        this.#nodes.set(id, { id, kind: "producer", node, producer: node });
        return node;
    }

    addTransform<In extends PortShape, Out extends PortShape>(id: string, unit: Transform<In, Out>): NodeProc<In, Out> {
        this.#register(id);
        const node = new NodeProc(unit, this.#nodeOptions(id));
        this.#nodes.set(id, { id, kind: "transform", node, producer: node, consumer: node });
        return node;
    }

    addSink<In extends PortShape>(id: string, unit: Sink<In>): NodeOut<In> {
        this.#register(id);
        const node = new NodeOut(unit, this.#nodeOptions(id));
        this.#nodes.set(id, { id, kind: "sink", node, consumer: node });
        return node;
    }

    #get(id: string): PipelineNode {
        const entry = this.#nodes.get(id);
        if (!entry) {
            throw new PipelineError(`Node '${id}' does not exist`, id);
        }
        return entry;
    }

    #ends(from: string, to: string): { producer: ObservableNode; consumer: ConsumingNode } {
        const source = this.#get(from);
        const target = this.#get(to);
        if (!source.producer) {
            throw new PipelineError(`Node '${from}' is a ${source.kind} and has no outputs`, from);
        }
        if (!target.consumer) {
            throw new PipelineError(`Node '${to}' is a ${target.kind} and takes no inputs`, to);
        }
        return { producer: source.producer, consumer: target.consumer };
    }

    /**
     * Returns the node registered under `id`.
     */
    node(id: string): GraphNode {
        return this.#get(id).node;
    }

    /**
     * Connects an output of one node to an input of another.
     * @throws PipelineError for unknown ids or an edge starting at a sink / ending at a source.
     * @throws PortError when the ports do not exist or do not match.
     */
    connect(from: string, to: string, config: ConnectConfig): Pipeline {
        const { producer, consumer } = this.#ends(from, to);
        const toInput = config.toInput ?? config.fromOutput;

        producer.attach(consumer, config.fromOutput, toInput);
        this.#edges.push({ from, to, fromOutput: config.fromOutput, toInput });
        return this;
    }

    /**
     * Removes every edge from `from` to `to`.
     * @returns The number of edges removed.
     */
    disconnect(from: string, to: string): number {
        const { producer, consumer } = this.#ends(from, to);
        producer.detach(consumer);

        const before = this.#edges.length;
        this.#edges = this.#edges.filter((edge) => !(edge.from === from && edge.to === to));
        return before - this.#edges.length;
    }

    /**
     * Sets the sources `run()` triggers, in order. Defaults to every source in
     * insertion order.
     */
    setEntryNodes(...ids: string[]): Pipeline {
        for (const id of ids) {
            if (this.#get(id).kind !== "producer") {
                throw new PipelineError(`Entry node '${id}' is not a source`, id);
            }
        }
        this.#entryNodes = [...ids];
        return this;
    }

    get entryNodes(): string[] {
        if (this.#entryNodes.length > 0) {
            return [...this.#entryNodes];
        }
        return [...this.#nodes.values()].filter((entry) => entry.kind === "producer").map((entry) => entry.id);
    }

    get edges(): readonly PipelineEdge[] {
        return [...this.#edges];
    }

    /**
     * Runs every entry source once, propagating through the graph.
     * Errors raised during the wave propagate to the caller.
     */
    run(): PipelineRunReport {
        const executed: string[] = [];
        const unsubscribe = this.on((event) => {
            if (event.type === "node_run" && event.status === "executed" && event.nodeName !== undefined) {
                executed.push(event.nodeName);
            }
        });

        let durationMs: number;
        this.#timer.start();
        try {
            for (const id of this.entryNodes) {
                this.#get(id).node.run();
            }
        } finally {
            durationMs = this.#timer.stop();
            unsubscribe();
        }

        const waiting = [...this.#nodes.values()]
            .filter((entry) => entry.consumer !== undefined && entry.consumer.observer.consuming.size > 0)
            .map((entry) => entry.id);

        return { executed, waiting, durationMs };
    }

    /**
     * Timing statistics over every completed `run()`.
     */
    stats(): PerformanceStats {
        return this.#timer.getStats();
    }

    /**
     * Finds a directed cycle among the edges.
     * @returns The node ids on the cycle, first id repeated at the end, or undefined.
     */
    findCycle(): string[] | undefined {
        const visited = new Set<string>();
        const visiting: string[] = [];

        const visit = (id: string): string[] | undefined => {
            if (visited.has(id)) return undefined;
            const index = visiting.indexOf(id);
            if (index >= 0) {
                return [...visiting.slice(index), id];
            }

            visiting.push(id);
            for (const edge of this.#edges) {
                if (edge.from !== id) continue;
                const cycle = visit(edge.to);
                if (cycle) return cycle;
            }
            visiting.pop();
            visited.add(id);
            return undefined;
        };

        for (const id of this.#nodes.keys()) {
            const cycle = visit(id);
            if (cycle) return cycle;
        }
        return undefined;
    }

    /**
     * Checks the assembled graph.
     * - a cycle is an error
     * - a required input with no incoming edge is a warning (the node can never run)
     * - a port whose schema cannot be inspected is a warning
     * - port schema warnings are repeated, once per distinct edge
     * - an edge registered more than once is a warning (each copy delivers)
     * - several edges into one input are a warning (last writer wins)
     */
    validate(): ValidationResult {
        const result: ValidationResult = { compatible: true, warnings: [], errors: [] };

        const cycle = this.findCycle();
        if (cycle) {
            result.errors.push(`Cycle detected: ${cycle.join(" -> ")}`);
            result.compatible = false;
        }

        for (const entry of this.#nodes.values()) {
            if (!entry.consumer) continue;
            const incoming = this.#edges.filter((edge) => edge.to === entry.id);
            for (const port of entry.node.unit.requiredInputs) {
                const writers = incoming.filter((edge) => edge.toInput === port);
                if (writers.length === 0) {
                    result.warnings.push(`Required input '${entry.id}.${port}' has no incoming edge`);
                }
            }
        }

        for (const entry of this.#nodes.values()) {
            const { unit } = entry.node;
            for (const port of unit.inputs) {
                const check = validateSchemaExists(unit.portSchema("destination", port), `input '${entry.id}.${port}'`);
                result.warnings.push(...check.warnings);
            }
            for (const port of unit.outputs) {
                const check = validateSchemaExists(unit.portSchema("source", port), `output '${entry.id}.${port}'`);
                result.warnings.push(...check.warnings);
            }
        }

        const seen = new Map<string, number>();
        const writers = new Map<string, Set<string>>();
        for (const edge of this.#edges) {
            const key = `${edge.from}.${edge.fromOutput} -> ${edge.to}.${edge.toInput}`;
            const count = (seen.get(key) ?? 0) + 1;
            seen.set(key, count);
            if (count === 1) {
                result.warnings.push(
                    ...validatePortBinding({
                        producer: this.#get(edge.from).node.unit,
                        consumer: this.#get(edge.to).node.unit,
                        sourcePort: edge.fromOutput,
                        destPort: edge.toInput,
                        producerName: edge.from,
                        consumerName: edge.to,
                    })
                );
            }

            const input = `${edge.to}.${edge.toInput}`;
            const sources = writers.get(input) ?? new Set<string>();
            sources.add(`${edge.from}.${edge.fromOutput}`);
            writers.set(input, sources);
        }
        for (const [key, count] of seen) {
            if (count > 1) {
                result.warnings.push(`Edge ${key} is registered ${count} times`);
            }
        }
        for (const [input, sources] of writers) {
            if (sources.size > 1) {
                result.warnings.push(`Input '${input}' has ${sources.size} writers: ${[...sources].join(", ")}`);
            }
        }

        return result;
    }

    /**
     * Returns a summary description of the pipeline
     */
    describe() {
        return {
            name: this.name,
            nodes: [...this.#nodes.values()].map((entry) => ({
                id: entry.id,
                kind: entry.kind,
                inputs: [...entry.node.unit.inputs],
                outputs: [...entry.node.unit.outputs],
            })),
            connections: this.#edges.map((edge) => ({ ...edge })),
            entryNodes: this.entryNodes,
            options: {
                maxDepth: this.options.maxDepth,
                validateOnBuild: this.options.validateOnBuild,
            },
        };
    }
}

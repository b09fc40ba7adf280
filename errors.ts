/**
 * @file errors.ts
 * @description Error classes raised by the node graph.
 */

/**
 * Base class for errors raised by nodes and pipelines.
 */
export class NodeError extends Error {
    constructor(message: string, public readonly nodeName?: string) {
        super(message);
        this.name = "NodeError";
    }
}

/**
 * Which end of an edge a port belongs to.
 */
export type PortSide = "source" | "destination";

/**
 * Raised at wiring time when an edge names a port the unit does not declare,
 * or when the two ports carry incompatible schemas.
 */
export class PortError extends NodeError {
    constructor(
        message: string,
        public readonly port: string,
        public readonly side: PortSide,
        nodeName?: string
    ) {
        super(message, nodeName);
        this.name = "PortError";
    }
}

/**
 * Raised when an Observable is asked to deliver a port it holds no value for.
 */
export class ConsistencyError extends NodeError {
    constructor(public readonly port: string, nodeName?: string) {
        super(
            `No value provided for subscribed port '${port}'${nodeName ? ` on node '${nodeName}'` : ""}`,
            nodeName
        );
        this.name = "ConsistencyError";
    }
}

/**
 * Raised when propagation nests deeper than the configured limit, or when a
 * pipeline contains a cycle. `path` lists the node names involved, outermost first.
 */
export class GraphCycleError extends NodeError {
    constructor(message: string, public readonly path: readonly string[]) {
        super(message, path[path.length - 1]);
        this.name = "GraphCycleError";
    }
}

/**
 * Raised by pipeline assembly for unknown or duplicate node ids and for
 * edges that start at a sink or end at a source.
 */
export class PipelineError extends NodeError {
    constructor(message: string, nodeName?: string) {
        super(message, nodeName);
        this.name = "PipelineError";
    }
}

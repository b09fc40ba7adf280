/**
 * @file events.ts
 * @description Event types emitted by nodes while a propagation wave runs.
 *              Nodes hand these to the `onEvent` listener they were built with;
 *              a Pipeline forwards them to its own listeners.
 */

/**
 * Base properties for all events emitted by a node.
 */
export type BaseNodeEvent = {
    /**
     * The specific type of the event (e.g., 'log', 'node_run').
     */
    type: string;
    /**
     * The name of the node that emitted this event.
     */
    nodeName?: string;
    /**
     * Unix timestamp (milliseconds) of when the event occurred.
     */
    timestamp: number;
    /**
     * Nesting depth of the emitting node inside the current wave.
     */
    depth?: number;
};

export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Outcome of a single `run()` call on a consuming or producing node.
 */
export type RunStatus = "executed" | "waiting";

/**
 * A union type representing any event a node can emit.
 */
export type NodeEvent = LogEvent | ErrorEvent | NodeRunEvent;

/**
 * Listener receiving node events.
 */
export type NodeEventListener = (event: NodeEvent) => void;

// Base class providing timestamp handling and metadata spread
class BaseEvent {
    /** Unix timestamp (milliseconds) of when the event occurred */
    timestamp: number;
    /** The name of the node that emitted this event */
    nodeName?: string;
    /** Nesting depth of the emitting node */
    depth?: number;

    /**
     * @param metadata Additional metadata for the event
     */
    constructor(metadata: Partial<BaseNodeEvent> = {}) {
        this.timestamp = Date.now();
        this.nodeName = metadata.nodeName;
        this.depth = metadata.depth;
    }
}

/**
 * LogEvent class representing a log message.
 */
export class LogEvent extends BaseEvent {
    readonly type = "log";
    /** The severity level of the log */
    level: LogLevel;
    /** The log message */
    message: string;
    /** Structured details attached to the message */
    details?: Record<string, unknown>;

    /**
     * @param level The severity level of the log
     * @param message The log message
     * @param metadata Additional metadata including optional details
     */
    constructor(
        level: LogLevel,
        message: string,
        metadata: Partial<BaseNodeEvent> & { details?: Record<string, unknown> } = {}
    ) {
        super(metadata);
        this.level = level;
        this.message = message;
        this.details = metadata.details;
    }
}

/**
 * ErrorEvent reports an error raised while a node was running.
 * The error itself still propagates to the caller of `run()`.
 */
export class ErrorEvent extends BaseEvent {
    readonly type = "error_event";
    /** Details of the error */
    error: {
        name: string;
        message: string;
        stack?: string;
    };

    /**
     * @param err The thrown value
     * @param metadata Additional metadata for the event
     */
    constructor(err: unknown, metadata: Partial<BaseNodeEvent> = {}) {
        super(metadata);
        if (err instanceof Error) {
            this.error = { name: err.name, message: err.message, stack: err.stack };
        } else {
            this.error = { name: "Error", message: String(err) };
        }
    }
}

/**
 * Emitted once per `run()` call that reached the readiness check.
 */
export class NodeRunEvent extends BaseEvent {
    readonly type = "node_run";
    status: RunStatus;
    /** Required input ports that held no value; empty when executed */
    missing: string[];
    /** Wall time of the wrapped unit, not including downstream propagation */
    durationMs?: number;

    constructor(
        status: RunStatus,
        metadata: Partial<BaseNodeEvent> & { missing?: string[]; durationMs?: number } = {}
    ) {
        super(metadata);
        this.status = status;
        this.missing = metadata.missing ?? [];
        this.durationMs = metadata.durationMs;
    }
}

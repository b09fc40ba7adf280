/**
 * @file observer.ts
 * @description The consuming half of a node: collects values delivered to its
 *              input ports and pokes its owner after every delivery.
 */

/**
 * Accumulates inbound values addressed to named input ports.
 */
export class Observer {
    /**
     * Most recently delivered value per port. Values survive across
     * deliveries until the owning node runs successfully.
     */
    readonly consuming: Map<string, unknown> = new Map();

    /**
     * Invoked after every delivery; nodes bind their `run()` here.
     */
    updateHook: () => void;

    constructor(updateHook: () => void = () => {}) {
        this.updateHook = updateHook;
    }

    /**
     * Stores `value` under `port`, overwriting any earlier value, then calls
     * the update hook. Every delivery triggers the hook; there is no batching.
     */
    update(port: string, value: unknown): void {
        this.consuming.set(port, value);
        this.updateHook();
    }

    has(port: string): boolean {
        return this.consuming.has(port);
    }

    get(port: string): unknown {
        return this.consuming.get(port);
    }

    /**
     * Ports among `required` that hold no value yet.
     */
    missing(required: readonly string[]): string[] {
        return required.filter((port) => !this.consuming.has(port));
    }

    /**
     * Plain-object copy of the consumed values.
     */
    snapshot(): Record<string, unknown> {
        return Object.fromEntries(this.consuming);
    }

    clear(): void {
        this.consuming.clear();
    }
}

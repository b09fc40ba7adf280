/**
 * @file propagation.ts
 * @description Depth guard for propagation waves. Propagation is a plain
 *              synchronous call chain (notify → update → run → notify ...);
 *              the guard tracks that chain and stops it with a
 *              GraphCycleError before the platform stack runs out.
 */

import { resolvePropagationOptions, type PropagationOptions } from "./config.js";
import { GraphCycleError } from "./errors.js";

export class PropagationGuard {
    readonly maxDepth: number;

    /**
     * Names of the nodes currently executing, outermost first.
     */
    #chain: string[] = [];

    constructor(options: PropagationOptions = {}) {
        this.maxDepth = resolvePropagationOptions(options).maxDepth;
    }

    /**
     * Number of nodes currently executing in the active wave.
     */
    get depth(): number {
        return this.#chain.length;
    }

    get chain(): readonly string[] {
        return [...this.#chain];
    }

    /**
     * Runs `fn` as node `name`, one level deeper in the current wave.
     * The level is released however `fn` ends.
     * @throws GraphCycleError when the wave is already `maxDepth` nodes deep.
     */
    track<T>(name: string, fn: () => T): T {
        if (this.#chain.length >= this.maxDepth) {
            const path = [...this.#chain, name];
            throw new GraphCycleError(
                `Propagation exceeded depth ${this.maxDepth} at node '${name}'; ` +
                `the graph likely contains a cycle (${summarizePath(path)})`,
                path
            );
        }

        this.#chain.push(name);
        try {
            return fn();
        } finally {
            this.#chain.pop();
        }
    }
}

/**
 * Shortens long chains to their tail, where a cycle repeats.
 */
function summarizePath(path: readonly string[], keep = 8): string {
    if (path.length <= keep) {
        return path.join(" -> ");
    }
    return `... -> ${path.slice(-keep).join(" -> ")}`;
}

/**
 * Guard shared by nodes constructed without one.
 */
export const defaultGuard = new PropagationGuard();

/**
 * @file observable.ts
 * @description The producing half of a node: holds the latest outputs and the
 *              ordered list of subscriptions they are delivered to.
 */

import { ConsistencyError } from "./errors.js";
import type { Observer } from "./observer.js";

/**
 * One edge: deliver `sourcePort` of the owning node to `destPort` of `observer`.
 */
export type Subscription = {
    readonly observer: Observer;
    readonly sourcePort: string;
    readonly destPort: string;
};

/**
 * Holds a node's produced values and fans them out to subscribers.
 */
export class Observable {
    /**
     * Latest value per output port, merged on every run.
     */
    readonly providing: Map<string, unknown> = new Map();

    #subscriptions: Subscription[] = [];

    /**
     * @param ownerName - Name of the owning node, used in error messages.
     */
    constructor(readonly ownerName?: string) {}

    /**
     * Appends a subscription. The same triple may be registered more than
     * once; each registration is delivered separately.
     */
    register(observer: Observer, sourcePort: string, destPort: string): void {
        this.#subscriptions.push({ observer, sourcePort, destPort });
    }

    /**
     * Removes every subscription targeting `observer`.
     */
    unregister(observer: Observer): void {
        this.#subscriptions = this.#subscriptions.filter((sub) => sub.observer !== observer);
    }

    /**
     * Merges `values` into `providing`.
     */
    provide(values: Readonly<Record<string, unknown>>): void {
        for (const [port, value] of Object.entries(values)) {
            this.providing.set(port, value);
        }
    }

    /**
     * Delivers the provided values to every subscription, in registration order.
     * Subscriptions added or removed by downstream nodes during delivery take
     * effect from the next call.
     * @throws ConsistencyError when a subscribed port has no provided value.
     */
    notify(): void {
        for (const { observer, sourcePort, destPort } of [...this.#subscriptions]) {
            if (!this.providing.has(sourcePort)) {
                throw new ConsistencyError(sourcePort, this.ownerName);
            }
            observer.update(destPort, this.providing.get(sourcePort));
        }
    }

    /**
     * Subscribed observers, one entry per subscription.
     */
    get observers(): readonly Observer[] {
        return this.#subscriptions.map((sub) => sub.observer);
    }

    get subscriptions(): readonly Subscription[] {
        return [...this.#subscriptions];
    }
}

/**
 * @file binding.ts
 * @description Wiring-time validation of (output field, input parameter) pairs.
 */

import { PortError } from "./errors.js";
import { validateZodTypeCompatibility, type ValidationResult } from "./schema-validator.js";
import type { PortDeclaration } from "./unit.js";

/**
 * The two ends of a proposed edge.
 */
export type PortBinding = {
    producer: PortDeclaration;
    consumer: PortDeclaration;
    sourcePort: string;
    destPort: string;
    /** Node names for messages; fall back to the unit names */
    producerName?: string;
    consumerName?: string;
};

/**
 * Checks that `sourcePort` is an output of the producer, that `destPort` is an
 * input of the consumer, and that the two port schemas are compatible.
 *
 * @returns Compatibility warnings worth reporting; empty when the ports match cleanly.
 * @throws PortError for an undeclared port or incompatible schemas.
 */
export function validatePortBinding(binding: PortBinding): string[] {
    const { producer, consumer, sourcePort, destPort } = binding;
    const producerName = binding.producerName ?? producer.name ?? producer.kind;
    const consumerName = binding.consumerName ?? consumer.name ?? consumer.kind;

    const sourceSchema = producer.portSchema("source", sourcePort);
    if (!sourceSchema) {
        throw new PortError(
            `'${producerName}' has no output '${sourcePort}' (outputs: ${formatPorts(producer.outputs)})`,
            sourcePort,
            "source",
            producerName
        );
    }

    const destSchema = consumer.portSchema("destination", destPort);
    if (!destSchema) {
        throw new PortError(
            `'${consumerName}' has no input '${destPort}' (inputs: ${formatPorts(consumer.inputs)})`,
            destPort,
            "destination",
            consumerName
        );
    }

    const result: ValidationResult = validateZodTypeCompatibility(sourceSchema, destSchema);
    if (!result.compatible) {
        throw new PortError(
            `Cannot bind '${producerName}.${sourcePort}' to '${consumerName}.${destPort}': ${result.errors.join(", ")}`,
            destPort,
            "destination",
            consumerName
        );
    }

    return result.warnings.map(
        (warning) => `'${producerName}.${sourcePort}' -> '${consumerName}.${destPort}': ${warning}`
    );
}

function formatPorts(ports: readonly string[]): string {
    return ports.length > 0 ? ports.join(", ") : "none";
}

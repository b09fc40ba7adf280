/**
 * @file unit.ts
 * @description Processing units: the logic a node wraps. A unit declares its
 *              ports as Zod object shapes; port names, required inputs and
 *              per-port schemas are resolved once, at construction.
 */

import { z } from "zod";
import type { PortSide } from "./errors.js";

/**
 * Zod shape declaring a unit's ports, one schema per port name.
 */
export type PortShape = z.ZodRawShape;

/**
 * Shape of a unit with no ports on one side.
 */
export type NoPorts = Record<string, never>;

/**
 * Values carried by a set of ports, after parsing.
 */
export type PortValues<S extends PortShape> = z.output<z.ZodObject<S>>;

/**
 * The three capability shapes a unit can take.
 */
export type UnitKind = "producer" | "transform" | "sink";

/**
 * Untyped record of port values, as held by Observers and Observables.
 */
export type PortRecord = Readonly<Record<string, unknown>>;

/**
 * Port information every unit exposes to nodes and wiring checks.
 */
export interface PortDeclaration {
    readonly kind: UnitKind;
    readonly name?: string;
    /** Every input parameter name, in declaration order */
    readonly inputs: readonly string[];
    /** Input parameters that must hold a value before the unit can run */
    readonly requiredInputs: readonly string[];
    /** Every output field name, in declaration order */
    readonly outputs: readonly string[];
    /**
     * Schema of one port, or undefined when the unit does not declare it.
     */
    portSchema(side: PortSide, port: string): z.ZodTypeAny | undefined;
}

/**
 * Configuration options shared by every unit.
 */
export type UnitOptions = {
    /**
     * An optional name, used as the default name of nodes wrapping this unit.
     */
    name?: string;
    /**
     * An optional description of what this unit does.
     */
    description?: string;
    /**
     * Whether results are parsed through the output schema. When off, results
     * are passed on as returned and only checked for declared ports at delivery.
     */
    validateOutput?: boolean;
};

/**
 * Whether a port is declared optional, through `.optional()` or `.default()`.
 * Schemas that merely accept `undefined`, such as `z.unknown()`, `z.any()` or
 * `z.custom()`, still mark a required port.
 */
export function isOptionalPort(schema: z.ZodTypeAny): boolean {
    if (schema instanceof z.ZodEffects) {
        return isOptionalPort(schema.innerType());
    }
    if (schema instanceof z.ZodNullable) {
        return isOptionalPort(schema.unwrap());
    }
    return schema instanceof z.ZodOptional || schema instanceof z.ZodDefault;
}

type OutputView = { parse(data: unknown): Record<string, unknown> };

/**
 * Base class holding the port declarations and schema handling common to
 * producers, transforms and sinks.
 *
 * @template In - Shape of the input parameters.
 * @template Out - Shape of the output fields.
 */
export abstract class ProcessingUnit<In extends PortShape, Out extends PortShape> implements PortDeclaration {
    abstract readonly kind: UnitKind;

    name?: string;

    description?: string;

    validateOutput: boolean;

    /**
     * Schema of the input parameters. Inputs are always parsed through it,
     * so defaults apply and undeclared keys are dropped.
     */
    readonly inputSchema: z.ZodObject<In>;

    /**
     * Schema of the output fields.
     */
    readonly outputSchema: z.ZodObject<Out>;

    readonly inputs: readonly string[];

    readonly requiredInputs: readonly string[];

    readonly outputs: readonly string[];

    /**
     * Untyped view of the output schema used at the node boundary.
     */
    readonly #outputView: OutputView;

    protected constructor(inputShape: In, outputShape: Out, options: UnitOptions = {}) {
        this.name = options.name;
        this.description = options.description;
        this.validateOutput = options.validateOutput !== false;
        this.inputSchema = z.object(inputShape);
        this.outputSchema = z.object(outputShape);

        const inputs: PortShape = inputShape;
        const outputs: PortShape = outputShape;
        this.inputs = Object.keys(inputs);
        this.requiredInputs = Object.entries(inputs)
            .filter(([, schema]) => !isOptionalPort(schema))
            .map(([port]) => port);
        this.outputs = Object.keys(outputs);
        this.#outputView = this.validateOutput
            ? z.object(outputs)
            : z.object({}).passthrough();
    }

    portSchema(side: PortSide, port: string): z.ZodTypeAny | undefined {
        const shape: PortShape = side === "source" ? this.outputSchema.shape : this.inputSchema.shape;
        const ports = side === "source" ? this.outputs : this.inputs;
        return ports.includes(port) ? shape[port] : undefined;
    }

    /**
     * Converts a typed result into the record handed to an Observable.
     */
    protected toRecord(values: PortValues<Out>): Record<string, unknown> {
        return this.#outputView.parse(values);
    }

    /**
     * Returns a formatted help message showing the unit's ports.
     */
    help(): string {
        const lines = [];

        lines.push("═".repeat(60));
        lines.push(`  ${this.name || `Unnamed ${this.kind}`}`);
        lines.push("═".repeat(60));

        if (this.description) {
            lines.push("");
            lines.push("Description:");
            lines.push(`  ${this.description}`);
        }

        if (this.kind !== "producer") {
            lines.push("");
            lines.push("Inputs:");
            lines.push(`  ${this.#formatZodSchema(this.inputSchema)}`);
        }

        if (this.kind !== "sink") {
            lines.push("");
            lines.push("Outputs:");
            lines.push(`  ${this.#formatZodSchema(this.outputSchema)}`);
        }

        lines.push("");
        lines.push("═".repeat(60));

        return lines.join("\n");
    }

    #formatZodSchema(schema: z.ZodTypeAny): string {
        if (schema instanceof z.ZodString) {
            return "string";
        } else if (schema instanceof z.ZodNumber) {
            return "number";
        } else if (schema instanceof z.ZodBoolean) {
            return "boolean";
        } else if (schema instanceof z.ZodArray) {
            const element: z.ZodTypeAny = schema.element;
            return `array of ${this.#formatZodSchema(element)}`;
        } else if (schema instanceof z.ZodObject) {
            const shape: PortShape = schema.shape;
            const properties = Object.entries(shape).map(([key, propSchema]) => {
                const isOptional = isOptionalPort(propSchema);
                const actualSchema = propSchema instanceof z.ZodOptional ? propSchema.unwrap() : propSchema;
                return `${key}${isOptional ? "?" : ""}: ${this.#formatZodSchema(actualSchema)}`;
            });
            if (properties.length === 0) {
                return "{}";
            }
            return `{\n    ${properties.join(",\n    ")}\n  }`;
        } else if (schema instanceof z.ZodOptional) {
            return `${this.#formatZodSchema(schema.unwrap())} (optional)`;
        } else if (schema instanceof z.ZodDefault) {
            return this.#formatZodSchema(schema.removeDefault());
        } else if (schema instanceof z.ZodUnion) {
            const options: readonly z.ZodTypeAny[] = schema.options;
            return options.map((opt) => this.#formatZodSchema(opt)).join(" | ");
        } else if (schema instanceof z.ZodLiteral) {
            return JSON.stringify(schema.value);
        } else if (schema instanceof z.ZodEnum) {
            const values: readonly string[] = schema.options;
            return values.map((opt) => `"${opt}"`).join(" | ");
        }
        return schema.constructor.name.replace("Zod", "").toLowerCase();
    }
}

/**
 * A unit with no inputs that produces a record of named outputs.
 *
 * @example
 * class ReadSettings extends Producer<{ rate: z.ZodNumber }> {
 *     constructor() {
 *         super({ name: "settings", outputs: { rate: z.number() } });
 *     }
 *     protected invoke() {
 *         return { rate: 250 };
 *     }
 * }
 */
export abstract class Producer<Out extends PortShape> extends ProcessingUnit<NoPorts, Out> {
    readonly kind = "producer";

    protected constructor(options: UnitOptions & { outputs: Out }) {
        super({}, options.outputs, options);
    }

    /**
     * Produces the output values. Implemented by concrete producers.
     */
    protected abstract invoke(): PortValues<Out>;

    run(): Record<string, unknown> {
        return this.toRecord(this.invoke());
    }
}

/**
 * A unit taking named inputs and returning named outputs.
 */
export abstract class Transform<In extends PortShape, Out extends PortShape> extends ProcessingUnit<In, Out> {
    readonly kind = "transform";

    protected constructor(options: UnitOptions & { inputs: In; outputs: Out }) {
        super(options.inputs, options.outputs, options);
    }

    protected abstract invoke(inputs: PortValues<In>): PortValues<Out>;

    /**
     * Parses `inputs`, runs the transform and returns its outputs.
     * Parsing failures surface as `ZodError`.
     */
    run(inputs: PortRecord): Record<string, unknown> {
        return this.toRecord(this.invoke(this.inputSchema.parse(inputs)));
    }
}

/**
 * A unit taking named inputs and producing an external side effect.
 */
export abstract class Sink<In extends PortShape> extends ProcessingUnit<In, NoPorts> {
    readonly kind = "sink";

    protected constructor(options: UnitOptions & { inputs: In }) {
        super(options.inputs, {}, options);
    }

    protected abstract invoke(inputs: PortValues<In>): void;

    run(inputs: PortRecord): void {
        this.invoke(this.inputSchema.parse(inputs));
    }
}

/**
 * @file config.ts
 * @description Option schemas for propagation and pipelines. Options are parsed
 *              once at construction; missing fields take the defaults below.
 */

import { z } from "zod";

export const DEFAULT_MAX_DEPTH = 256;

export const propagationOptionsSchema = z.object({
    /**
     * Longest chain of nested node runs a single wave may build before it is
     * reported as a cycle.
     */
    maxDepth: z.number().int().positive().default(DEFAULT_MAX_DEPTH),
});

export const pipelineOptionsSchema = propagationOptionsSchema.extend({
    /**
     * Name used in events and error messages.
     */
    name: z.string().min(1).default("pipeline"),
    /**
     * Whether `build()` runs `validate()` and rejects invalid pipelines.
     */
    validateOnBuild: z.boolean().default(true),
});

export type PropagationOptions = z.input<typeof propagationOptionsSchema>;
export type ResolvedPropagationOptions = z.output<typeof propagationOptionsSchema>;

export type PipelineOptions = z.input<typeof pipelineOptionsSchema>;
export type ResolvedPipelineOptions = z.output<typeof pipelineOptionsSchema>;

export function resolvePropagationOptions(options: PropagationOptions = {}): ResolvedPropagationOptions {
    return propagationOptionsSchema.parse(options);
}

export function resolvePipelineOptions(options: PipelineOptions = {}): ResolvedPipelineOptions {
    return pipelineOptionsSchema.parse(options);
}

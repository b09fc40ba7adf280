/**
 * Example: a small signal chain.
 *
 *   samples ─► detrend ─► gain ─► output
 *                          ▲
 *   settings ──────────────┘
 *
 * `gain` needs values from two sources, so it waits after the first entry
 * node runs and executes once `settings` delivers its factor.
 */

import {z} from "zod";
import type {NodeEvent} from "../events.js";
import {collect, defineProducer, defineTransform} from "../patterns.js";
import {Pipeline} from "../pipeline.js";

const series = z.array(z.number());

export type SignalSettings = {
  samples: number[];
  factor: number;
};

export function buildSignalPipeline({samples, factor}: SignalSettings) {
  const output = collect({scaled: series}, {name: "output"});

  const pipeline = Pipeline.builder({name: "signal"})
    .source("samples", defineProducer({outputs: {samples: series}}, () => ({samples})))
    .source("settings", defineProducer({outputs: {factor: z.number()}}, () => ({factor})))
    .transform("detrend", defineTransform(
      {description: "Subtracts the mean", inputs: {samples: series}, outputs: {centered: series}},
      ({samples: values}) => {
        const mean = values.reduce((sum, value) => sum + value, 0) / Math.max(values.length, 1);
        return {centered: values.map((value) => value - mean)};
      }
    ))
    .transform("gain", defineTransform(
      {inputs: {signal: series, factor: z.number()}, outputs: {scaled: series}},
      ({signal, factor: k}) => ({scaled: signal.map((value) => value * k)})
    ))
    .sink("output", output)
    .connect("samples", "detrend", {fromOutput: "samples"})
    .connect("detrend", "gain", {fromOutput: "centered", toInput: "signal"})
    .connect("settings", "gain", {fromOutput: "factor"})
    .connect("gain", "output", {fromOutput: "scaled"})
    .entry("samples", "settings")
    .build();

  return {pipeline, output};
}

/**
 * One line per event, for printing while a pipeline runs.
 */
export function formatEvent(event: NodeEvent): string {
  const node = event.nodeName ?? "?";
  switch (event.type) {
    case "log":
      return `[${node}] ${event.level}: ${event.message}`;
    case "error_event":
      return `[${node}] error: ${event.error.message}`;
    case "node_run":
      return event.status === "executed"
        ? `[${node}] executed`
        : `[${node}] waiting for ${event.missing.join(", ")}`;
  }
}

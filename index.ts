/**
 * @file index.ts
 * @description Entry point of the portflow package.
 */

// Processing units
export {ProcessingUnit, Producer, Transform, Sink, isOptionalPort} from "./unit.js";
export type {
  PortShape,
  PortValues,
  PortRecord,
  PortDeclaration,
  NoPorts,
  UnitKind,
  UnitOptions,
} from "./unit.js";

// Observer machinery
export {Observer} from "./observer.js";
export {Observable} from "./observable.js";
export type {Subscription} from "./observable.js";

// Nodes and wiring
export {ObservableNode, NodeIn, NodeProc, NodeOut, attach, detach} from "./nodes.js";
export type {NodeOptions, NodeState, GraphNode, ConsumingNode} from "./nodes.js";
export {validatePortBinding} from "./binding.js";
export type {PortBinding} from "./binding.js";
export {PropagationGuard, defaultGuard} from "./propagation.js";

// Pipelines
export {Pipeline} from "./pipeline.js";
export {PipelineBuilder} from "./pipelineBuilder.js";
export type {PipelineEdge, ConnectConfig, PipelineRunReport} from "./pipeline.js";

// Configuration
export {
  DEFAULT_MAX_DEPTH,
  propagationOptionsSchema,
  pipelineOptionsSchema,
  resolvePropagationOptions,
  resolvePipelineOptions,
} from "./config.js";
export type {PropagationOptions, PipelineOptions} from "./config.js";

// Errors
export {NodeError, PortError, ConsistencyError, GraphCycleError, PipelineError} from "./errors.js";
export type {PortSide} from "./errors.js";

// Schema validation
export {validateZodTypeCompatibility, validateSchemaExists, extractSchemaInfo} from "./schema-validator.js";
export type {ValidationResult, SchemaInfo} from "./schema-validator.js";

// Export zod for port declarations
export {z} from "zod";

// Helpers
export {PerformanceTimer, measure} from "./helpers.js";
export type {PerformanceStats, MeasureResult} from "./helpers.js";

// Events
export {LogEvent, ErrorEvent, NodeRunEvent} from "./events.js";
export type {BaseNodeEvent, NodeEvent, NodeEventListener, LogLevel, RunStatus} from "./events.js";

// Unit factories
export {
  FunctionProducer,
  FunctionTransform,
  FunctionSink,
  CollectSink,
  defineProducer,
  defineTransform,
  defineSink,
  constant,
  collect,
} from "./patterns.js";

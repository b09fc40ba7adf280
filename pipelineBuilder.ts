import type {PipelineOptions} from "./config.js";
import {GraphCycleError, PipelineError} from "./errors.js";
import type {NodeEventListener} from "./events.js";
import {Pipeline, type ConnectConfig} from "./pipeline.js";
import type {PortShape, Producer, Sink, Transform} from "./unit.js";

/**
 * Builder class for constructing Pipeline instances with a fluent API.
 */
export class PipelineBuilder {
  /**
   * The pipeline being built
   */
  readonly #pipeline: Pipeline;

  constructor(options?: PipelineOptions) {
    this.#pipeline = new Pipeline(options);
  }

  /**
   * Adds a source node.
   */
  source<Out extends PortShape>(id: string, unit: Producer<Out>): PipelineBuilder {
    this.#pipeline.addSource(id, unit);
    return this;
  }

  /**
   * Adds a transform node.
   */
  transform<In extends PortShape, Out extends PortShape>(id: string, unit: Transform<In, Out>): PipelineBuilder {
    this.#pipeline.addTransform(id, unit);
    return this;
  }

  /**
   * Adds a sink node.
   */
  sink<In extends PortShape>(id: string, unit: Sink<In>): PipelineBuilder {
    this.#pipeline.addSink(id, unit);
    return this;
  }

  /**
   * Connects two nodes.
   */
  connect(from: string, to: string, config: ConnectConfig): PipelineBuilder {
    this.#pipeline.connect(from, to, config);
    return this;
  }

  /**
   * Sets entry nodes.
   */
  entry(...nodeIds: string[]): PipelineBuilder {
    this.#pipeline.setEntryNodes(...nodeIds);
    return this;
  }

  /**
   * Registers an event listener.
   */
  on(listener: NodeEventListener): PipelineBuilder {
    this.#pipeline.on(listener);
    return this;
  }

  /**
   * Builds and returns the configured pipeline. Unless `validateOnBuild` is
   * off, the pipeline is validated first: errors are thrown and warnings are
   * written to the console.
   */
  build(): Pipeline {
    const pipeline = this.#pipeline;
    if (!pipeline.options.validateOnBuild) {
      return pipeline;
    }

    const cycle = pipeline.findCycle();
    if (cycle) {
      throw new GraphCycleError(`Pipeline '${pipeline.name}' contains a cycle: ${cycle.join(" -> ")}`, cycle);
    }

    const {compatible, errors, warnings} = pipeline.validate();
    if (!compatible) {
      throw new PipelineError(`Pipeline '${pipeline.name}' is invalid: ${errors.join(", ")}`);
    }

    if (warnings.length > 0) {
      globalThis.console.warn(`Pipeline '${pipeline.name}' validation warnings:`);
      for (const warning of warnings) {
        globalThis.console.warn(`- ${warning}`);
      }
    }

    return pipeline;
  }
}

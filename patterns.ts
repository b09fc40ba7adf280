import {Producer, Sink, Transform, type PortShape, type PortValues, type UnitOptions} from "./unit.js";

/**
 * Producer backed by a plain function.
 */
export class FunctionProducer<Out extends PortShape> extends Producer<Out> {
  readonly #produce: () => PortValues<Out>;

  constructor(options: UnitOptions & { outputs: Out }, produce: () => PortValues<Out>) {
    super(options);
    this.#produce = produce;
  }

  protected invoke(): PortValues<Out> {
    return this.#produce();
  }
}

/**
 * Transform backed by a plain function.
 */
export class FunctionTransform<In extends PortShape, Out extends PortShape> extends Transform<In, Out> {
  readonly #transform: (inputs: PortValues<In>) => PortValues<Out>;

  constructor(
    options: UnitOptions & { inputs: In; outputs: Out },
    transform: (inputs: PortValues<In>) => PortValues<Out>
  ) {
    super(options);
    this.#transform = transform;
  }

  protected invoke(inputs: PortValues<In>): PortValues<Out> {
    return this.#transform(inputs);
  }
}

/**
 * Sink backed by a plain function.
 */
export class FunctionSink<In extends PortShape> extends Sink<In> {
  readonly #consume: (inputs: PortValues<In>) => void;

  constructor(options: UnitOptions & { inputs: In }, consume: (inputs: PortValues<In>) => void) {
    super(options);
    this.#consume = consume;
  }

  protected invoke(inputs: PortValues<In>): void {
    this.#consume(inputs);
  }
}

/**
 * Sink that keeps every input set it receives, in arrival order.
 */
export class CollectSink<In extends PortShape> extends Sink<In> {
  readonly received: PortValues<In>[] = [];

  constructor(options: UnitOptions & { inputs: In }) {
    super(options);
  }

  protected invoke(inputs: PortValues<In>): void {
    this.received.push(inputs);
  }
}

/**
 * Defines a producer from a function.
 *
 * @example
 * const settings = defineProducer(
 *   { name: "settings", outputs: { rate: z.number() } },
 *   () => ({ rate: 250 })
 * );
 */
export function defineProducer<Out extends PortShape>(
  options: UnitOptions & { outputs: Out },
  produce: () => PortValues<Out>
): FunctionProducer<Out> {
  return new FunctionProducer(options, produce);
}

/**
 * Defines a transform from a function.
 */
export function defineTransform<In extends PortShape, Out extends PortShape>(
  options: UnitOptions & { inputs: In; outputs: Out },
  transform: (inputs: PortValues<In>) => PortValues<Out>
): FunctionTransform<In, Out> {
  return new FunctionTransform(options, transform);
}

/**
 * Defines a sink from a function.
 */
export function defineSink<In extends PortShape>(
  options: UnitOptions & { inputs: In },
  consume: (inputs: PortValues<In>) => void
): FunctionSink<In> {
  return new FunctionSink(options, consume);
}

/**
 * Producer that always emits the same values.
 */
export function constant<Out extends PortShape>(
  outputs: Out,
  values: PortValues<Out>,
  options: UnitOptions = {}
): FunctionProducer<Out> {
  return new FunctionProducer({name: "constant", ...options, outputs}, () => values);
}

/**
 * Sink that records what it receives.
 */
export function collect<In extends PortShape>(inputs: In, options: UnitOptions = {}): CollectSink<In> {
  return new CollectSink({name: "collect", ...options, inputs});
}

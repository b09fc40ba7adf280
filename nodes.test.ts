import {describe, expect, it} from "vitest";
import {z} from "zod";
import {ConsistencyError, GraphCycleError, PortError} from "./errors.js";
import {ErrorEvent, LogEvent, NodeRunEvent, type NodeEvent} from "./events.js";
import {NodeIn, NodeOut, NodeProc, attach, detach} from "./nodes.js";
import {collect, constant, defineSink, defineTransform} from "./patterns.js";
import {PropagationGuard} from "./propagation.js";

const addOne = () =>
  defineTransform({name: "add-one", inputs: {x: z.number()}, outputs: {y: z.number()}}, ({x}) => ({y: x + 1}));

const sum = () =>
  defineTransform(
    {name: "sum", inputs: {a: z.number(), b: z.number()}, outputs: {total: z.number()}},
    ({a, b}) => ({total: a + b})
  );

describe("attach / detach", () => {
  it("registers the consumer's observer on the producer", () => {
    const source = new NodeIn(constant({x: z.number()}, {x: 1}));
    const consumer = new NodeProc(addOne());

    source.attach(consumer, "x", "x");

    expect(source.observable.observers).toContain(consumer.observer);
  });

  it("rejects a source port the producer does not declare", () => {
    const source = new NodeIn(constant({x: z.number()}, {x: 1}), {name: "reader"});
    const consumer = new NodeProc(addOne());

    expect(() => source.attach(consumer, "absent", "x")).toThrow(PortError);
    expect(() => source.attach(consumer, "absent", "x")).toThrow("'reader' has no output 'absent' (outputs: x)");
  });

  it("rejects a destination port the consumer does not declare", () => {
    const source = new NodeIn(constant({x: z.number()}, {x: 1}));
    const consumer = new NodeProc(addOne(), {name: "adder"});

    let caught: unknown;
    try {
      source.attach(consumer, "x", "absent");
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(PortError);
    if (caught instanceof PortError) {
      expect(caught.side).toBe("destination");
      expect(caught.port).toBe("absent");
      expect(caught.message).toBe("'adder' has no input 'absent' (inputs: x)");
    }
    expect(source.observable.observers).toHaveLength(0);
  });

  it("rejects ports with incompatible schemas", () => {
    const source = new NodeIn(constant({label: z.string()}, {label: "a"}));
    const consumer = new NodeProc(addOne());

    expect(() => source.attach(consumer, "label", "x")).toThrow(PortError);
  });

  it("reports schema warnings as log events", () => {
    const events: NodeEvent[] = [];
    const source = new NodeIn(constant({v: z.number().optional()}, {v: 1}), {
      name: "src",
      onEvent: (event) => events.push(event),
    });
    const consumer = new NodeOut(collect({v: z.number()}), {name: "dst"});

    source.attach(consumer, "v", "v");

    const warnings = events.filter((event): event is LogEvent => event instanceof LogEvent && event.level === "warn");
    expect(warnings.map((event) => event.message)).toEqual([
      "'src.v' -> 'dst.v': Output is optional but input is required",
    ]);
  });

  it("stops delivering to a detached consumer", () => {
    const source = new NodeIn(constant({x: z.number()}, {x: 1}));
    const collector = collect({x: z.number()});
    const sink = new NodeOut(collector);
    attach(source, sink, "x", "x");

    detach(source, sink);
    source.run();

    expect(source.observable.observers).not.toContain(sink.observer);
    expect(collector.received).toEqual([]);
  });

  it("treats detaching an unattached consumer as a no-op", () => {
    const source = new NodeIn(constant({x: z.number()}, {x: 1}));
    const attached = new NodeOut(collect({x: z.number()}));
    source.attach(attached, "x", "x");

    source.detach(new NodeOut(collect({x: z.number()})));

    expect(source.observable.observers).toEqual([attached.observer]);
  });
});

describe("NodeProc", () => {
  it("runs only once every required input is present", () => {
    const node = new NodeProc(sum());

    expect(node.run()).toBe(false);
    expect(node.observable.providing.size).toBe(0);

    node.observer.consuming.set("a", 1);
    expect(node.run()).toBe(false);
    expect(node.observable.providing.size).toBe(0);
    expect(node.observer.get("a")).toBe(1);

    node.observer.consuming.set("b", 2);
    expect(node.run()).toBe(true);
    expect(node.observable.providing.get("total")).toBe(3);
    expect(node.observer.consuming.size).toBe(0);
  });

  it("moves through awaiting-input, ready and executed", () => {
    const node = new NodeProc(sum());
    expect(node.state).toBe("awaiting-input");

    node.observer.consuming.set("a", 1);
    node.observer.consuming.set("b", 2);
    expect(node.state).toBe("ready");

    node.run();
    expect(node.state).toBe("executed");
    expect(node.runCount).toBe(1);

    node.observer.update("a", 5);
    expect(node.state).toBe("awaiting-input");
  });

  it("runs as soon as the required inputs arrive when the rest are optional", () => {
    const node = new NodeProc(
      defineTransform(
        {inputs: {a: z.number(), scale: z.number().default(10)}, outputs: {out: z.number()}},
        ({a, scale}) => ({out: a * scale})
      )
    );

    node.observer.update("a", 2);

    expect(node.observable.providing.get("out")).toBe(20);
  });

  it("waits for every input of an opaque type", () => {
    const node = new NodeProc(
      defineTransform({inputs: {raw: z.unknown(), events: z.unknown()}, outputs: {n: z.number()}}, () => ({n: 1}))
    );

    node.observer.update("raw", [0.1, 0.2]);
    expect(node.state).toBe("awaiting-input");
    expect(node.observable.providing.size).toBe(0);

    node.observer.update("events", []);
    expect(node.observable.providing.get("n")).toBe(1);
  });

  it("emits a waiting event naming the missing ports", () => {
    const events: NodeEvent[] = [];
    const node = new NodeProc(sum(), {name: "sum", onEvent: (event) => events.push(event)});

    node.observer.update("a", 1);

    expect(events).toHaveLength(1);
    const [event] = events;
    expect(event).toBeInstanceOf(NodeRunEvent);
    if (event instanceof NodeRunEvent) {
      expect(event.status).toBe("waiting");
      expect(event.missing).toEqual(["b"]);
      expect(event.nodeName).toBe("sum");
    }
  });

  it("propagates errors from the transform and keeps its inputs", () => {
    const events: NodeEvent[] = [];
    const failing = defineTransform({inputs: {x: z.number()}, outputs: {y: z.number()}}, () => {
      throw new Error("boom");
    });
    const node = new NodeProc(failing, {onEvent: (event) => events.push(event)});
    node.observer.consuming.set("x", 1);

    expect(() => node.run()).toThrow("boom");
    expect(node.observer.get("x")).toBe(1);
    expect(node.observable.providing.size).toBe(0);

    const errors = events.filter((event): event is ErrorEvent => event instanceof ErrorEvent);
    expect(errors.map((event) => event.error.message)).toEqual(["boom"]);
  });

  it("surfaces inputs that fail the input schema", () => {
    const node = new NodeProc(addOne());
    node.observer.consuming.set("x", "not a number");

    expect(() => node.run()).toThrow(z.ZodError);
  });

  it("fails with a consistency error when a subscribed output was not produced", () => {
    const partial = defineTransform(
      {inputs: {x: z.number()}, outputs: {y: z.number(), extra: z.number().optional()}},
      ({x}) => ({y: x})
    );
    const node = new NodeProc(partial, {name: "partial"});
    node.attach(new NodeOut(collect({v: z.number()})), "extra", "v");
    node.observer.consuming.set("x", 1);

    expect(() => node.run()).toThrow(ConsistencyError);
  });
});

describe("NodeOut", () => {
  it("stays idle until its opaque inputs arrive", () => {
    const collector = collect({raw: z.any(), path: z.custom<string>()});
    const node = new NodeOut(collector);

    expect(node.run()).toBe(false);
    expect(collector.received).toEqual([]);
  });

  it("performs its side effect only when ready, then clears its inputs", () => {
    const written: string[] = [];
    const node = new NodeOut(defineSink({inputs: {raw: z.string()}}, ({raw}) => {
      written.push(raw);
    }));

    expect(node.run()).toBe(false);
    expect(written).toEqual([]);

    node.observer.consuming.set("raw", "data");
    expect(node.run()).toBe(true);
    expect(written).toEqual(["data"]);
    expect(node.observer.consuming.size).toBe(0);
    expect(node.state).toBe("executed");
  });
});

describe("propagation", () => {
  it("carries a value from source through transform to sink", () => {
    const source = new NodeIn(constant({x: z.number()}, {x: 1}));
    const transform = new NodeProc(addOne());
    const written: number[] = [];
    const sink = new NodeOut(defineSink({inputs: {z: z.number()}}, (inputs) => {
      written.push(inputs.z);
    }));
    source.attach(transform, "x", "x");
    transform.attach(sink, "y", "z");

    source.run();

    expect(Object.fromEntries(transform.observable.providing)).toEqual({y: 2});
    expect(written).toEqual([2]);
    expect(transform.observer.consuming.size).toBe(0);
    expect(sink.observer.consuming.size).toBe(0);
  });

  it("fans one output out to several consumers", () => {
    const source = new NodeIn(constant({x: z.number()}, {x: 1}));
    const left = new NodeProc(sum());
    const right = new NodeProc(sum());
    source.attach(left, "x", "a");
    source.attach(right, "x", "b");

    source.run();

    expect(left.observer.snapshot()).toEqual({a: 1});
    expect(right.observer.snapshot()).toEqual({b: 1});
  });

  it("runs a consumer once per duplicated edge", () => {
    const source = new NodeIn(constant({x: z.number()}, {x: 1}));
    const collector = collect({x: z.number()});
    const sink = new NodeOut(collector);
    source.attach(sink, "x", "x");
    source.attach(sink, "x", "x");

    source.run();

    expect(collector.received).toEqual([{x: 1}, {x: 1}]);
  });

  it("keeps the last value written to a port within a wave", () => {
    const source = new NodeIn(constant({p: z.number(), q: z.number()}, {p: 1, q: 5}));
    const pair = new NodeProc(
      defineTransform(
        {inputs: {a: z.number(), b: z.number()}, outputs: {pair: z.string()}},
        ({a, b}) => ({pair: `${a}:${b}`})
      )
    );
    source.attach(pair, "p", "a");
    source.attach(pair, "q", "a");
    source.attach(pair, "p", "b");

    source.run();

    expect(pair.observable.providing.get("pair")).toBe("5:1");
  });

  it("turns a cycle into a GraphCycleError", () => {
    const guard = new PropagationGuard({maxDepth: 10});
    const source = new NodeIn(constant({v: z.number()}, {v: 0}), {name: "source", guard});
    const ping = new NodeProc(
      defineTransform({inputs: {v: z.number()}, outputs: {v: z.number()}}, ({v}) => ({v: v + 1})),
      {name: "ping", guard}
    );
    const pong = new NodeProc(
      defineTransform({inputs: {v: z.number()}, outputs: {v: z.number()}}, ({v}) => ({v})),
      {name: "pong", guard}
    );
    source.attach(ping, "v", "v");
    ping.attach(pong, "v", "v");
    pong.attach(ping, "v", "v");

    let caught: unknown;
    try {
      source.run();
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(GraphCycleError);
    if (caught instanceof GraphCycleError) {
      expect(caught.path).toHaveLength(11);
      expect(caught.path.slice(0, 4)).toEqual(["source", "ping", "pong", "ping"]);
    }
    expect(guard.depth).toBe(0);
  });

  it("emits executed events in propagation order", () => {
    const events: NodeEvent[] = [];
    const onEvent = (event: NodeEvent) => events.push(event);
    const source = new NodeIn(constant({x: z.number()}, {x: 1}), {name: "s", onEvent});
    const transform = new NodeProc(addOne(), {name: "t", onEvent});
    const sink = new NodeOut(collect({y: z.number()}), {name: "w", onEvent});
    source.attach(transform, "x", "x");
    transform.attach(sink, "y", "y");

    source.run();

    const executed = events
      .filter((event): event is NodeRunEvent => event instanceof NodeRunEvent && event.status === "executed")
      .map((event) => [event.nodeName, event.depth]);
    expect(executed).toEqual([
      ["s", 1],
      ["t", 2],
      ["w", 3],
    ]);
  });
});

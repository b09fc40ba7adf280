/**
 * Timing helpers used by nodes and pipelines.
 */

/**
 * Performance statistics object
 */
export interface PerformanceStats {
  count: number;
  total: number;
  average: number;
  minimum: number;
  maximum: number;
}

function round(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Performance timer class for measuring repeated operation durations
 */
export class PerformanceTimer {
  /**
   * Name of the operation being timed
   */
  name: string;

  /**
   * Array of duration measurements
   */
  measurements: number[];

  /**
   * Start time in milliseconds
   */
  startTime: number | null;

  constructor(name: string) {
    this.name = name;
    this.measurements = [];
    this.startTime = null;
  }

  get isRunning(): boolean {
    return this.startTime !== null;
  }

  /**
   * Starts the timer
   */
  start(): PerformanceTimer {
    this.startTime = Date.now();
    return this;
  }

  /**
   * Stops the timer and records the measurement
   */
  stop(): number {
    if (this.startTime === null) {
      throw new Error(`Timer '${this.name}' is not running`);
    }

    const duration = Date.now() - this.startTime;
    this.measurements.push(duration);
    this.startTime = null;
    return duration;
  }

  /**
   * Gets performance statistics
   */
  getStats(): PerformanceStats {
    if (this.measurements.length === 0) {
      return {
        count: 0,
        total: 0,
        average: 0,
        minimum: 0,
        maximum: 0,
      };
    }

    const total = this.measurements.reduce(
      (sum, duration) => sum + duration,
      0,
    );

    return {
      count: this.measurements.length,
      total: round(total),
      average: round(total / this.measurements.length),
      minimum: round(Math.min(...this.measurements)),
      maximum: round(Math.max(...this.measurements)),
    };
  }

  /**
   * Resets the timer, clearing all measurements
   */
  reset(): PerformanceTimer {
    this.measurements = [];
    this.startTime = null;
    return this;
  }
}

/**
 * Result of a measurement operation
 */
export interface MeasureResult<T> {
  result: T;
  durationMs: number;
}

/**
 * Measures the execution time of a synchronous function.
 * Errors thrown by `fn` propagate unchanged.
 */
export function measure<T>(fn: () => T): MeasureResult<T> {
  const startTime = Date.now();
  const result = fn();
  return {
    result,
    durationMs: round(Date.now() - startTime),
  };
}

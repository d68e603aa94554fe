import type { PhaseMeasurement } from "./types";

/**
 * Measurements of one benchmark run. Only the orchestrator appends to it;
 * once sealed it is read-only and safe to hand to the aggregator.
 */
export class ResultSet {
  private readonly samples: PhaseMeasurement[] = [];
  private sealed = false;

  add(measurement: PhaseMeasurement): void {
    if (this.sealed) {
      throw new Error("Result set is sealed; no more measurements can be added");
    }
    this.samples.push(Object.freeze({ ...measurement }));
  }

  seal(): void {
    this.sealed = true;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  get size(): number {
    return this.samples.length;
  }

  values(): readonly PhaseMeasurement[] {
    return [...this.samples];
  }
}

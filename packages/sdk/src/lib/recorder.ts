import { SampleOrderError } from "./errors.js";
import type { InvocationSample } from "./types.js";

/**
 * Append-only, ordered store of measured samples.
 *
 * A sample whose `sequenceIndex` differs from the current length is rejected
 * rather than re-indexed, so a recorded sequence always matches call order.
 */
export class SampleRecorder {
  #samples: InvocationSample[] = [];
  #completed = false;

  get length(): number {
    return this.#samples.length;
  }

  get completed(): boolean {
    return this.#completed;
  }

  get samples(): readonly InvocationSample[] {
    return this.#samples;
  }

  record(sample: InvocationSample): void {
    const expected = this.#samples.length;
    if (this.#completed) {
      throw new SampleOrderError(
        `Cannot record sample ${sample.sequenceIndex}: recorder is completed`,
        expected,
        sample.sequenceIndex,
      );
    }
    if (sample.sequenceIndex !== expected) {
      throw new SampleOrderError(
        `Expected sample ${expected}, received ${sample.sequenceIndex}`,
        expected,
        sample.sequenceIndex,
      );
    }
    this.#samples.push(Object.freeze({ ...sample }));
  }

  /** Freeze the sequence and return it. Later `record` calls throw. */
  complete(): readonly InvocationSample[] {
    this.#completed = true;
    return Object.freeze([...this.#samples]);
  }
}

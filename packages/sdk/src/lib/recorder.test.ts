import { describe, expect, test } from "vitest";
import { SampleOrderError } from "./errors.js";
import { SampleRecorder } from "./recorder.js";
import type { InvocationSample } from "./types.js";

function sample(sequenceIndex: number): InvocationSample {
  return {
    sequenceIndex,
    startedAt: "2026-01-01T00:00:00.000Z",
    durationMs: 1,
    kind: "read",
    succeeded: true,
  };
}

describe("SampleRecorder", () => {
  test("appends samples in call order", () => {
    const recorder = new SampleRecorder();
    recorder.record(sample(0));
    recorder.record(sample(1));

    expect(recorder.length).toBe(2);
    expect(recorder.samples.map((s) => s.sequenceIndex)).toEqual([0, 1]);
  });

  test("rejects a sample whose index is not the current length", () => {
    const recorder = new SampleRecorder();
    recorder.record(sample(0));

    expect(() => recorder.record(sample(2))).toThrow(SampleOrderError);
    expect(() => recorder.record(sample(0))).toThrow("Expected sample 1, received 0");
    expect(recorder.length).toBe(1);
  });

  test("reports expected and received indices on rejection", () => {
    const recorder = new SampleRecorder();
    try {
      recorder.record(sample(3));
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(SampleOrderError);
      if (err instanceof SampleOrderError) {
        expect(err.expectedIndex).toBe(0);
        expect(err.receivedIndex).toBe(3);
      }
    }
  });

  test("complete() freezes the sequence", () => {
    const recorder = new SampleRecorder();
    recorder.record(sample(0));
    const samples = recorder.complete();

    expect(recorder.completed).toBe(true);
    expect(Object.isFrozen(samples)).toBe(true);
    expect(Object.isFrozen(samples[0])).toBe(true);
    expect(() => recorder.record(sample(1))).toThrow("recorder is completed");
  });

  test("stored samples are copies of the recorded input", () => {
    const recorder = new SampleRecorder();
    const input = sample(0);
    recorder.record(input);
    input.durationMs = 999;

    expect(recorder.samples[0]?.durationMs).toBe(1);
  });
});

/**
 * Tests for PPM output.
 */

import { describe, test, expect } from "vitest";
import { BufferSink, PpmWriter } from "./image";

describe("PpmWriter", () => {
  test("writes the P3 header", () => {
    const sink = new BufferSink();
    new PpmWriter(sink).header(3, 2);
    expect(sink.lines()).toEqual(["P3", "3 2", "255"]);
  });

  test("pixels reach the sink on flush, one per line", () => {
    const sink = new BufferSink();
    const writer = new PpmWriter(sink);
    writer.header(2, 1);
    writer.pixel([1, 1, 1]);
    writer.pixel([0, 0, 0]);
    expect(sink.lines()).toEqual(["P3", "2 1", "255"]);

    writer.flush();
    expect(sink.toString()).toBe("P3\n2 1\n255\n255 255 255\n0 0 0\n");
  });

  test("flush with nothing queued writes nothing", () => {
    const sink = new BufferSink();
    new PpmWriter(sink).flush();
    expect(sink.toString()).toBe("");
  });
});

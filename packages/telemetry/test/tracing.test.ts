import { describe, expect, it, vi } from "vitest";

import { getStrataTracer, runWithSpan } from "../src/index.js";

describe("runWithSpan", () => {
  const tracer = getStrataTracer({ name: "telemetry-test" });

  it("resolves the callback result", async () => {
    await expect(runWithSpan(tracer, "session.findById", async () => "s-1")).resolves.toBe("s-1");
  });

  it("accepts synchronous callbacks", async () => {
    await expect(runWithSpan(tracer, "session.save", () => 3, { attributes: { "session.id": "s-1" } })).resolves.toBe(3);
  });

  it("reports failures to onError and rethrows them", async () => {
    const onError = vi.fn();
    const failure = new Error("boom");

    await expect(
      runWithSpan(
        tracer,
        "session.deleteById",
        async () => {
          throw failure;
        },
        { onError },
      ),
    ).rejects.toBe(failure);
    expect(onError).toHaveBeenCalledTimes(1);
    expect(onError.mock.calls[0]?.[0]).toBe(failure);
  });
});

import { describe, it, expect } from "vitest";
import { createMemoryLogStream } from "./memory";

describe("createMemoryLogStream", () => {
  it("stamps records with the clock and the invocation id", () => {
    let now = 1_000;
    const stream = createMemoryLogStream(() => now);

    stream.sinkFor("inv-1").write([{ severity: "normal", text: "a" }]);
    now = 2_000;
    stream.sinkFor("inv-2").write([{ severity: "error", text: "ERROR|script_failed returncode=1" }]);

    expect(stream.records()).toEqual([
      { severity: "normal", text: "a", timestamp: 1_000, invocationId: "inv-1" },
      {
        severity: "error",
        text: "ERROR|script_failed returncode=1",
        timestamp: 2_000,
        invocationId: "inv-2",
      },
    ]);
  });

  it("queries by substring in append order", () => {
    const stream = createMemoryLogStream(() => 0);
    stream.sinkFor("inv-1").write([
      { severity: "normal", text: "disk ok" },
      { severity: "error", text: "ERROR|script_failed returncode=2" },
      { severity: "normal", text: "disk full" },
    ]);

    expect(stream.query("disk").map((r) => r.text)).toEqual(["disk ok", "disk full"]);
    expect(stream.query("ERROR|")).toHaveLength(1);
  });

  it("stores frozen records", () => {
    const stream = createMemoryLogStream(() => 0);
    stream.sinkFor("inv-1").write([{ severity: "normal", text: "a" }]);

    expect(Object.isFrozen(stream.records()[0])).toBe(true);
  });
});

import { describe, it, expect } from "vitest";
import { mapEncodeError, Tracker } from "./tracker";

describe("Tracker", () => {
  it("tallies outcomes by status", () => {
    const tracker = new Tracker();
    const record = { ordinal: 1, path: "/out/calib_000001.jpg" };

    tracker.record({ status: "written", source: "/a.jpg", record });
    tracker.record({
      status: "decode-failed",
      source: "/b.jpg",
      failure: { reason: "decode-failed", path: "/b.jpg", details: "bad header" },
    });
    tracker.record({
      status: "encode-failed",
      source: "/c.jpg",
      record,
      reason: "write-error",
      details: "EACCES",
    });
    tracker.record({ status: "skipped", source: "/d.jpg" });

    const stats = tracker.getStats();
    expect(stats.writtenImages).toBe(1);
    expect(stats.decodeFailures).toBe(1);
    expect(stats.encodeFailures).toBe(1);
    expect(stats.skippedImages).toBe(1);
    expect(tracker.getIssues()).toEqual([
      { type: "decode", path: "/b.jpg", reason: "decode-failed", details: "bad header" },
      { type: "encode", path: "/out/calib_000001.jpg", reason: "write-error", details: "EACCES" },
    ]);
  });

  it("keeps cleanup issues apart", () => {
    const tracker = new Tracker();
    tracker.trackCleanupError("/out/calib_000000.jpg", new Error("busy"));

    expect(tracker.getIssues("cleanup")).toEqual([
      {
        type: "cleanup",
        path: "/out/calib_000000.jpg",
        reason: "remove-failed",
        details: "busy",
      },
    ]);
    expect(tracker.getIssues("decode")).toEqual([]);
  });
});

describe("mapEncodeError", () => {
  it("classifies filesystem refusals as write errors", () => {
    const error = Object.assign(new Error("permission denied"), { code: "EACCES" });
    expect(mapEncodeError(error)).toEqual({
      reason: "write-error",
      details: "permission denied",
    });
  });

  it("treats anything else as an encode failure", () => {
    expect(mapEncodeError(new Error("unsupported"))).toEqual({
      reason: "encode-failed",
      details: "unsupported",
    });
    expect(mapEncodeError("odd")).toEqual({
      reason: "encode-failed",
      details: "odd",
    });
  });
});

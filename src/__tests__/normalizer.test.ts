import { describe, expect, test } from "@jest/globals";
import {
  mergeRecordBatches,
  mergeRecords,
  normalizeStatus,
  parseJobRecords,
} from "../normalizer";
import type { JobRecord, RunStatus } from "../types";

const record = (runId: string, status: RunStatus, overrides?: Partial<JobRecord>): JobRecord => ({
  runId,
  pipelineName: "iris_job",
  status,
  startTime: null,
  endTime: null,
  creationTime: null,
  tags: [],
  assets: [],
  ...(overrides ?? {}),
});

describe("parseJobRecords", () => {
  test("normalizes run items from the feed", () => {
    const records = parseJobRecords([
      {
        runId: "r1",
        pipelineName: "iris_summon_and_release_job",
        status: "success",
        startTime: 100.5,
        endTime: "160.5",
        creationTime: null,
        tags: [
          { key: "dagster/partition", value: "iris" },
          { key: "broken" },
          { key: "attempt", value: 2 },
        ],
        assets: [{ key: { path: ["iris", "release"] } }, { key: "flat" }],
      },
    ]);

    expect(records).toEqual([
      {
        runId: "r1",
        pipelineName: "iris_summon_and_release_job",
        status: "SUCCESS",
        startTime: 100.5,
        endTime: 160.5,
        creationTime: null,
        tags: [
          { key: "dagster/partition", value: "iris" },
          { key: "attempt", value: "2" },
        ],
        assets: [["iris", "release"]],
      },
    ]);
  });

  test("falls back to the job name and tolerates missing fields", () => {
    const [parsed] = parseJobRecords([{ runId: "r2", jobName: "obis_job", startTime: "soon" }]);

    expect(parsed).toEqual({
      runId: "r2",
      pipelineName: "obis_job",
      status: "UNKNOWN",
      startTime: null,
      endTime: null,
      creationTime: null,
      tags: [],
      assets: [],
    });
  });

  test("drops items without a run id", () => {
    const records = parseJobRecords([{ pipelineName: "orphan" }, { runId: "" }, "text", { runId: "r3" }]);

    expect(records.map((r) => r.runId)).toEqual(["r3"]);
  });

  test("a malformed field falls back without dropping the run", () => {
    const records = parseJobRecords([
      { runId: "a", pipelineName: "iris_job", status: "FAILURE", startTime: true, endTime: { at: 5 } },
      { runId: "b", pipelineName: "iris_job", status: "FAILURE", tags: {} },
      { runId: "c", pipelineName: "iris_job", status: "FAILURE", assets: "x" },
      { runId: "d", pipelineName: 42, status: 7 },
    ]);

    expect(records.map((r) => r.runId)).toEqual(["a", "b", "c", "d"]);
    expect(records[0]).toMatchObject({ status: "FAILURE", startTime: null, endTime: null });
    expect(records[1].tags).toEqual([]);
    expect(records[2].assets).toEqual([]);
    expect(records[3]).toMatchObject({ pipelineName: "42", status: "UNKNOWN" });
  });

  test("anything but a list is an empty page", () => {
    expect(parseJobRecords(null)).toEqual([]);
    expect(parseJobRecords({ results: [] })).toEqual([]);
  });
});

describe("normalizeStatus", () => {
  test("maps unrecognized statuses to UNKNOWN", () => {
    expect(normalizeStatus(" queued ")).toBe("QUEUED");
    expect(normalizeStatus("CANCELED")).toBe("UNKNOWN");
    expect(normalizeStatus(null)).toBe("UNKNOWN");
  });
});

describe("mergeRecordBatches", () => {
  test("keeps the all-runs record over status-filtered duplicates", () => {
    const tagged = record("r1", "SUCCESS", { tags: [{ key: "source", value: "iris" }] });

    const merged = mergeRecordBatches({
      allRuns: [tagged],
      byStatus: {
        SUCCESS: [record("r1", "SUCCESS"), record("r2", "SUCCESS")],
        FAILURE: [record("r2", "FAILURE")],
        QUEUED: [record("r3", "QUEUED")],
      },
    });

    expect(merged).toEqual([tagged, record("r2", "SUCCESS"), record("r3", "QUEUED")]);
  });

  test("status batches follow SUCCESS, FAILURE, STARTED, QUEUED order", () => {
    const merged = mergeRecordBatches({
      allRuns: [],
      byStatus: {
        QUEUED: [record("r4", "QUEUED")],
        STARTED: [record("r4", "STARTED")],
      },
    });

    expect(merged).toEqual([record("r4", "STARTED")]);
  });

  test("run ids are unique in the result", () => {
    const merged = mergeRecords([
      [record("a", "SUCCESS"), record("b", "SUCCESS")],
      [record("b", "FAILURE"), record("a", "QUEUED"), record("c", "STARTED")],
    ]);

    expect(merged.map((r) => r.runId)).toEqual(["a", "b", "c"]);
  });

  test("drops records without a run id", () => {
    expect(mergeRecords([[record("", "SUCCESS"), record("x", "SUCCESS")]]).map((r) => r.runId)).toEqual(["x"]);
  });
});

/**
 * Restore Status Scanner Tests
 */

import { describe, expect, it } from "vitest";

import { S3Manager } from "../s3/manager.js";
import { createMockLogger, messagesOf, serviceError, stubS3Send } from "../test-helpers.js";
import { isCandidateObject, listArchiveCandidates, sumSizes } from "./listing.js";
import {
  checkRestoreStatus,
  formatStatusSummary,
  parseRestoreHeader,
  scanRestoreStatus,
  summarizeStatusResults,
} from "./status.js";

const BUCKET = "archive";

describe("parseRestoreHeader", () => {
  it("reads the ongoing-request flag", () => {
    expect(
      parseRestoreHeader('ongoing-request="false", expiry-date="Fri, 21 Dec 2012 00:00:00 GMT"'),
    ).toBe("completed");
    expect(parseRestoreHeader('ongoing-request="true"')).toBe("in-progress");
  });

  it("treats a missing or unrecognized header as not started", () => {
    expect(parseRestoreHeader(undefined)).toBe("not-started");
    expect(parseRestoreHeader("")).toBe("not-started");
    expect(parseRestoreHeader("something-else")).toBe("not-started");
  });
});

describe("candidate listing", () => {
  it("skips the prefix marker, empty objects and objects without a storage class", () => {
    expect(isCandidateObject({ key: "photos/", size: 0, storageClass: "STANDARD" }, "photos/")).toBe(false);
    expect(isCandidateObject({ key: "photos/empty", size: 0, storageClass: "GLACIER" }, "photos/")).toBe(false);
    expect(isCandidateObject({ key: "photos/a", size: 5 }, "photos/")).toBe(false);
    expect(isCandidateObject({ key: "photos/a", size: 5, storageClass: "STANDARD" }, "photos/")).toBe(true);
  });

  it("optionally keeps only archival storage classes", async () => {
    stubS3Send({
      list: () => ({
        Contents: [
          { Key: "photos/", Size: 0, StorageClass: "STANDARD" },
          { Key: "photos/a.jpg", Size: 10, StorageClass: "GLACIER" },
          { Key: "photos/b.jpg", Size: 20, StorageClass: "STANDARD" },
          { Key: "photos/c.jpg", Size: 30, StorageClass: "DEEP_ARCHIVE" },
        ],
      }),
    });
    const manager = new S3Manager({ region: "us-east-1" });

    const all = await listArchiveCandidates(manager, { bucketName: BUCKET, prefix: "photos/" });
    const archival = await listArchiveCandidates(manager, {
      bucketName: BUCKET,
      prefix: "photos/",
      archivalOnly: true,
    });

    expect(all.map((o) => o.key)).toEqual(["photos/a.jpg", "photos/b.jpg", "photos/c.jpg"]);
    expect(archival.map((o) => o.key)).toEqual(["photos/a.jpg", "photos/c.jpg"]);
    expect(sumSizes(archival)).toBe(40);
  });
});

describe("storage classes outside the known list", () => {
  it("are still scanned and counted", async () => {
    stubS3Send({
      list: () => ({
        Contents: [
          { Key: "photos/a.jpg", Size: 10, StorageClass: "GLACIER" },
          { Key: "photos/z.bin", Size: 70, StorageClass: "FSX_OPENZFS" },
          { Key: "photos/n.bin", Size: 5 },
        ],
      }),
      head: () => ({ ContentLength: 1 }),
    });
    const manager = new S3Manager({ region: "us-east-1" });

    const candidates = await listArchiveCandidates(manager, { bucketName: BUCKET, prefix: "photos/" });
    const summary = await scanRestoreStatus(
      manager,
      { bucketName: BUCKET, prefix: "photos/", concurrency: 2 },
      createMockLogger(),
    );

    expect(candidates.map((o) => [o.key, o.storageClass])).toEqual([
      ["photos/a.jpg", "GLACIER"],
      ["photos/z.bin", "FSX_OPENZFS"],
    ]);
    expect(summary.total).toBe(2);
    expect(summary.totalSize).toBe(80);
    expect(summary.notStarted).toBe(2);
  });
});

describe("checkRestoreStatus", () => {
  it("turns a failed lookup into an error result worth zero bytes", async () => {
    stubS3Send({
      head: () => {
        throw serviceError("Forbidden", "Access Denied");
      },
    });
    const logger = createMockLogger();

    const result = await checkRestoreStatus(new S3Manager(), BUCKET, "photos/x.jpg", logger);

    expect(result).toEqual({ key: "photos/x.jpg", state: "error", size: 0 });
    expect(messagesOf(logger.error)).toEqual(["Error checking photos/x.jpg: Access Denied"]);
  });
});

describe("scanRestoreStatus", () => {
  it("summarizes completed, errored and not-started objects", async () => {
    const sizes: Record<string, number> = { "photos/a.jpg": 100, "photos/b.jpg": 200, "photos/c.jpg": 300 };
    stubS3Send({
      list: () => ({
        Contents: Object.entries(sizes).map(([Key, Size]) => ({ Key, Size, StorageClass: "GLACIER" })),
      }),
      head: (input) => {
        if (input.Key === "photos/b.jpg") throw serviceError("Forbidden", "Access Denied");
        return {
          ContentLength: input.Key ? sizes[input.Key] : 0,
          StorageClass: "GLACIER",
          Restore: input.Key === "photos/a.jpg" ? 'ongoing-request="false"' : undefined,
        };
      },
    });
    const logger = createMockLogger();

    const summary = await scanRestoreStatus(
      new S3Manager({ region: "us-east-1" }),
      { bucketName: BUCKET, prefix: "photos/", concurrency: 2 },
      logger,
    );

    expect(summary).toEqual({
      total: 3,
      completed: 1,
      inProgress: 0,
      notStarted: 1,
      error: 1,
      totalSize: 600,
      restoredSize: 100,
      percentComplete: expect.closeTo(33.333, 2),
    });
    expect(summary.percentComplete.toFixed(2)).toBe("33.33");
    expect(messagesOf(logger.info).sort()).toEqual([
      "photos/a.jpg: Completed",
      "photos/b.jpg: Error",
      "photos/c.jpg: Not Started",
    ]);
    expect(messagesOf(logger.error)).toEqual(["Error checking photos/b.jpg: Access Denied"]);
  });

  it("reports 0% for an empty prefix", async () => {
    stubS3Send({ list: () => ({ Contents: [] }) });

    const summary = await scanRestoreStatus(
      new S3Manager(),
      { bucketName: BUCKET, prefix: "empty/", concurrency: 10 },
      createMockLogger(),
    );

    expect(summary.total).toBe(0);
    expect(summary.percentComplete).toBe(0);
  });
});

describe("summarizeStatusResults", () => {
  it("adds only completed sizes to the restored size", () => {
    const summary = summarizeStatusResults(
      [
        { key: "a", state: "completed", size: 10 },
        { key: "b", state: "completed", size: 15 },
        { key: "c", state: "in-progress", size: 99 },
      ],
      { total: 4, totalSize: 200 },
    );

    expect(summary.restoredSize).toBe(25);
    expect(summary.inProgress).toBe(1);
    expect(summary.percentComplete).toBe(50);
    expect(summary.completed + summary.inProgress + summary.notStarted + summary.error).toBeLessThanOrEqual(
      summary.total,
    );
  });
});

describe("formatStatusSummary", () => {
  it("prints the summary block", () => {
    const lines = formatStatusSummary(
      {
        total: 3,
        completed: 1,
        inProgress: 0,
        notStarted: 1,
        error: 1,
        totalSize: 1_610_612_736,
        restoredSize: 536_870_912,
        percentComplete: 100 / 3,
      },
      "glacier_restore_status.log",
    );

    expect(lines).toEqual([
      "",
      "===== Glacier Restore Status Summary =====",
      "Total objects scanned:   3",
      "Restore Completed:       1",
      "Restore In Progress:     0",
      "Restore Not Started:     1",
      "Errors:                  1",
      "Percent Completed:       33.33%",
      "Total Data Size:         1.50 GiB",
      "Total Restored Size:     0.50 GiB",
      "",
      "Details logged to glacier_restore_status.log",
    ]);
  });
});

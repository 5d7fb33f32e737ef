/**
 * Tests for the glacier-toolkit CLI.
 *
 * Verifies every subcommand registers and runs end to end against the
 * in-process S3 and IAM stand-ins.
 */

import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { IAMClient, ListAttachedRolePoliciesCommand, ListRolePoliciesCommand, ListRolesCommand } from "@aws-sdk/client-iam";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import type { CommandDeps } from "../commands/deps.js";
import { S3Manager } from "../s3/manager.js";
import {
  createMockLogger,
  createMockRuntime,
  printedLines,
  serviceError,
  stubS3Send,
  type MockLogger,
  type MockRuntime,
} from "../test-helpers.js";
import { buildProgram } from "./program.js";

// ── Helpers ─────────────────────────────────────────────────────────────────

let runtime: MockRuntime;
let logger: MockLogger;
let deps: CommandDeps;

async function run(...args: string[]) {
  await buildProgram(deps).parseAsync(args, { from: "user" });
}

beforeEach(() => {
  runtime = createMockRuntime();
  logger = createMockLogger();
  deps = { runtime, logger, manager: new S3Manager({ region: "us-east-1" }) };
});

// ── Registration ────────────────────────────────────────────────────────────

describe("buildProgram", () => {
  it("registers every subcommand", () => {
    expect(buildProgram(deps).commands.map((command) => command.name())).toEqual([
      "upload-dummy",
      "restore-status",
      "restore",
      "iam-admin-roles",
    ]);
  });

  it("offers the restore tiers as choices", () => {
    const restore = buildProgram(deps).commands.find((command) => command.name() === "restore");
    const tier = restore?.options.find((option) => option.long === "--tier");

    expect(tier?.argChoices).toEqual(["Expedited", "Standard", "Bulk"]);
    expect(tier?.defaultValue).toBe("Expedited");
  });
});

// ── restore-status ──────────────────────────────────────────────────────────

describe("restore-status", () => {
  it("prints the summary", async () => {
    stubS3Send({
      list: () => ({ Contents: [{ Key: "photos/a.jpg", Size: 1_073_741_824, StorageClass: "GLACIER" }] }),
      head: () => ({ ContentLength: 1_073_741_824, Restore: 'ongoing-request="false"' }),
    });

    await run("restore-status", "--bucket", "archive", "--prefix", "photos/");

    const lines = printedLines(runtime);
    expect(lines).toContain("Restore Completed:       1");
    expect(lines).toContain("Percent Completed:       100.00%");
    expect(lines).toContain("Total Restored Size:     1.00 GiB");
    expect(lines.at(-1)).toBe("Details logged to glacier_restore_status.log");
    expect(logger.close).toHaveBeenCalledTimes(1);
    expect(runtime.exit).not.toHaveBeenCalled();
  });

  it("rejects an invalid thread count before calling S3", async () => {
    const send = stubS3Send({});

    await run("restore-status", "--bucket", "archive", "--prefix", "photos/", "--threads", "zero");

    expect(runtime.error).toHaveBeenCalledTimes(1);
    expect(runtime.error.mock.calls[0]?.[0]).toMatch(/^Error: Invalid options: threads: /);
    expect(runtime.exit).toHaveBeenCalledWith(1);
    expect(send).not.toHaveBeenCalled();
  });

  it("exits with 1 when the listing fails", async () => {
    stubS3Send({
      list: () => {
        throw serviceError("NoSuchBucket", "The specified bucket does not exist");
      },
    });

    await run("restore-status", "--bucket", "missing", "--prefix", "photos/", "--log-file", "custom.log");

    expect(runtime.error).toHaveBeenCalledWith("Error: The specified bucket does not exist");
    expect(runtime.exit).toHaveBeenCalledWith(1);
    expect(logger.close).toHaveBeenCalledTimes(1);
  });
});

// ── restore ─────────────────────────────────────────────────────────────────

describe("restore", () => {
  it("prints each outcome and the summary", async () => {
    stubS3Send({
      list: () => ({ Contents: [{ Key: "photos/a.jpg", Size: 100, StorageClass: "GLACIER" }] }),
      head: () => ({ StorageClass: "GLACIER" }),
      restore: () => ({}),
    });

    await run("restore", "--bucket", "archive", "--prefix", "photos/", "--tier", "Bulk", "--days", "7");

    const lines = printedLines(runtime);
    expect(lines[0]).toBe("photos/a.jpg: Requested (Tier: Bulk)");
    expect(lines).toContain("Requested:                    1");
    expect(lines).toContain("  Bulk: 1");
    expect(lines.at(-1)).toBe("Details logged to glacier_restore.log");
  });

  it("exits with 1 instead of crashing when the log file cannot be opened", async () => {
    const root = await mkdtemp(join(tmpdir(), "glacier-cli-"));
    const logFile = join(root, "missing", "glacier_restore.log");
    stubS3Send({
      list: () => ({ Contents: [{ Key: "photos/a.jpg", Size: 100, StorageClass: "GLACIER" }] }),
      head: () => ({ StorageClass: "GLACIER" }),
      restore: () => ({}),
    });
    deps = { runtime, manager: deps.manager };

    try {
      await run("restore", "--bucket", "archive", "--prefix", "photos/", "--log-file", logFile);
    } finally {
      await rm(root, { recursive: true, force: true });
    }

    expect(printedLines(runtime)).toContain("Requested:                    1");
    expect(runtime.error).toHaveBeenCalledTimes(1);
    expect(runtime.error.mock.calls[0]?.[0]).toMatch(/^Error: ENOENT: no such file or directory/);
    expect(runtime.exit).toHaveBeenCalledWith(1);
  });
});

// ── upload-dummy ────────────────────────────────────────────────────────────

describe("upload-dummy", () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "glacier-cli-"));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("takes its settings from the environment", async () => {
    const keys: (string | undefined)[] = [];
    stubS3Send({
      put: (input) => {
        keys.push(input.Key);
        return {};
      },
    });
    deps.env = {
      GLACIER_UPLOAD_FILE_COUNT: "2",
      GLACIER_UPLOAD_FILE_SIZE: "8",
      GLACIER_UPLOAD_PREFIX: "seed/",
      GLACIER_UPLOAD_DIR: join(root, "dummy_files"),
    };

    await run("upload-dummy");

    expect(keys.sort()).toEqual(["seed/dummy_file_0001.txt", "seed/dummy_file_0002.txt"]);
    expect(runtime.exit).not.toHaveBeenCalled();
  });
});

// ── iam-admin-roles ─────────────────────────────────────────────────────────

describe("iam-admin-roles", () => {
  it("prints the admin role table", async () => {
    vi.spyOn(IAMClient.prototype, "send").mockImplementation(async (command: unknown) => {
      if (command instanceof ListRolesCommand) {
        return { Roles: [{ RoleName: "ops-admin" }, { RoleName: "reader" }], IsTruncated: false };
      }
      if (command instanceof ListAttachedRolePoliciesCommand) {
        return {
          AttachedPolicies:
            command.input.RoleName === "ops-admin" ? [{ PolicyName: "AdministratorAccess" }] : [],
        };
      }
      if (command instanceof ListRolePoliciesCommand) return { PolicyNames: [] };
      throw new Error("Unexpected IAM command");
    });
    deps.iamClient = new IAMClient({ region: "us-east-1" });

    await run("iam-admin-roles", "--threads", "2");

    expect(printedLines(runtime)).toEqual([
      "Role Name                           Relevant Policies",
      `${"-".repeat(35)} ${"-".repeat(70)}`,
      "ops-admin                           AdministratorAccess",
    ]);
  });
});

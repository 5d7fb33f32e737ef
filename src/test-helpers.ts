/**
 * Shared test doubles: an in-process S3 stand-in and a recording logger.
 */

import {
  HeadObjectCommand,
  ListObjectsV2Command,
  PutObjectCommand,
  RestoreObjectCommand,
  S3Client,
  type HeadObjectCommandInput,
  type ListObjectsV2CommandInput,
  type PutObjectCommandInput,
  type RestoreObjectCommandInput,
} from "@aws-sdk/client-s3";
import { vi, type Mock } from "vitest";

import type { Logger } from "./logging/logger.js";
import type { RuntimeEnv } from "./runtime.js";

// ── S3 ──────────────────────────────────────────────────────────────────────

export type S3Handlers = {
  list?: (input: ListObjectsV2CommandInput) => unknown;
  head?: (input: HeadObjectCommandInput) => unknown;
  put?: (input: PutObjectCommandInput) => unknown;
  restore?: (input: RestoreObjectCommandInput) => unknown;
};

/**
 * Route every `S3Client#send` to the matching handler. A handler that
 * throws (or rejects) makes the SDK call fail the same way.
 */
export function stubS3Send(handlers: S3Handlers) {
  return vi.spyOn(S3Client.prototype, "send").mockImplementation(async (command: unknown) => {
    if (command instanceof ListObjectsV2Command && handlers.list) return handlers.list(command.input);
    if (command instanceof HeadObjectCommand && handlers.head) return handlers.head(command.input);
    if (command instanceof PutObjectCommand && handlers.put) return handlers.put(command.input);
    if (command instanceof RestoreObjectCommand && handlers.restore) return handlers.restore(command.input);
    throw new Error(`Unexpected S3 command: ${String(command)}`);
  });
}

/** An SDK-style service error: the code travels in `name`. */
export function serviceError(name: string, message: string): Error {
  const err = new Error(message);
  err.name = name;
  return err;
}

// ── Logger ──────────────────────────────────────────────────────────────────

export type MockLogger = Logger & {
  debug: Mock<Logger["debug"]>;
  info: Mock<Logger["info"]>;
  warn: Mock<Logger["warn"]>;
  error: Mock<Logger["error"]>;
  close: Mock<Logger["close"]>;
};

export function createMockLogger(): MockLogger {
  return {
    subsystem: "test",
    debug: vi.fn<Logger["debug"]>(),
    info: vi.fn<Logger["info"]>(),
    warn: vi.fn<Logger["warn"]>(),
    error: vi.fn<Logger["error"]>(),
    close: vi.fn<Logger["close"]>().mockResolvedValue(undefined),
  };
}

/** First argument of every call, i.e. the logged messages. */
export function messagesOf(mock: Mock<Logger["info"]>): string[] {
  return mock.mock.calls.map((call) => call[0]);
}

// ── Runtime ─────────────────────────────────────────────────────────────────

export type MockRuntime = RuntimeEnv & {
  log: Mock<RuntimeEnv["log"]>;
  error: Mock<RuntimeEnv["error"]>;
  exit: Mock<RuntimeEnv["exit"]>;
};

export function createMockRuntime(): MockRuntime {
  return {
    log: vi.fn<RuntimeEnv["log"]>(),
    error: vi.fn<RuntimeEnv["error"]>(),
    exit: vi.fn<RuntimeEnv["exit"]>(),
  };
}

export function printedLines(runtime: MockRuntime): string[] {
  return runtime.log.mock.calls.map((call) => call[0]);
}

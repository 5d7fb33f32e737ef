import type { IAMClient } from "@aws-sdk/client-iam";

import type { Logger } from "../logging/logger.js";
import type { RuntimeEnv } from "../runtime.js";
import type { S3Manager } from "../s3/manager.js";

/**
 * Collaborators a command builds for itself unless handed one.
 */
export type CommandDeps = {
  runtime?: RuntimeEnv;
  manager?: S3Manager;
  iamClient?: IAMClient;
  logger?: Logger;
  env?: NodeJS.ProcessEnv;
};

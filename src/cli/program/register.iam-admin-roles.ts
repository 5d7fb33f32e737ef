import type { Command } from "commander";

import type { CommandDeps } from "../../commands/deps.js";
import { iamAdminRolesCommand } from "../../commands/iam-admin-roles.js";
import { DEFAULT_THREADS, iamAuditOptionsSchema, parseOptions } from "../../config/config.js";
import { defaultRuntime } from "../../runtime.js";
import { runCommandWithRuntime } from "../cli-utils.js";

export function registerIamAdminRolesCommand(program: Command, deps: CommandDeps = {}) {
  const runtime = deps.runtime ?? defaultRuntime;

  program
    .command("iam-admin-roles")
    .description("List IAM roles with admin or full-access policies attached")
    .option("--threads <n>", "Number of roles checked in parallel", String(DEFAULT_THREADS))
    .option("--region <region>", "AWS region (default: AWS_REGION or us-east-1)")
    .action(async (opts: Record<string, unknown>) => {
      await runCommandWithRuntime(runtime, async () => {
        await iamAdminRolesCommand(parseOptions(iamAuditOptionsSchema, opts), deps);
      });
    });
}

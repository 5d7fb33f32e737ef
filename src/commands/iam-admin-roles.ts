import type { IamAuditOptions } from "../config/config.js";
import { printLines } from "../cli/cli-utils.js";
import { auditAdminRoles, createIAMClient, formatAdminRoleTable } from "../iam/admin-roles.js";
import { createCliLogger } from "../logging/logger.js";
import { defaultRuntime } from "../runtime.js";
import type { CommandDeps } from "./deps.js";

export async function iamAdminRolesCommand(options: IamAuditOptions, deps: CommandDeps = {}): Promise<void> {
  const runtime = deps.runtime ?? defaultRuntime;
  const client = deps.iamClient ?? createIAMClient(options.region);
  const logger = deps.logger ?? createCliLogger({ subsystem: "iam/admin-roles", level: "warn" });

  try {
    const findings = await auditAdminRoles(client, { concurrency: options.threads }, logger);
    printLines(runtime, formatAdminRoleTable(findings));
  } finally {
    await logger.close();
  }
}

import { Command } from "commander";

import type { CommandDeps } from "../commands/deps.js";
import { VERSION } from "../version.js";
import { registerIamAdminRolesCommand } from "./program/register.iam-admin-roles.js";
import { registerRestoreCommand } from "./program/register.restore.js";
import { registerRestoreStatusCommand } from "./program/register.restore-status.js";
import { registerUploadDummyCommand } from "./program/register.upload-dummy.js";

export function buildProgram(deps: CommandDeps = {}): Command {
  const program = new Command("glacier-toolkit")
    .description("Upload, restore and audit objects in the S3 archival tiers")
    .version(VERSION);

  registerUploadDummyCommand(program, deps);
  registerRestoreStatusCommand(program, deps);
  registerRestoreCommand(program, deps);
  registerIamAdminRolesCommand(program, deps);

  return program;
}

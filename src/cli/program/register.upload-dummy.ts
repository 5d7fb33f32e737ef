import type { Command } from "commander";

import type { CommandDeps } from "../../commands/deps.js";
import { uploadDummyCommand } from "../../commands/upload-dummy.js";
import { UPLOADER_ENV_VARS } from "../../config/config.js";
import { defaultRuntime } from "../../runtime.js";
import { runCommandWithRuntime } from "../cli-utils.js";

export function registerUploadDummyCommand(program: Command, deps: CommandDeps = {}) {
  const runtime = deps.runtime ?? defaultRuntime;

  program
    .command("upload-dummy")
    .description("Generate dummy files and upload them to S3 with an archival storage class")
    .addHelpText(
      "after",
      () =>
        `\nEnvironment overrides:\n${Object.values(UPLOADER_ENV_VARS)
          .map((name) => `  ${name}`)
          .join("\n")}\n`,
    )
    .action(async () => {
      await runCommandWithRuntime(runtime, async () => {
        await uploadDummyCommand(deps);
      });
    });
}

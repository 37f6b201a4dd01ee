/**
 * reid-risk CLI - re-identification risk assessment for quasi-identified datasets
 */

import { Command, Option } from "commander";
import { createAssessCommand } from "./commands/assess.js";
import { createInspectCommand } from "./commands/inspect.js";
import { LOG_LEVELS, isLogLevel, logger } from "../utils/logger.js";

const pkg = {
  name: "reid-risk",
  version: "0.1.0",
  description:
    "Measure k-anonymity, l-diversity and t-closeness of a dataset across generalization scenarios",
};

/**
 * Main CLI program
 */
function createProgram(): Command {
  const program = new Command();

  program
    .name(pkg.name)
    .description(pkg.description)
    .version(pkg.version)
    .addOption(
      new Option("--log-level <level>", "Logging verbosity")
        .choices(LOG_LEVELS)
        .default("info"),
    )
    .hook("preAction", (thisCommand) => {
      const level: unknown = thisCommand.opts().logLevel;
      if (typeof level === "string" && isLogLevel(level)) {
        logger.setLevel(level);
      }
    });

  program.addCommand(createAssessCommand());
  program.addCommand(createInspectCommand());

  return program;
}

async function main(): Promise<void> {
  await createProgram().parseAsync(process.argv);
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  logger.error("Unexpected error", { error: message });
  console.error(
    JSON.stringify(
      {
        status: "error",
        error: {
          code: "UNEXPECTED_ERROR",
          message,
        },
      },
      null,
      2,
    ),
  );
  process.exit(1);
});

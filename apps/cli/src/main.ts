import "dotenv/config";
import { loadConfig } from "@studydesk/config";
import { AppError, errorMessage } from "@studydesk/errors";
import { createLogger } from "@studydesk/logger";
import { USAGE, parseCommand } from "./args.js";
import { runCommand } from "./commands.js";
import { createContainer } from "./container.js";

function describeError(err: unknown): string {
  if (AppError.isAppError(err)) return `${err.code}: ${err.message}`;
  return `UNEXPECTED_ERROR: ${errorMessage(err)}`;
}

function print(line: string): void {
  process.stdout.write(`${line}\n`);
}

async function main(): Promise<number> {
  const command = parseCommand(process.argv.slice(2));
  if (command.name === "help") {
    print(USAGE);
    return 0;
  }

  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel, service: "studydesk-cli", destination: 2 });
  const container = createContainer(config, logger);

  return runCommand(command, container, print);
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    process.stderr.write(`${describeError(err)}\n`);
    process.exitCode = 1;
  });

import { parseArgs } from "node:util";
import { ValidationError, errorMessage } from "@studydesk/errors";

export type Command =
  | { name: "init" }
  | { name: "rebuild-base" }
  | { name: "upload"; files: string[]; retry: boolean }
  | { name: "list" }
  | { name: "delete"; fileId: string }
  | { name: "ask"; question: string; k?: number }
  | { name: "usage" }
  | { name: "help" };

export const USAGE = `Usage: studydesk <command> [options]

Commands:
  init                      Load or build the course collection and open the user collection
  rebuild-base              Drop the course collection and build it again
  upload <files...> [--retry]
                            Store and index PDFs; --retry reprocesses failures once
  list                      List uploaded documents, newest first
  delete <fileId>           Remove an upload, its record and its chunks
  ask <question...> [--k n] Answer a question from both collections
  usage                     Show upload storage usage
`;

function usageError(message: string): ValidationError {
  return new ValidationError(message, { command: message }, { operation: "cli.parse" });
}

function readArgs(argv: readonly string[]) {
  return parseArgs({
    args: [...argv],
    allowPositionals: true,
    options: {
      retry: { type: "boolean" },
      k: { type: "string" },
      help: { type: "boolean", short: "h" },
    },
  });
}

/** Parse argv (without the node and script entries) into a command. */
export function parseCommand(argv: readonly string[]): Command {
  let parsed: ReturnType<typeof readArgs>;
  try {
    parsed = readArgs(argv);
  } catch (err) {
    throw usageError(errorMessage(err));
  }

  const [name, ...rest] = parsed.positionals;
  if (parsed.values.help === true || name === undefined || name === "help") {
    return { name: "help" };
  }

  switch (name) {
    case "init":
    case "rebuild-base":
    case "list":
    case "usage":
      return { name };
    case "upload":
      if (rest.length === 0) throw usageError("upload needs at least one file");
      return { name, files: rest, retry: parsed.values.retry === true };
    case "delete": {
      const [fileId] = rest;
      if (fileId === undefined || rest.length > 1) throw usageError("delete takes exactly one fileId");
      return { name, fileId };
    }
    case "ask": {
      const question = rest.join(" ").trim();
      if (question === "") throw usageError("ask needs a question");
      if (parsed.values.k === undefined) return { name, question };
      const k = Number(parsed.values.k);
      if (!Number.isInteger(k) || k < 0) {
        throw usageError(`--k must be a non-negative integer (got "${parsed.values.k}")`);
      }
      return { name, question, k };
    }
    default:
      throw usageError(`Unknown command "${name}"`);
  }
}

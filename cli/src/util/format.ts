import type { SearchMessage } from "../../../src/file-ops/scan-types";
import { assertNever } from "../../../src/utils/error-utils";

export interface OutputSink {
  out: (line: string) => void;
  err: (line: string) => void;
}

export const processOutput: OutputSink = {
  out: (line) => {
    process.stdout.write(`${line}\n`);
  },
  err: (line) => {
    process.stderr.write(`${line}\n`);
  }
};

/**
 * Matches go to stdout, failures to stderr. With `json`, each message is one
 * JSON object per line on the same streams.
 */
export function printMessage(message: SearchMessage, sink: OutputSink, json: boolean): void {
  switch (message.type) {
    case "match":
      sink.out(json ? JSON.stringify(message) : `Found: ${message.path}`);
      return;
    case "failure":
      sink.err(json ? JSON.stringify(message) : `Error: ${message.path}: ${message.message}`);
      return;
    default:
      assertNever(message, "Unknown search message");
  }
}

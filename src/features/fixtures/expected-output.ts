/**
 * Expected-output fixture reader.
 *
 * An expected-output file holds one literal expectation per line.
 * Lines are kept byte-for-byte: no trimming, no escape processing, and
 * a `\r` before the newline stays part of the line.  Only the line
 * terminator `\n` is removed.
 */
import { readFileSync } from "node:fs";
import type { BlankLinePolicy, ExpectedLine, ExpectedOutput } from "../../shared/types/harness.js";
import { InvalidFixtureError } from "../../shared/errors.js";

/**
 * Split expected-output text into literal lines.
 *
 * A final line without a trailing newline is still a line; the empty
 * string after a trailing newline is not.  Blank (empty or
 * whitespace-only) lines always match any output, so `ignore` drops
 * them and `reject` fails on the first one.
 */
export function parseExpectedOutput(
  text: string,
  path: string,
  policy: BlankLinePolicy = "ignore",
): ExpectedOutput {
  const raw = text.split("\n");
  if (raw.length > 0 && raw[raw.length - 1] === "") raw.pop();

  const lines: ExpectedLine[] = [];
  raw.forEach((line, idx) => {
    const lineNumber = idx + 1;
    if (line.trim() === "") {
      if (policy === "reject") {
        throw new InvalidFixtureError(path, lineNumber, "blank expectation line");
      }
      return;
    }
    lines.push({ text: line, lineNumber });
  });

  return { path, lines };
}

/** Read and parse an expected-output file. */
export function readExpectedOutput(path: string, policy: BlankLinePolicy = "ignore"): ExpectedOutput {
  return parseExpectedOutput(readFileSync(path, "utf-8"), path, policy);
}

/**
 * Expectation matcher: fixed-string, case-sensitive, order-independent.
 */
import type { ExpectedLine, MatchResult } from "../../shared/types/harness.js";

/**
 * Check that every expected line occurs somewhere in `captured`.
 *
 * Lines are checked in file order and the first one not found is
 * returned.  How often or where a line occurs does not matter.
 */
export function checkExpectations(captured: string, expected: readonly ExpectedLine[]): MatchResult {
  for (const line of expected) {
    if (!captured.includes(line.text)) {
      return { ok: false, missing: line };
    }
  }
  return { ok: true };
}

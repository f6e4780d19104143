import type { Diagnostic } from "../../diagnostic";
import { RULE_DESCRIPTORS } from "../../rules";
import { TextRule } from "../rule";

export const MAX_FILE_LINES = 500;

/**
 * Count lines the way a line reader does: "\n", "\r\n" and "\r" each end a
 * line, a final unterminated line still counts, empty text has none.
 */
export function countLines(source: string): number {
  if (source.length === 0) return 0;

  const breaks = source.match(/\r\n|\r|\n/g)?.length ?? 0;
  const lastChar = source[source.length - 1];
  const endsWithBreak = lastChar === "\n" || lastChar === "\r";
  return endsWithBreak ? breaks : breaks + 1;
}

/**
 * ORG_001: file longer than 500 lines. Always reported at line 1.
 */
export class LargeFileRule extends TextRule {
  readonly descriptor = RULE_DESCRIPTORS.ORG_001;

  check(source: string): Diagnostic[] {
    const lines = countLines(source);
    if (lines <= MAX_FILE_LINES) return [];
    return [this.diagnostic(`File too large (${lines} lines)`, 1)];
  }
}

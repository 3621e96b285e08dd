/**
 * Log text helpers: line tails and cleanup of terminal control sequences for
 * readers that are not terminals (MCP clients).
 */

import stripAnsi from "strip-ansi";

/**
 * Last `lines` lines of `text`. A trailing newline does not count as an empty
 * last line.
 */
export function tailLines(text: string, lines: number): string {
  if (lines <= 0) return "";

  const all = text.split("\n");
  if (all.length > 0 && all[all.length - 1] === "") {
    all.pop();
  }
  return all.slice(-lines).join("\n");
}

/**
 * Strip ANSI codes and resolve carriage-return redraws (progress bars,
 * spinners) to what the terminal would finally show on each line.
 */
export function cleanOutput(text: string): string {
  return stripAnsi(text)
    .replace(/\r\n/g, "\n")
    .split("\n")
    .map((line) => {
      const redraws = line.split("\r");
      return (redraws[redraws.length - 1] ?? "").trimEnd();
    })
    .join("\n");
}

import { z } from "zod";
import type { TimePort } from "../ports/sys/TimePort";
import type { ToolExecutionResult, ToolSpec } from "../ports/tools/ToolRegistryPort";
import { fail, succeed } from "../ports/tools/ToolRegistryPort";

function pad(value: number, width: number): string {
  return String(value).padStart(width, "0");
}

/**
 * Local calendar date of `epochMs` shifted by `days`, as YYYY-MM-DD.
 * Null when the result has no four-digit year.
 */
export function offsetDate(epochMs: number, days: number): string | null {
  const date = new Date(epochMs);
  date.setDate(date.getDate() + days);
  if (Number.isNaN(date.getTime())) return null;
  const year = date.getFullYear();
  if (year < 0 || year > 9999) return null;
  return `${pad(date.getFullYear(), 4)}-${pad(date.getMonth() + 1, 2)}-${pad(date.getDate(), 2)}`;
}

const parameters = z.strictObject({
  days: z
    .number()
    .int()
    .describe("Whole number of days to add to today; negative values go back in time."),
});

export class DateOffsetTool implements ToolSpec<typeof parameters> {
  readonly name = "date_offset";
  readonly description =
    "Get the calendar date a number of days from today, as an ISO-8601 date (YYYY-MM-DD).";
  readonly parameters = parameters;
  readonly effect = "pure";

  constructor(private readonly time: TimePort) {}

  async exec(args: z.infer<typeof parameters>): Promise<ToolExecutionResult> {
    const date = offsetDate(this.time.now(), args.days);
    if (date === null) {
      return fail(
        "InvalidArguments",
        `Offset of ${args.days} days falls outside the years 0000-9999.`
      );
    }
    return succeed(date);
  }
}

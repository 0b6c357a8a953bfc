import { readFile } from "node:fs/promises";
import { z } from "zod";
import { defineSource } from "../../core/pipeline/steps";

const ReadNumbersParamsSchema = z
  .object({
    path: z.string().min(1),
  })
  .strict();

type ReadNumbersParams = z.infer<typeof ReadNumbersParamsSchema>;

/**
 * Parse one line of a numbers file.
 *
 * @returns the number, or `undefined` for a blank line
 * @throws Error when the line is not a finite number
 */
export function parseNumberLine(line: string, lineNumber: number, path: string): number | undefined {
  const trimmed = line.trim();
  if (trimmed === "") {
    return undefined;
  }

  const value = Number(trimmed);
  if (!Number.isFinite(value)) {
    throw new Error(`${path}:${lineNumber}: not a number: ${JSON.stringify(trimmed)}`);
  }
  return value;
}

/**
 * Read Numbers source.
 *
 * Reads a text file when the first item is pulled and yields one number per
 * non-blank line. Lines are parsed on demand, so a bad line far down the file
 * only fails a run that gets that far.
 *
 * @example
 * ```typescript
 * const pipeline = [
 *   { step: readNumbers, params: { path: "./samples.txt" } },
 *   { step: mean },
 * ];
 * ```
 */
export const readNumbers = defineSource({
  name: "readNumbers",
  description: "Yield one number per non-blank line of a text file",
  params: ReadNumbersParamsSchema,
  async *run({ path }: ReadNumbersParams, { logger }) {
    const content = await readFile(path, "utf8");
    const lines = content.split(/\r?\n/);

    let yielded = 0;
    for (const [index, line] of lines.entries()) {
      const value = parseNumberLine(line, index + 1, path);
      if (value !== undefined) {
        yielded++;
        yield value;
      }
    }
    logger.debug({ event: "read_numbers_complete", path, lines: lines.length, values: yielded });
  },
});

export { ReadNumbersParamsSchema };
export type { ReadNumbersParams };

import { z } from "zod";
import { defineSink } from "../../core/pipeline/steps";

const MeanParamsSchema = z.object({}).strict();

/**
 * Arithmetic mean of all items; 0 for an empty stream.
 */
export const mean = defineSink({
  name: "mean",
  description: "Arithmetic mean of all items (0 when empty)",
  params: MeanParamsSchema,
  async run(input: AsyncGenerator<number>) {
    let total = 0;
    let count = 0;
    for await (const item of input) {
      total += item;
      count++;
    }
    return count === 0 ? 0 : total / count;
  },
});

export { MeanParamsSchema };

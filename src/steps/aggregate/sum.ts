import { z } from "zod";
import { defineSink } from "../../core/pipeline/steps";

const SumParamsSchema = z.object({}).strict();

export const sum = defineSink({
  name: "sum",
  description: "Total of all items",
  params: SumParamsSchema,
  async run(input: AsyncGenerator<number>) {
    let total = 0;
    for await (const item of input) {
      total += item;
    }
    return total;
  },
});

export { SumParamsSchema };

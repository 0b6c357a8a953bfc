import { z } from "zod";
import { defineSource } from "../../core/pipeline/steps";

const RangeParamsSchema = z
  .object({
    start: z.number().default(0),
    count: z.number().int().nonnegative().default(10),
    step: z.number().default(1),
  })
  .strict();

type RangeParams = z.infer<typeof RangeParamsSchema>;

/**
 * Range source.
 *
 * Yields `count` numbers starting at `start`, `step` apart. Items are produced
 * on demand, so a large count costs nothing until it is pulled.
 *
 * @example
 * ```typescript
 * await runPipeline([{ step: range, params: { start: 1, count: 3 } }]);
 * // value: [1, 2, 3]
 * ```
 */
export const range = defineSource({
  name: "range",
  description: "Yield count numbers from start, step apart",
  params: RangeParamsSchema,
  *run({ start, count, step }: RangeParams) {
    for (let i = 0; i < count; i++) {
      yield start + i * step;
    }
  },
});

export { RangeParamsSchema };
export type { RangeParams };

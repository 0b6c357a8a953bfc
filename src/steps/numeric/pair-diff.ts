import { z } from "zod";
import { defineTransform } from "../../core/pipeline/steps";

const PairDiffParamsSchema = z.object({}).strict();

/**
 * Pairwise difference transform.
 *
 * Consumes items two at a time and yields `a - b` for each pair. A trailing
 * item without a partner is dropped. In preview mode the step stops after the
 * first difference.
 */
export const pairDiff = defineTransform({
  name: "pairDiff",
  description: "Consume items in pairs and yield a - b",
  params: PairDiffParamsSchema,
  async *run(input: AsyncGenerator<number>, _params, { preview, logger }) {
    let pending: number | undefined;
    let pairs = 0;

    for await (const item of input) {
      if (pending === undefined) {
        pending = item;
        continue;
      }

      yield pending - item;
      pending = undefined;
      pairs++;

      if (preview) {
        break;
      }
    }

    if (pending !== undefined) {
      logger.debug({ event: "pair_diff_unpaired", pairs }, "Dropping unpaired trailing item");
    }
  },
});

export { PairDiffParamsSchema };

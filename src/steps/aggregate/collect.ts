import { z } from "zod";
import { defineSink } from "../../core/pipeline/steps";

const CollectParamsSchema = z.object({}).strict();

/** Items kept by `collect` in preview mode */
export const COLLECT_PREVIEW_ITEMS = 2;

/**
 * Collect sink.
 *
 * Gathers every item into an array. In preview mode it stops after
 * {@link COLLECT_PREVIEW_ITEMS} items and leaves the rest of the stream unread.
 */
export const collect = defineSink({
  name: "collect",
  description: "Gather all items into an array",
  params: CollectParamsSchema,
  async run(input: AsyncGenerator<unknown>, _params, { preview }) {
    const items: unknown[] = [];
    for await (const item of input) {
      items.push(item);
      if (preview && items.length >= COLLECT_PREVIEW_ITEMS) {
        break;
      }
    }
    return items;
  },
});

export { CollectParamsSchema };

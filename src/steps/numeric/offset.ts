import { z } from "zod";
import { defineGeneric } from "../../core/pipeline/steps";

const OffsetParamsSchema = z
  .object({
    amount: z.number().default(0),
  })
  .strict();

type OffsetParams = z.infer<typeof OffsetParamsSchema>;

export const offset = defineGeneric({
  name: "offset",
  description: "Add amount to each item",
  params: OffsetParamsSchema,
  run: (x: number, { amount }: OffsetParams) => x + amount,
});

export { OffsetParamsSchema };
export type { OffsetParams };

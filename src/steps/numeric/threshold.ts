import { z } from "zod";
import { defineGeneric } from "../../core/pipeline/steps";

const ThresholdParamsSchema = z
  .object({
    level: z.number().default(0),
  })
  .strict();

type ThresholdParams = z.infer<typeof ThresholdParamsSchema>;

/**
 * Zero out items below `level`; items at or above it pass unchanged.
 */
export const threshold = defineGeneric({
  name: "threshold",
  description: "Keep items >= level, replace the rest with 0",
  params: ThresholdParamsSchema,
  run: (x: number, { level }: ThresholdParams) => (x >= level ? x : 0),
});

export { ThresholdParamsSchema };
export type { ThresholdParams };

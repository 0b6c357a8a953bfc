import { z } from "zod";
import { defineGeneric } from "../../core/pipeline/steps";

const ScaleParamsSchema = z
  .object({
    factor: z.number().default(1),
  })
  .strict();

type ScaleParams = z.infer<typeof ScaleParamsSchema>;

/**
 * Multiply each item by `factor`.
 *
 * @example
 * ```typescript
 * { step: scale, params: { factor: 2 }, parallelism: 4 }
 * ```
 */
export const scale = defineGeneric({
  name: "scale",
  description: "Multiply each item by factor",
  params: ScaleParamsSchema,
  run: (x: number, { factor }: ScaleParams) => x * factor,
});

export { ScaleParamsSchema };
export type { ScaleParams };

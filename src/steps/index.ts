/**
 * Demonstration step catalog.
 *
 * Small numeric steps covering every role, used by the CLI and the tests:
 *
 * | step        | role      |
 * | ----------- | --------- |
 * | range       | source    |
 * | readNumbers | source    |
 * | pairDiff    | transform |
 * | scale       | generic   |
 * | offset      | generic   |
 * | threshold   | generic   |
 * | sum         | sink      |
 * | mean        | sink      |
 * | collect     | sink      |
 */

import { StepRegistry } from "../core/pipeline/registry";
import type { PipelineStep } from "../core/pipeline/types";
import { COLLECT_PREVIEW_ITEMS, CollectParamsSchema, collect } from "./aggregate/collect";
import { MeanParamsSchema, mean } from "./aggregate/mean";
import { SumParamsSchema, sum } from "./aggregate/sum";
import { type ReadNumbersParams, ReadNumbersParamsSchema, parseNumberLine, readNumbers } from "./io/read-numbers";
import { type OffsetParams, OffsetParamsSchema, offset } from "./numeric/offset";
import { PairDiffParamsSchema, pairDiff } from "./numeric/pair-diff";
import { type RangeParams, RangeParamsSchema, range } from "./numeric/range";
import { type ScaleParams, ScaleParamsSchema, scale } from "./numeric/scale";
import { type ThresholdParams, ThresholdParamsSchema, threshold } from "./numeric/threshold";

export {
  COLLECT_PREVIEW_ITEMS,
  CollectParamsSchema,
  collect,
  MeanParamsSchema,
  mean,
  type OffsetParams,
  OffsetParamsSchema,
  offset,
  PairDiffParamsSchema,
  pairDiff,
  parseNumberLine,
  type RangeParams,
  RangeParamsSchema,
  range,
  type ReadNumbersParams,
  ReadNumbersParamsSchema,
  readNumbers,
  type ScaleParams,
  ScaleParamsSchema,
  scale,
  SumParamsSchema,
  sum,
  type ThresholdParams,
  ThresholdParamsSchema,
  threshold,
};

export const demoSteps: readonly PipelineStep[] = [
  range,
  readNumbers,
  pairDiff,
  scale,
  offset,
  threshold,
  sum,
  mean,
  collect,
];

export function createDefaultRegistry(): StepRegistry {
  return new StepRegistry().registerAll(demoSteps);
}

import { type StepDescription, describeStep } from "./classifier";
import type { PipelineStep } from "./types";

/**
 * Named catalog of pipeline steps.
 *
 * Steps are looked up by name when a pipeline is assembled from text (the CLI),
 * so a registry is the only place names are resolved. The runner itself works
 * on step objects and never consults a registry.
 */
export class StepRegistry {
  private steps = new Map<string, PipelineStep>();

  /**
   * Add a step under its own name.
   *
   * @throws Error when a step with the same name is already registered
   */
  register(step: PipelineStep): this {
    if (this.steps.has(step.name)) {
      throw new Error(`Step already registered: ${step.name}`);
    }
    this.steps.set(step.name, step);
    return this;
  }

  registerAll(steps: Iterable<PipelineStep>): this {
    for (const step of steps) {
      this.register(step);
    }
    return this;
  }

  get(name: string): PipelineStep | undefined {
    return this.steps.get(name);
  }

  getAll(): PipelineStep[] {
    return Array.from(this.steps.values());
  }

  has(name: string): boolean {
    return this.steps.has(name);
  }

  /**
   * Look up a step that must exist.
   *
   * @throws Error naming the known steps when `name` is not registered
   */
  resolve(name: string): PipelineStep {
    const step = this.steps.get(name);
    if (!step) {
      const known = Array.from(this.steps.keys()).sort().join(", ");
      throw new Error(`Unknown step "${name}". Registered steps: ${known || "(none)"}`);
    }
    return step;
  }

  describe(): StepDescription[] {
    return this.getAll().map(describeStep);
  }
}

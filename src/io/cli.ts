import { parseArgs } from "node:util";
import type { Config } from "../config/schema";
import { createLogger, type Logger } from "../core/logging/logger";
import { CancellationSource } from "../core/pipeline/cancellation";
import { isPipelineError } from "../core/pipeline/errors";
import type { StepRegistry } from "../core/pipeline/registry";
import { runPipeline } from "../core/pipeline/runner";
import type { StepDescriptor, StepParams } from "../core/pipeline/types";

/**
 * One step as written on the command line: `name[:k=v,k=v][@workers]`.
 */
export interface StepSpec {
  name: string;
  params: StepParams;
  /** 0 when no `@` suffix was given */
  parallelism: number;
}

export interface RunCommand {
  command: "run";
  steps: StepSpec[];
  preview: boolean;
  previewLimit?: number;
  chunkSize?: number;
  verbose: boolean;
}

export type Command = RunCommand | { command: "list" } | { command: "help" };

export interface CLIOptions {
  registry: StepRegistry;
  config: Config;
  argv?: string[];
  /** Result lines (stdout) */
  out?: (line: string) => void;
  /** Error lines (stderr) */
  err?: (line: string) => void;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

const USAGE = `Usage:
  stepstream run <step>[:key=value,...][@workers] ... [options]
  stepstream list

Options:
  -p, --preview            Run on a short prefix of every source and transform
      --preview-limit <n>  Items kept per stage in preview mode
      --chunk-size <n>     Items per worker dispatch for parallel steps
  -v, --verbose            Debug logging
  -h, --help               Show this help

Parameter values are parsed as JSON when possible and kept as strings otherwise.
A bare "@" runs the step on the configured default number of workers.

Example:
  stepstream run range:count=100 scale:factor=2@4 threshold:level=50 sum`;

/**
 * Parse a parameter value: JSON when it parses, the raw string otherwise.
 *
 * @example
 * ```typescript
 * parseParamValue("2.5");   // 2.5
 * parseParamValue("true");  // true
 * parseParamValue("a.txt"); // "a.txt"
 * ```
 */
export function parseParamValue(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return raw;
  }
}

/**
 * Parse `name[:k=v,k=v][@workers]`.
 *
 * The `@` suffix only counts when it ends the token and is followed by digits
 * or nothing, so `readNumbers:path=data@home.txt` keeps its `@`.
 *
 * @throws UsageError for an empty step name or a parameter without `=`
 */
export function parseStepSpec(token: string, defaultWorkers: number): StepSpec {
  const suffix = /@(\d*)$/.exec(token);
  const body = suffix ? token.slice(0, suffix.index) : token;
  const workers = suffix?.[1];
  const parallelism = suffix ? (workers ? Number.parseInt(workers, 10) : defaultWorkers) : 0;

  const colon = body.indexOf(":");
  const name = colon === -1 ? body : body.slice(0, colon);
  if (!name) {
    throw new UsageError(`Missing step name in "${token}"`);
  }

  const params: StepParams = {};
  if (colon !== -1) {
    for (const pair of body.slice(colon + 1).split(",")) {
      if (pair === "") continue;
      const eq = pair.indexOf("=");
      if (eq <= 0) {
        throw new UsageError(`Expected key=value in "${token}", got "${pair}"`);
      }
      params[pair.slice(0, eq)] = parseParamValue(pair.slice(eq + 1));
    }
  }

  return { name, params, parallelism };
}

function parsePositiveInt(flag: string, value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new UsageError(`${flag} expects a positive integer, got "${value}"`);
  }
  return parsed;
}

/**
 * Turn argv (without the node and script entries) into a command.
 */
export function parseCommand(argv: string[], defaultWorkers: number): Command {
  const { values, positionals } = parseArgs({
    args: argv,
    options: {
      preview: { type: "boolean", short: "p", default: false },
      "preview-limit": { type: "string" },
      "chunk-size": { type: "string" },
      verbose: { type: "boolean", short: "v", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
    allowPositionals: true,
  });

  const [command, ...stepTokens] = positionals;
  if (values.help === true || command === undefined) {
    return { command: "help" };
  }
  if (command === "list") {
    return { command: "list" };
  }
  if (command !== "run") {
    throw new UsageError(`Unknown command "${command}"`);
  }
  if (stepTokens.length === 0) {
    throw new UsageError("run needs at least one step");
  }

  return {
    command: "run",
    steps: stepTokens.map((token) => parseStepSpec(token, defaultWorkers)),
    preview: values.preview === true,
    previewLimit: parsePositiveInt("--preview-limit", values["preview-limit"]),
    chunkSize: parsePositiveInt("--chunk-size", values["chunk-size"]),
    verbose: values.verbose === true,
  };
}

function listSteps(registry: StepRegistry, out: (line: string) => void): void {
  for (const step of registry.describe()) {
    const params = step.parameters.length > 0 ? ` (${step.parameters.join(", ")})` : "";
    out(`${step.name.padEnd(12)} ${step.role.padEnd(10)} ${step.description ?? ""}${params}`.trimEnd());
  }
}

async function runSteps(command: RunCommand, options: CLIOptions, logger: Logger): Promise<number> {
  const out = options.out ?? console.log;
  const descriptors: StepDescriptor[] = command.steps.map((spec) => ({
    step: options.registry.resolve(spec.name),
    params: spec.params,
    parallelism: spec.parallelism,
    chunkSize: command.chunkSize,
  }));

  const cancellation = new CancellationSource();
  const onSigint = () => {
    logger.warn({ event: "sigint" }, "Cancelling pipeline");
    cancellation.cancel();
  };
  process.once("SIGINT", onSigint);

  try {
    const result = await runPipeline(
      descriptors,
      {
        preview: command.preview,
        previewLimit: command.previewLimit,
        cancellation,
        logger,
        onPeek: (event) => logger.info({ event: "peek", step: event.step, role: event.role, value: event.value }),
        onProgress: (event) => logger.debug({ event: "progress", step: event.step, count: event.count }),
        onStateChange: (state) => logger.debug({ event: "state_change", state }),
      },
      options.config.engine,
    );

    out(JSON.stringify(result.value));
    if (result.status === "cancelled") {
      logger.warn({ event: "run_cancelled" }, "Pipeline cancelled; partial result printed");
    }
    return 0;
  } finally {
    process.removeListener("SIGINT", onSigint);
  }
}

/**
 * Entry point of the `stepstream` command. Resolves to the process exit code.
 */
export async function runCLI(options: CLIOptions): Promise<number> {
  const out = options.out ?? console.log;
  const err = options.err ?? console.error;
  const argv = options.argv ?? process.argv.slice(2);

  try {
    const command = parseCommand(argv, options.config.engine.defaultWorkers);

    switch (command.command) {
      case "help":
        out(USAGE);
        return 0;
      case "list":
        listSteps(options.registry, out);
        return 0;
      case "run": {
        if (command.verbose) {
          // The line formatters filter on LOG_LEVEL as well as the logger level
          process.env.LOG_LEVEL = "debug";
        }
        const logger = createLogger("cli");
        if (command.verbose) {
          logger.level = "debug";
        }
        return await runSteps(command, options, logger);
      }
    }
  } catch (error) {
    if (isPipelineError(error)) {
      err(`${error.code}: ${error.message}`);
    } else if (error instanceof UsageError) {
      err(`${error.message}\n\n${USAGE}`);
    } else {
      err(error instanceof Error ? error.message : String(error));
    }
    return 1;
  }
}

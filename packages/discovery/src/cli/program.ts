import * as fs from "node:fs";
import { Command, CommanderError } from "commander";
import pc from "picocolors";
import { z } from "zod";
import { loadConfig, type AppConfig } from "../config.js";
import { createConsoleReporter, formatSummary } from "../logging.js";
import { writeResult } from "../output/formatters.js";
import { DiscoveryRunner, type RunnerConfig } from "../runner.js";
import { RunStatus } from "../state/types.js";
import type { WorkflowState } from "../state/workflow-state.js";

const packageJson = z
  .object({ version: z.string() })
  .parse(JSON.parse(fs.readFileSync(new URL("../../package.json", import.meta.url), "utf-8")));

export interface Runner {
  run: DiscoveryRunner["run"];
  resume: DiscoveryRunner["resume"];
}

/** Process boundary of the CLI, replaceable in tests. */
export interface CliIO {
  env: Record<string, string | undefined>;
  createRunner: (config: Readonly<AppConfig>, options: RunnerConfig) => Runner;
  /** Results. */
  out: (text: string) => void;
  /** Progress and diagnostics. */
  err: (text: string) => void;
}

export function defaultIO(): CliIO {
  return {
    env: process.env,
    createRunner: (config, options) => new DiscoveryRunner(config, options),
    out: (text) => process.stdout.write(text),
    err: (text) => process.stderr.write(text),
  };
}

interface OutputOptions {
  output?: string;
  verbose?: boolean;
  quiet?: boolean;
  checkpoint?: string;
}

interface RunOptions extends OutputOptions {
  details?: string;
}

function runnerFor(io: CliIO, options: OutputOptions): Runner {
  const config = loadConfig(io.env);
  return io.createRunner(config, {
    ...(options.quiet
      ? {}
      : {
          onEvent: createConsoleReporter({
            verbose: options.verbose ?? false,
            write: (line) => io.err(`${line}\n`),
          }),
        }),
    ...(options.checkpoint ? { checkpointPath: options.checkpoint } : {}),
  });
}

function finish(io: CliIO, state: WorkflowState, options: OutputOptions): number {
  const snapshot = state.snapshot();
  if (options.output) {
    const format = writeResult(options.output, snapshot);
    if (!options.quiet) io.err(`Report written to ${options.output} (${format})\n`);
  } else {
    io.out(`${formatSummary(snapshot)}\n`);
  }
  return state.status === RunStatus.COMPLETED ? 0 : 1;
}

async function guarded(io: CliIO, body: () => Promise<number>): Promise<number> {
  try {
    return await body();
  } catch (error) {
    io.err(`${pc.red("Error:")} ${error instanceof Error ? error.message : String(error)}\n`);
    return 1;
  }
}

/**
 * Parse `argv` (arguments after the executable) and run the command.
 * Resolves to the process exit code.
 */
export async function runCli(argv: readonly string[], io: CliIO = defaultIO()): Promise<number> {
  let exitCode = 0;

  const program = new Command()
    .name("procurement-scout")
    .description("Discover vendors, partners and pricing for a procurement request")
    .version(packageJson.version, "-V, --version", "Print version")
    .exitOverride()
    .configureOutput({ writeOut: io.out, writeErr: io.err });

  program
    .command("run")
    .description("Run discovery for a service in a country")
    .argument("<service_name>", "Service or product to procure")
    .argument("<country>", "Country where the service is needed")
    .option("-d, --details <text>", "Additional requirements or context")
    .option("-o, --output <path>", "Write the report (.json, .md, .markdown or .html)")
    .option("-v, --verbose", "Also show retries and checkpoints")
    .option("-q, --quiet", "Only print the result")
    .option("--checkpoint <path>", "Save a checkpoint after every stage attempt")
    .action(async (serviceName: string, country: string, options: RunOptions) => {
      exitCode = await guarded(io, async () => {
        const runner = runnerFor(io, options);
        const state = await runner.run({
          serviceName,
          country,
          ...(options.details !== undefined ? { details: options.details } : {}),
        });
        return finish(io, state, options);
      });
    });

  program
    .command("resume")
    .description("Continue a run from its checkpoint")
    .argument("<checkpoint>", "Checkpoint file written by run --checkpoint")
    .option("-o, --output <path>", "Write the report (.json, .md, .markdown or .html)")
    .option("-v, --verbose", "Also show retries and checkpoints")
    .option("-q, --quiet", "Only print the result")
    .action(async (checkpoint: string, options: OutputOptions) => {
      exitCode = await guarded(io, async () => {
        const runner = runnerFor(io, { ...options, checkpoint });
        const state = await runner.resume(checkpoint);
        return finish(io, state, options);
      });
    });

  program.addHelpText(
    "after",
    `
${pc.bold("Examples:")}
  ${pc.dim("$")} procurement-scout run "Cloud Storage" "United States"
  ${pc.dim("$")} procurement-scout run CRM Germany -d "500 users, GDPR" -o report.md
  ${pc.dim("$")} procurement-scout resume runs/checkpoint.json
`,
  );

  try {
    await program.parseAsync([...argv], { from: "user" });
  } catch (error) {
    if (error instanceof CommanderError) return error.exitCode;
    throw error;
  }
  return exitCode;
}

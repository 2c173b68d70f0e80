import { resolve } from "node:path";
import { Command, InvalidArgumentError } from "commander";
import { ConsoleLogger, ReplayMismatchError, silentLogger } from "@tickvale/schemas";
import type { Logger } from "@tickvale/schemas";
import { replayCommand, runCommand } from "./commands.js";
import type { Print } from "./commands.js";
import { POLICY_NAMES, isPolicyName } from "./simulation.js";

export const DEFAULT_REPLAY_DIR = "runs";

export interface CliIO {
  out: Print;
  err: Print;
  setExitCode(code: number): void;
  logger?: Logger;
}

const defaultIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
  setExitCode: (code) => {
    process.exitCode = code;
  },
};

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError(`"${value}" is not a positive integer`);
  }
  return n;
}

function parsePolicy(value: string) {
  if (!isPolicyName(value)) throw new InvalidArgumentError(`expected one of ${POLICY_NAMES.join(", ")}`);
  return value;
}

function envTimeout(env: NodeJS.ProcessEnv): number | undefined {
  const raw = env.TICKVALE_DECISION_TIMEOUT_MS;
  if (raw === undefined || raw === "") return undefined;
  const n = Number(raw);
  if (!Number.isFinite(n) || n <= 0) throw new Error(`Invalid TICKVALE_DECISION_TIMEOUT_MS: "${raw}"`);
  return n;
}

interface RunFlags {
  ticks: number;
  seed?: string;
  policy: "idle" | "patrol";
  replayDir?: string;
  replay: boolean;
  memoryLog?: string;
  metrics?: boolean;
  quiet?: boolean;
}

interface ReplayFlags {
  verify?: boolean;
  summary?: boolean;
}

/**
 * Builds the `tickvale` command tree. Flags win over environment variables,
 * which win over built-in defaults.
 */
export function createProgram(io: CliIO = defaultIO, env: NodeJS.ProcessEnv = process.env): Command {
  const logger = io.logger ?? new ConsoleLogger("cli");

  const fail = (err: unknown) => {
    if (err instanceof ReplayMismatchError) io.err(`Replay mismatch: ${err.message}`);
    else io.err(`Error: ${err instanceof Error ? err.message : String(err)}`);
    io.setExitCode(1);
  };

  const program = new Command();
  program.name("tickvale").description("Tick-based multi-agent town simulation").version("0.1.0");

  program
    .command("run")
    .description("Simulate a world for a number of ticks")
    .argument("<world-file>", "World definition (.yaml, .yml or .json)")
    .option("--ticks <n>", "Number of ticks to run", parsePositiveInt, 24)
    .option("--seed <seed>", "Seed for world dynamics")
    .option("--policy <name>", `Decision policy: ${POLICY_NAMES.join(", ")}`, parsePolicy, "patrol" as const)
    .option("--replay-dir <dir>", "Directory for replay logs")
    .option("--no-replay", "Do not write a replay log")
    .option("--memory-log <file>", "Append every memory record to this JSONL file")
    .option("--metrics", "Print Prometheus metrics for the run when it ends")
    .option("--quiet", "Only print the final summary")
    .action(async (worldFile: string, flags: RunFlags) => {
      try {
        const replayDir = flags.replayDir ?? env.TICKVALE_REPLAY_DIR ?? DEFAULT_REPLAY_DIR;
        await runCommand(
          resolve(worldFile),
          {
            ticks: flags.ticks,
            policy: flags.policy,
            seed: flags.seed ?? (env.TICKVALE_SEED || undefined),
            decisionTimeoutMs: envTimeout(env),
            replayDir: flags.replay ? resolve(replayDir) : undefined,
            memoryLog: flags.memoryLog !== undefined ? resolve(flags.memoryLog) : undefined,
            metrics: flags.metrics ?? false,
            quiet: flags.quiet ?? false,
            logger: flags.quiet ? silentLogger : logger,
          },
          io.out,
        );
      } catch (err) {
        fail(err);
      }
    });

  program
    .command("replay")
    .description("Print, summarise or verify a recorded run")
    .argument("<run-file>", "Replay log (run.jsonl)")
    .option("--verify", "Re-simulate the run and compare every tick")
    .option("--summary", "Print counts instead of the narration")
    .action(async (runFile: string, flags: ReplayFlags) => {
      try {
        await replayCommand(resolve(runFile), { verify: flags.verify, summary: flags.summary, logger }, io.out);
      } catch (err) {
        fail(err);
      }
    });

  return program;
}

import { z } from "zod";
import { LogLevel } from "../src/utils/logger";

const list = <T extends z.ZodTypeAny>(item: T) =>
  z
    .string()
    .transform((s) =>
      s
        .split(",")
        .map((part) => part.trim())
        .filter(Boolean)
    )
    .pipe(z.array(item).nonempty());

const ExperimentEnv = z.object({
  EXP_OUTPUT: z.string().min(1).default("experiments/results.csv"),
  // how many seeds per configuration
  EXP_TRIALS: z.coerce.number().int().positive().default(20),
  // odd sizes keep maze borders closed
  EXP_SIZES: list(z.coerce.number().int().min(3)).default("31,63"),
  EXP_MAP_TYPES: list(z.enum(["Empty", "Random", "Maze"])).default("Maze,Random"),
  EXP_DENSITIES: list(z.coerce.number().min(0).max(1)).default("0.2,0.35"),
  EXP_HEURISTICS: list(z.enum(["Manhattan", "Chebyshev", "Euclidean"])).default(
    "Manhattan,Euclidean"
  ),
  EXP_LOG_LEVEL: LogLevel.default("info"),
  EXP_DIAG: z
    .enum(["0", "1"])
    .default("0")
    .transform((v) => v === "1"),
});

export type ExperimentConfig = z.output<typeof ExperimentEnv>;

/** Reads EXP_* variables; anything unset falls back to the defaults above. */
export function loadExperimentConfig(
  env: Record<string, string | undefined> = process.env
): ExperimentConfig {
  return ExperimentEnv.parse(env);
}

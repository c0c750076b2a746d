import { z } from "zod";

export const LogLevelSchema = z.enum(["debug", "info", "warn", "error", "silent"]);

export const SolverSchema = z.object({
  pivotTolerance: z.number().positive(),
});

export const RationalSchema = z.object({
  maxIterations: z.number().int().positive(),
  tolerance: z.number().nonnegative(),
});

export const AppConfigSchema = z.object({
  logLevel: LogLevelSchema,
  solver: SolverSchema,
  rational: RationalSchema,
});

// per-call overrides accepted by fitRational
export const RationalFitOptionsSchema = RationalSchema.merge(SolverSchema).partial().strict();

export type AppConfig = z.infer<typeof AppConfigSchema>;

import { z } from "zod";

import { ConfigError } from "./errors";
import { TabularEngineName } from "./tabular";

const convertConfigSchema = z.object({
  /** Size proxy at or above which tabular engines are considered. */
  threshold: z.number().int().nonnegative(),
  indent: z.string(),
  /** Emit the notice recommending an accelerator when a large input falls back to the baseline engine. */
  advisories: z.boolean(),
  /** Tabular engines this process may use. */
  accelerators: z.array(z.enum([TabularEngineName.Columnar, TabularEngineName.Blocks])),
});

export type ConvertConfig = z.infer<typeof convertConfigSchema>;

export const defaultConvertConfig: Readonly<ConvertConfig> = {
  threshold: 100,
  indent: "  ",
  advisories: true,
  accelerators: [TabularEngineName.Columnar, TabularEngineName.Blocks],
};

export const ConfigEnv = {
  Threshold: "TOON_CONVERT_THRESHOLD",
  Advisories: "TOON_CONVERT_ADVISORIES",
  Accelerators: "TOON_CONVERT_ACCELERATORS",
} as const;

const TRUE_WORDS = new Set(["1", "true", "on", "yes"]);
const FALSE_WORDS = new Set(["0", "false", "off", "no"]);

// Unrecognised words are passed through untouched so validation reports them.
const parseFlag = (raw: string): unknown => {
  const word = raw.trim().toLowerCase();
  if (TRUE_WORDS.has(word)) return true;
  if (FALSE_WORDS.has(word)) return false;
  return raw;
};

const parseList = (raw: string): string[] => {
  const trimmed = raw.trim();
  if (trimmed === "" || trimmed.toLowerCase() === "none") return [];
  return trimmed
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
};

const readEnv = (env: NodeJS.ProcessEnv): Record<string, unknown> => {
  const values: Record<string, unknown> = {};
  const threshold = env[ConfigEnv.Threshold];
  if (threshold !== undefined && threshold.trim() !== "") values.threshold = Number(threshold);
  const advisories = env[ConfigEnv.Advisories];
  if (advisories !== undefined) values.advisories = parseFlag(advisories);
  const accelerators = env[ConfigEnv.Accelerators];
  if (accelerators !== undefined) values.accelerators = parseList(accelerators);
  return values;
};

/**
 * Merges defaults, environment overrides and explicit overrides (in that order) and validates
 * the result.
 */
export const resolveConfig = (
  overrides: Partial<ConvertConfig> = {},
  env: NodeJS.ProcessEnv = process.env,
): ConvertConfig => {
  const explicit = Object.fromEntries(Object.entries(overrides).filter(([, value]) => value !== undefined));
  const result = convertConfigSchema.safeParse({ ...defaultConvertConfig, ...readEnv(env), ...explicit });
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "config"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${details}`, { cause: result.error });
  }
  return result.data;
};

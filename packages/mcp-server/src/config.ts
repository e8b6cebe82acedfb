import { homedir } from "os";
import path from "path";
import { z } from "zod";
import { defaultConcurrency } from "@take-finder/utils";
import { ConfigError } from "./fingerprints/errors.js";
import { DEFAULT_ALGORITHM, FINGERPRINT_ALGORITHMS } from "./fingerprints/types.js";
import { DEFAULT_THRESHOLD } from "./matching/autolabel.js";
import { DEFAULT_TOP_N } from "./matching/matcher.js";

export const USAGE = [
  "Usage: take-finder-mcp --library-root <path> [options]",
  "   or: Set TAKE_FINDER_LIBRARY_ROOT environment variable",
  "",
  "Options:",
  "  --library-root <path>        Folder containing the practice session folders",
  "  --algorithm <id>             spectral | lightweight | chroma | constellation",
  "  --threshold <0..1>           Minimum weighted score to accept a match",
  "  --reference-folders <list>   Comma-separated reference folders (relative to the root)",
  "  --signature-mode <mode>      stat | content",
  "  --concurrency <n>            Files fingerprinted in parallel",
  "  --top-n <n>                  Candidates kept in match diagnostics",
].join("\n");

/**
 * Flags and the environment variables that back them
 */
const SOURCES = {
  libraryRoot: { flag: "--library-root", env: "TAKE_FINDER_LIBRARY_ROOT" },
  algorithm: { flag: "--algorithm", env: "TAKE_FINDER_ALGORITHM" },
  threshold: { flag: "--threshold", env: "TAKE_FINDER_THRESHOLD" },
  referenceFolders: { flag: "--reference-folders", env: "TAKE_FINDER_REFERENCE_FOLDERS" },
  signatureMode: { flag: "--signature-mode", env: "TAKE_FINDER_SIGNATURE_MODE" },
  concurrency: { flag: "--concurrency", env: "TAKE_FINDER_CONCURRENCY" },
  topN: { flag: "--top-n", env: "TAKE_FINDER_TOP_N" },
} as const;

type ConfigKey = keyof typeof SOURCES;

function expandHome(value: string): string {
  return value === "~" || value.startsWith("~/") ? path.join(homedir(), value.slice(1)) : value;
}

const configSchema = z
  .object({
    libraryRoot: z
      .string({ error: "Library root is required" })
      .trim()
      .min(1, "Library root is required")
      .transform((value) => path.resolve(expandHome(value))),
    algorithm: z.enum(FINGERPRINT_ALGORITHMS).default(DEFAULT_ALGORITHM),
    threshold: z.coerce.number().min(0).max(1).default(DEFAULT_THRESHOLD),
    referenceFolders: z
      .string()
      .default("")
      .transform((value) =>
        value
          .split(",")
          .map((folder) => folder.trim())
          .filter((folder) => folder.length > 0)
      ),
    signatureMode: z.enum(["stat", "content"]).default("stat"),
    concurrency: z.coerce.number().int().positive().optional(),
    topN: z.coerce.number().int().positive().default(DEFAULT_TOP_N),
  })
  .transform((config) => ({
    ...config,
    referenceFolders: config.referenceFolders.map((folder) =>
      path.resolve(config.libraryRoot, expandHome(folder))
    ),
    concurrency: config.concurrency ?? defaultConcurrency(),
  }));

export type EngineConfig = z.output<typeof configSchema>;

/**
 * Read raw option values; command-line flags win over the environment
 */
function readRaw(
  argv: readonly string[],
  env: NodeJS.ProcessEnv
): Partial<Record<ConfigKey, string>> {
  const raw: Partial<Record<ConfigKey, string>> = {};

  for (const [key, source] of Object.entries(SOURCES)) {
    if (!isConfigKey(key)) continue;

    let value = env[source.env];
    const index = argv.findIndex(
      (arg) => arg === source.flag || arg.startsWith(`${source.flag}=`)
    );
    if (index !== -1) {
      const arg = argv[index];
      if (arg.includes("=")) {
        value = arg.slice(arg.indexOf("=") + 1);
      } else {
        const next = argv[index + 1];
        if (next === undefined || next.startsWith("--")) {
          throw new ConfigError(`Missing value for ${source.flag}`, [`${key}: missing value`]);
        }
        value = next;
      }
    }

    if (value !== undefined && value !== "") raw[key] = value;
  }

  return raw;
}

function isConfigKey(key: string): key is ConfigKey {
  return key in SOURCES;
}

/**
 * Build the engine configuration from command-line arguments and environment
 *
 * @throws ConfigError listing every invalid option
 */
export function loadConfig(
  argv: readonly string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env
): EngineConfig {
  const result = configSchema.safeParse(readRaw(argv, env));
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.map(String).join(".") || "config"}: ${issue.message}`
    );
    throw new ConfigError(`Invalid configuration:\n  ${issues.join("\n  ")}`, issues);
  }
  return result.data;
}

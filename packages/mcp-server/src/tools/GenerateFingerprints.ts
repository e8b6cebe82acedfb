import { z } from "zod";
import type { McpServer } from "../server.js";
import type { ToolContext } from "../types.js";
import { generateFolder } from "../fingerprints/batch.js";
import { FINGERPRINT_ALGORITHMS } from "../fingerprints/types.js";
import { logger } from "../utils/logger.js";

const log = logger.child({ group: "GenerateFingerprints" });

/**
 * Register the GenerateFingerprints tool - fingerprints the audio files in a folder
 *
 * Files whose cached fingerprint is still valid are not decoded again.
 * Cancelling the request stops new files from starting; finished work is saved.
 *
 * @example
 * GenerateFingerprints({ folder: "2024-05-01", algorithm: "chroma" })
 */
export function registerGenerateFingerprints(server: McpServer, context: ToolContext) {
  server.registerTool(
    "GenerateFingerprints",
    {
      title: "Generate Fingerprints",
      description:
        "Compute and cache audio fingerprints for the files in a practice folder. " +
        "Unchanged files reuse their cached fingerprint. " +
        "Files that cannot be decoded are reported and skipped.",
      inputSchema: {
        folder: z.string().describe("Practice folder, relative to the library root"),
        files: z
          .array(z.string())
          .optional()
          .describe("Filenames to fingerprint (default: every audio file in the folder)"),
        algorithm: z
          .enum(FINGERPRINT_ALGORITHMS)
          .optional()
          .describe("Fingerprint algorithm (default: the configured algorithm)"),
      },
      annotations: {
        readOnlyHint: false,
        destructiveHint: false,
        idempotentHint: true,
        openWorldHint: false,
      },
    },
    async ({ folder, files, algorithm }, { signal }) => {
      const result = await generateFolder(context.cache, context.resolvePath(folder), {
        algorithm: algorithm ?? context.config.algorithm,
        files,
        concurrency: context.config.concurrency,
        signal,
        onProgress: (progress) => log.debug(progress, "Fingerprint progress"),
      });

      const { counts } = result;
      const lines = [
        `${result.cancelled ? "Cancelled" : "Finished"} ${result.algorithm} fingerprints for ${result.folder}`,
        `generated: ${counts.generated}, cached: ${counts.cached}, skipped: ${counts.skipped}, failed: ${counts.failed}`,
      ];
      for (const outcome of result.outcomes) {
        if (outcome.status === "failed") lines.push(`- ${outcome.file}: ${outcome.error}`);
      }
      if (result.notStarted.length > 0) {
        lines.push(`Not started: ${result.notStarted.join(", ")}`);
      }

      return {
        content: [{ type: "text", text: lines.join("\n") }],
        structuredContent: { ...result },
      };
    }
  );
}

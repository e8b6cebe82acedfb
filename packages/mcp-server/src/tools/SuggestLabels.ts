import path from "path";
import { z } from "zod";
import type { McpServer } from "../server.js";
import type { ToolContext } from "../types.js";
import { FINGERPRINT_ALGORITHMS } from "../fingerprints/types.js";

/**
 * Register the SuggestLabels tool - proposes song names for every take in a folder
 */
export function registerSuggestLabels(server: McpServer, context: ToolContext) {
  server.registerTool(
    "SuggestLabels",
    {
      title: "Suggest Labels For Folder",
      description:
        "Fingerprint every recording in a practice folder and suggest a song name for each, " +
        "based on the closest match in the other practice folders. " +
        "Suggestions are not applied.",
      inputSchema: {
        folder: z.string().describe("Practice folder, relative to the library root"),
        threshold: z
          .number()
          .min(0)
          .max(1)
          .optional()
          .describe("Minimum weighted score to accept a match (default: configured threshold)"),
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
    async ({ folder, threshold, algorithm }, { signal }) => {
      const result = await context.autoLabeler.suggestFolder(context.resolvePath(folder), {
        threshold,
        algorithm,
        signal,
      });

      const lines = [`Suggestions for ${result.folder} (${result.algorithm}):`];
      for (const suggestion of result.suggestions) {
        const name = path.basename(suggestion.file);
        lines.push(
          suggestion.suggestedName
            ? `- ${name} → ${suggestion.suggestedName} (${suggestion.confidence}%, from ${suggestion.sourceFolder})`
            : `- ${name} → no match`
        );
      }
      for (const failure of result.failures) {
        lines.push(`- ${failure.file}: failed (${failure.error})`);
      }
      if (result.generation.cancelled) {
        lines.push(`Cancelled; not started: ${result.generation.notStarted.join(", ")}`);
      }

      return {
        content: [{ type: "text", text: lines.join("\n") }],
        structuredContent: {
          folder: result.folder,
          algorithm: result.algorithm,
          cancelled: result.generation.cancelled,
          suggestions: result.suggestions.map(({ diagnostics: _diagnostics, ...rest }) => rest),
          failures: result.failures,
        },
      };
    }
  );
}

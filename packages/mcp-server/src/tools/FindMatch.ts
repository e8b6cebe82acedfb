import { z } from "zod";
import type { McpServer } from "../server.js";
import type { ToolContext } from "../types.js";
import { FINGERPRINT_ALGORITHMS } from "../fingerprints/types.js";
import { formatDiagnostics } from "../matching/diagnostics.js";

/**
 * Register the FindMatch tool - suggests which known song a recording is
 *
 * @example
 * FindMatch({ file: "2024-06-12/take 3.wav", includeDiagnostics: true })
 */
export function registerFindMatch(server: McpServer, context: ToolContext) {
  server.registerTool(
    "FindMatch",
    {
      title: "Find Matching Recording",
      description:
        "Fingerprint a recording and find the most similar fingerprinted recording across all practice folders. " +
        "Reference folders and reference songs are weighted higher. " +
        "Returns a suggested song name and confidence, or no match when nothing reaches the threshold. " +
        "Nothing is renamed.",
      inputSchema: {
        file: z.string().describe("Audio file, relative to the library root"),
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
        includeDiagnostics: z
          .boolean()
          .optional()
          .default(false)
          .describe("Append the candidate ranking trace to the response"),
      },
      annotations: {
        readOnlyHint: false,
        destructiveHint: false,
        idempotentHint: true,
        openWorldHint: false,
      },
    },
    async ({ file, threshold, algorithm, includeDiagnostics }) => {
      const suggestion = await context.autoLabeler.suggest(context.resolvePath(file), {
        threshold,
        algorithm,
      });

      const { match } = suggestion;
      const summary = match
        ? `Suggested "${suggestion.suggestedName}" (${suggestion.confidence}% confidence) ` +
          `from ${match.matchedFile} in ${match.matchedFolder}, weighted score ${match.weightedScore.toFixed(4)}`
        : `No match for ${suggestion.file} above threshold ${suggestion.diagnostics.threshold}`;

      const text = includeDiagnostics
        ? `${summary}\n\n${formatDiagnostics(suggestion.diagnostics)}`
        : summary;

      return {
        content: [{ type: "text", text }],
        structuredContent: {
          file: suggestion.file,
          suggestedName: suggestion.suggestedName,
          confidence: suggestion.confidence,
          sourceFolder: suggestion.sourceFolder,
          match,
          ...(includeDiagnostics && { diagnostics: suggestion.diagnostics }),
        },
      };
    }
  );
}

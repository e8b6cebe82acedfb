import { z } from "zod";
import type { McpServer } from "../server.js";
import type { ToolContext } from "../types.js";

/**
 * Register the FingerprintInfo tool - summarizes a folder's fingerprint cache
 */
export function registerFingerprintInfo(server: McpServer, context: ToolContext) {
  server.registerTool(
    "FingerprintInfo",
    {
      title: "Fingerprint Info",
      description:
        "Show how many files in a practice folder have fingerprints for each algorithm, " +
        "plus the folder's reference/ignore flags, excluded files and reference songs.",
      inputSchema: {
        folder: z.string().describe("Practice folder, relative to the library root"),
      },
      annotations: {
        readOnlyHint: true,
        openWorldHint: false,
      },
    },
    async ({ folder }) => {
      const info = await context.cache.info(context.resolvePath(folder));

      const coverage = Object.entries(info.algorithmCoverage)
        .map(([algorithm, count]) => `${algorithm}: ${count}`)
        .join(", ");
      const lines = [
        `${info.folder}: ${info.totalFiles} fingerprinted file(s)`,
        `Coverage: ${coverage}`,
        `Reference folder: ${info.referenceFolder ? "yes" : "no"}, ignored: ${info.ignored ? "yes" : "no"}`,
      ];
      if (info.excludedFiles.length > 0) lines.push(`Excluded: ${info.excludedFiles.join(", ")}`);
      if (info.referenceSongs.length > 0) {
        lines.push(`Reference songs: ${info.referenceSongs.join(", ")}`);
      }

      return {
        content: [{ type: "text", text: lines.join("\n") }],
        structuredContent: { ...info },
      };
    }
  );
}

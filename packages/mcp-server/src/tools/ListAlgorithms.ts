import type { McpServer } from "../server.js";
import type { ToolContext } from "../types.js";
import { describeAlgorithms } from "../fingerprints/algorithms/index.js";

/**
 * Register the ListAlgorithms tool - describes the available fingerprint algorithms
 */
export function registerListAlgorithms(server: McpServer, context: ToolContext) {
  server.registerTool(
    "ListAlgorithms",
    {
      title: "List Fingerprint Algorithms",
      description:
        "List the fingerprint algorithms the engine supports, with their vector lengths. " +
        "Fingerprints are only comparable within the same algorithm.",
      inputSchema: {},
      annotations: {
        readOnlyHint: true,
        openWorldHint: false,
      },
    },
    async () => {
      const algorithms = describeAlgorithms();
      const lines = algorithms.map((a) => {
        const marker = a.id === context.config.algorithm ? " (default)" : "";
        return `- ${a.id}${marker}: ${a.name}, ${a.length} values. ${a.description}`;
      });

      return {
        content: [{ type: "text", text: lines.join("\n") }],
        structuredContent: {
          defaultAlgorithm: context.config.algorithm,
          algorithms,
        },
      };
    }
  );
}

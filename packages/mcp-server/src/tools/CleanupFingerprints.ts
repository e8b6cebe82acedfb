import { z } from "zod";
import type { McpServer } from "../server.js";
import type { ToolContext } from "../types.js";

/**
 * Register the CleanupFingerprints tool - drops fingerprints of deleted files
 */
export function registerCleanupFingerprints(server: McpServer, context: ToolContext) {
  server.registerTool(
    "CleanupFingerprints",
    {
      title: "Clean Up Fingerprints",
      description:
        "Remove cached fingerprints whose audio file no longer exists in the practice folder. " +
        "Fingerprints are never removed otherwise.",
      inputSchema: {
        folder: z.string().describe("Practice folder, relative to the library root"),
      },
      annotations: {
        readOnlyHint: false,
        destructiveHint: true,
        idempotentHint: true,
        openWorldHint: false,
      },
    },
    async ({ folder }) => {
      const target = context.resolvePath(folder);
      const removed = await context.cache.cleanup(target);

      const text =
        removed.length > 0
          ? `Removed ${removed.length} stale fingerprint(s) from ${target}:\n${removed.map((f) => `- ${f}`).join("\n")}`
          : `No stale fingerprints in ${target}`;

      return {
        content: [{ type: "text", text }],
        structuredContent: { folder: target, removed },
      };
    }
  );
}

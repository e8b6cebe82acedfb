import path from "path";
import { z } from "zod";
import type { McpServer } from "../server.js";
import type { ToolContext } from "../types.js";
import { discoverPracticeFolders } from "../folders/discovery.js";

/**
 * Register the DiscoverFolders tool - lists practice folders that have fingerprints
 */
export function registerDiscoverFolders(server: McpServer, context: ToolContext) {
  server.registerTool(
    "DiscoverFolders",
    {
      title: "Discover Practice Folders",
      description:
        "List every practice folder under the library root (or a subfolder of it) that has a fingerprint cache. " +
        "These are the folders searched when matching.",
      inputSchema: {
        root: z
          .string()
          .optional()
          .describe("Subfolder to search, relative to the library root (default: the whole library)"),
      },
      annotations: {
        readOnlyHint: true,
        openWorldHint: false,
      },
    },
    async ({ root }) => {
      const start = context.resolvePath(root ?? ".");
      const folders = await discoverPracticeFolders(start);
      const libraryRoot = context.config.libraryRoot;

      const text =
        folders.length > 0
          ? folders.map((folder) => `- ${path.relative(libraryRoot, folder) || "."}`).join("\n")
          : `No fingerprinted folders under ${start}`;

      return {
        content: [{ type: "text", text }],
        structuredContent: { root: start, folders },
      };
    }
  );
}

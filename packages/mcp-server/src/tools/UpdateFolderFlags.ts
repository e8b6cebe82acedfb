import { z } from "zod";
import type { McpServer } from "../server.js";
import type { ToolContext } from "../types.js";

/**
 * Register the UpdateFolderFlags tool - marks a folder as reference or ignored
 */
export function registerUpdateFolderFlags(server: McpServer, context: ToolContext) {
  server.registerTool(
    "UpdateFolderFlags",
    {
      title: "Update Folder Flags",
      description:
        "Set a practice folder's flags. " +
        "A reference folder's recordings are trusted more when matching; an ignored folder is never searched.",
      inputSchema: {
        folder: z.string().describe("Practice folder, relative to the library root"),
        referenceFolder: z.boolean().optional().describe("Mark the folder as a reference folder"),
        ignored: z.boolean().optional().describe("Exclude the folder from matching"),
      },
      annotations: {
        readOnlyHint: false,
        destructiveHint: false,
        idempotentHint: true,
        openWorldHint: false,
      },
    },
    async ({ folder, referenceFolder, ignored }) => {
      const target = context.resolvePath(folder);

      if (referenceFolder !== undefined) {
        await context.cache.setFolderReference(target, referenceFolder);
      }
      if (ignored !== undefined) {
        await context.cache.setFolderIgnored(target, ignored);
      }

      const info = await context.cache.info(target);
      return {
        content: [
          {
            type: "text",
            text: `${info.folder}: reference folder ${info.referenceFolder ? "on" : "off"}, ignored ${info.ignored ? "on" : "off"}`,
          },
        ],
        structuredContent: {
          folder: info.folder,
          referenceFolder: info.referenceFolder,
          ignored: info.ignored,
        },
      };
    }
  );
}

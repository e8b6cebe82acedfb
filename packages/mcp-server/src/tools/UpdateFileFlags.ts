import path from "path";
import { z } from "zod";
import type { McpServer } from "../server.js";
import type { ToolContext } from "../types.js";

/**
 * Register the UpdateFileFlags tool - excludes a file or marks it as a reference song
 */
export function registerUpdateFileFlags(server: McpServer, context: ToolContext) {
  server.registerTool(
    "UpdateFileFlags",
    {
      title: "Update File Flags",
      description:
        "Set flags for one recording in a practice folder. " +
        "Excluded files are neither fingerprinted nor matched; reference songs are trusted more when matching.",
      inputSchema: {
        folder: z.string().describe("Practice folder, relative to the library root"),
        file: z
          .string()
          .min(1)
          .refine((value) => path.basename(value) === value, "Must be a filename inside the folder")
          .describe("Filename inside the folder"),
        excluded: z.boolean().optional().describe("Skip this file when fingerprinting and matching"),
        referenceSong: z.boolean().optional().describe("Mark this file as a reference song"),
      },
      annotations: {
        readOnlyHint: false,
        destructiveHint: false,
        idempotentHint: true,
        openWorldHint: false,
      },
    },
    async ({ folder, file, excluded, referenceSong }) => {
      const target = context.resolvePath(folder);

      if (excluded !== undefined) {
        await context.cache.setFileExcluded(target, file, excluded);
      }
      if (referenceSong !== undefined) {
        await context.cache.setReferenceSong(target, file, referenceSong);
      }

      const info = await context.cache.info(target);
      const isExcluded = info.excludedFiles.includes(file);
      const isReferenceSong = info.referenceSongs.includes(file);

      return {
        content: [
          {
            type: "text",
            text: `${file}: excluded ${isExcluded ? "on" : "off"}, reference song ${isReferenceSong ? "on" : "off"}`,
          },
        ],
        structuredContent: {
          folder: info.folder,
          file,
          excluded: isExcluded,
          referenceSong: isReferenceSong,
        },
      };
    }
  );
}

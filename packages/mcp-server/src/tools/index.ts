/**
 * All available MCP tools for the take-finder server
 *
 * Tools use server.registerTool() API for clean, type-safe registration
 */

import type { McpServer } from "../server.js";
import type { ToolContext } from "../types.js";
import { registerListAlgorithms } from "./ListAlgorithms.js";
import { registerGenerateFingerprints } from "./GenerateFingerprints.js";
import { registerFindMatch } from "./FindMatch.js";
import { registerSuggestLabels } from "./SuggestLabels.js";
import { registerFingerprintInfo } from "./FingerprintInfo.js";
import { registerDiscoverFolders } from "./DiscoverFolders.js";
import { registerUpdateFolderFlags } from "./UpdateFolderFlags.js";
import { registerUpdateFileFlags } from "./UpdateFileFlags.js";
import { registerCleanupFingerprints } from "./CleanupFingerprints.js";

/**
 * Register all tools with the MCP server
 */
export function registerAllTools(server: McpServer, context: ToolContext) {
  registerListAlgorithms(server, context);
  registerGenerateFingerprints(server, context);
  registerFindMatch(server, context);
  registerSuggestLabels(server, context);
  registerFingerprintInfo(server, context);
  registerDiscoverFolders(server, context);
  registerUpdateFolderFlags(server, context);
  registerUpdateFileFlags(server, context);
  registerCleanupFingerprints(server, context);
}

/**
 * Type definitions for MCP tools
 */

import type { EngineConfig } from "./config.js";
import type { FingerprintCache } from "./fingerprints/cache.js";
import type { AutoLabeler } from "./matching/autolabel.js";

/**
 * Context passed to all tool handlers
 * Contains shared engine instances and the resolved configuration
 */
export interface ToolContext {
  config: EngineConfig;
  cache: FingerprintCache;
  autoLabeler: AutoLabeler;
  /** Resolve a tool's folder or file argument against the library root */
  resolvePath: (relativeOrAbsolute: string) => string;
}

/**
 * Per-call information the server hands to tool handlers
 */
export interface ToolCallExtra {
  /** Aborted when the client cancels the request */
  signal: AbortSignal;
}

/**
 * Tool response format
 */
export interface ToolResponse {
  content: ToolResponseContent[];
  structuredContent?: Record<string, unknown>;
  isError?: boolean;
}

export type ToolResponseContent = { type: "text"; text: string };

/**
 * Tool behaviour hints shown to clients
 */
export interface ToolAnnotations {
  title?: string;
  readOnlyHint?: boolean;
  destructiveHint?: boolean;
  idempotentHint?: boolean;
  openWorldHint?: boolean;
}

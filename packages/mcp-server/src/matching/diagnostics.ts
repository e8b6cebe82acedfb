import type { FingerprintAlgorithm } from "../fingerprints/types.js";

/**
 * Which trust boosts applied to a candidate
 */
export interface AppliedBoosts {
  referenceFolder: boolean;
  perFolderReference: boolean;
  referenceSong: boolean;
}

/**
 * One candidate after scoring and weighting
 */
export interface ScoredCandidate {
  file: string;
  folder: string;
  rawScore: number;
  /** Sum of applied boosts */
  boost: number;
  /** raw × (1 + boost), unclamped; used for ranking */
  boostedScore: number;
  /** boostedScore clamped to 1; compared against the threshold */
  weightedScore: number;
  isReference: boolean;
  folderCount: number;
  applied: AppliedBoosts;
}

export interface SkippedCandidate {
  file: string;
  folder: string;
  reason: string;
}

/**
 * Structured trace of one matching call
 */
export interface MatchDiagnostics {
  targetFile?: string;
  algorithm: FingerprintAlgorithm;
  targetLength: number;
  threshold: number;
  candidateCount: number;
  scoredCount: number;
  skipped: SkippedCandidate[];
  warnings: string[];
  /** Best candidates by weighted score */
  topCandidates: ScoredCandidate[];
  /** Candidates scoring between 50% and 100% of the threshold */
  nearThreshold: ScoredCandidate[];
  selection: ScoredCandidate | null;
  accepted: boolean;
}

/**
 * Ranking order: weighted score, then reference, then folder count, then
 * filename (and folder) for determinism
 */
export function compareRanked(a: ScoredCandidate, b: ScoredCandidate): number {
  if (a.boostedScore !== b.boostedScore) return b.boostedScore - a.boostedScore;
  if (a.isReference !== b.isReference) return a.isReference ? -1 : 1;
  if (a.folderCount !== b.folderCount) return b.folderCount - a.folderCount;
  if (a.file !== b.file) return a.file < b.file ? -1 : 1;
  if (a.folder !== b.folder) return a.folder < b.folder ? -1 : 1;
  return 0;
}

function formatCandidate(c: ScoredCandidate): string {
  const flags = [
    c.applied.referenceFolder && "reference-folder",
    c.applied.perFolderReference && "folder-reference",
    c.applied.referenceSong && "reference-song",
  ].filter((flag): flag is string => typeof flag === "string");

  return (
    `${c.file} [${c.folder}] raw=${c.rawScore.toFixed(4)} ` +
    `boost=+${(c.boost * 100).toFixed(0)}% weighted=${c.weightedScore.toFixed(4)} ` +
    `folders=${c.folderCount}` +
    (flags.length > 0 ? ` (${flags.join(", ")})` : "")
  );
}

/**
 * Render diagnostics as a plain-text trace for logs and tool output
 */
export function formatDiagnostics(d: MatchDiagnostics): string {
  const lines: string[] = [];
  lines.push(`Target: ${d.targetFile ?? "(unnamed)"} (${d.algorithm}, length ${d.targetLength})`);
  lines.push(
    `Threshold: ${d.threshold.toFixed(2)} | candidates: ${d.candidateCount} | scored: ${d.scoredCount} | skipped: ${d.skipped.length}`
  );

  for (const warning of d.warnings) lines.push(`Warning: ${warning}`);

  if (d.topCandidates.length > 0) {
    lines.push("Top candidates:");
    d.topCandidates.forEach((c, i) => lines.push(`  ${i + 1}. ${formatCandidate(c)}`));
  }

  if (d.nearThreshold.length > 0) {
    lines.push("Near threshold:");
    for (const c of d.nearThreshold) lines.push(`  - ${formatCandidate(c)}`);
  }

  for (const s of d.skipped) lines.push(`Skipped: ${s.file} [${s.folder}]: ${s.reason}`);

  if (d.selection) {
    lines.push(`${d.accepted ? "Selected" : "Best (below threshold)"}: ${formatCandidate(d.selection)}`);
  } else {
    lines.push("No scorable candidates");
  }

  return lines.join("\n");
}

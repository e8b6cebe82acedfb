import { describe, it, expect } from "vitest";
import {
  DEFAULT_BOOSTS,
  computeBoost,
  findBestMatch,
  weightScore,
  type MatchCandidate,
} from "./matcher.js";
import { formatDiagnostics } from "./diagnostics.js";
import { InvalidInputError } from "../fingerprints/errors.js";
import { FingerprintGenerator } from "../fingerprints/generator.js";
import type { FingerprintAlgorithm, FingerprintVector } from "../fingerprints/types.js";
import { TEST_SAMPLE_RATE, sine } from "../test-helpers.js";

const LENGTH = 144;

/** Lightweight fingerprint whose first two values are `a` and `b` */
function lightweight(a: number, b: number): FingerprintVector {
  const values = new Array<number>(32).fill(0);
  values[0] = a;
  values[1] = b;
  return { algorithm: "lightweight", values };
}

/** Unit vector whose cosine with `axis(0)` is exactly `similarity` */
function withSimilarity(similarity: number, length = LENGTH): FingerprintVector {
  const values = new Array<number>(length).fill(0);
  values[0] = similarity;
  values[1] = Math.sqrt(1 - similarity * similarity);
  return { algorithm: "spectral", values };
}

function axis(index: number, length = LENGTH, algorithm: FingerprintAlgorithm = "spectral"): FingerprintVector {
  const values = new Array<number>(length).fill(0);
  values[index] = 1;
  return { algorithm, values };
}

function candidate(
  file: string,
  folder: string,
  vector: FingerprintVector,
  flags: Partial<Pick<MatchCandidate, "isReferenceFolder" | "isPerFolderReference" | "isReferenceSong">> = {}
): MatchCandidate {
  return {
    file,
    folder,
    vector,
    isReferenceFolder: flags.isReferenceFolder ?? false,
    isPerFolderReference: flags.isPerFolderReference ?? false,
    isReferenceSong: flags.isReferenceSong ?? false,
  };
}

const NO_BOOSTS = { referenceFolder: 0, perFolderReference: 0, referenceSong: 0 };

describe("computeBoost and weightScore", () => {
  it("should add boosts together", () => {
    expect(
      computeBoost({ referenceFolder: true, perFolderReference: false, referenceSong: false })
    ).toBe(0.15);
    expect(
      computeBoost({ referenceFolder: true, perFolderReference: true, referenceSong: true })
    ).toBeCloseTo(0.35, 12);
    expect(
      computeBoost({ referenceFolder: false, perFolderReference: false, referenceSong: false })
    ).toBe(0);
  });

  it("should cap the weighted score at 1 but not the ranking score", () => {
    expect(weightScore(0.9996, 0.15).weighted).toBe(1);
    expect(weightScore(0.9996, 0.15).boosted).toBeCloseTo(1.14954, 10);
    expect(weightScore(0.5, 0.1).weighted).toBeCloseTo(0.55, 12);
  });

  it("should be non-decreasing in boost and in raw score", () => {
    const boosts = [0, 0.1, 0.15, 0.25, 0.35];
    const raws = [0, 0.2, 0.5, 0.8, 0.9, 0.99, 1];

    for (const raw of raws) {
      for (let i = 1; i < boosts.length; i++) {
        expect(weightScore(raw, boosts[i]).weighted).toBeGreaterThanOrEqual(
          weightScore(raw, boosts[i - 1]).weighted
        );
      }
    }
    for (const boost of boosts) {
      for (let i = 1; i < raws.length; i++) {
        expect(weightScore(raws[i], boost).weighted).toBeGreaterThanOrEqual(
          weightScore(raws[i - 1], boost).weighted
        );
      }
    }
  });
});

describe("findBestMatch", () => {
  const target = axis(0);

  it("should select the boosted reference candidate in the cross-folder scenario", () => {
    const { match } = findBestMatch(
      target,
      [
        candidate("Wonderwall.wav", "/library/folder1", withSimilarity(0.9996)),
        candidate("Creep.wav", "/library/folder1", withSimilarity(0.9711)),
        candidate("Wonderwall.wav", "/library/folder2", withSimilarity(0.9996), {
          isReferenceFolder: true,
        }),
      ],
      0.8,
      { targetFile: "take 3.wav" }
    );

    expect(match).not.toBeNull();
    expect(match?.targetFile).toBe("take 3.wav");
    expect(match?.matchedFile).toBe("Wonderwall.wav");
    expect(match?.matchedFolder).toBe("/library/folder2");
    expect(match?.rawScore).toBeCloseTo(0.9996, 10);
    expect(match?.weightedScore).toBe(1);
    expect(match?.boost).toBe(0.15);
    expect(match?.isReference).toBe(true);
    expect(match?.folderCount).toBe(2);
  });

  it("should report the unboosted weighted scores in diagnostics", () => {
    const { diagnostics } = findBestMatch(
      target,
      [
        candidate("Wonderwall.wav", "/library/folder1", withSimilarity(0.9996)),
        candidate("Creep.wav", "/library/folder1", withSimilarity(0.9711)),
      ],
      0.8
    );

    expect(diagnostics.topCandidates.map((c) => c.file)).toEqual(["Wonderwall.wav", "Creep.wav"]);
    expect(diagnostics.topCandidates[0].weightedScore).toBeCloseTo(0.9996, 10);
    expect(diagnostics.topCandidates[1].weightedScore).toBeCloseTo(0.9711, 10);
  });

  it("should find no match for silent audio", () => {
    const silent: FingerprintVector = { algorithm: "spectral", values: new Array(LENGTH).fill(0) };
    const { match, diagnostics } = findBestMatch(
      silent,
      [
        candidate("a.wav", "/library/one", withSimilarity(0.9)),
        candidate("b.wav", "/library/two", axis(5), { isReferenceFolder: true }),
      ],
      0.01
    );

    expect(match).toBeNull();
    expect(diagnostics.topCandidates.map((c) => c.rawScore)).toEqual([0, 0]);
    expect(diagnostics.warnings).toEqual([
      "Target fingerprint has zero norm (silent audio?); all similarities are 0",
    ]);
  });

  it("should find no match for a generated silent clip", () => {
    const generator = new FingerprintGenerator();
    const silent = generator.generate(new Float32Array(TEST_SAMPLE_RATE), TEST_SAMPLE_RATE);
    const song = generator.generate(sine(440, 0.5), TEST_SAMPLE_RATE);

    const { match, diagnostics } = findBestMatch(
      silent,
      [candidate("Song.wav", "/library/one", song, { isReferenceFolder: true })],
      0.01
    );

    expect(match).toBeNull();
    expect(diagnostics.topCandidates.map((c) => c.rawScore)).toEqual([0]);
    expect(diagnostics.warnings).toEqual([
      "Target fingerprint has zero norm (silent audio?); all similarities are 0",
    ]);
  });

  it("should return no match when the best score is below the threshold", () => {
    const candidates = Array.from({ length: 25 }, (_, i) =>
      candidate(`take${i}.wav`, `/library/s${i}`, withSimilarity(0.4 + i * 0.01))
    );

    const { match, diagnostics } = findBestMatch(target, candidates, 0.7);

    expect(match).toBeNull();
    expect(diagnostics.accepted).toBe(false);
    expect(diagnostics.selection?.file).toBe("take24.wav");
  });

  it("should accept a score equal to the threshold", () => {
    const { match } = findBestMatch(target, [candidate("a.wav", "/library/one", axis(0))], 1);
    expect(match?.weightedScore).toBe(1);
  });

  it("should let a boost lift a candidate over the threshold", () => {
    const candidates = [
      candidate("Song.wav", "/library/one", withSimilarity(0.65), { isReferenceSong: true }),
    ];

    expect(findBestMatch(target, candidates, 0.7, { boosts: NO_BOOSTS }).match).toBeNull();
    expect(findBestMatch(target, candidates, 0.7).match?.weightedScore).toBeCloseTo(0.715, 10);
  });

  it("should prefer the reference candidate when raw scores are equal", () => {
    const { match } = findBestMatch(
      target,
      [
        candidate("A.wav", "/library/one", withSimilarity(0.9)),
        candidate("B.wav", "/library/two", withSimilarity(0.9), { isReferenceSong: true }),
      ],
      0.5
    );
    expect(match?.matchedFile).toBe("B.wav");
    expect(match?.isReference).toBe(true);
  });

  it("should break ties by reference, then folder count, then filename", () => {
    const same = withSimilarity(0.9);

    const byReference = findBestMatch(
      target,
      [
        candidate("A.wav", "/library/one", same),
        candidate("Z.wav", "/library/two", same, { isPerFolderReference: true }),
      ],
      0.5,
      { boosts: NO_BOOSTS }
    );
    expect(byReference.match?.matchedFile).toBe("Z.wav");

    const byFolderCount = findBestMatch(
      target,
      [
        candidate("B.wav", "/library/one", same),
        candidate("Z.wav", "/library/two", same),
        candidate("Z.wav", "/library/three", same),
      ],
      0.5
    );
    expect(byFolderCount.match?.matchedFile).toBe("Z.wav");
    expect(byFolderCount.match?.matchedFolder).toBe("/library/three");
    expect(byFolderCount.match?.folderCount).toBe(2);

    const byName = findBestMatch(
      target,
      [candidate("C.wav", "/library/one", same), candidate("B.wav", "/library/two", same)],
      0.5
    );
    expect(byName.match?.matchedFile).toBe("B.wav");
  });

  it("should rank clamped candidates by their uncapped boosted score", () => {
    const { match } = findBestMatch(
      target,
      [
        candidate("A.wav", "/library/one", withSimilarity(0.9), { isReferenceFolder: true }),
        candidate("B.wav", "/library/two", withSimilarity(0.95), { isReferenceFolder: true }),
      ],
      0.5
    );
    // both weighted scores are capped at 1
    expect(match?.weightedScore).toBe(1);
    expect(match?.matchedFile).toBe("B.wav");
  });

  it("should skip candidates that cannot be compared", () => {
    const { match, diagnostics } = findBestMatch(
      target,
      [
        candidate("chroma.wav", "/library/one", axis(0, LENGTH, "chroma")),
        candidate("short.wav", "/library/one", axis(0, 12)),
        candidate("ok.wav", "/library/two", withSimilarity(0.9)),
      ],
      0.5
    );

    expect(match?.matchedFile).toBe("ok.wav");
    expect(diagnostics.candidateCount).toBe(3);
    expect(diagnostics.scoredCount).toBe(1);
    expect(diagnostics.skipped).toEqual([
      {
        file: "chroma.wav",
        folder: "/library/one",
        reason: "Cannot compare fingerprints of different algorithms: spectral vs chroma",
      },
      {
        file: "short.wav",
        folder: "/library/one",
        reason: "Cannot compare fingerprints of different lengths: 144 vs 12",
      },
    ]);
  });

  it("should skip candidates with non-finite values", () => {
    const broken = axis(0);
    broken.values[5] = Number.NaN;

    const { match, diagnostics } = findBestMatch(
      target,
      [candidate("bad.wav", "/library/one", broken), candidate("good.wav", "/library/two", axis(0))],
      0.8
    );

    expect(match?.matchedFile).toBe("good.wav");
    expect(match?.rawScore).toBe(1);
    expect(diagnostics.skipped).toEqual([
      { file: "bad.wav", folder: "/library/one", reason: "Fingerprint contains non-finite values" },
    ]);
  });

  it("should return no match for no candidates", () => {
    const { match, diagnostics } = findBestMatch(target, [], 0.5);
    expect(match).toBeNull();
    expect(diagnostics.selection).toBeNull();
  });

  it("should reject an invalid target or threshold", () => {
    const empty: FingerprintVector = { algorithm: "spectral", values: [] };
    const nan = axis(0);
    nan.values[1] = Number.NaN;

    expect(() => findBestMatch(empty, [], 0.5)).toThrow(InvalidInputError);
    expect(() => findBestMatch(nan, [], 0.5)).toThrow(InvalidInputError);
    expect(() => findBestMatch(axis(0, 10), [candidate("a.wav", "/library/one", axis(0))], 0.5)).toThrow(
      "Target spectral fingerprint has 10 values, expected 144"
    );
    expect(() => findBestMatch(target, [], 1.5)).toThrow(InvalidInputError);
    expect(() => findBestMatch(target, [], -0.1)).toThrow(InvalidInputError);
  });

  it("should keep the top candidates and those near the threshold", () => {
    const { diagnostics } = findBestMatch(
      target,
      [
        candidate("a.wav", "/library/one", withSimilarity(0.5)),
        candidate("b.wav", "/library/one", withSimilarity(0.3)),
        candidate("c.wav", "/library/one", withSimilarity(0.7)),
      ],
      0.8,
      { topN: 2 }
    );

    expect(diagnostics.topCandidates.map((c) => c.file)).toEqual(["c.wav", "a.wav"]);
    // [0.4, 0.8)
    expect(diagnostics.nearThreshold.map((c) => c.file)).toEqual(["c.wav", "a.wav"]);
    expect(diagnostics.threshold).toBe(0.8);
    expect(diagnostics.targetLength).toBe(LENGTH);
  });

  it("should warn about silent candidates", () => {
    const { diagnostics } = findBestMatch(
      target,
      [candidate("quiet.wav", "/library/one", { algorithm: "spectral", values: new Array(LENGTH).fill(0) })],
      0.5
    );
    expect(diagnostics.warnings).toEqual(["1 candidate fingerprint(s) have zero norm; scored as 0"]);
  });

  it("should use the default boost weights", () => {
    expect(DEFAULT_BOOSTS).toEqual({ referenceFolder: 0.15, perFolderReference: 0.1, referenceSong: 0.1 });
  });
});

describe("formatDiagnostics", () => {
  it("should render an accepted match", () => {
    const { diagnostics } = findBestMatch(
      lightweight(1, 0),
      [
        {
          file: "Song.wav",
          folder: "/library/a",
          vector: lightweight(1, 0),
          isReferenceFolder: true,
          isReferenceSong: false,
        },
      ],
      0.7,
      { targetFile: "take.wav" }
    );

    const line = "Song.wav [/library/a] raw=1.0000 boost=+15% weighted=1.0000 folders=1 (reference-folder)";
    expect(formatDiagnostics(diagnostics).split("\n")).toEqual([
      "Target: take.wav (lightweight, length 32)",
      "Threshold: 0.70 | candidates: 1 | scored: 1 | skipped: 0",
      "Top candidates:",
      `  1. ${line}`,
      `Selected: ${line}`,
    ]);
  });

  it("should render a rejected match and skipped candidates", () => {
    const { diagnostics } = findBestMatch(
      lightweight(1, 0),
      [
        candidate("Near.wav", "/library/a", lightweight(0.6, 0.8)),
        candidate("Other.wav", "/library/b", { algorithm: "chroma", values: [1, 0] }),
      ],
      0.8
    );

    const line = "Near.wav [/library/a] raw=0.6000 boost=+0% weighted=0.6000 folders=1";
    expect(formatDiagnostics(diagnostics).split("\n")).toEqual([
      "Target: (unnamed) (lightweight, length 32)",
      "Threshold: 0.80 | candidates: 2 | scored: 1 | skipped: 1",
      "Top candidates:",
      `  1. ${line}`,
      "Near threshold:",
      `  - ${line}`,
      "Skipped: Other.wav [/library/b]: Cannot compare fingerprints of different algorithms: lightweight vs chroma",
      `Best (below threshold): ${line}`,
    ]);
  });

  it("should say when nothing could be scored", () => {
    const { diagnostics } = findBestMatch(lightweight(1, 0), [], 0.5);
    expect(formatDiagnostics(diagnostics)).toContain("No scorable candidates");
  });
});

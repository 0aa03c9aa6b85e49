import type { TestCaseRanker } from "../campaign/collaborators.js";
import { RankingOutcome, TestCaseDescriptor, TestPriority } from "../campaign/test-types.js";
import { RankingError } from "../errors.js";

const PRIORITY_WEIGHT: Record<TestPriority, number> = {
  high: 3,
  medium: 2,
  low: 1,
};

export function rankScore(testCase: TestCaseDescriptor): number {
  return PRIORITY_WEIGHT[testCase.priority] * 10 + testCase.complexityScore;
}

/**
 * Orders candidates by priority then complexity and keeps the top N.
 * Equal scores keep their generation order.
 */
export class HeuristicRanker implements TestCaseRanker {
  async rank(candidates: readonly TestCaseDescriptor[], selectCount: number): Promise<RankingOutcome> {
    if (!Number.isInteger(selectCount) || selectCount < 0) {
      throw new RankingError(`Invalid selection count: ${selectCount}`);
    }

    const ordered = candidates
      .map((testCase, index) => ({ testCase, index, score: rankScore(testCase) }))
      .sort((a, b) => b.score - a.score || a.index - b.index)
      .map((entry) => entry.testCase);

    return {
      selected: ordered.slice(0, selectCount),
      rejected: ordered.slice(selectCount),
    };
  }
}

import type { HttpRequest } from '../http/types';
import { evaluateMock, type MockEvaluation } from '../matching/matcher';
import type { MockPair, MockRequestRecord, RecordStore } from '../store/types';

export type MockEvaluationObserver = (input: {
  scenario: string;
  mock: MockRequestRecord;
  result: MockEvaluation;
}) => void;

/**
 * Scans the scenario's mocks for the request's method in sequence order and returns
 * the first one whose path, body and headers all match. Matching does not consume
 * the mock: the same mock answers every request it matches.
 */
export class MatchingEngine {
  constructor(private readonly store: RecordStore) {}

  async findMatch(
    request: HttpRequest,
    scenarioName: string | undefined,
    observer?: MockEvaluationObserver
  ): Promise<MockPair | undefined> {
    if (!scenarioName) {
      return undefined;
    }

    const scenario = await this.store.findScenarioByName(scenarioName);
    if (!scenario) {
      return undefined;
    }

    const candidates = await this.store.listMockRequests(scenario.id, request.method);

    for (const mock of candidates) {
      const result = evaluateMock(mock, request);
      observer?.({ scenario: scenario.name, mock, result });

      if (!result.matched) {
        continue;
      }

      const response = await this.store.findMockResponse(mock.id);
      if (response) {
        return { request: mock, response };
      }
    }

    return undefined;
  }
}

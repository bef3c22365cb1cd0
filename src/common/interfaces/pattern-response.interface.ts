// Envelopes shared by every /api/patterns/<name>/demo and /test endpoint.

export interface PatternDemoResponse<TResult = unknown> {
  pattern: string;
  description: string;
  result: TResult;
  metadata: Record<string, unknown>;
}

export interface TestCheck {
  name: string;
  pass: boolean;
  details: string;
}

export type TestStatus = 'PASS' | 'FAIL';

export interface PatternTestResponse {
  pattern: string;
  status: TestStatus;
  checks: TestCheck[];
}

/** Implemented by each pattern module's scenario provider. */
export interface PatternScenario {
  runDemo(): Promise<PatternDemoResponse>;
  runTest(): Promise<PatternTestResponse>;
}

import { PatternTestResponse, TestCheck } from '../interfaces/pattern-response.interface';

export function check(name: string, pass: boolean, details: string): TestCheck {
  return { name, pass, details };
}

/** PASS only when every check passed. An empty check list is a FAIL. */
export function toTestResponse(pattern: string, checks: TestCheck[]): PatternTestResponse {
  const status = checks.length > 0 && checks.every(c => c.pass) ? 'PASS' : 'FAIL';
  return { pattern, status, checks };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

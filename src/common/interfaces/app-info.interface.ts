export interface HealthResponse {
  status: 'ok' | 'error';
  timestamp: string;
  uptime: number;          // seconds since process start
  service: string;
}

export interface PatternEndpoints {
  demo: string;
  test: string;
}

export interface ServiceInfoResponse {
  message: string;
  version: string;
  health: string;
  patterns: Record<string, PatternEndpoints>;
}

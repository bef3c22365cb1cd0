// Body written by HttpExceptionFilter for every failed request.
export interface HttpExceptionResponse {
  statusCode: number;
  message: string | string[];   // ValidationPipe reports one entry per failed constraint
  error?: string;
  timestamp: string;
  path: string;
}

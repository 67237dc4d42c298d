/** JSON body written by the console API for every failed request. */
export interface ApiErrorPayload {
  statusCode: number;
  timestamp: string;
  path: string;
  message: string | string[];
  details?: Record<string, unknown>;
  stack?: string[];
}

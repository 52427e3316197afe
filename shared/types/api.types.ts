/**
 * HTTP response contracts
 */

export interface ErrorResponseBody {
  error: string;
}

export interface HealthResponseBody {
  status: 'healthy';
  service: string;
  timestamp: string;
}

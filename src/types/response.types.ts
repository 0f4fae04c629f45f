/**
 * Response payloads, as placed in the `data` field of the envelope
 */

// Auth Module Response Types
export interface TokenResponse {
  access_token: string;
  token_type: 'bearer';
}

export interface HealthResponse {
  status: 'ok' | 'error';
  database: 'connected' | 'disconnected';
}

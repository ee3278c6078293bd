/**
 * Shared Type Definitions
 * Layer: Shared (cross-cutting, used by every layer)
 *
 * Response shapes that cross layer boundaries. Field names are snake_case
 * because they are part of the public JSON contract that probes, dashboards
 * and the existing test harness already read.
 */
export interface TokenResponse {
  access_token: string;
  token_type: 'bearer';
}

/** Internal reasons a bearer token is refused. Logged, never sent to the client. */
export type TokenRejectionReason =
  | 'invalid_signature'
  | 'expired'
  | 'missing_subject'
  | 'unknown_subject';

export interface ErrorResponse {
  status: 'error';
  message: string;
}

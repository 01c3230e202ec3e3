/**
 * API types: shapes for request/response payloads.
 * Field names follow the snake_case wire format the chat frontend sends.
 */

import type { Source } from './models.js';

// ── Requests ──

export interface QueryRequest {
  query: string;
  session_id?: string;
}

// ── Responses ──

export interface QueryResponse {
  answer: string;
  sources: Source[];
  session_id: string;
}

export interface CourseStatsResponse {
  total_courses: number;
  course_titles: string[];
}

export interface HealthResponse {
  status: 'ok';
}

export interface ApiErrorResponse {
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
}

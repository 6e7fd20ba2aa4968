import type { FastifyRequest } from 'fastify';
import { SERVER_CONFIG } from '@fitledger/shared';
import { FitnessError, NotLoggedInError, ValidationError } from '@fitledger/fitness-core';

const STATUS_BY_CODE: Record<string, number> = {
  VALIDATION_ERROR: 400,
  NOT_LOGGED_IN: 401,
  NOT_FOUND: 404,
  TRANSACTION_FAILED: 500,
};

export function statusFor(error: unknown): number {
  if (error instanceof FitnessError) {
    return STATUS_BY_CODE[error.code] ?? 500;
  }
  // Fastify's own errors (bad JSON, oversized body) carry a status
  if (error instanceof Error && 'statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode;
  }
  return 500;
}

/**
 * The signed-in user, resolved by the shell in front of this server and
 * passed along in a header.
 */
export function requestUser(request: FastifyRequest): string {
  const header = request.headers[SERVER_CONFIG.USER_HEADER];
  const userId = Array.isArray(header) ? header[0] : header;
  if (!userId) {
    throw new NotLoggedInError();
  }
  return userId;
}

export function parseId(raw: string): number {
  const id = Number(raw);
  if (!Number.isInteger(id) || id <= 0) {
    throw new ValidationError(`Invalid id: ${raw}`);
  }
  return id;
}

export function parseCount(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const count = Number(raw);
  if (!Number.isInteger(count) || count < 0) {
    throw new ValidationError(`Invalid count: ${raw}`);
  }
  return count;
}

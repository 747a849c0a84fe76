/**
 * HTTP Test Helpers
 * Run Express handlers against mocked requests and responses
 */

import { RequestHandler } from 'express';
import { createRequest, createResponse } from 'node-mocks-http';

export async function invokeHandler(
  handler: RequestHandler,
  options: { method?: 'GET' | 'POST'; body?: Record<string, unknown> } = {}
) {
  const req = createRequest({ method: options.method ?? 'POST', body: options.body ?? {} });
  const res = createResponse();
  const next = jest.fn();

  handler(req, res, next);

  // asyncHandler settles on a later tick
  await new Promise((resolve) => setImmediate(resolve));

  return { req, res, next };
}

/**
 * Entity-independent units: error handling, request validation, pagination
 */

import { lines } from "../render.js";
import type { ResolvedSynthesizerOptions } from "../types.js";

export function renderErrorHandler(): string {
  return lines(
    "import { NextFunction, Request, Response } from 'express';",
    "import { ForeignKeyConstraintError, UniqueConstraintError, ValidationError } from 'sequelize';",
    "",
    "export class HttpError extends Error {",
    "  constructor(",
    "    public readonly status: number,",
    "    message: string,",
    "    public readonly details?: unknown,",
    "  ) {",
    "    super(message);",
    "    this.name = 'HttpError';",
    "  }",
    "}",
    "",
    "export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {",
    "  next(new HttpError(404, `Route not found: ${req.method} ${req.originalUrl}`));",
    "}",
    "",
    "export function errorHandler(",
    "  err: unknown,",
    "  _req: Request,",
    "  res: Response,",
    "  _next: NextFunction,",
    "): void {",
    "  if (err instanceof HttpError) {",
    "    res.status(err.status).json({ error: err.message, details: err.details });",
    "    return;",
    "  }",
    "  if (err instanceof UniqueConstraintError) {",
    "    res.status(409).json({",
    "      error: 'Unique constraint violation',",
    "      details: err.errors.map((item) => item.message),",
    "    });",
    "    return;",
    "  }",
    "  if (err instanceof ValidationError) {",
    "    res.status(400).json({",
    "      error: 'Validation error',",
    "      details: err.errors.map((item) => item.message),",
    "    });",
    "    return;",
    "  }",
    "  if (err instanceof ForeignKeyConstraintError) {",
    "    res.status(409).json({ error: 'Foreign key constraint violation' });",
    "    return;",
    "  }",
    "",
    "  console.error(err);",
    "  res.status(500).json({",
    "    error: 'Internal server error',",
    "    message:",
    "      process.env.NODE_ENV === 'development' && err instanceof Error ? err.message : undefined,",
    "  });",
    "}",
  );
}

export function renderValidateRequest(): string {
  return lines(
    "import { NextFunction, Request, RequestHandler, Response } from 'express';",
    "import { HttpError } from './errorHandler';",
    "",
    "function isBlank(value: unknown): boolean {",
    "  return value === undefined || value === null || (typeof value === 'string' && value.trim() === '');",
    "}",
    "",
    "/**",
    " * Reject bodies that are not JSON objects or that lack any of the given fields",
    " */",
    "export function requireFields(fields: readonly string[]): RequestHandler {",
    "  return (req: Request, _res: Response, next: NextFunction): void => {",
    "    const body: unknown = req.body;",
    "    if (typeof body !== 'object' || body === null || Array.isArray(body)) {",
    "      next(new HttpError(400, 'Request body must be a JSON object'));",
    "      return;",
    "    }",
    "",
    "    const values = new Map<string, unknown>(Object.entries(body));",
    "    const missing = fields.filter((field) => isBlank(values.get(field)));",
    "    if (missing.length > 0) {",
    "      next(new HttpError(400, 'Missing required fields', { missing }));",
    "      return;",
    "    }",
    "    next();",
    "  };",
    "}",
  );
}

export function renderPagination(options: ResolvedSynthesizerOptions): string {
  return lines(
    `export const DEFAULT_PAGE_SIZE = ${options.defaultPageSize};`,
    `export const MAX_PAGE_SIZE = ${options.maxPageSize};`,
    "",
    "export interface PageRequest {",
    "  page: number;",
    "  limit: number;",
    "}",
    "",
    "export interface Page<T> {",
    "  items: T[];",
    "  total: number;",
    "  page: number;",
    "  limit: number;",
    "  totalPages: number;",
    "}",
    "",
    "function toPositiveInteger(value: unknown, fallback: number): number {",
    "  const parsed = typeof value === 'string' ? Number.parseInt(value, 10) : Number.NaN;",
    "  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;",
    "}",
    "",
    "export function parsePageRequest(query: Record<string, unknown>): PageRequest {",
    "  return {",
    "    page: toPositiveInteger(query.page, 1),",
    "    limit: Math.min(toPositiveInteger(query.limit, DEFAULT_PAGE_SIZE), MAX_PAGE_SIZE),",
    "  };",
    "}",
    "",
    "export function toOffset(request: PageRequest): number {",
    "  return (request.page - 1) * request.limit;",
    "}",
    "",
    "export function toPage<T>(items: T[], total: number, request: PageRequest): Page<T> {",
    "  return {",
    "    items,",
    "    total,",
    "    page: request.page,",
    "    limit: request.limit,",
    "    totalPages: Math.ceil(total / request.limit),",
    "  };",
    "}",
  );
}

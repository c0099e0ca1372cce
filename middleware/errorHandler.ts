import type { NextFunction, Request, Response } from 'express';
import { ZodError } from 'zod';
import { HttpError } from '../errors';
import type { ErrorResponse } from '../types';

export const notFoundHandler = (req: Request, res: Response<ErrorResponse>) => {
  res.status(404).json({ detail: 'Not found' });
};

export const errorHandler = (err: unknown, req: Request, res: Response<ErrorResponse>, _next: NextFunction) => {
  if (err instanceof HttpError) {
    return res.status(err.status).json({ detail: err.message });
  }
  if (err instanceof ZodError) {
    const issue = err.issues[0];
    console.warn(`Rejected ${req.method} ${req.path}: ${issue?.message}`);
    return res.status(400).json({ detail: issue?.message ?? 'Invalid request' });
  }
  console.error(`Unhandled error on ${req.method} ${req.path}:`, err);
  res.status(500).json({ detail: 'Internal server error' });
};

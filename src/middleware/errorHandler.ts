import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';

export const errorHandler = (err: Error, req: Request, res: Response, _next: NextFunction) => {
  console.error('Error:', err);

  // Default error
  let status = 500;
  let message = 'Internal server error';
  let details: unknown;

  // Handle specific error types
  if (err instanceof ZodError) {
    status = 400;
    message = 'Validation error';
    details = err.errors;
  } else if (err.name === 'ValidationError') {
    status = 400;
    message = err.message;
  } else if (err.name === 'TimeoutError') {
    status = 408;
    message = 'Request timeout';
  } else if (err.message.includes('ENOTFOUND') || err.message.includes('ECONNREFUSED')) {
    status = 400;
    message = 'Unable to reach the specified URL';
  } else if (err.name === 'FetchError') {
    status = 502;
    message = err.message;
  } else if (err.name === 'SyntaxError' && 'body' in err) {
    status = 400;
    message = 'Malformed JSON body';
  }

  res.status(status).json({
    error: message,
    ...(details !== undefined && { details }),
    ...(process.env.NODE_ENV === 'development' && { stack: err.stack }),
  });
};

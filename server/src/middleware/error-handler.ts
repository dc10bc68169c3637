import { NextFunction, Request, Response } from 'express';
import multer from 'multer';

/**
 * Last-resort handler for errors raised outside the route bodies,
 * mostly upload rejections from multer
 */
export function errorHandler(err: Error, req: Request, res: Response, next: NextFunction) {
  if (res.headersSent) {
    return next(err);
  }

  // Handle Multer errors specifically
  if (err instanceof multer.MulterError) {
    console.error(`[Server] Upload rejected on ${req.method} ${req.path}: ${err.code} (${err.field ?? 'no field'})`);
    return res.status(400).json({
      error: 'File upload error',
      message: err.message,
      code: err.code,
      field: err.field,
    });
  }

  console.error('[Server] Error occurred:', err);
  res.status(500).json({
    error: 'Internal Server Error',
    message: err.message,
  });
}

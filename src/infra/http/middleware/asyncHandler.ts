import type { NextFunction, Request, RequestHandler, Response } from 'express';

export type AsyncRouteHandler = (
  req: Request,
  res: Response,
  signal: AbortSignal
) => Promise<unknown>;

/**
 * Wrap an async Express handler so it returns void (no-misused-promises)
 * and forwards errors to next().
 *
 * The handler receives a signal that aborts when the client disconnects
 * before the response has been written.
 */
export function asyncHandler(fn: AsyncRouteHandler): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableEnded) {
        controller.abort();
      }
    });
    void fn(req, res, controller.signal).catch(next);
  };
}

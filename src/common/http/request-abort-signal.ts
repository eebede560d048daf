import { Request, Response } from 'express';

/**
 * An AbortSignal that fires when the client goes away before the response
 * has been written, so slow store lookups can stop early.
 */
export function requestAbortSignal(req: Request, res: Response): AbortSignal {
  const controller = new AbortController();

  const onClose = () => {
    if (!res.writableFinished) {
      controller.abort(new Error(`Client disconnected from ${req.originalUrl}`));
    }
  };

  res.once('close', onClose);
  return controller.signal;
}

import type { Request, Response, NextFunction, RequestHandler } from "express";

/** Forwards a rejected handler promise to the error middleware. */
export function asyncHandler(fn: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    fn(req, res).catch(next);
  };
}

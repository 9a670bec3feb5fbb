import type { NextFunction, Request, Response } from "express";

// Express 4 does not forward rejected promises to the error handler
export function asyncRoute(
  handler: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
) {
  return (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res, next).catch(next);
  };
}

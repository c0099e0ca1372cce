import type { NextFunction, Request, Response } from 'express';

// Express 4 does not forward rejected promises from handlers to the error middleware.
export const asyncHandler =
  <Req extends Request = Request>(handler: (req: Req, res: Response, next: NextFunction) => Promise<unknown>) =>
  (req: Req, res: Response, next: NextFunction): void => {
    handler(req, res, next).catch(next);
  };

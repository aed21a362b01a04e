import { NextFunction, Request, RequestHandler, Response } from "express";

export type AsyncRoute = (req: Request, res: Response, next: NextFunction) => Promise<unknown>;

/** Forwards rejections from an async route to the Express error handler. */
export const asyncHandler = (fn: AsyncRoute): RequestHandler => {
  return (req, res, next) => {
    fn(req, res, next).catch(next);
  };
};

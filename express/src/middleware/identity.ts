import type { NextFunction, Request, Response } from 'express';
import { anonymousActor, type Actor } from '@actiongate/core';

declare global {
  namespace Express {
    interface Request {
      actor?: Actor;
    }
  }
}

export type IdentityResolver = (req: Request) => Promise<Actor | null> | Actor | null;

export function identityMiddleware(resolver?: IdentityResolver) {
  return async (req: Request, _res: Response, next: NextFunction) => {
    try {
      req.actor = (await resolver?.(req)) ?? anonymousActor();
      next();
    } catch (e) {
      next(e);
    }
  };
}

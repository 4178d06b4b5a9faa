import type { NextFunction, Request, Response } from 'express';
import {
  anonymousActor,
  type AccessControl,
  type Decision,
  type ExecutionContext,
  type Logger,
  type Params,
} from '@actiongate/core';

import { defaultDenial, renderDenial, type DenialConfig } from '../http/denial.js';

export type RequestAccess = {
  context: ExecutionContext;
  decision: Decision;
  permittedTo: (privilege: string, target?: unknown) => Promise<boolean>;
  /** Object loaded for `domainType` while deciding this request, if any. */
  loaded: (domainType: string) => unknown;
};

declare global {
  namespace Express {
    interface Request {
      access?: RequestAccess;
    }
  }
}

export type DeniedHandler = (req: Request, res: Response, decision: Decision) => void | Promise<void>;

export type AccessFilterOptions = {
  /** Renders or redirects on denial instead of the fixed response. */
  onDenied?: DeniedHandler;
  denial?: DenialConfig;
  logger?: Logger;
  params?: (req: Request) => Params;
};

function isPlainObject(v: unknown): v is Record<string, unknown> {
  return !!v && typeof v === 'object' && !Array.isArray(v);
}

export function requestParams(req: Request): Params {
  const body: unknown = req.body;
  return {
    ...req.query,
    ...(isPlainObject(body) ? body : {}),
    ...req.params,
  };
}

export function logDenial(logger: Logger, resource: string, action: string, decision: Decision): void {
  const { reason } = decision;
  if (reason.type === 'no-matching-rule') {
    logger.warn(`[actiongate] Permission denied: No matching filter access rule found for ${resource}.${action}`);
  } else if (reason.type === 'evaluation-denied') {
    logger.info(`[actiongate] Permission denied: ${reason.cause.message}`);
  } else if (reason.type === 'evaluation-error') {
    logger.warn(`[actiongate] Permission denied: ${resource}.${action} failed to evaluate`, reason.cause);
  }
}

/**
 * Before-action filter: decides `action` against `access` and either continues the
 * request or renders the denial.
 */
export function accessFilter(access: AccessControl, action: string, opts: AccessFilterOptions = {}) {
  const logger = opts.logger ?? access.logger;
  const denial = opts.denial ?? defaultDenial;

  return async (req: Request, res: Response, next: NextFunction) => {
    try {
      const context = access.createContext({
        identity: req.actor ?? anonymousActor(),
        action,
        params: opts.params ? opts.params(req) : requestParams(req),
      });
      const decision = await access.decide(action, context);
      req.access = {
        context,
        decision,
        permittedTo: (privilege, target) => access.permittedTo(context, privilege, target),
        loaded: (domainType) => context.objects.get(domainType),
      };
      if (decision.allowed) return next();

      logDenial(logger, access.resource, action, decision);
      if (opts.onDenied) return await opts.onDenied(req, res, decision);
      renderDenial(res, denial);
    } catch (e) {
      next(e);
    }
  };
}

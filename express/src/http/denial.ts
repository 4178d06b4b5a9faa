import type { Response } from 'express';
import { DEFAULT_DENIAL_MESSAGE, type ResolvedAccessConfig } from '@actiongate/core';

export type DenialConfig = ResolvedAccessConfig['denial'];

export const defaultDenial: DenialConfig = { status: 403, message: DEFAULT_DENIAL_MESSAGE };

/** Fixed denial body; never carries the decision's cause. */
export function renderDenial(res: Response, denial: DenialConfig = defaultDenial): void {
  const code = denial.status;
  res.status(code).json({
    success: false,
    code,
    errors: { root: code === 404 ? 'NotFound' : 'Forbidden' },
    message: denial.message,
  });
}

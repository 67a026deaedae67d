import type { Request, Response, NextFunction } from 'express';
import { getAddress } from 'viem';
import { zAddress } from '@quorum-governor/shared';
import type { Address } from '../governance/types.js';

/** Set by the authenticating gateway in front of this service. */
export const CALLER_HEADER = 'x-caller-address';

declare global {
  namespace Express {
    interface Request {
      caller?: Address;
    }
  }
}

/**
 * Resolve the calling principal for direct-form operations (propose, castVote).
 * Rejects the request when the header is missing or not an address.
 */
export function requireCaller(req: Request, res: Response, next: NextFunction): void {
  const parsed = zAddress.safeParse(req.header(CALLER_HEADER));
  if (!parsed.success) {
    res.status(401).json({ error: `${CALLER_HEADER} header with the caller address is required`, code: 'UNAUTHENTICATED' });
    return;
  }
  req.caller = getAddress(parsed.data);
  next();
}

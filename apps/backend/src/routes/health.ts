import { Router } from 'express';
import { ZERO_ADDRESS } from '@quorum-governor/shared';
import { isStrictMode } from '../config/governor.js';
import type { GovernanceRuntime } from '../runtime.js';

/** Mask an address to first 6 + last 4 chars for public display. */
function maskAddress(addr: string): string {
  if (!addr || addr === ZERO_ADDRESS) return '(not configured)';
  if (addr.length < 12) return addr;
  return `${addr.slice(0, 6)}…${addr.slice(-4)}`;
}

export function createHealthRouter(runtime: GovernanceRuntime): Router {
  const router = Router();

  router.get('/health', async (_req, res) => {
    const { engine } = runtime;

    let checkpoint: { ok: true; current: string } | { ok: false; error: string };
    try {
      checkpoint = { ok: true, current: (await runtime.clock.current()).toString() };
    } catch (err) {
      checkpoint = { ok: false, error: err instanceof Error ? err.message : 'Failed to read checkpoint' };
    }

    res.json({
      status: checkpoint.ok ? 'ok' : 'degraded',
      uptime: process.uptime(),
      service: 'quorum-governor-backend',
      timestamp: new Date().toISOString(),
      mode: runtime.mode,
      strictMode: isStrictMode(),
      checkpoint,
      governor: {
        name: engine.config.name,
        chainId: engine.config.chainId,
        tokenMasked: maskAddress(engine.config.token),
        verifyingContractMasked: maskAddress(engine.config.verifyingContract),
        proposalCount: engine.proposalCount.toString(),
      },
    });
  });

  return router;
}

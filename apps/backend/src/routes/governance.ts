import { Router, type Response } from 'express';
import {
  CastVoteBySigRequestSchema,
  CastVoteRequestSchema,
  ExecuteRequestSchema,
  ProposalIdParamSchema,
  ProposeRequestSchema,
  zAddress,
} from '@quorum-governor/shared';
import type { GovernanceEngine } from '../governance/engine.js';
import { GovernanceErrorCode, isGovernanceError } from '../governance/errors.js';
import { requireCaller } from '../middleware/caller.js';
import { appendLog, createLogEvent, readByProposalId, readLatest } from '../storage/logStore.js';
import { toHttpError, validationError, type HttpError } from './httpErrors.js';
import { actionsView, configView, proposalView, receiptView } from './views.js';

function send(res: Response, error: HttpError): void {
  res.status(error.status).json(error.body);
}

/** Translate a failed operation; unexpected errors are logged before the 500. */
function fail(res: Response, tag: string, err: unknown): void {
  if (isGovernanceError(err)) {
    if (err.code === GovernanceErrorCode.ActionExecutionFailed) {
      const proposalId = typeof err.details?.proposalId === 'string' ? err.details.proposalId : undefined;
      appendLog(createLogEvent('PROPOSAL_EXECUTE_FAIL', err.details, 'ERROR', proposalId));
    }
  } else {
    console.error(`[governance/${tag}] error:`, err);
    appendLog(createLogEvent('ERROR', { route: tag, message: err instanceof Error ? err.message : String(err) }, 'ERROR'));
  }
  send(res, toHttpError(err));
}

export function createGovernanceRouter(engine: GovernanceEngine): Router {
  const router = Router();

  // ─── GET /api/governance/config ─────────────────────────
  router.get('/config', (_req, res) => {
    res.json(configView(engine));
  });

  // ─── GET /api/governance/events ─────────────────────────
  router.get('/events', (req, res) => {
    const limit = Math.min(Math.max(Number(req.query.limit ?? 100) || 100, 1), 1000);
    res.json({ events: readLatest(limit) });
  });

  // ─── GET /api/governance/proposers/:address/latest ──────
  router.get('/proposers/:address/latest', (req, res) => {
    const address = zAddress.safeParse(req.params.address);
    if (!address.success) return send(res, validationError('address', address.error));
    res.json({ proposer: address.data, latestProposalId: engine.latestProposalId(address.data).toString() });
  });

  // ─── GET /api/governance/proposals/:id ──────────────────
  router.get('/proposals/:id', async (req, res) => {
    const id = ProposalIdParamSchema.safeParse(req.params.id);
    if (!id.success) return send(res, validationError('proposal id', id.error));
    try {
      const state = await engine.state(id.data);
      res.json(proposalView(engine.getProposal(id.data), state));
    } catch (err) {
      fail(res, 'proposal', err);
    }
  });

  // ─── GET /api/governance/proposals/:id/state ────────────
  router.get('/proposals/:id/state', async (req, res) => {
    const id = ProposalIdParamSchema.safeParse(req.params.id);
    if (!id.success) return send(res, validationError('proposal id', id.error));
    try {
      res.json({ proposalId: id.data.toString(), state: await engine.state(id.data) });
    } catch (err) {
      fail(res, 'state', err);
    }
  });

  // ─── GET /api/governance/proposals/:id/actions ──────────
  router.get('/proposals/:id/actions', (req, res) => {
    const id = ProposalIdParamSchema.safeParse(req.params.id);
    if (!id.success) return send(res, validationError('proposal id', id.error));
    try {
      res.json(actionsView(engine.getActions(id.data)));
    } catch (err) {
      fail(res, 'actions', err);
    }
  });

  // ─── GET /api/governance/proposals/:id/events ───────────
  router.get('/proposals/:id/events', (req, res) => {
    const id = ProposalIdParamSchema.safeParse(req.params.id);
    if (!id.success) return send(res, validationError('proposal id', id.error));
    res.json({ proposalId: id.data.toString(), events: readByProposalId(id.data.toString()) });
  });

  // ─── GET /api/governance/proposals/:id/receipts/:voter ──
  router.get('/proposals/:id/receipts/:voter', (req, res) => {
    const id = ProposalIdParamSchema.safeParse(req.params.id);
    if (!id.success) return send(res, validationError('proposal id', id.error));
    const voter = zAddress.safeParse(req.params.voter);
    if (!voter.success) return send(res, validationError('voter', voter.error));
    try {
      res.json(receiptView(id.data, voter.data, engine.getReceipt(id.data, voter.data)));
    } catch (err) {
      fail(res, 'receipt', err);
    }
  });

  // ─── POST /api/governance/proposals ─────────────────────
  router.post('/proposals', requireCaller, async (req, res) => {
    const body = ProposeRequestSchema.safeParse(req.body);
    if (!body.success) return send(res, validationError('proposal', body.error));
    if (!req.caller) return send(res, toHttpError(new Error('caller missing after requireCaller')));
    try {
      const { targets, signatures, calldatas, description } = body.data;
      const proposalId = await engine.propose(req.caller, targets, signatures, calldatas, description);
      res.status(201).json({ proposalId: proposalId.toString() });
    } catch (err) {
      fail(res, 'propose', err);
    }
  });

  // ─── POST /api/governance/proposals/:id/votes ───────────
  router.post('/proposals/:id/votes', requireCaller, async (req, res) => {
    const id = ProposalIdParamSchema.safeParse(req.params.id);
    if (!id.success) return send(res, validationError('proposal id', id.error));
    const body = CastVoteRequestSchema.safeParse(req.body);
    if (!body.success) return send(res, validationError('vote', body.error));
    if (!req.caller) return send(res, toHttpError(new Error('caller missing after requireCaller')));
    try {
      const receipt = await engine.castVote(req.caller, id.data, body.data.support);
      res.status(201).json(receiptView(id.data, req.caller, receipt));
    } catch (err) {
      fail(res, 'vote', err);
    }
  });

  // ─── POST /api/governance/proposals/:id/votes/by-sig ────
  router.post('/proposals/:id/votes/by-sig', async (req, res) => {
    const id = ProposalIdParamSchema.safeParse(req.params.id);
    if (!id.success) return send(res, validationError('proposal id', id.error));
    const body = CastVoteBySigRequestSchema.safeParse(req.body);
    if (!body.success) return send(res, validationError('signed vote', body.error));
    try {
      const receipt = await engine.castVoteBySig(id.data, body.data.support, body.data.signature);
      res.status(201).json({
        proposalId: id.data.toString(),
        hasVoted: receipt.hasVoted,
        support: receipt.support,
        votes: receipt.votes.toString(),
      });
    } catch (err) {
      fail(res, 'vote-by-sig', err);
    }
  });

  // ─── POST /api/governance/proposals/:id/cancel ──────────
  router.post('/proposals/:id/cancel', async (req, res) => {
    const id = ProposalIdParamSchema.safeParse(req.params.id);
    if (!id.success) return send(res, validationError('proposal id', id.error));
    try {
      await engine.cancel(id.data);
      res.json({ proposalId: id.data.toString(), state: await engine.state(id.data) });
    } catch (err) {
      fail(res, 'cancel', err);
    }
  });

  // ─── POST /api/governance/proposals/:id/execute ─────────
  router.post('/proposals/:id/execute', async (req, res) => {
    const id = ProposalIdParamSchema.safeParse(req.params.id);
    if (!id.success) return send(res, validationError('proposal id', id.error));
    const body = ExecuteRequestSchema.safeParse(req.body ?? {});
    if (!body.success) return send(res, validationError('execute request', body.error));
    try {
      await engine.execute(id.data, body.data.value ?? 0n);
      res.json({ proposalId: id.data.toString(), state: await engine.state(id.data) });
    } catch (err) {
      fail(res, 'execute', err);
    }
  });

  return router;
}

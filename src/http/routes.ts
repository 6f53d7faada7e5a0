import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import type { NodeService } from '../node/node-service.js';
import { InvalidFieldError, MissingFieldError } from '../ledger/ledger-types.js';
import { InvalidPeerAddressError, MissingNodeListError } from '../peers/peer-types.js';
import { logger, generateRequestId, errorMessage } from '../observability/logger.js';

function isClientError(error: unknown): error is Error {
  return error instanceof MissingFieldError
    || error instanceof InvalidFieldError
    || error instanceof InvalidPeerAddressError
    || error instanceof MissingNodeListError;
}

function handleError(res: Response, phase: string, error: unknown): void {
  if (isClientError(error)) {
    res.status(400).json({ error: error.name, message: error.message });
    return;
  }

  logger.error(`${phase}_endpoint_error`, 'Unexpected error in endpoint', {
    error: errorMessage(error),
  });
  res.status(500).json({ error: 'Internal server error' });
}

export function createApp(node: NodeService): express.Express {
  const app = express();
  app.use(express.json());

  app.use((req: Request, res: Response, next: NextFunction) => {
    logger.setContext({
      requestId: generateRequestId(),
      nodeId: node.nodeId,
      route: `${req.method} ${req.path}`,
    });
    res.on('finish', () => logger.clearContext());
    next();
  });

  app.get('/mine', async (_req, res) => {
    try {
      const { block, persisted } = await node.mine();
      res.status(200).json({
        message: 'New Block Forged',
        index: block.index,
        transactions: block.transactions,
        proof: block.proof,
        previousHash: block.previousHash,
        persisted,
      });
    } catch (error) {
      handleError(res, 'mine', error);
    }
  });

  app.post('/transactions/new', async (req, res) => {
    try {
      const { index } = await node.submitTransaction(req.body);
      res.status(201).json({
        message: `Stamp Transaction will be added to Block ${index}`,
        index,
      });
    } catch (error) {
      handleError(res, 'transaction', error);
    }
  });

  app.get('/chain', (_req, res) => {
    res.status(200).json(node.getChain());
  });

  app.get('/chain/length', (_req, res) => {
    res.status(200).json({ chainLength: node.getChainLength() });
  });

  app.post('/nodes/register', (req, res) => {
    try {
      const body: unknown = req.body;
      const nodes = typeof body === 'object' && body !== null && 'nodes' in body ? body.nodes : undefined;
      const totalNodes = node.registerNodes(nodes);
      res.status(201).json({
        message: 'New nodes have been added',
        totalNodes,
      });
    } catch (error) {
      handleError(res, 'register_nodes', error);
    }
  });

  app.get('/nodes', (_req, res) => {
    res.status(200).json({ networkNodes: node.listNodes() });
  });

  app.get('/nodes/resolve', async (_req, res) => {
    try {
      const result = await node.resolve();
      if (result.replaced) {
        res.status(200).json({
          message: 'Our chain was replaced',
          newChain: result.chain,
          peers: result.peers,
          persisted: result.persisted,
        });
      } else {
        res.status(200).json({
          message: 'Our chain is authoritative',
          chain: result.chain,
          peers: result.peers,
        });
      }
    } catch (error) {
      handleError(res, 'resolve', error);
    }
  });

  app.get('/health', (_req, res) => {
    res.status(200).json({ status: 'ok' });
  });

  app.get('/metrics', (_req, res) => {
    try {
      res.status(200).json(node.metricsSnapshot());
    } catch (error) {
      handleError(res, 'metrics', error);
    }
  });

  // Four parameters mark this as express's error handler; it sees body-parser failures.
  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof SyntaxError) {
      res.status(400).json({ error: 'MalformedJson', message: error.message });
      return;
    }
    handleError(res, 'request', error);
  });

  return app;
}

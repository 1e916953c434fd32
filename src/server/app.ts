// src/server/app.ts

import express, { type Express } from 'express';
import bodyParser from 'body-parser';
import cors from 'cors';
import { registerGetWrapper, type Tool } from '../../registerGetWrapper.js';
import { handleRpc } from './rpc.js';

export function createApp(tools: Tool[]): Express {
  const app = express();
  app.use(cors());
  app.use(bodyParser.json({ limit: '10mb' }));

  app.post('/mcp', async (req, res) => {
    const { status, body } = await handleRpc(tools, req.body);
    res.status(status).json(body);
  });

  registerGetWrapper(app, tools);
  return app;
}

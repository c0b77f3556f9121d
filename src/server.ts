import express, { type ErrorRequestHandler } from 'express';
import http from 'http';
import cors from 'cors';
import { Server } from 'socket.io';
import type { AgariResult } from './game/agari';
import { handleScoreRequest } from './net/dto';
import { defaultRuleId, listRules } from './rules/RuleRegistry';

export const LOG_PREFIX = '[riichi-scorer]';

type ScoreAck = (res: AgariResult) => void;

function isBodyParseError(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'type' in err && err.type === 'entity.parse.failed';
}

const onError: ErrorRequestHandler = (err, req, res, _next) => {
  if (isBodyParseError(err)) {
    res.status(400).json({ ok: false, code: 'bad-request', message: 'request body is not valid JSON' });
    return;
  }
  console.error(`${LOG_PREFIX} ${req.method} ${req.path} failed:`, err);
  res.status(500).json({ ok: false, message: 'internal error' });
};

export function createServer() {
  const app = express();
  app.use(cors());
  app.use(express.json());

  app.get('/health', (_req, res) => res.json({ ok: true }));
  app.get('/rules', (_req, res) => res.json({ default: defaultRuleId(), rules: listRules() }));

  app.post('/score', (req, res) => {
    const r = handleScoreRequest(req.body);
    res.status(r.ok ? 200 : 400).json(r);
  });

  app.use(onError);

  const server = http.createServer(app);
  const io = new Server(server, { cors: { origin: true, credentials: true } });

  io.on('connection', (socket) => {
    function errorTo(message: string) {
      socket.emit('errorMsg', { message });
    }

    socket.on('score', (body: unknown, ack?: ScoreAck) => {
      if (typeof ack !== 'function') {
        errorTo('score needs an acknowledgement callback');
        return;
      }
      try {
        ack(handleScoreRequest(body));
      } catch (e) {
        console.error(`${LOG_PREFIX} score event failed:`, e);
        errorTo('internal error');
      }
    });
  });

  return { app, server, io };
}

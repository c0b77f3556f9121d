import { io as connect, type Socket } from 'socket.io-client';
import { createServer } from '../src/server';
import type { AgariResult } from '../src/game/agari';

const body = {
  tiles: '234m567m340p678p44s',
  winTile: 'p8',
  method: 'tsumo',
  player: { seatWind: 'south', riichi: true },
  round: { roundWind: 'east', honba: 1, doraIndicators: ['p2'], uraDoraIndicators: ['m6'] },
};

describe('server', () => {
  const { server, io } = createServer();
  let base = '';
  let client: Socket;

  beforeAll(async () => {
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const addr = server.address();
    if (!addr || typeof addr === 'string') throw new Error('server is not listening on a port');
    base = `http://127.0.0.1:${addr.port}`;
    client = connect(base, { transports: ['websocket'] });
  });

  afterAll(async () => {
    client.close();
    const closed = new Promise<void>((resolve) => io.close(() => resolve()));
    server.closeAllConnections();
    await closed;
  });

  function post(path: string, payload: string) {
    return fetch(`${base}${path}`, { method: 'POST', headers: { 'content-type': 'application/json' }, body: payload });
  }

  it('answers health checks', async () => {
    const res = await fetch(`${base}/health`);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ ok: true });
  });

  it('lists the rules', async () => {
    const res = await fetch(`${base}/rules`);
    expect(await res.json()).toEqual({ default: 'riichi', rules: [{ id: 'riichi', name: 'Riichi Mahjong' }] });
  });

  it('scores a hand over HTTP', async () => {
    const res = await post('/score', JSON.stringify(body));
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ ok: true, result: { han: 7, fu: 20, limit: 'haneman', totalPayment: 12300 } });
  });

  it('answers 400 with the rejection code', async () => {
    const res = await post('/score', JSON.stringify({ ...body, round: { ...body.round, haitei: true, houtei: true } }));
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ ok: false, code: 'houtei-on-tsumo' });
  });

  it('answers 400 to a body that is not JSON', async () => {
    const res = await post('/score', '{"tiles": ');
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ ok: false, code: 'bad-request', message: 'request body is not valid JSON' });
  });

  it('scores a hand over socket.io through the acknowledgement', async () => {
    const res = await new Promise<AgariResult>((resolve) => client.emit('score', body, resolve));
    expect(res).toMatchObject({ ok: true, result: { totalPayment: 12300 } });
  });

  it('emits errorMsg when no acknowledgement is given', async () => {
    const msg = new Promise<unknown>((resolve) => client.once('errorMsg', resolve));
    client.emit('score', body);
    expect(await msg).toEqual({ message: 'score needs an acknowledgement callback' });
  });
});

import { describe, it, expect } from 'vitest';
import request from 'supertest';
import app from '../../app.js';
import { isOriginAllowed } from '../middleware/cors.middleware.js';

const FORK_FEN = 'q3k3/8/8/1N6/8/8/8/4K3 w - - 0 1';

const pinBoard = [
  { type: 'b', color: 'white', square: 'c1' },
  { type: 'k', color: 'white', square: 'g1' },
  { type: 'n', color: 'black', square: 'f6' },
  { type: 'k', color: 'black', square: 'e7' },
];

describe('Patterns API', () => {
  describe('POST /api/v1/patterns/position', () => {
    it('returns the legal moves best first', async () => {
      const res = await request(app).post('/api/v1/patterns/position').send({ fen: FORK_FEN });

      expect(res.status).toBe(200);
      expect(res.body.fen).toBe(FORK_FEN);
      expect(res.body.policy).toEqual({ selection: 'best', aggregation: 'weighted' });
      expect(res.body.moves).toHaveLength(11);
      expect(res.body.moves[0]).toEqual({
        uci: 'b5c7',
        score: 468,
        givesCheck: true,
        createsPromotion: false,
        kindScores: { fork: 106 },
        matches: [{ kind: 'fork', score: 106, squares: ['e8', 'a8'] }],
      });
    });

    it('orders only the moves asked for', async () => {
      const res = await request(app)
        .post('/api/v1/patterns/position')
        .send({ fen: '8/P7/8/7k/8/8/8/4K3 w - - 0 1', moves: ['e1e2', 'a7a8q'] });

      expect(res.status).toBe(200);
      expect(res.body.moves.map((m: { uci: string; score: number }) => [m.uci, m.score])).toEqual([
        ['a7a8q', 800],
        ['e1e2', 0],
      ]);
    });

    it('rejects an invalid FEN', async () => {
      const res = await request(app).post('/api/v1/patterns/position').send({ fen: 'not a fen' });

      expect(res.status).toBe(422);
      expect(res.body.code).toBe('INVALID_POSITION');
    });

    it('rejects an illegal move', async () => {
      const res = await request(app)
        .post('/api/v1/patterns/position')
        .send({ fen: FORK_FEN, moves: ['b5b6'] });

      expect(res.status).toBe(422);
      expect(res.body.code).toBe('ILLEGAL_MOVE');
    });

    it('validates the body', async () => {
      const missing = await request(app).post('/api/v1/patterns/position').send({});
      expect(missing.status).toBe(400);
      expect(missing.body.code).toBe('VALIDATION_ERROR');
      expect(missing.body.details[0].path).toBe('fen');

      const unknownPolicy = await request(app)
        .post('/api/v1/patterns/position')
        .send({ fen: FORK_FEN, policy: { aggregation: 'average' } });
      expect(unknownPolicy.status).toBe(400);
      expect(unknownPolicy.body.code).toBe('VALIDATION_ERROR');
    });
  });

  describe('POST /api/v1/patterns/board', () => {
    it('scores moves on a raw piece list', async () => {
      const res = await request(app)
        .post('/api/v1/patterns/board')
        .send({ pieces: pinBoard, moves: [{ uci: 'g1h1' }, { uci: 'c1g5' }] });

      expect(res.status).toBe(200);
      expect(res.body).toEqual({
        policy: { selection: 'best', aggregation: 'weighted' },
        moves: [
          {
            uci: 'c1g5',
            score: 200,
            givesCheck: false,
            createsPromotion: false,
            kindScores: { absolute_pin: 50 },
            matches: [{ kind: 'absolute_pin', score: 50, squares: ['f6', 'e7'] }],
          },
          {
            uci: 'g1h1',
            score: 0,
            givesCheck: false,
            createsPromotion: false,
            kindScores: {},
            matches: [],
          },
        ],
      });
    });

    it('applies the requested policy', async () => {
      const res = await request(app)
        .post('/api/v1/patterns/board')
        .send({
          pieces: pinBoard,
          moves: [{ uci: 'c1g5', givesCheck: true }],
          policy: { aggregation: 'sum' },
        });

      expect(res.status).toBe(200);
      expect(res.body.policy).toEqual({ selection: 'best', aggregation: 'sum' });
      expect(res.body.moves[0].score).toBe(100);
    });

    it('rejects a move from an empty square', async () => {
      const res = await request(app)
        .post('/api/v1/patterns/board')
        .send({ pieces: pinBoard, moves: [{ uci: 'd2d4' }] });

      expect(res.status).toBe(400);
      expect(res.body.code).toBe('ENGINE_CONTRACT');
    });

    it('rejects two pieces on one square', async () => {
      const res = await request(app)
        .post('/api/v1/patterns/board')
        .send({ pieces: [...pinBoard, { type: 'q', color: 'black', square: 'f6' }], moves: [{ uci: 'c1g5' }] });

      expect(res.status).toBe(400);
      expect(res.body.code).toBe('BOARD_CONTRACT');
    });
  });

  describe('service routes', () => {
    it('reports health', async () => {
      const res = await request(app).get('/api/v1/health');

      expect(res.status).toBe(200);
      expect(res.body.status).toBe('healthy');
      expect(res.body.version).toBe('1.0.0');
    });

    it('returns 404 for unknown routes', async () => {
      const res = await request(app).get('/api/v1/unknown');

      expect(res.status).toBe(404);
      expect(res.body).toEqual({ error: 'Not found' });
    });

    it('rejects origins that are not allowed', async () => {
      const blocked = await request(app).get('/api/v1/health').set('Origin', 'http://evil.example');
      expect(blocked.status).toBe(403);
      expect(blocked.body.code).toBe('CORS_REJECTED');

      const allowed = await request(app).get('/api/v1/health').set('Origin', 'http://localhost:3000');
      expect(allowed.status).toBe(200);
      expect(allowed.headers['access-control-allow-origin']).toBe('http://localhost:3000');
    });
  });
});

describe('isOriginAllowed', () => {
  it('accepts any localhost port when localhost is listed', () => {
    expect(isOriginAllowed('http://localhost:5173', ['http://localhost:8080'])).toBe(true);
  });

  it('accepts listed origins and their subdomains', () => {
    const allowed = ['https://example.com'];

    expect(isOriginAllowed('https://example.com', allowed)).toBe(true);
    expect(isOriginAllowed('https://app.example.com', allowed)).toBe(true);
    expect(isOriginAllowed('https://example.org', allowed)).toBe(false);
  });
});

import { describe, it, expect, vi, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { knex, type Knex } from 'knex';
import { buildServer } from '../server.js';
import { QueryPipeline, type SqlRunner, type SqlSource } from '../services/pipeline.js';
import { GenerationError } from '../types/errors.js';

function makePipeline(generate: SqlSource['generate']): QueryPipeline {
  const executor: SqlRunner = {
    execute: async (sql) => ({ sql, columns: ['n'], rows: [{ n: 3 }], executionMs: 2 }),
  };
  return new QueryPipeline({ generator: { generate }, executor, defaultMaxRows: 200 });
}

const answers: SqlSource['generate'] = async () => ({
  sql: 'SELECT count(*) AS n FROM customers',
  metadata: { model: 'fake/sql-model' },
});

let app: FastifyInstance | undefined;
let db: Knex | undefined;

afterEach(async () => {
  await app?.close();
  await db?.destroy();
  app = undefined;
  db = undefined;
});

describe('POST /query', () => {
  it('returns 200 with the success envelope', async () => {
    app = await buildServer({ pipeline: makePipeline(answers), docs: false });

    const response = await app.inject({
      method: 'POST',
      url: '/query',
      payload: { question: 'How many customers?', max_rows: 10 },
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      status: 'ok',
      sql: 'SELECT count(*) AS n FROM customers LIMIT 10',
      columns: ['n'],
      rows: [{ n: 3 }],
      execution_ms: 2,
      metadata: { model: 'fake/sql-model', max_rows: 10, row_count: 1 },
    });
  });

  it('returns 400 with the pipeline error envelope', async () => {
    const empty = vi.fn<SqlSource['generate']>(async () => {
      throw new GenerationError('Generated SQL is empty.');
    });
    app = await buildServer({ pipeline: makePipeline(empty), docs: false });

    const response = await app.inject({
      method: 'POST',
      url: '/query',
      payload: { question: 'How many customers?' },
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({
      status: 'error',
      message: 'Generated SQL is empty.',
      stage: 'generation',
    });
  });

  it('returns 400 for a blank question', async () => {
    app = await buildServer({ pipeline: makePipeline(answers), docs: false });

    const response = await app.inject({ method: 'POST', url: '/query', payload: { question: ' ' } });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({
      status: 'error',
      message: '`question` is required.',
      stage: 'request',
    });
  });

  it('returns 400 for a body that is not an object', async () => {
    app = await buildServer({ pipeline: makePipeline(answers), docs: false });

    const response = await app.inject({ method: 'POST', url: '/query', payload: ['question'] });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({
      status: 'error',
      message: 'JSON payload must be an object.',
      stage: 'request',
    });
  });

  it('returns 400 for a malformed row cap', async () => {
    app = await buildServer({ pipeline: makePipeline(answers), docs: false });

    const response = await app.inject({
      method: 'POST',
      url: '/query',
      payload: { question: 'How many customers?', max_rows: 'abc' },
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({
      status: 'error',
      message: '`max_rows` must be an integer.',
      stage: 'request',
    });
  });

  it('returns 400 for malformed JSON', async () => {
    app = await buildServer({ pipeline: makePipeline(answers), docs: false });

    const response = await app.inject({
      method: 'POST',
      url: '/query',
      headers: { 'content-type': 'application/json' },
      payload: '{"question": ',
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({
      status: 'error',
      message: 'Invalid JSON payload.',
      stage: 'request',
    });
  });

  it('returns 500 without details for unexpected faults', async () => {
    const broken = vi.fn<SqlSource['generate']>(async () => {
      throw new TypeError('cannot read properties of undefined');
    });
    app = await buildServer({ pipeline: makePipeline(broken), docs: false });

    const response = await app.inject({
      method: 'POST',
      url: '/query',
      payload: { question: 'How many customers?' },
    });

    expect(response.statusCode).toBe(500);
    expect(response.json()).toEqual({
      status: 'error',
      message: 'Internal server error.',
      stage: 'server',
    });
  });
});

describe('utility routes', () => {
  it('reports database health', async () => {
    db = knex({ client: 'better-sqlite3', connection: { filename: ':memory:' }, useNullAsDefault: true });
    app = await buildServer({ pipeline: makePipeline(answers), db, docs: false });

    const response = await app.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ status: 'ok', database: 'up' });
  });

  it('reports an unconfigured database', async () => {
    app = await buildServer({ pipeline: makePipeline(answers), docs: false });

    const response = await app.inject({ method: 'GET', url: '/health' });

    expect(response.json()).toEqual({ status: 'ok', database: 'unconfigured' });
  });

  it('describes the service', async () => {
    app = await buildServer({ pipeline: makePipeline(answers), docs: false });

    const response = await app.inject({ method: 'GET', url: '/' });

    expect(response.json()).toMatchObject({ name: 'sqlgate', docs: '/docs' });
  });

  it('serves the OpenAPI document', async () => {
    app = await buildServer({ pipeline: makePipeline(answers) });

    const response = await app.inject({ method: 'GET', url: '/docs/json' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({ info: { title: 'sqlgate', version: '1.0.0' } });
  });
});

import { RunStatus } from '../../src/domain/run';
import { setLogHandler, resetLogHandler } from '../../src/logger';
import { TestServer, createTestServer, request } from '../helpers/http';

describe('Run API', () => {
  let server: TestServer;

  beforeEach(async () => {
    setLogHandler(() => {});
    server = await createTestServer();
  });

  afterEach(() => resetLogHandler());

  test('GET /runs/:id returns a finished run without progress', async () => {
    const run = await server.ctx.runner.trigger({ pipelineId: 'static' });

    const res = await request(server.app, 'GET', `/api/v1/runs/${run.id}`);

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({
      run: { id: run.id, status: RunStatus.Succeeded, counts: { total: 5 } },
      progress: null,
    });
  });

  test('GET /runs/:id returns 404 for an unknown run', async () => {
    const res = await request(server.app, 'GET', '/api/v1/runs/run_missing');
    expect(res.status).toBe(404);
    expect(res.body).toMatchObject({ error: { code: 'RUN.NOT_FOUND', message: 'Run not found: run_missing' } });
  });

  test('POST /runs/:id/cancel cancels a created run', async () => {
    const created = await server.ctx.runner.createRun({ pipelineId: 'static' });

    const res = await request(
      server.app,
      'POST',
      `/api/v1/runs/${created.id}/cancel`,
      { reason: 'superseded' },
      { 'x-identity-id': 'operator' },
    );

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({
      run: {
        status: RunStatus.Canceled,
        canceledBy: 'operator',
        cancelReason: 'superseded',
        error: { code: 'RUN.CANCELED', message: 'Run canceled: superseded' },
      },
    });
  });

  test('POST /runs/:id/cancel defaults the canceller to the API', async () => {
    const created = await server.ctx.runner.createRun({ pipelineId: 'docker' });
    const res = await request(server.app, 'POST', `/api/v1/runs/${created.id}/cancel`);
    expect(res.body).toMatchObject({ run: { canceledBy: 'api' } });
  });

  test('POST /runs/:id/cancel returns 404 for an unknown run', async () => {
    const res = await request(server.app, 'POST', '/api/v1/runs/run_missing/cancel');
    expect(res.status).toBe(404);
  });

  test('GET /runs/:id/events filters by type and pages', async () => {
    const run = await server.ctx.runner.trigger({ pipelineId: 'static' });

    const all = await request(server.app, 'GET', `/api/v1/runs/${run.id}/events?type=run.created,job.succeeded`);
    const page = await request(server.app, 'GET', `/api/v1/runs/${run.id}/events?type=job.succeeded&limit=2&offset=4`);

    expect(all.status).toBe(200);
    expect(all.body).toMatchObject({
      events: [
        { type: 'run.created' },
        { type: 'job.succeeded' },
        { type: 'job.succeeded' },
        { type: 'job.succeeded' },
        { type: 'job.succeeded' },
        { type: 'job.succeeded' },
      ],
      limit: 100,
      offset: 0,
    });
    expect(page.body).toMatchObject({ events: [{ type: 'job.succeeded', runId: run.id }], limit: 2, offset: 4 });
  });

  test('GET /runs/:id/events returns 404 for an unknown run', async () => {
    const res = await request(server.app, 'GET', '/api/v1/runs/run_missing/events');
    expect(res.status).toBe(404);
  });
});

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { ProviderError } from '../errors';
import { InMemoryJobRegistry } from '../repositories/jobRegistry';
import { ResearchOrchestrator } from '../services/orchestrator';
import { buildServer, SERVICE_NAME, toHttpFailure } from '../server';
import {
  delayed,
  outcome,
  silentLogger,
  StubGateway,
  waitForTerminal,
} from './test-helpers';

type App = Awaited<ReturnType<typeof buildServer>>;

describe('HTTP routes', () => {
  let registry: InMemoryJobRegistry;
  let gateway: StubGateway;
  let orchestrator: ResearchOrchestrator;
  let app: App;

  beforeEach(async () => {
    registry = new InMemoryJobRegistry();
    gateway = new StubGateway(async () => outcome('R1', ['http://a']), async () => 'R1-enhanced');
    orchestrator = new ResearchOrchestrator(registry, gateway, { logger: silentLogger });
    app = await buildServer({ registry, orchestrator, gateway, logLevel: 'silent' });
  });

  afterEach(async () => {
    await app.close();
  });

  it('reports health', async () => {
    const res = await app.inject({ method: 'GET', url: '/health' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      status: 'healthy',
      service: SERVICE_NAME,
      configured: true,
      jobs_in_flight: 0,
    });
  });

  it('configures credentials and rejects incomplete ones', async () => {
    gateway.configured = false;

    const bad = await app.inject({
      method: 'POST',
      url: '/configure',
      payload: { gemini_api_key: 'test-gemini-key' },
    });
    expect(bad.statusCode).toBe(400);
    expect(bad.json()).toEqual({
      statusCode: 400,
      error: 'Bad Request',
      message: 'Invalid credentials: firecrawl_api_key: Required',
      issues: ['firecrawl_api_key: Required'],
    });
    expect(gateway.configured).toBe(false);

    const ok = await app.inject({
      method: 'POST',
      url: '/configure',
      payload: { gemini_api_key: 'test-gemini-key', firecrawl_api_key: 'test-firecrawl-key' },
    });
    expect(ok.statusCode).toBe(200);
    expect(ok.json()).toEqual({ success: true, message: 'API keys configured successfully' });
    expect(gateway.configured).toBe(true);
  });

  it('refuses research before credentials are configured', async () => {
    gateway.configured = false;

    const res = await app.inject({ method: 'POST', url: '/research', payload: { topic: 'quantum computing' } });

    expect(res.statusCode).toBe(400);
    expect(res.json().message).toBe('API keys not configured. Please call /configure endpoint first.');
    expect(registry.size).toBe(0);
  });

  it('validates the submission body', async () => {
    const empty = await app.inject({ method: 'POST', url: '/research', payload: { topic: '' } });
    expect(empty.statusCode).toBe(400);
    expect(empty.json().message).toBe('Invalid request: topic: topic must not be empty');

    const tooDeep = await app.inject({
      method: 'POST',
      url: '/research',
      payload: { topic: 'x', max_depth: 6 },
    });
    expect(tooDeep.statusCode).toBe(400);
    expect(tooDeep.json().issues).toEqual(['max_depth: Number must be less than or equal to 5']);

    const malformed = await app.inject({
      method: 'POST',
      url: '/research',
      headers: { 'content-type': 'application/json' },
      payload: '{"topic":',
    });
    expect(malformed.statusCode).toBe(400);
  });

  it('submits a job, applies defaults and serves its status and results', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/research',
      payload: { topic: 'quantum computing', enhance_report: true },
    });

    expect(res.statusCode).toBe(202);
    const body = res.json();
    expect(body).toEqual({
      research_id: expect.any(String),
      message: 'Research process started',
      status: 'pending',
    });
    expect(registry.require(body.research_id).parameters).toEqual({
      max_depth: 3,
      time_limit: 180,
      max_urls: 10,
      enhance_report: true,
    });

    const done = await waitForTerminal(registry, body.research_id);

    const status = await app.inject({ method: 'GET', url: `/research/${body.research_id}/status` });
    expect(status.json()).toEqual({
      research_id: body.research_id,
      status: 'completed',
      stage: null,
      current_step: 'Research completed successfully',
      created_at: done.created_at,
      started_at: done.started_at,
      completed_at: done.completed_at,
    });

    const results = await app.inject({ method: 'GET', url: `/research/${body.research_id}/results` });
    expect(results.json()).toEqual({
      success: true,
      research_id: body.research_id,
      topic: 'quantum computing',
      status: 'completed',
      parameters: { max_depth: 3, time_limit: 180, max_urls: 10, enhance_report: true },
      initial_report: 'R1',
      enhanced_report: 'R1-enhanced',
      sources: [{ url: 'http://a' }],
      sources_count: 1,
      warnings: [],
      error: null,
      created_at: done.created_at,
      started_at: done.started_at,
      completed_at: done.completed_at,
    });
  });

  it('shows in-progress jobs without report fields', async () => {
    gateway.researchImpl = () => delayed(50, () => outcome('R1', []));
    const submitted = await app.inject({ method: 'POST', url: '/research', payload: { topic: 'slow' } });
    const id = submitted.json().research_id;

    const results = await app.inject({ method: 'GET', url: `/research/${id}/results` });
    const view = results.json();
    expect(['pending', 'running']).toContain(view.status);
    expect(view).toMatchObject({
      success: false,
      initial_report: null,
      enhanced_report: null,
      sources: null,
      sources_count: null,
      error: null,
      completed_at: null,
    });

    const download = await app.inject({ method: 'GET', url: `/research/${id}/download` });
    expect(download.statusCode).toBe(404);
    expect(download.json().message).toBe('Research report not ready');

    await waitForTerminal(registry, id);
  });

  it('returns 404 for unknown jobs', async () => {
    for (const suffix of ['status', 'results', 'download']) {
      const res = await app.inject({ method: 'GET', url: `/research/does-not-exist/${suffix}` });
      expect(res.statusCode).toBe(404);
      expect(res.json()).toEqual({ statusCode: 404, error: 'Not Found', message: 'Research ID not found' });
    }
  });

  it('runs research synchronously and reports failures in the body', async () => {
    const ok = await app.inject({
      method: 'POST',
      url: '/research/sync',
      payload: { topic: 'quantum computing', max_depth: 2, time_limit: 5, max_urls: 3 },
    });
    expect(ok.statusCode).toBe(200);
    expect(ok.json()).toMatchObject({
      success: true,
      status: 'completed',
      initial_report: 'R1',
      enhanced_report: null,
      sources_count: 1,
    });

    gateway.researchImpl = async () => {
      throw new ProviderError('firecrawl', 'Firecrawl deep research failed');
    };
    const failed = await app.inject({ method: 'POST', url: '/research/sync', payload: { topic: 'doomed' } });
    expect(failed.statusCode).toBe(200);
    expect(failed.json()).toMatchObject({
      success: false,
      status: 'failed',
      initial_report: null,
      error: 'Firecrawl deep research failed',
    });
  });

  it('downloads the enhanced report as markdown', async () => {
    const sync = await app.inject({
      method: 'POST',
      url: '/research/sync',
      payload: { topic: 'quantum computing', enhance_report: true },
    });
    const id = sync.json().research_id;

    const res = await app.inject({ method: 'GET', url: `/research/${id}/download` });

    expect(res.statusCode).toBe(200);
    expect(res.headers['content-type']).toBe('text/markdown; charset=utf-8');
    expect(res.headers['content-disposition']).toBe('attachment; filename=quantum_computing_report.md');
    expect(res.body).toBe('R1-enhanced\n\n## Sources\n\n1. <http://a>\n');

    const pdf = await app.inject({ method: 'GET', url: `/research/${id}/download?format=pdf` });
    expect(pdf.statusCode).toBe(400);
    expect(pdf.json().message).toBe("Unsupported format. Only 'markdown' is supported.");
  });

  it('refuses to download a failed job', async () => {
    gateway.researchImpl = async () => {
      throw new ProviderError('firecrawl', 'nope');
    };
    const sync = await app.inject({ method: 'POST', url: '/research/sync', payload: { topic: 'doomed' } });

    const res = await app.inject({ method: 'GET', url: `/research/${sync.json().research_id}/download` });

    expect(res.statusCode).toBe(400);
    expect(res.json().message).toBe('Research was not successful');
  });

  it('lists jobs newest first', async () => {
    const first = await app.inject({ method: 'POST', url: '/research/sync', payload: { topic: 'first' } });
    const second = await app.inject({ method: 'POST', url: '/research/sync', payload: { topic: 'second' } });

    const all = await app.inject({ method: 'GET', url: '/research' });
    expect(all.json().jobs.map((job: { research_id: string }) => job.research_id)).toEqual([
      second.json().research_id,
      first.json().research_id,
    ]);

    const limited = await app.inject({ method: 'GET', url: '/research?limit=1' });
    expect(limited.json().jobs).toHaveLength(1);
    expect(limited.json().jobs[0]).toMatchObject({ topic: 'second', status: 'completed', has_report: true });

    const invalid = await app.inject({ method: 'GET', url: '/research?limit=0' });
    expect(invalid.statusCode).toBe(400);
  });

  it('answers 503 once the orchestrator is shutting down', async () => {
    await orchestrator.shutdown(0);

    const res = await app.inject({ method: 'POST', url: '/research', payload: { topic: 'late' } });

    expect(res.statusCode).toBe(503);
    expect(res.json().error).toBe('Service Unavailable');
  });

  it('exposes prometheus metrics', async () => {
    await app.inject({ method: 'POST', url: '/research/sync', payload: { topic: 'metered' } });

    const res = await app.inject({ method: 'GET', url: '/metrics' });

    expect(res.statusCode).toBe(200);
    expect(res.body).toContain('deep_research_jobs_total{status="completed"}');
  });
});

describe('toHttpFailure', () => {
  it('hides internal error messages', () => {
    expect(toHttpFailure(new Error('database exploded'))).toEqual({
      statusCode: 500,
      message: 'Internal server error',
    });
  });

  it('keeps client errors that carry a status code', () => {
    const error = Object.assign(new Error('Unsupported Media Type'), { statusCode: 415 });
    expect(toHttpFailure(error)).toEqual({ statusCode: 415, message: 'Unsupported Media Type' });
  });
});

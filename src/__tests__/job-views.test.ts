import { describe, it, expect } from '@jest/globals';
import { toResultView, toStatusView } from '../services/jobViews';
import type { FailedJob, PendingJob, RunningJob } from '../types/job';
import { baseParameters } from './test-helpers';

const pending: PendingJob = {
  id: 'job-1',
  topic: 'fusion power',
  parameters: baseParameters,
  status: 'pending',
  created_at: '2026-01-01T00:00:00.000Z',
  updated_at: '2026-01-01T00:00:00.000Z',
};

const running: RunningJob = {
  ...pending,
  status: 'running',
  stage: 'enhancing',
  started_at: '2026-01-01T00:00:01.000Z',
  updated_at: '2026-01-01T00:00:05.000Z',
};

const failed: FailedJob = {
  ...pending,
  status: 'failed',
  started_at: '2026-01-01T00:00:01.000Z',
  completed_at: '2026-01-01T00:00:07.000Z',
  updated_at: '2026-01-01T00:00:07.000Z',
  error: 'Research timed out after 5s',
  error_kind: 'timeout',
};

describe('toStatusView', () => {
  it('describes a queued job', () => {
    expect(toStatusView(pending)).toEqual({
      research_id: 'job-1',
      status: 'pending',
      stage: null,
      current_step: 'Research queued',
      created_at: '2026-01-01T00:00:00.000Z',
      started_at: null,
      completed_at: null,
    });
  });

  it('names the running stage', () => {
    expect(toStatusView(running)).toMatchObject({
      status: 'running',
      stage: 'enhancing',
      current_step: 'Enhancing report with additional information',
      started_at: '2026-01-01T00:00:01.000Z',
    });
    expect(toStatusView({ ...running, stage: 'researching' }).current_step).toBe('Conducting initial research');
  });

  it('carries the error of a failed job', () => {
    expect(toStatusView(failed)).toMatchObject({
      current_step: 'Error: Research timed out after 5s',
      completed_at: '2026-01-01T00:00:07.000Z',
    });
  });
});

describe('toResultView', () => {
  it('exposes the failure without any report', () => {
    expect(toResultView(failed)).toEqual({
      success: false,
      research_id: 'job-1',
      topic: 'fusion power',
      status: 'failed',
      parameters: baseParameters,
      initial_report: null,
      enhanced_report: null,
      sources: null,
      sources_count: null,
      warnings: [],
      error: 'Research timed out after 5s',
      created_at: '2026-01-01T00:00:00.000Z',
      started_at: '2026-01-01T00:00:01.000Z',
      completed_at: '2026-01-01T00:00:07.000Z',
    });
  });

  it('copies the report fields of a completed job', () => {
    const view = toResultView({
      ...running,
      status: 'completed',
      completed_at: '2026-01-01T00:00:09.000Z',
      initial_report: 'R1',
      enhanced_report: null,
      sources: [{ url: 'http://a' }],
      warnings: ['Enhancement failed: quota exceeded'],
    });

    expect(view).toMatchObject({
      success: true,
      initial_report: 'R1',
      enhanced_report: null,
      sources: [{ url: 'http://a' }],
      sources_count: 1,
      warnings: ['Enhancement failed: quota exceeded'],
      error: null,
    });
  });
});

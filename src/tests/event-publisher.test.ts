import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

vi.mock('../jobs/queue.js', () => ({
  enqueueRehabEvent: vi.fn(),
}));

import { enqueueRehabEvent } from '../jobs/queue.js';
import { LogEventPublisher, QueueEventPublisher } from '../services/event-publisher.service.js';

const mockEnqueue = vi.mocked(enqueueRehabEvent);

const payload = {
  recommendationId: '00000000-0000-4000-8000-000000000001',
  inmateId: 'INM001',
  programId: '00000000-0000-4000-8000-000000000002',
  stationId: null,
  officerId: null,
  degraded: true,
};

describe('QueueEventPublisher', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.spyOn(console, 'info').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('enqueues the event under its topic', async () => {
    mockEnqueue.mockResolvedValue('42');

    await new QueueEventPublisher().publish('recommendation-created', payload);

    expect(mockEnqueue).toHaveBeenCalledWith('recommendation-created', payload);
    expect(console.info).toHaveBeenCalledWith('[events] Published recommendation-created (job 42)');
  });

  it('logs and swallows delivery failures', async () => {
    mockEnqueue.mockRejectedValue(new Error('ECONNREFUSED'));

    await expect(
      new QueueEventPublisher().publish('recommendation-created', payload)
    ).resolves.toBeUndefined();
    expect(console.error).toHaveBeenCalledWith(
      '[events] Failed to publish recommendation-created: ECONNREFUSED'
    );
  });

  it('gives up on an enqueue that never settles', async () => {
    mockEnqueue.mockImplementation(() => new Promise<string | null>(() => undefined));

    await expect(
      new QueueEventPublisher(20).publish('recommendation-created', payload)
    ).resolves.toBeUndefined();
    expect(console.error).toHaveBeenCalledWith(
      '[events] Failed to publish recommendation-created: enqueue timed out after 20ms'
    );
    expect(console.info).not.toHaveBeenCalled();
  });
});

describe('LogEventPublisher', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('only logs the event', async () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);

    await new LogEventPublisher().publish('medical-report-added', {
      reportId: 'r-1',
      inmateId: 'INM001',
      diagnosis: null,
    });

    expect(info).toHaveBeenCalledWith(
      '[events] medical-report-added {"reportId":"r-1","inmateId":"INM001","diagnosis":null}'
    );
    expect(mockEnqueue).not.toHaveBeenCalled();
  });
});

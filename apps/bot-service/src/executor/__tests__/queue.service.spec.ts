import { QueueFullError } from '@app/shared/errors/command.errors';
import { ExecutionResult } from '@app/shared/types/executor.types';
import { QueueService } from '../queue.service';

function result(overrides: Partial<ExecutionResult> = {}): ExecutionResult {
  return { exitCode: 0, stdout: '', stderr: '', durationMs: 5, truncated: false, ...overrides };
}

describe('QueueService', () => {
  let service: QueueService;
  const target = { channel: 'C1', thread_ts: '1.0' };

  beforeEach(() => {
    service = new QueueService({ maxConcurrent: 1, maxSize: 2 });
  });

  describe('enqueue', () => {
    it('should add a queued job', () => {
      const job = service.enqueue({ name: 'echo', payload: 'hi' }, 'U1', target);

      expect(job.status).toBe('queued');
      expect(job.requestedBy).toBe('U1');
      expect(job.channel).toBe('C1');
      expect(job.thread_ts).toBe('1.0');
      expect(service.getQueuedJobs()).toEqual([job]);
    });

    it('should reject when the queue is full', () => {
      service.enqueue({ name: 'a', payload: '' }, 'U1', target);
      service.enqueue({ name: 'b', payload: '' }, 'U1', target);

      expect(() => service.enqueue({ name: 'c', payload: '' }, 'U1', target)).toThrow(
        new QueueFullError(2, 2),
      );
      expect(() => service.enqueue({ name: 'c', payload: '' }, 'U1', target)).toThrow(
        'Queue is full (2/2)',
      );
    });
  });

  describe('dequeue', () => {
    it('should return null when empty', () => {
      expect(service.dequeue()).toBeNull();
    });

    it('should respect maxConcurrent and keep arrival order', () => {
      const a = service.enqueue({ name: 'a', payload: '' }, 'U1', target);
      const b = service.enqueue({ name: 'b', payload: '' }, 'U1', target);

      expect(service.dequeue()?.id).toBe(a.id);
      expect(a.status).toBe('running');
      expect(service.dequeue()).toBeNull();

      service.complete(a.id, { result: result() });

      expect(service.dequeue()?.id).toBe(b.id);
    });
  });

  describe('complete', () => {
    it('should mark a clean exit as completed and drop the job', () => {
      const job = service.enqueue({ name: 'a', payload: '' }, 'U1', target);
      service.dequeue();

      const done = service.complete(job.id, { result: result() });

      expect(done?.status).toBe('completed');
      expect(done?.completedAt).toBeDefined();
      expect(service.getRunningJobs()).toHaveLength(0);
    });

    it('should mark a non-zero exit as failed', () => {
      const job = service.enqueue({ name: 'a', payload: '' }, 'U1', target);

      const done = service.complete(job.id, {
        result: result({ exitCode: 2, error: 'Exited with code 2' }),
      });

      expect(done?.status).toBe('failed');
    });

    it('should mark a rejected job as failed', () => {
      const job = service.enqueue({ name: 'a', payload: '' }, 'U1', target);
      const error = new Error('Unknown executor "a"');

      const done = service.complete(job.id, { error });

      expect(done?.status).toBe('failed');
      expect(done?.error).toBe(error);
      expect(done?.result).toBeUndefined();
    });

    it('should free a slot for new jobs', () => {
      const a = service.enqueue({ name: 'a', payload: '' }, 'U1', target);
      service.enqueue({ name: 'b', payload: '' }, 'U1', target);
      service.complete(a.id, { result: result() });

      expect(() => service.enqueue({ name: 'c', payload: '' }, 'U1', target)).not.toThrow();
    });

    it('should return null for an unknown job', () => {
      expect(service.complete('missing', { result: result() })).toBeNull();
    });
  });
});

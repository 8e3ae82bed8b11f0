import { describe, it, expect } from 'vitest';
import { ValidationError, type JobOutcome } from '../../../backend/domain/index.js';
import { TaskStore, type TaskArtifact } from '../../../backend/infrastructure/tasks/task-store.js';

type RunnerOutcome = JobOutcome<{ outputs: TaskArtifact[] }>;

function deferred() {
  let resolve: (value: RunnerOutcome) => void = () => {};
  const promise = new Promise<RunnerOutcome>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

const output: TaskArtifact = { name: 'output.mp4', path: '/srv/workspaces/t-1/output.mp4' };

describe('TaskStore', () => {
  it('returns a PENDING record and runs tasks one at a time', async () => {
    const store = new TaskStore();
    const first = deferred();
    const second = deferred();

    expect(store.enqueue('t-1', () => first.promise).status).toBe('PENDING');
    store.enqueue('t-2', () => second.promise);

    expect(store.get('t-1')?.status).toBe('RUNNING');
    expect(store.get('t-2')?.status).toBe('PENDING');

    first.resolve({ ok: true, outputs: [output] });
    await store.whenSettled('t-1');
    expect(store.get('t-1')).toMatchObject({ status: 'COMPLETED', outputs: [output] });
    expect(store.get('t-2')?.status).toBe('RUNNING');

    second.resolve({ ok: false, error: 'Execution of prompt p2 exceeded 1000ms', code: 'EXECUTION_TIMEOUT' });
    await expect(store.whenSettled('t-2')).resolves.toMatchObject({
      status: 'FAILED',
      error: 'Execution of prompt p2 exceeded 1000ms',
      code: 'EXECUTION_TIMEOUT',
    });
  });

  it('runs up to the concurrency limit in parallel', () => {
    const store = new TaskStore({ concurrency: 2 });
    for (const id of ['a', 'b', 'c']) store.enqueue(id, () => deferred().promise);
    expect(['a', 'b', 'c'].map((id) => store.get(id)?.status)).toEqual(['RUNNING', 'RUNNING', 'PENDING']);
  });

  it('records a thrown error as FAILED', async () => {
    const store = new TaskStore();
    store.enqueue('t-1', async () => {
      throw new ValidationError('Image file not found: /nope.jpg');
    });
    await expect(store.whenSettled('t-1')).resolves.toMatchObject({
      status: 'FAILED',
      error: 'Image file not found: /nope.jpg',
      code: 'VALIDATION_ERROR',
    });
  });

  it('rejects duplicate ids and unknown lookups', async () => {
    const store = new TaskStore();
    store.enqueue('t-1', async () => ({ ok: true, outputs: [] }));
    expect(() => store.enqueue('t-1', async () => ({ ok: true, outputs: [] }))).toThrow('Task already exists: t-1');
    expect(store.get('nope')).toBeUndefined();
    await expect(store.whenSettled('nope')).resolves.toBeUndefined();
  });

  it('hands out copies', async () => {
    const store = new TaskStore();
    store.enqueue('t-1', async () => ({ ok: true, outputs: [output] }));
    await store.whenSettled('t-1');
    store.get('t-1')?.outputs.push({ name: 'x', path: '/x' });
    expect(store.get('t-1')?.outputs).toEqual([output]);
  });

  it('prunes terminal tasks past the retention window only', async () => {
    let now = 1_000;
    const store = new TaskStore({ retentionMs: 500, now: () => now });
    store.enqueue('done', async () => ({ ok: true, outputs: [] }));
    await store.whenSettled('done');
    store.enqueue('busy', () => deferred().promise);

    now = 1_400;
    expect(store.prune()).toBe(0);
    now = 1_501;
    expect(store.prune()).toBe(1);
    expect(store.get('done')).toBeUndefined();
    expect(store.get('busy')?.status).toBe('RUNNING');
  });
});

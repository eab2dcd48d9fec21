import { describe, expect, it } from 'vitest';
import { TaskGroup } from './taskGroup';

function untilAborted(signal: AbortSignal): Promise<never> {
  return new Promise((_, reject) => {
    signal.addEventListener('abort', () => reject(signal.reason), { once: true });
  });
}

const tick = () => new Promise(resolve => setTimeout(resolve, 0));

describe('TaskGroup', () => {
  it('ends on the first failure and aborts the other pipelines', async () => {
    const group = new TaskGroup();
    const failure = new Error('receive failed');
    let siblingAborted = false;

    group.spawn('sibling', async signal => {
      try {
        await untilAborted(signal);
      } finally {
        siblingAborted = signal.aborted;
      }
    });
    group.spawn('receive', async () => {
      await tick();
      throw failure;
    });

    await expect(group.join()).rejects.toBe(failure);
    expect(siblingAborted).toBe(true);
  });

  it('keeps the first failure when several pipelines fail', async () => {
    const group = new TaskGroup();
    const first = new Error('first');

    group.spawn('one', async () => {
      throw first;
    });
    group.spawn('two', async signal => {
      await untilAborted(signal).catch(() => undefined);
      throw new Error('second');
    });

    await expect(group.join()).rejects.toBe(first);
  });

  it('completes when a group-ending pipeline returns', async () => {
    const group = new TaskGroup();
    let siblingAborted = false;

    group.spawn('sibling', async signal => {
      await untilAborted(signal).catch(() => {
        siblingAborted = true;
      });
    });
    group.spawn('send-text', async () => {
      await tick();
    }, { endsGroup: true });

    await expect(group.join()).resolves.toBeUndefined();
    expect(siblingAborted).toBe(true);
  });

  it('does not end when an ordinary pipeline returns', async () => {
    const parent = new AbortController();
    const group = new TaskGroup(parent.signal);

    group.spawn('quick', async () => undefined);
    group.spawn('long', signal => untilAborted(signal));
    await tick();

    expect(group.ended).toBe(false);
    parent.abort(new Error('stop'));
    await expect(group.join()).rejects.toThrow('stop');
  });

  it('ends when the parent signal aborts', async () => {
    const parent = new AbortController();
    const group = new TaskGroup(parent.signal);
    group.spawn('long', signal => untilAborted(signal));

    parent.abort(new Error('cancelled'));

    await expect(group.join()).rejects.toThrow('cancelled');
    expect(group.signal.aborted).toBe(true);
  });

  it('starts already ended under an aborted parent', async () => {
    const group = new TaskGroup(AbortSignal.abort(new Error('too late')));

    expect(group.ended).toBe(true);
    await expect(group.join()).rejects.toThrow('too late');
  });
});

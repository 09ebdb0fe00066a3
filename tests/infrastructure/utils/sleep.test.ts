import { sleep } from '../../../src/infrastructure/utils/sleep';
import { InterruptedError } from '../../../src/domain/errors/InterruptedError';

describe('sleep', () => {
  it('resolves after the delay', async () => {
    await expect(sleep(5)).resolves.toBeUndefined();
  });

  it('rejects immediately when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(sleep(10_000, controller.signal)).rejects.toBeInstanceOf(InterruptedError);
  });

  it('rejects when the signal aborts mid-sleep', async () => {
    const controller = new AbortController();
    const pending = sleep(10_000, controller.signal);
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(InterruptedError);
  });
});

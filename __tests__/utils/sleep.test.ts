import { sleep } from '../../app/utils/sleep.js';

describe('sleep', () => {
  it('resolves true once the delay has elapsed', async () => {
    expect(await sleep(5)).toBe(true);
  });

  it('resolves false straight away for an already aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();

    const started = Date.now();
    expect(await sleep(60_000, controller.signal)).toBe(false);
    expect(Date.now() - started).toBeLessThan(1000);
  });

  it('resolves false when aborted part way through', async () => {
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 10);

    const started = Date.now();
    expect(await sleep(60_000, controller.signal)).toBe(false);
    expect(Date.now() - started).toBeLessThan(1000);
  });

  it('is unaffected by a signal that never fires', async () => {
    const controller = new AbortController();
    expect(await sleep(5, controller.signal)).toBe(true);
    controller.abort();
  });
});

import * as timer from './timer.js';
import * as q from './quantity.js';

/** Block the thread without consuming CPU */
function sleep(ms: number) {
  Atomics.wait(new Int32Array(new SharedArrayBuffer(4)), 0, 0, ms);
}

/** Keep the CPU busy for the given time */
function spin(ms: number) {
  const end = process.hrtime.bigint() + BigInt(ms) * 1_000_000n;
  let x = 0;
  while (process.hrtime.bigint() < end) x++;
  return x;
}

describe('HrTime', () => {
  test('from', () => {
    const a = timer.HrTime.from(q.create('microsecond', 1.5));
    expect(Number(a)).toEqual(1500);

    const b = timer.HrTime.from(q.create('second', 1));
    expect(Number(b)).toEqual(1e9);

    const c = timer.HrTime.from(q.create('second', -1));
    expect(Number(c)).toEqual(-1e9);

    const d = timer.HrTime.from(q.create('second', 0));
    expect(Number(d)).toEqual(0);

    const e = timer.HrTime.from(q.create('millisecond', 2.5));
    expect(Number(e)).toEqual(2_500_000);
  });

  test('toSeconds', () => {
    expect(timer.HrTime.toSeconds(5_000_000n as timer.HrTime)).toBe(0.005);
    expect(timer.HrTime.toSeconds(2_500_000_000n as timer.HrTime)).toBe(2.5);
    expect(timer.HrTime.toSeconds(0n as timer.HrTime)).toBe(0);
  });
});

describe('create', () => {
  test('wall time includes time spent blocked', () => {
    const t = timer.create('wall');

    t.start();
    sleep(20);
    const elapsed = timer.HrTime.toSeconds(t.current());

    expect(elapsed).toBeGreaterThanOrEqual(0.015);
  });

  test('process time excludes time spent blocked', () => {
    const t = timer.create('process');

    t.start();
    sleep(50);
    const elapsed = timer.HrTime.toSeconds(t.current());

    expect(elapsed).toBeInRange(0, 0.025);
  });

  test('process time counts busy work', () => {
    const t = timer.create('process');

    t.start();
    spin(30);
    const elapsed = timer.HrTime.toSeconds(t.current());

    expect(elapsed).toBeGreaterThan(0.005);
  });

  test('start restarts the timer', () => {
    const t = timer.create('wall');
    t.start();
    sleep(30);

    t.start();
    expect(timer.HrTime.toSeconds(t.current())).toBeLessThan(0.025);
  });
});

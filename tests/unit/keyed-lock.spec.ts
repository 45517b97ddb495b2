import { KeyedLock } from '../../src/utils/keyed-lock';
import { delay } from '../helpers';

describe('KeyedLock', () => {
  it('should run tasks with the same key one after another', async () => {
    const lock = new KeyedLock();
    const steps: string[] = [];

    const task = (name: string, ms: number) => async () => {
      steps.push(`${name}:start`);
      await delay(ms);
      steps.push(`${name}:end`);
      return name;
    };

    const results = await Promise.all([
      lock.run('loan-1', task('a', 15)),
      lock.run('loan-1', task('b', 1)),
    ]);

    expect(results).toEqual(['a', 'b']);
    expect(steps).toEqual(['a:start', 'a:end', 'b:start', 'b:end']);
  });

  it('should run tasks with different keys concurrently', async () => {
    const lock = new KeyedLock();
    const steps: string[] = [];

    await Promise.all([
      lock.run('loan-1', async () => {
        steps.push('a:start');
        await delay(15);
        steps.push('a:end');
      }),
      lock.run('loan-2', async () => {
        steps.push('b:start');
        await delay(1);
        steps.push('b:end');
      }),
    ]);

    expect(steps).toEqual(['a:start', 'b:start', 'b:end', 'a:end']);
  });

  it('should keep the queue moving after a failed task', async () => {
    const lock = new KeyedLock();

    const failed = lock.run('loan-1', async () => {
      throw new Error('guard exploded');
    });
    const next = lock.run('loan-1', async () => 'ok');

    await expect(failed).rejects.toThrow('guard exploded');
    await expect(next).resolves.toBe('ok');
  });

  it('should release keys once their tasks settle', async () => {
    const lock = new KeyedLock();

    const pending = lock.run('loan-1', () => delay(5));
    expect(lock.size).toBe(1);

    await pending;
    expect(lock.size).toBe(0);
  });
});

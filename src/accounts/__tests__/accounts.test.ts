import { describe, it, expect } from 'vitest';
import type { PlatformAccount } from '../../sources';
import { AccountPool } from '..';

const main: PlatformAccount = {
  name: 'main',
  platform: 'twitter',
  credentials: { cookies: 'ct0=test', bearerToken: 'test-bearer' },
};
const space: PlatformAccount = { name: 'space', platform: 'bilibili.space', credentials: {} };

describe('AccountPool', () => {
  it('名前でアカウントを引く', () => {
    const pool = new AccountPool([main, space]);

    expect(pool.size).toBe(2);
    expect(pool.get('main')?.account).toBe(main);
    expect(pool.get('missing')).toBeUndefined();
  });

  it('同じアカウントのタスクは重ならない', async () => {
    const handle = new AccountPool([main]).get('main');
    if (!handle) throw new Error('account not found');

    let active = 0;
    let peak = 0;
    const task = async (account: PlatformAccount) => {
      active++;
      peak = Math.max(peak, active);
      await new Promise((resolve) => setTimeout(resolve, 5));
      active--;
      return account.name;
    };

    const results = await Promise.all([
      handle.withPermit(task, 'a'),
      handle.withPermit(task, 'b'),
      handle.withPermit(task, 'c'),
    ]);

    expect(results).toEqual(['main', 'main', 'main']);
    expect(peak).toBe(1);
  });

  it('別のアカウントは並行して動く', async () => {
    const pool = new AccountPool([main, space]);
    const a = pool.get('main');
    const b = pool.get('space');
    if (!a || !b) throw new Error('account not found');

    let active = 0;
    let peak = 0;
    const task = async () => {
      active++;
      peak = Math.max(peak, active);
      await new Promise((resolve) => setTimeout(resolve, 5));
      active--;
    };

    await Promise.all([a.withPermit(task), b.withPermit(task)]);
    expect(peak).toBe(2);
  });
});

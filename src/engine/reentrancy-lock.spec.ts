import { ReentrancyLock } from './reentrancy-lock.js';
import { catchSaleError } from '../../test/support/sale-error.js';

describe('ReentrancyLock', () => {
  let lock: ReentrancyLock;

  beforeEach(() => {
    lock = new ReentrancyLock();
  });

  it('should hold the lock only while the body runs', () => {
    let seen = false;
    const result = lock.run(() => {
      seen = lock.locked;
      return 42;
    });

    expect(result).toBe(42);
    expect(seen).toBe(true);
    expect(lock.locked).toBe(false);
  });

  it('should reject a nested entry', () => {
    const nested = lock.run(() => catchSaleError(() => lock.run(() => 1)));

    expect(nested.code).toBe('REENTRANT_CALL');
    expect(nested.getStatus()).toBe(409);
    expect(lock.locked).toBe(false);
  });

  it('should release the lock when the body throws', () => {
    expect(() =>
      lock.run(() => {
        throw new Error('boom');
      }),
    ).toThrow('boom');

    expect(lock.locked).toBe(false);
    expect(lock.run(() => 'again')).toBe('again');
  });
});

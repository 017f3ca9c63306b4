import { InMemoryAssetLedger } from './in-memory-asset-ledger.js';
import { InMemoryTokenLedger } from './in-memory-token-ledger.js';
import { LedgerError } from './ledger.error.js';

const HOLDER = '0x00000000000000000000000000000000000000c1';
const OTHER = '0x00000000000000000000000000000000000000c2';
const TOKEN = '0x0000000000000000000000000000000000000070';

describe('InMemoryAssetLedger', () => {
  let ledger: InMemoryAssetLedger;

  beforeEach(() => {
    ledger = new InMemoryAssetLedger('0x0000000000000000000000000000000000000a55');
  });

  it('should move a batch and notify the receiver once', () => {
    const received: Array<[string, readonly number[], readonly number[]]> = [];
    ledger.setReceiver(OTHER, {
      onItemsReceived: (_source, from, itemIds, amounts) => {
        received.push([from, itemIds, amounts]);
      },
    });
    ledger.mint(HOLDER, 1, 5);
    ledger.mint(HOLDER, 2, 5);

    ledger.safeBatchTransferFrom(HOLDER, OTHER, [1, 2], [2, 3]);

    expect(ledger.balanceOf(HOLDER, 1)).toBe(3);
    expect(ledger.balanceOf(OTHER, 2)).toBe(3);
    expect(received).toEqual([[HOLDER, [1, 2], [2, 3]]]);
  });

  it('should leave balances untouched when one entry is short', () => {
    ledger.mint(HOLDER, 1, 5);

    expect(() =>
      ledger.safeBatchTransferFrom(HOLDER, OTHER, [1, 2], [2, 1]),
    ).toThrow(LedgerError);
    expect(ledger.balanceOf(HOLDER, 1)).toBe(5);
    expect(ledger.balanceOf(OTHER, 1)).toBe(0);
  });

  it('should undo a mint the receiver refuses', () => {
    ledger.setReceiver(OTHER, {
      onItemsReceived: () => {
        throw new Error('refused');
      },
    });

    expect(() => ledger.mint(OTHER, 1, 4)).toThrow('refused');
    expect(ledger.balanceOf(OTHER, 1)).toBe(0);
  });

  it('should restore a checkpoint', () => {
    ledger.mint(HOLDER, 1, 5);
    const checkpoint = ledger.checkpoint();

    ledger.safeTransferFrom(HOLDER, OTHER, 1, 5);
    checkpoint.rollback();

    expect(ledger.balanceOf(HOLDER, 1)).toBe(5);
    expect(ledger.balanceOf(OTHER, 1)).toBe(0);
  });
});

describe('InMemoryTokenLedger', () => {
  let tokens: InMemoryTokenLedger;

  beforeEach(() => {
    tokens = new InMemoryTokenLedger();
    tokens.mint(TOKEN, HOLDER, 10n);
  });

  it('should spend the allowance on transferFrom', () => {
    tokens.approve(TOKEN, HOLDER, OTHER, 6n);

    tokens.transferFrom(TOKEN, OTHER, HOLDER, OTHER, 4n);

    expect(tokens.balanceOf(TOKEN, OTHER)).toBe(4n);
    expect(tokens.allowance(TOKEN, HOLDER, OTHER)).toBe(2n);
  });

  it('should refuse a transfer above the allowance', () => {
    tokens.approve(TOKEN, HOLDER, OTHER, 3n);

    expect(() => tokens.transferFrom(TOKEN, OTHER, HOLDER, OTHER, 4n)).toThrow(
      expect.objectContaining({ code: 'INSUFFICIENT_ALLOWANCE' }),
    );
    expect(tokens.balanceOf(TOKEN, HOLDER)).toBe(10n);
  });

  it('should restore balances and allowances from a checkpoint', () => {
    tokens.approve(TOKEN, HOLDER, OTHER, 10n);
    const checkpoint = tokens.checkpoint();

    tokens.transferFrom(TOKEN, OTHER, HOLDER, OTHER, 10n);
    checkpoint.rollback();

    expect(tokens.balanceOf(TOKEN, HOLDER)).toBe(10n);
    expect(tokens.allowance(TOKEN, HOLDER, OTHER)).toBe(10n);
  });
});

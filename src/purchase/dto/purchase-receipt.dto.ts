import type { BuyerStatus, PurchaseReceipt } from '../purchase.service.js';
import type { SettlementStrategy } from '../batch-orchestrator.js';

export class PurchaseEntryDto {
  itemId!: number;
  quantity!: number;
  cost!: string;
  paymentToken!: string;
  saleVersion!: number;
}

export class PurchaseReceiptDto {
  receiptId!: string;
  buyer!: string;
  strategy!: SettlementStrategy;
  purchases!: PurchaseEntryDto[];
  nativePaid!: string;
  refunded!: string;
  tokenTransfers!: number;
}

export type BuyerStatusDto = BuyerStatus;

export function toReceiptDto(receipt: PurchaseReceipt): PurchaseReceiptDto {
  return {
    receiptId: receipt.receiptId,
    buyer: receipt.buyer,
    strategy: receipt.strategy,
    purchases: receipt.purchases.map((entry) => ({
      itemId: entry.itemId,
      quantity: entry.quantity,
      cost: entry.cost.toString(),
      paymentToken: entry.paymentToken,
      saleVersion: entry.saleVersion,
    })),
    nativePaid: receipt.nativePaid.toString(),
    refunded: receipt.refunded.toString(),
    tokenTransfers: receipt.tokenTransfers,
  };
}

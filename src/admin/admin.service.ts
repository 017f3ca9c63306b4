import { Injectable, Logger } from '@nestjs/common';
import { EngineStateService } from '../engine/engine-state.service.js';
import { NATIVE_CURRENCY } from '../engine/constants.js';
import { ADMIN_GUARDS, CallContext } from '../engine/entry-guards.js';
import { SaleEngineError } from '../engine/sale-engine.error.js';
import { InventoryGuardService } from '../inventory/inventory-guard.service.js';
import { assertBatchShape } from '../purchase/batch-orchestrator.js';
import { SaleRegistryService } from '../sale/sale-registry.service.js';
import type { SaleConfig, SaleParams } from '../sale/sale.types.js';

export interface ItemWithdrawal {
  to: string;
  itemIds: number[];
  amounts: number[];
}

export interface BalanceWithdrawal {
  token: string;
  to: string;
  amount: bigint;
}

/**
 * Administrator entry points. All of them run under the owner and
 * non-payable guards; none is affected by the pause flag.
 */
@Injectable()
export class AdminService {
  private readonly logger = new Logger(AdminService.name);

  constructor(
    private readonly engine: EngineStateService,
    private readonly registry: SaleRegistryService,
    private readonly inventory: InventoryGuardService,
  ) {}

  configureSale(
    ctx: CallContext,
    itemId: number,
    params: SaleParams,
    verifyInventory: boolean,
  ): SaleConfig {
    const config = this.engine.run(ctx, ADMIN_GUARDS, (scope) => {
      const configured = this.registry.configure(itemId, params, verifyInventory);
      scope.emit({
        type: 'SaleConfigured',
        itemId,
        price: configured.price,
        startTime: configured.startTime,
        endTime: configured.endTime,
        maxSupply: configured.maxSupply,
        maxPerAddress: configured.maxPerAddress,
        paymentToken: configured.paymentToken,
        saleVersion: configured.saleVersion,
      });
      return configured;
    });
    this.logger.log(
      `Configured sale for item ${itemId} (version ${config.saleVersion}, supply ${config.maxSupply})`,
    );
    return config;
  }

  updateSaleParams(
    ctx: CallContext,
    itemId: number,
    newPrice: bigint,
    newEndTime: number,
  ): SaleConfig {
    const config = this.engine.run(ctx, ADMIN_GUARDS, (scope) => {
      const updated = this.registry.updateParams(itemId, newPrice, newEndTime);
      scope.emit({
        type: 'SaleParamsUpdated',
        itemId,
        price: updated.price,
        endTime: updated.endTime,
      });
      return updated;
    });
    this.logger.log(
      `Updated sale for item ${itemId}: price ${newPrice}, ends ${newEndTime}`,
    );
    return config;
  }

  setSaleActive(ctx: CallContext, itemId: number, active: boolean): SaleConfig {
    const config = this.engine.run(ctx, ADMIN_GUARDS, (scope) => {
      const changed = this.registry.setActive(itemId, active);
      scope.emit({ type: 'SaleStatusChanged', itemId, active });
      return changed;
    });
    this.logger.log(`Sale for item ${itemId} ${active ? 'activated' : 'deactivated'}`);
    return config;
  }

  setAssetLedger(ctx: CallContext, address: string): void {
    this.engine.run(ctx, ADMIN_GUARDS, (scope) => {
      const previous = this.engine.assetLedgerAddress();
      this.engine.setAssetLedger(this.engine.resolveAssetLedger(address));
      scope.emit({ type: 'AssetLedgerUpdated', previous, current: address });
    });
    this.logger.log(`Asset ledger set to ${address}`);
  }

  setPaymentRecipient(ctx: CallContext, recipient: string): void {
    this.engine.run(ctx, ADMIN_GUARDS, (scope) => {
      const previous = this.engine.paymentRecipientAddress();
      this.engine.setPaymentRecipient(recipient);
      scope.emit({ type: 'PaymentRecipientUpdated', previous, current: recipient });
    });
    this.logger.log(`Payment recipient set to ${recipient}`);
  }

  setPaused(ctx: CallContext, paused: boolean): void {
    this.engine.run(ctx, ADMIN_GUARDS, (scope) => {
      this.engine.setPaused(paused);
      scope.emit({ type: 'PausedChanged', paused });
    });
    this.logger.log(paused ? 'Sales paused' : 'Sales resumed');
  }

  /**
   * Moves items from the engine to the administrator, refusing any entry
   * that would leave an active sale's unsold supply unbacked.
   */
  withdrawItems(
    ctx: CallContext,
    itemIds: readonly number[],
    amounts: readonly number[],
  ): ItemWithdrawal {
    const withdrawal = this.engine.run(ctx, ADMIN_GUARDS, (scope) => {
      assertBatchShape(itemIds, amounts);
      const assets = this.engine.getAssetLedger();
      itemIds.forEach((itemId, i) => {
        this.inventory.checkWithdrawable(itemId, amounts[i] ?? 0);
      });

      assets.safeBatchTransferFrom(
        this.engine.address,
        this.engine.owner,
        itemIds,
        amounts,
      );
      const result: ItemWithdrawal = {
        to: this.engine.owner,
        itemIds: [...itemIds],
        amounts: [...amounts],
      };
      scope.emit({ type: 'ItemsWithdrawn', ...result });
      return result;
    });
    this.logger.log(
      `Withdrew items [${withdrawal.itemIds.join(', ')}] x [${withdrawal.amounts.join(', ')}]`,
    );
    return withdrawal;
  }

  withdrawNativeBalance(ctx: CallContext): BalanceWithdrawal {
    const withdrawal = this.engine.run(ctx, ADMIN_GUARDS, (scope) => {
      const amount = this.engine.native.balanceOf(this.engine.address);
      if (amount === 0n) {
        throw new SaleEngineError('ZERO_AMOUNT', 'No native balance to withdraw');
      }
      this.engine.native.transfer(this.engine.address, this.engine.owner, amount);
      scope.emit({ type: 'NativeWithdrawn', to: this.engine.owner, amount });
      return { token: NATIVE_CURRENCY, to: this.engine.owner, amount };
    });
    this.logger.log(`Withdrew ${withdrawal.amount} native`);
    return withdrawal;
  }

  withdrawTokenBalance(ctx: CallContext, token: string): BalanceWithdrawal {
    const withdrawal = this.engine.run(ctx, ADMIN_GUARDS, (scope) => {
      if (token === NATIVE_CURRENCY) {
        throw new SaleEngineError(
          'INVALID_ADDRESS',
          'Use the native withdrawal for the native currency',
        );
      }
      const amount = this.engine.tokens.balanceOf(token, this.engine.address);
      if (amount === 0n) {
        throw new SaleEngineError('ZERO_AMOUNT', `No ${token} balance to withdraw`);
      }
      this.engine.tokens.transfer(token, this.engine.address, this.engine.owner, amount);
      scope.emit({ type: 'TokenWithdrawn', token, to: this.engine.owner, amount });
      return { token, to: this.engine.owner, amount };
    });
    this.logger.log(`Withdrew ${withdrawal.amount} of ${token}`);
    return withdrawal;
  }
}

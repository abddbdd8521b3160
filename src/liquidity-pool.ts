/**
 * Constant-product pool pairing the stablecoin with the reference asset
 *
 * Zero fees: every swap keeps reserveStable * reserveRef constant, deposits
 * and withdrawals scale both reserves without moving the price. Liquidity
 * shares live in a per-holder ledger; the initial sqrt(k) shares belong to
 * the seed holder and can never be withdrawn.
 */

import { InsufficientSharesError, InvalidAmountError, PoolDepletedError } from "./errors";

export type PoolAsset = "stable" | "ref";

export const SEED_HOLDER = "seed";

export interface LiquidityDeposit {
  asset: PoolAsset;
  amount: number;
}

export interface DepositReceipt {
  shares: number;
  amountStable: number;
  amountRef: number;
}

export interface WithdrawalReceipt {
  amountStable: number;
  amountRef: number;
}

export interface PoolSnapshot {
  reserveStable: number;
  reserveRef: number;
  totalShares: number;
  shares: Array<[string, number]>;
}

function requirePositiveAmount(operation: string, amount: number): void {
  if (!Number.isFinite(amount) || amount <= 0) {
    throw new InvalidAmountError(operation, amount);
  }
}

/**
 * Reference-asset amount to swap so that swapping and then depositing both
 * sides uses up a wallet of `walletRef` exactly.
 */
export function entireWalletSwapSize(reserveRef: number, walletRef: number): number {
  // R_ref * (sqrt(1 + w/R_ref) - 1), written without the subtraction
  const ratio = walletRef / reserveRef;
  return (reserveRef * ratio) / (Math.sqrt(1 + ratio) + 1);
}

export class LiquidityPool {
  private _reserveStable: number;
  private _reserveRef: number;
  private _totalShares: number;
  private shares: Map<string, number>;

  constructor(reserveStable: number, reserveRef: number) {
    requirePositiveAmount("seed stable reserve", reserveStable);
    requirePositiveAmount("seed reference reserve", reserveRef);

    this._reserveStable = reserveStable;
    this._reserveRef = reserveRef;
    this._totalShares = Math.sqrt(reserveStable * reserveRef);
    this.shares = new Map([[SEED_HOLDER, this._totalShares]]);
  }

  static fromSnapshot(snapshot: PoolSnapshot): LiquidityPool {
    const pool = new LiquidityPool(snapshot.reserveStable, snapshot.reserveRef);
    pool.restore(snapshot);
    return pool;
  }

  get reserveStable(): number {
    return this._reserveStable;
  }

  get reserveRef(): number {
    return this._reserveRef;
  }

  get totalShares(): number {
    return this._totalShares;
  }

  get k(): number {
    return this._reserveStable * this._reserveRef;
  }

  /**
   * Stablecoin price in reference-asset units (R_ref / R_stable)
   */
  spotPrice(): number {
    this.ensureLive("spotPrice");
    return this._reserveRef / this._reserveStable;
  }

  /**
   * Reference asset quoted in stablecoin (R_stable / R_ref)
   */
  referenceQuote(): number {
    this.ensureLive("referenceQuote");
    return this._reserveStable / this._reserveRef;
  }

  poolShare(shares: number): number {
    return shares / this._totalShares;
  }

  sharesOf(holder: string): number {
    return this.shares.get(holder) ?? 0;
  }

  agentShareTotal(): number {
    let total = 0;
    for (const [holder, balance] of this.shares) {
      if (holder !== SEED_HOLDER) total += balance;
    }
    return total;
  }

  holders(): string[] {
    return [...this.shares.keys()];
  }

  /**
   * Whole pool valued in the reference asset (both sides are worth R_ref)
   */
  totalValueInRef(): number {
    return this._reserveRef + this._reserveStable * this.spotPrice();
  }

  quoteSwap(assetIn: PoolAsset, amountIn: number): number {
    requirePositiveAmount(`swap ${assetIn}`, amountIn);
    this.ensureLive("swap");

    const [reserveIn, reserveOut] = this.orderedReserves(assetIn);
    // R_out - k / (R_in + in), rearranged to avoid cancellation
    const amountOut = (reserveOut * amountIn) / (reserveIn + amountIn);
    if (!(reserveOut - amountOut > 0)) {
      throw new PoolDepletedError(`swapping ${amountIn} ${assetIn} would drain the ${otherAsset(assetIn)} reserve`);
    }
    return amountOut;
  }

  swap(assetIn: PoolAsset, amountIn: number): number {
    const amountOut = this.quoteSwap(assetIn, amountIn);
    this.applyTrade(assetIn, amountIn, amountOut);
    return amountOut;
  }

  quoteInputForExactOutput(assetOut: PoolAsset, amountOut: number): number {
    requirePositiveAmount(`buy ${assetOut}`, amountOut);
    this.ensureLive("swapForExactOutput");

    const assetIn = otherAsset(assetOut);
    const [reserveIn, reserveOut] = this.orderedReserves(assetIn);
    if (amountOut >= reserveOut) {
      throw new PoolDepletedError(`cannot buy ${amountOut} ${assetOut} from a reserve of ${reserveOut}`);
    }
    // R_in * (R_out / (R_out - out) - 1)
    return (reserveIn * amountOut) / (reserveOut - amountOut);
  }

  swapForExactOutput(assetOut: PoolAsset, amountOut: number): number {
    const amountIn = this.quoteInputForExactOutput(assetOut, amountOut);
    this.applyTrade(otherAsset(assetOut), amountIn, amountOut);
    return amountIn;
  }

  /**
   * Deposit `amount` of one asset plus the matching amount of the other at
   * the current ratio. Mints amount / R_asset * totalShares to the holder.
   */
  addLiquidity(holder: string, deposit: LiquidityDeposit): DepositReceipt {
    if (holder === SEED_HOLDER) {
      throw new Error("The seed holder's position is immutable");
    }
    requirePositiveAmount(`add ${deposit.asset} liquidity`, deposit.amount);
    this.ensureLive("addLiquidity");

    const fraction =
      deposit.asset === "stable" ? deposit.amount / this._reserveStable : deposit.amount / this._reserveRef;
    const amountStable = deposit.asset === "stable" ? deposit.amount : fraction * this._reserveStable;
    const amountRef = deposit.asset === "ref" ? deposit.amount : fraction * this._reserveRef;
    const minted = fraction * this._totalShares;

    this._reserveStable += amountStable;
    this._reserveRef += amountRef;
    this._totalShares += minted;
    this.shares.set(holder, this.sharesOf(holder) + minted);

    return { shares: minted, amountStable, amountRef };
  }

  removeLiquidity(holder: string, shares: number): WithdrawalReceipt {
    requirePositiveAmount("remove liquidity", shares);
    this.ensureLive("removeLiquidity");

    const available = holder === SEED_HOLDER ? 0 : this.sharesOf(holder);
    if (shares > available) {
      throw new InsufficientSharesError(holder, shares, available);
    }

    const fraction = shares / this._totalShares;
    const amountStable = fraction * this._reserveStable;
    const amountRef = fraction * this._reserveRef;

    this._reserveStable -= amountStable;
    this._reserveRef -= amountRef;
    this._totalShares -= shares;

    const remaining = available - shares;
    if (remaining > 0) {
      this.shares.set(holder, remaining);
    } else {
      this.shares.delete(holder);
    }

    return { amountStable, amountRef };
  }

  entireWalletSwapSize(walletRef: number): number {
    requirePositiveAmount("entire-wallet sizing", walletRef);
    this.ensureLive("entireWalletSwapSize");
    return entireWalletSwapSize(this._reserveRef, walletRef);
  }

  clone(): LiquidityPool {
    return LiquidityPool.fromSnapshot(this.snapshot());
  }

  snapshot(): PoolSnapshot {
    return {
      reserveStable: this._reserveStable,
      reserveRef: this._reserveRef,
      totalShares: this._totalShares,
      shares: [...this.shares.entries()],
    };
  }

  restore(snapshot: PoolSnapshot): void {
    this._reserveStable = snapshot.reserveStable;
    this._reserveRef = snapshot.reserveRef;
    this._totalShares = snapshot.totalShares;
    this.shares = new Map(snapshot.shares);
  }

  private orderedReserves(assetIn: PoolAsset): [number, number] {
    return assetIn === "stable"
      ? [this._reserveStable, this._reserveRef]
      : [this._reserveRef, this._reserveStable];
  }

  private applyTrade(assetIn: PoolAsset, amountIn: number, amountOut: number): void {
    if (assetIn === "stable") {
      this._reserveStable += amountIn;
      this._reserveRef -= amountOut;
    } else {
      this._reserveRef += amountIn;
      this._reserveStable -= amountOut;
    }
    this.ensureLive("trade");
  }

  private ensureLive(operation: string): void {
    const live =
      Number.isFinite(this._reserveStable) &&
      Number.isFinite(this._reserveRef) &&
      this._reserveStable > 0 &&
      this._reserveRef > 0;
    if (!live) {
      throw new PoolDepletedError(
        `${operation} on depleted pool (stable=${this._reserveStable}, ref=${this._reserveRef})`
      );
    }
  }
}

function otherAsset(asset: PoolAsset): PoolAsset {
  return asset === "stable" ? "ref" : "stable";
}

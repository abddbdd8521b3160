/**
 * Collateralized debt ledger ("safes")
 *
 * Agents lock reference asset and mint stablecoin debt valued at the
 * redemption price. The engine only keeps books; buying back the debt on the
 * pool is the owner's job before it closes a safe.
 */

import { InvalidAmountError, assertFinite } from "./errors";
import { MIN_COLLATERALIZATION_PCT } from "./simulation-config";

export interface Safe {
  id: number;
  owner: string;
  collateral: number;
  debt: number;
}

export interface OpenedSafe {
  safeId: number;
  debt: number;
}

export interface SafeEngineState {
  safes: Safe[];
  totalCollateral: number;
  totalDebt: number;
  nextId: number;
}

/**
 * Stablecoin debt minted against `collateral` at `collateralizationPct`
 */
export function debtForCollateral(
  collateral: number,
  collateralizationPct: number,
  refPrice: number,
  redemptionPrice: number
): number {
  return (collateral * refPrice) / (collateralizationPct / 100) / redemptionPrice;
}

export class SafeEngine {
  private safes = new Map<number, Safe>();
  private _totalCollateral = 0;
  private _totalDebt = 0;
  private nextId = 0;

  get totalCollateral(): number {
    return this._totalCollateral;
  }

  get totalDebt(): number {
    return this._totalDebt;
  }

  openSafe(
    owner: string,
    collateral: number,
    collateralizationPct: number,
    refPrice: number,
    redemptionPrice: number
  ): OpenedSafe {
    if (!Number.isFinite(collateral) || collateral <= 0) {
      throw new InvalidAmountError("open safe", collateral);
    }
    if (!(collateralizationPct > MIN_COLLATERALIZATION_PCT)) {
      throw new RangeError(
        `Collateralization ${collateralizationPct}% must exceed the ${MIN_COLLATERALIZATION_PCT}% minimum`
      );
    }

    const debt = assertFinite("safe debt", debtForCollateral(collateral, collateralizationPct, refPrice, redemptionPrice));
    const safeId = this.nextId++;

    this.safes.set(safeId, { id: safeId, owner, collateral, debt });
    this._totalCollateral += collateral;
    this._totalDebt += debt;

    return { safeId, debt };
  }

  addCollateral(safeId: number, amount: number): void {
    if (!Number.isFinite(amount) || amount <= 0) {
      throw new InvalidAmountError("add collateral", amount);
    }
    const safe = this.require(safeId);
    safe.collateral += amount;
    this._totalCollateral += amount;
  }

  /**
   * Remove the safe from the books and hand back its collateral
   */
  closeSafe(safeId: number): number {
    const safe = this.require(safeId);
    this.safes.delete(safeId);
    this._totalCollateral -= safe.collateral;
    this._totalDebt -= safe.debt;
    return safe.collateral;
  }

  getSafe(safeId: number): Safe {
    return { ...this.require(safeId) };
  }

  hasSafe(safeId: number): boolean {
    return this.safes.has(safeId);
  }

  /**
   * Collateral value over debt value, in %
   */
  collateralization(safeId: number, refPrice: number, redemptionPrice: number): number {
    const safe = this.require(safeId);
    return (100 * safe.collateral * refPrice) / (safe.debt * redemptionPrice);
  }

  safesOf(owner: string): Safe[] {
    return [...this.safes.values()].filter((safe) => safe.owner === owner).map((safe) => ({ ...safe }));
  }

  openSafeCount(): number {
    return this.safes.size;
  }

  snapshot(): SafeEngineState {
    return {
      safes: [...this.safes.values()].map((safe) => ({ ...safe })),
      totalCollateral: this._totalCollateral,
      totalDebt: this._totalDebt,
      nextId: this.nextId,
    };
  }

  restore(state: SafeEngineState): void {
    this.safes = new Map(state.safes.map((safe) => [safe.id, { ...safe }]));
    this._totalCollateral = state.totalCollateral;
    this._totalDebt = state.totalDebt;
    this.nextId = state.nextId;
  }

  private require(safeId: number): Safe {
    const safe = this.safes.get(safeId);
    if (!safe) {
      throw new Error(`Unknown safe ${safeId}`);
    }
    return safe;
  }
}

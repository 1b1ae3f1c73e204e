import { encode } from '@msgpack/msgpack';
import Decimal from 'decimal.js';
import { Signature, ZeroAddress, concat, keccak256 } from 'ethers';
import type { TypedDataDomain, TypedDataField, Wallet } from 'ethers';

export type TimeInForce = 'Ioc' | 'Gtc' | 'Alo';

// Field order is part of the signed payload; do not reorder.
export interface OrderWire {
  a: number;
  b: boolean;
  p: string;
  s: string;
  r: boolean;
  t: { limit: { tif: TimeInForce } };
}

export type HyperliquidAction =
  | { type: 'order'; orders: OrderWire[]; grouping: 'na' }
  | { type: 'updateLeverage'; asset: number; isCross: boolean; leverage: number };

export interface WireSignature {
  r: string;
  s: string;
  v: number;
}

const L1_DOMAIN: TypedDataDomain = {
  name: 'Exchange',
  version: '1',
  chainId: 1337,
  verifyingContract: ZeroAddress,
};

const AGENT_TYPES: Record<string, TypedDataField[]> = {
  Agent: [
    { name: 'source', type: 'string' },
    { name: 'connectionId', type: 'bytes32' },
  ],
};

/**
 * Normalised decimal string used for prices and sizes on the wire: at most
 * eight decimals, no trailing zeros, no exponent.
 */
export function floatToWire(value: Decimal.Value): string {
  const d = new Decimal(value);
  const rounded = d.toDecimalPlaces(8, Decimal.ROUND_HALF_EVEN);
  if (rounded.minus(d).abs().gte('1e-12')) {
    throw new Error(`floatToWire causes rounding: ${d.toString()}`);
  }
  if (rounded.isZero()) return '0';
  return rounded.toFixed();
}

/**
 * Aggressive limit price for an IOC "market" order: mid shifted by the
 * slippage, five significant figures, and no more decimals than the asset
 * allows (6 - szDecimals for perps).
 */
export function slippagePrice(mid: Decimal, isBuy: boolean, slippage: number, szDecimals: number): Decimal {
  const factor = isBuy ? new Decimal(1).plus(slippage) : new Decimal(1).minus(slippage);
  return mid
    .times(factor)
    .toSignificantDigits(5, Decimal.ROUND_HALF_EVEN)
    .toDecimalPlaces(Math.max(0, 6 - szDecimals), Decimal.ROUND_HALF_EVEN);
}

function nonceBytes(nonce: number): Uint8Array {
  const out = new Uint8Array(8);
  new DataView(out.buffer).setBigUint64(0, BigInt(nonce));
  return out;
}

/** keccak256(msgpack(action) ‖ nonce ‖ no-vault flag) */
export function actionHash(action: HyperliquidAction, nonce: number): string {
  return keccak256(concat([encode(action), nonceBytes(nonce), new Uint8Array([0])]));
}

export function phantomAgent(hash: string, isMainnet: boolean): { source: string; connectionId: string } {
  return { source: isMainnet ? 'a' : 'b', connectionId: hash };
}

export async function signL1Action(
  wallet: Wallet,
  action: HyperliquidAction,
  nonce: number,
  isMainnet: boolean,
): Promise<WireSignature> {
  const agent = phantomAgent(actionHash(action, nonce), isMainnet);
  const sig = Signature.from(await wallet.signTypedData(L1_DOMAIN, AGENT_TYPES, agent));
  return { r: sig.r, s: sig.s, v: sig.v };
}

export { L1_DOMAIN, AGENT_TYPES };

/**
 * Merkle commitment over per-strike bid/ask bounds, so a settlement layer can check a single
 * quote against one published root.
 *
 * Leaf:  keccak256(abi.encodePacked(uint8 optionType, uint256 strike, uint256 bid, uint256 ask))
 * Node:  keccak256(abi.encodePacked(min(a, b), max(a, b)))   (sorted pair)
 * An odd node at the end of a layer is carried up unchanged.
 */

import { encodePacked, keccak256, type Hex } from "viem";
import type { OptionType } from "../types/clum.js";

export const OPTION_TYPE_CODES: Record<OptionType, number> = { CALL: 0, PUT: 1 };

export interface PriceBound {
  type: OptionType;
  strike: bigint;
  bid: bigint;
  ask: bigint;
}

export interface PriceBoundsTree {
  root: Hex;
  leaves: Hex[];
  proofs: Hex[][];
}

export function hashPriceBound(bound: PriceBound): Hex {
  return keccak256(
    encodePacked(
      ["uint8", "uint256", "uint256", "uint256"],
      [OPTION_TYPE_CODES[bound.type], bound.strike, bound.bid, bound.ask]
    )
  );
}

function hashPair(a: Hex, b: Hex): Hex {
  const [lo, hi] = a.toLowerCase() < b.toLowerCase() ? [a, b] : [b, a];
  return keccak256(encodePacked(["bytes32", "bytes32"], [lo, hi]));
}

export function buildPriceBoundsMerkleTree(bounds: readonly PriceBound[]): PriceBoundsTree {
  if (bounds.length === 0) throw new Error("Price bounds tree needs at least one leaf");
  const leaves = bounds.map(hashPriceBound);

  const layers: Hex[][] = [leaves];
  let current = leaves;
  while (current.length > 1) {
    const next: Hex[] = [];
    for (let i = 0; i < current.length; i += 2) {
      next.push(i + 1 < current.length ? hashPair(current[i], current[i + 1]) : current[i]);
    }
    layers.push(next);
    current = next;
  }

  const proofs = leaves.map((_, leafIndex) => {
    const proof: Hex[] = [];
    let idx = leafIndex;
    for (let level = 0; level < layers.length - 1; level++) {
      const sibling = idx % 2 === 0 ? idx + 1 : idx - 1;
      if (sibling < layers[level].length) proof.push(layers[level][sibling]);
      idx = Math.floor(idx / 2);
    }
    return proof;
  });

  return { root: current[0], leaves, proofs };
}

export function verifyPriceBoundProof(bound: PriceBound, proof: readonly Hex[], root: Hex): boolean {
  const computed = proof.reduce<Hex>((node, sibling) => hashPair(node, sibling), hashPriceBound(bound));
  return computed.toLowerCase() === root.toLowerCase();
}

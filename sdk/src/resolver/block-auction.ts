import { OrderNotFillableError } from '@fillway/errors';
import { Address, BlockCosignerData, EMPTY_BYTES, Hex, isZeroAddress } from '@fillway/types';
import { applyInputOverride, applyOutputOverrides, cosignerDigest, verifyCosignature } from '../cosigner/cosigner-verifier';
import { encodeBlockCosignerData } from '../encoding/order-codec';

export interface BlockAuctionOrder {
  cosigner: Address;
  auctionStartBlock: bigint;
  cosignerData: BlockCosignerData;
  cosignature: Hex;
}

export interface BlockAuctionTerms {
  startBlock: bigint;
  inputAmount: bigint;
  outputAmounts: bigint[];
}

/**
 * Applies cosigner data while it is still relevant: before the signed start
 * block, or whenever a named cosigner has not signed yet (which fails).
 * The target block only moves the start earlier; a zero or later target
 * keeps the signed start.
 */
export function resolveBlockAuction(
  order: BlockAuctionOrder,
  signedInput: bigint,
  signedOutputs: bigint[],
  blockNumber: bigint,
  orderHash: Hex
): BlockAuctionTerms {
  let terms: BlockAuctionTerms = {
    startBlock: order.auctionStartBlock,
    inputAmount: signedInput,
    outputAmounts: signedOutputs
  };

  const cosignerApplies = !isZeroAddress(order.cosigner)
    && (order.cosignature === EMPTY_BYTES || blockNumber < order.auctionStartBlock);

  if (cosignerApplies) {
    const data = order.cosignerData;
    verifyCosignature(
      order.cosigner,
      cosignerDigest(orderHash, encodeBlockCosignerData(data)),
      order.cosignature,
      orderHash
    );
    terms = {
      startBlock: data.auctionTargetBlock !== 0n && data.auctionTargetBlock < order.auctionStartBlock
        ? data.auctionTargetBlock
        : order.auctionStartBlock,
      inputAmount: applyInputOverride(signedInput, data.inputOverride, orderHash),
      outputAmounts: applyOutputOverrides(signedOutputs, data.outputOverrides, orderHash)
    };
  }

  if (blockNumber < terms.startBlock) {
    throw new OrderNotFillableError(terms.startBlock, blockNumber, orderHash);
  }
  return terms;
}

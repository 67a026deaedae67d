/**
 * EIP-712 ballots for signature voting.
 *
 * Domain:  EIP712Domain(string name,uint256 chainId,address verifyingContract)
 * Message: Ballot(uint256 proposalId,bool support)
 *
 * Matches the digest existing GovernorAlpha-style signers produce, so a ballot
 * signed by a wallet for the same name/chain/contract verifies here.
 */

import { hashTypedData, recoverAddress, type LocalAccount, type TypedDataDomain } from 'viem';
import { BALLOT_PRIMARY_TYPE, BALLOT_TYPES, ZERO_ADDRESS } from '@quorum-governor/shared';
import type { Address, GovernorConfig, Hex, SignatureVerifier } from './types.js';

type BallotDomainConfig = Pick<GovernorConfig, 'name' | 'chainId' | 'verifyingContract'>;

export function ballotDomain(config: BallotDomainConfig): TypedDataDomain {
  return {
    name: config.name,
    chainId: config.chainId,
    verifyingContract: config.verifyingContract,
  };
}

export function ballotDigest(config: BallotDomainConfig, proposalId: bigint, support: boolean): Hex {
  return hashTypedData({
    domain: ballotDomain(config),
    types: BALLOT_TYPES,
    primaryType: BALLOT_PRIMARY_TYPE,
    message: { proposalId, support },
  });
}

/** Sign a ballot with a local account (client side and tests). */
export function signBallot(
  account: LocalAccount,
  config: BallotDomainConfig,
  proposalId: bigint,
  support: boolean,
): Promise<Hex> {
  return account.signTypedData({
    domain: ballotDomain(config),
    types: BALLOT_TYPES,
    primaryType: BALLOT_PRIMARY_TYPE,
    message: { proposalId, support },
  });
}

/**
 * secp256k1 recovery over a precomputed digest. Malformed signatures and
 * the zero address recover to null.
 */
export class EcdsaSignatureVerifier implements SignatureVerifier {
  async recover(digest: Hex, signature: Hex): Promise<Address | null> {
    let signer: Address;
    try {
      signer = await recoverAddress({ hash: digest, signature });
    } catch (err) {
      console.warn('[governance/ballot] signature recovery failed:', err instanceof Error ? err.message : err);
      return null;
    }
    return signer === ZERO_ADDRESS ? null : signer;
  }
}

// ─── EIP-712 Ballot ──────────────────────────────────────
// Domain: EIP712Domain(string name,uint256 chainId,address verifyingContract)
// Message: Ballot(uint256 proposalId,bool support)

export const BALLOT_PRIMARY_TYPE = 'Ballot' as const;

export const BALLOT_TYPES = {
  Ballot: [
    { name: 'proposalId', type: 'uint256' },
    { name: 'support', type: 'bool' },
  ],
} as const;

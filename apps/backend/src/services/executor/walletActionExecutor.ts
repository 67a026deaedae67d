/**
 * Executes proposal actions as transactions from the governor's signer.
 * One transaction per action; an action succeeds when its receipt status is
 * "success". Reverts and send failures are reported, never retried here.
 */

import type { Account, Chain, PublicClient, Transport, WalletClient } from 'viem';
import type { ActionCall, ActionCallResult, ActionExecutor } from '../../governance/types.js';

export class WalletActionExecutor implements ActionExecutor {
  constructor(
    private readonly walletClient: WalletClient<Transport, Chain, Account>,
    private readonly publicClient: PublicClient,
  ) {}

  async invoke(call: ActionCall): Promise<ActionCallResult> {
    let hash: `0x${string}`;
    try {
      hash = await this.walletClient.sendTransaction({
        to: call.target,
        data: call.data,
        value: call.value,
      });
    } catch (err) {
      return { ok: false, reason: err instanceof Error ? err.message : 'sendTransaction failed' };
    }

    const receipt = await this.publicClient.waitForTransactionReceipt({ hash });
    if (receipt.status !== 'success') {
      return { ok: false, reason: `Transaction ${hash} reverted` };
    }
    console.log(`[executor] action sent to ${call.target} in block ${receipt.blockNumber} (${hash})`);
    return { ok: true };
  }
}

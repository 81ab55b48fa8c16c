import { Module } from '@nestjs/common';

import { EtherscanExplorerAdapter } from './explorers/etherscan/etherscan-explorer.adapter';
import { EthereumRpcAdapter } from './rpc/ethereum/ethereum-rpc.adapter';
import { INDEXED_EXPLORER_ADAPTER, RPC_ADAPTER } from '../core/ports/port.tokens';
import { RateLimitingModule } from '../rate-limiting/rate-limiting.module';

@Module({
  imports: [RateLimitingModule],
  providers: [
    // --- Backends ---
    EthereumRpcAdapter,
    EtherscanExplorerAdapter,
    {
      provide: RPC_ADAPTER,
      useExisting: EthereumRpcAdapter,
    },
    {
      provide: INDEXED_EXPLORER_ADAPTER,
      useExisting: EtherscanExplorerAdapter,
    },
  ],
  exports: [RPC_ADAPTER, INDEXED_EXPLORER_ADAPTER],
})
export class IntegrationsModule {}

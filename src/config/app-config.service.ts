import { Injectable } from '@nestjs/common';

import { mapAppConfig } from './app-config.mapper';
import { envSchema, type ParsedEnv, type PersistedSettings } from './app-config.schema';
import type { AppConfig } from './app-config.types';
import { assertExplorerConfig } from './app-config.validators';
import { loadPersistedSettings } from './persisted-settings.loader';

@Injectable()
export class AppConfigService {
  private readonly config: AppConfig;

  public constructor() {
    const parsedEnv: ParsedEnv = envSchema.parse(process.env);
    assertExplorerConfig(parsedEnv);
    const persisted: PersistedSettings = loadPersistedSettings(parsedEnv.EXPLORER_SETTINGS_PATH);

    this.config = mapAppConfig(parsedEnv, persisted);
  }

  public get snapshot(): AppConfig {
    return this.config;
  }

  public get nodeEnv(): AppConfig['nodeEnv'] {
    return this.config.nodeEnv;
  }

  public get logLevel(): AppConfig['logLevel'] {
    return this.config.logLevel;
  }

  public get settingsPath(): string | null {
    return this.config.settingsPath;
  }

  public get rpcUrl(): string {
    return this.config.rpcUrl;
  }

  public get rpcWsUrl(): string | null {
    return this.config.rpcWsUrl;
  }

  public get chainId(): number {
    return this.config.chainId;
  }

  public get rpcTimeoutMs(): number {
    return this.config.rpcTimeoutMs;
  }

  public get rpcNodeLocal(): boolean {
    return this.config.rpcNodeLocal;
  }

  public get etherscanApiBaseUrl(): string {
    return this.config.etherscanApiBaseUrl;
  }

  public get etherscanApiKey(): string | null {
    return this.config.etherscanApiKey;
  }

  public get etherscanTimeoutMs(): number {
    return this.config.etherscanTimeoutMs;
  }

  public get cacheEnabled(): boolean {
    return this.config.cacheEnabled;
  }

  public get cacheMaxEntriesPerKind(): number {
    return this.config.cacheMaxEntriesPerKind;
  }

  public get cacheTtlBlocksSec(): number {
    return this.config.cacheTtlBlocksSec;
  }

  public get cacheTtlTransactionsSec(): number {
    return this.config.cacheTtlTransactionsSec;
  }

  public get cacheTtlAddressesSec(): number {
    return this.config.cacheTtlAddressesSec;
  }

  public get cacheTtlContractsSec(): number {
    return this.config.cacheTtlContractsSec;
  }

  public get cacheTtlTokensSec(): number {
    return this.config.cacheTtlTokensSec;
  }

  public get cacheTtlAddressHistorySec(): number {
    return this.config.cacheTtlAddressHistorySec;
  }

  public get cacheTtlTokenTransfersSec(): number {
    return this.config.cacheTtlTokenTransfersSec;
  }

  public get cacheTtlInternalTxsSec(): number {
    return this.config.cacheTtlInternalTxsSec;
  }

  public get cacheTtlTokenBalancesSec(): number {
    return this.config.cacheTtlTokenBalancesSec;
  }

  public get cacheTtlEnsSec(): number {
    return this.config.cacheTtlEnsSec;
  }

  public get blockPollIntervalMs(): number {
    return this.config.blockPollIntervalMs;
  }

  public get addressPollIntervalMs(): number {
    return this.config.addressPollIntervalMs;
  }

  public get rateLimitEtherscanMinTimeMs(): number {
    return this.config.rateLimitEtherscanMinTimeMs;
  }

  public get rateLimitEtherscanMaxConcurrent(): number {
    return this.config.rateLimitEtherscanMaxConcurrent;
  }

  public get rateLimitEthRpcMinTimeMs(): number {
    return this.config.rateLimitEthRpcMinTimeMs;
  }

  public get rateLimitEthRpcMaxConcurrent(): number {
    return this.config.rateLimitEthRpcMaxConcurrent;
  }
}

import { Inject, Injectable, Logger, type OnModuleDestroy } from '@nestjs/common';
import { type Observable, Subject } from 'rxjs';

import {
  type IActiveSubscription,
  type ISubscriptionTask,
  type SubscriptionEvent,
  SubscriptionEventType,
  SubscriptionKind,
  SubscriptionMode,
} from './subscription.interfaces';
import { toErrorMessage } from '../common/errors/explorer-errors';
import { abortableDelay } from '../common/utils/network/abortable-delay.util';
import { assertAddress } from '../common/validation/hex-input.validators';
import { AppConfigService } from '../config/app-config.service';
import type { IBlockSummary, ITransactionSummary } from '../core/ports/chain/chain-data.interfaces';
import { RPC_ADAPTER } from '../core/ports/port.tokens';
import type { IRpcAdapter, ISubscriptionHandle } from '../core/ports/rpc/rpc-adapter.interfaces';

type BlockConsumer = (block: IBlockSummary, task: ISubscriptionTask) => void;

/**
 * Owns background block and address watchers keyed by caller-chosen ids.
 * Each id runs at most one task; all events share the `events$` stream.
 * Tasks use the node's push feed when a websocket endpoint is configured
 * and fall back to head polling otherwise.
 */
@Injectable()
export class SubscriptionManagerService implements OnModuleDestroy {
  private readonly logger: Logger = new Logger(SubscriptionManagerService.name);
  private readonly tasks: Map<string, ISubscriptionTask> = new Map<string, ISubscriptionTask>();
  private readonly eventsSubject: Subject<SubscriptionEvent> = new Subject<SubscriptionEvent>();

  public readonly events$: Observable<SubscriptionEvent> = this.eventsSubject.asObservable();

  public constructor(
    private readonly appConfigService: AppConfigService,
    @Inject(RPC_ADAPTER)
    private readonly rpcAdapter: IRpcAdapter,
  ) {}

  public hasPushSupport(): boolean {
    return this.rpcAdapter.hasPushSupport();
  }

  public subscribeToBlocks(id: string): void {
    const task: ISubscriptionTask = this.registerTask(id, SubscriptionKind.BLOCKS, null);

    this.startTask(task, this.appConfigService.blockPollIntervalMs, this.emitNewBlock);
  }

  public subscribeToAddress(id: string, address: string): void {
    const normalizedAddress: string = assertAddress(address).toLowerCase();
    const task: ISubscriptionTask = this.registerTask(
      id,
      SubscriptionKind.ADDRESS,
      normalizedAddress,
    );

    this.startTask(task, this.appConfigService.addressPollIntervalMs, this.emitAddressMatches);
  }

  public unsubscribe(id: string): boolean {
    const task: ISubscriptionTask | undefined = this.tasks.get(id);

    if (task === undefined) {
      return false;
    }

    this.tasks.delete(id);
    task.controller.abort();
    this.logger.log(`Subscription stopped id=${id} kind=${task.kind}`);
    return true;
  }

  public unsubscribeAll(): void {
    for (const id of [...this.tasks.keys()]) {
      this.unsubscribe(id);
    }
  }

  public hasSubscription(id: string): boolean {
    return this.tasks.has(id);
  }

  public getActiveSubscriptions(): readonly IActiveSubscription[] {
    return [...this.tasks.values()].map(
      (task: ISubscriptionTask): IActiveSubscription => ({
        id: task.id,
        kind: task.kind,
        mode: task.mode,
        address: task.address,
      }),
    );
  }

  public onModuleDestroy(): void {
    this.unsubscribeAll();
    this.eventsSubject.complete();
  }

  private registerTask(
    id: string,
    kind: SubscriptionKind,
    address: string | null,
  ): ISubscriptionTask {
    this.unsubscribe(id);

    const task: ISubscriptionTask = {
      id,
      kind,
      address,
      mode: this.rpcAdapter.hasPushSupport() ? SubscriptionMode.PUSH : SubscriptionMode.POLL,
      controller: new AbortController(),
    };

    this.tasks.set(id, task);
    this.logger.log(
      `Subscription started id=${id} kind=${kind} mode=${task.mode}` +
        (address === null ? '' : ` address=${address}`),
    );
    return task;
  }

  private startTask(task: ISubscriptionTask, pollIntervalMs: number, consume: BlockConsumer): void {
    const run: Promise<void> =
      task.mode === SubscriptionMode.PUSH
        ? this.runPush(task, consume)
        : this.runPoll(task, pollIntervalMs, consume);

    void run.catch((error: unknown): void => {
      this.failTask(task, error);
    });
  }

  private async runPush(task: ISubscriptionTask, consume: BlockConsumer): Promise<void> {
    const signal: AbortSignal = task.controller.signal;
    // Heads are handled one at a time so events keep their arrival order.
    let queueTail: Promise<void> = Promise.resolve();
    const handle: ISubscriptionHandle = await this.rpcAdapter.subscribeBlocks(
      (blockNumber: number): Promise<void> => {
        queueTail = queueTail.then(
          (): Promise<void> => this.consumePushedBlock(task, blockNumber, consume),
        );

        return queueTail;
      },
    );

    if (signal.aborted) {
      await handle.stop();
      return;
    }

    signal.addEventListener(
      'abort',
      (): void => {
        void handle.stop().catch((error: unknown): void => {
          this.logger.warn(`Failed to stop push feed id=${task.id}: ${toErrorMessage(error)}`);
        });
      },
      { once: true },
    );
  }

  private async consumePushedBlock(
    task: ISubscriptionTask,
    blockNumber: number,
    consume: BlockConsumer,
  ): Promise<void> {
    if (task.controller.signal.aborted) {
      return;
    }

    try {
      const block: IBlockSummary | null = await this.rpcAdapter.getBlock(blockNumber);

      if (block !== null) {
        consume(block, task);
      }
    } catch (error: unknown) {
      this.failTask(task, error);
    }
  }

  private async runPoll(
    task: ISubscriptionTask,
    pollIntervalMs: number,
    consume: BlockConsumer,
  ): Promise<void> {
    const signal: AbortSignal = task.controller.signal;
    let lastSeenBlock: number = await this.rpcAdapter.getLatestBlockNumber();

    while (!signal.aborted) {
      await abortableDelay(pollIntervalMs, signal);

      if (signal.aborted) {
        return;
      }

      const headBlock: number = await this.rpcAdapter.getLatestBlockNumber();

      if (headBlock <= lastSeenBlock) {
        continue;
      }

      // Block watchers report only the new head; address watchers scan the whole gap.
      const fromBlock: number =
        task.kind === SubscriptionKind.BLOCKS ? headBlock : lastSeenBlock + 1;

      for (let blockNumber: number = fromBlock; blockNumber <= headBlock; blockNumber += 1) {
        if (signal.aborted) {
          return;
        }

        const block: IBlockSummary | null = await this.rpcAdapter.getBlock(blockNumber);

        // Announced but not served yet: retry from here on the next tick.
        if (block === null) {
          break;
        }

        consume(block, task);
        lastSeenBlock = blockNumber;
      }
    }
  }

  private readonly emitNewBlock = (block: IBlockSummary, task: ISubscriptionTask): void => {
    this.emit(task, {
      type: SubscriptionEventType.NEW_BLOCK,
      subscriptionId: task.id,
      number: block.number,
      hash: block.hash,
    });
  };

  private readonly emitAddressMatches = (block: IBlockSummary, task: ISubscriptionTask): void => {
    const address: string | null = task.address;

    if (address === null) {
      return;
    }

    for (const transaction of block.transactions) {
      if (!this.touchesAddress(transaction, address)) {
        continue;
      }

      this.emit(task, {
        type: SubscriptionEventType.NEW_ADDRESS_TRANSACTION,
        subscriptionId: task.id,
        address,
        transaction,
        blockNumber: block.number,
      });
    }
  };

  private touchesAddress(transaction: ITransactionSummary, address: string): boolean {
    return (
      transaction.from.toLowerCase() === address || transaction.to?.toLowerCase() === address
    );
  }

  private emit(task: ISubscriptionTask, event: SubscriptionEvent): void {
    if (task.controller.signal.aborted) {
      return;
    }

    this.eventsSubject.next(event);
  }

  private failTask(task: ISubscriptionTask, error: unknown): void {
    if (task.controller.signal.aborted) {
      return;
    }

    const message: string = toErrorMessage(error);

    this.logger.warn(`Subscription failed id=${task.id} kind=${task.kind}: ${message}`);
    this.eventsSubject.next({
      type: SubscriptionEventType.SUBSCRIPTION_ERROR,
      subscriptionId: task.id,
      message,
    });

    if (this.tasks.get(task.id) === task) {
      this.tasks.delete(task.id);
    }

    task.controller.abort();
  }
}

/**
 * WalletService composes the multisig wallet with its persistence.
 *
 * One instance serves one wallet. Mutations go straight to the wallet;
 * after each one that succeeds the service saves a snapshot so a restart
 * resumes from the last committed state.
 *
 * A failed save does not fail the mutation, which has already committed
 * (and may have paid out). The service reports itself not ready until a
 * later mutation saves successfully.
 */

import type { Logger } from "pino";
import type { Asset, Money } from "@concord/types";
import {
  InMemoryEventStore,
  InMemorySnapshotStore,
} from "@concord/event-store";
import type {
  EventStoreIntegrityResult,
  SnapshotStore,
  StoredEvent,
} from "@concord/event-store";
import {
  MultisigWallet,
  RecordingValueTransfer,
  checkInvariants,
  parseWalletSnapshot,
  walletStreamId,
} from "@concord/multisig";
import type {
  DepositReceipt,
  ExecutionResult,
  ParticipantId,
  Payout,
  Proposal,
  ProposalFilter,
} from "@concord/multisig";

// =============================================================================
// Types
// =============================================================================

export interface WalletServiceConfig {
  readonly walletId: string;
  readonly participants: readonly ParticipantId[];
  readonly threshold: number;
  readonly asset: Asset;
  /** Default: InMemorySnapshotStore */
  readonly snapshotStore?: SnapshotStore;
  readonly logger?: Logger;
  /** ISO timestamp source, passed to the wallet */
  readonly now?: () => string;
}

export interface WalletSummary {
  readonly walletId: string;
  readonly asset: Asset;
  readonly participants: readonly ParticipantId[];
  readonly threshold: number;
  readonly balance: Money;
  readonly proposalCount: number;
}

export interface ProposalView {
  readonly proposal: Proposal;
  readonly approvers: readonly ParticipantId[];
}

export interface SnapshotStatus {
  /** False while the latest committed state has not been saved */
  readonly current: boolean;
  /** Version of the last snapshot saved or restored (0 if none) */
  readonly version: number;
  readonly error?: string;
}

export interface Readiness {
  readonly ready: boolean;
  readonly integrity: EventStoreIntegrityResult;
  readonly violations: readonly string[];
  readonly snapshot: SnapshotStatus;
}

// =============================================================================
// Service
// =============================================================================

export class WalletService {
  readonly eventStore: InMemoryEventStore;
  readonly rail: RecordingValueTransfer;
  readonly snapshotStore: SnapshotStore;

  /** Snapshot version the wallet was restored from, if any */
  readonly restoredFrom: number | undefined;

  private readonly wallet: MultisigWallet;
  private readonly logger: Logger | undefined;
  private snapshotVersion: number;
  private saveError: string | undefined;

  constructor(config: WalletServiceConfig) {
    this.eventStore = new InMemoryEventStore();
    this.rail = new RecordingValueTransfer();
    this.snapshotStore = config.snapshotStore ?? new InMemorySnapshotStore();
    this.logger = config.logger;

    const deps = {
      eventStore: this.eventStore,
      transfer: this.rail,
      ...(config.now !== undefined ? { now: config.now } : {}),
    };

    const stored = this.snapshotStore.load(walletStreamId(config.walletId));
    if (stored !== undefined) {
      this.wallet = MultisigWallet.fromSnapshot(parseWalletSnapshot(stored.state), deps);
      this.snapshotVersion = stored.version;
      this.restoredFrom = stored.version;
      this.logger?.info(
        { walletId: config.walletId, version: stored.version },
        "Wallet restored from snapshot",
      );
    } else {
      this.wallet = new MultisigWallet(
        {
          walletId: config.walletId,
          participants: config.participants,
          threshold: config.threshold,
          asset: config.asset,
        },
        deps,
      );
      this.snapshotVersion = 0;
      this.restoredFrom = undefined;
    }
  }

  get walletId(): string {
    return this.wallet.walletId;
  }

  // ─── Proposals ──────────────────────────────────────────────────────

  proposeTransfer(caller: ParticipantId, destination: ParticipantId, amount: string): Proposal {
    return this.mutate(() =>
      this.wallet.proposeTransfer(caller, destination, this.money(amount)),
    );
  }

  proposeAddParticipant(caller: ParticipantId, participant: ParticipantId): Proposal {
    return this.mutate(() => this.wallet.proposeAddParticipant(caller, participant));
  }

  proposeRemoveParticipant(caller: ParticipantId, participant: ParticipantId): Proposal {
    return this.mutate(() => this.wallet.proposeRemoveParticipant(caller, participant));
  }

  proposeChangeThreshold(caller: ParticipantId, threshold: number): Proposal {
    return this.mutate(() => this.wallet.proposeChangeThreshold(caller, threshold));
  }

  approve(caller: ParticipantId, proposalId: number): Proposal {
    return this.mutate(() => this.wallet.approve(caller, proposalId));
  }

  revoke(caller: ParticipantId, proposalId: number): Proposal {
    return this.mutate(() => this.wallet.revoke(caller, proposalId));
  }

  execute(caller: ParticipantId, proposalId: number): ExecutionResult {
    return this.mutate(() => this.wallet.execute(caller, proposalId));
  }

  // ─── Deposits ───────────────────────────────────────────────────────

  deposit(from: ParticipantId, amount: string): DepositReceipt {
    return this.mutate(() => this.wallet.deposit(from, this.money(amount)));
  }

  // ─── Queries ────────────────────────────────────────────────────────

  summary(): WalletSummary {
    return {
      walletId: this.wallet.walletId,
      asset: this.wallet.asset,
      participants: this.wallet.participants,
      threshold: this.wallet.threshold,
      balance: this.wallet.balance,
      proposalCount: this.wallet.proposalCount,
    };
  }

  getProposal(proposalId: number): ProposalView | undefined {
    const proposal = this.wallet.getProposal(proposalId);
    if (proposal === undefined) {
      return undefined;
    }
    return { proposal, approvers: this.wallet.approversOf(proposalId) };
  }

  listProposals(filter?: ProposalFilter): readonly Proposal[] {
    return this.wallet.listProposals(filter);
  }

  /** Notifications from `afterPosition` (exclusive) onward. */
  events(afterPosition = 0): readonly StoredEvent[] {
    return this.eventStore.readAll({ fromPosition: afterPosition + 1 });
  }

  payouts(): readonly Payout[] {
    return this.rail.payouts;
  }

  readiness(): Readiness {
    const integrity = this.eventStore.verifyIntegrity();
    const violations = checkInvariants(this.wallet.snapshot());
    const snapshot: SnapshotStatus = {
      current: this.saveError === undefined,
      version: this.snapshotVersion,
      ...(this.saveError !== undefined ? { error: this.saveError } : {}),
    };
    return {
      ready: integrity.valid && violations.length === 0 && snapshot.current,
      integrity,
      violations,
      snapshot,
    };
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private money(amount: string): Money {
    return { amount, currency: this.wallet.asset.currency, decimals: this.wallet.asset.decimals };
  }

  private mutate<T>(operation: () => T): T {
    const result = operation();
    this.persist();
    return result;
  }

  /**
   * Save the current state. A failure is logged and kept for readiness;
   * the next mutation saves the full state again.
   */
  private persist(): void {
    const version = this.snapshotVersion + 1;
    try {
      this.snapshotStore.save({
        streamId: this.wallet.streamId,
        version,
        state: this.wallet.snapshot(),
      });
    } catch (err) {
      this.saveError = err instanceof Error ? err.message : String(err);
      this.logger?.error({ err, walletId: this.wallet.walletId, version }, "Snapshot save failed");
      return;
    }
    if (this.saveError !== undefined) {
      this.logger?.info({ walletId: this.wallet.walletId, version }, "Snapshot save recovered");
      this.saveError = undefined;
    }
    this.snapshotVersion = version;
  }
}

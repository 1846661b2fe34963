/**
 * MultisigWallet — top-level coordinator for one threshold-governed wallet.
 *
 * Composes:
 * - MembershipRegistry: participants and threshold
 * - ProposalStore: the append-only proposal list
 * - ApprovalLedger: who currently approves what
 * - ExecutionEngine: threshold check and action dispatch
 * - DepositGateway: inbound value
 *
 * Every public mutation runs in an atomic scope. A failure restores the
 * state captured when the scope opened and discards the notifications
 * buffered since then. Scopes nest when the transfer rail calls back into
 * the wallet; notifications reach the event store only when the
 * outermost scope succeeds, appended at the stream version seen when that
 * scope opened. A conflicting append fails the call and rolls it back;
 * any other publishing error propagates after the state has committed.
 */

import { randomUUID } from "node:crypto";
import { EventStoreError, InMemoryEventStore } from "@concord/event-store";
import type { EventStore } from "@concord/event-store";
import { isPositive } from "@concord/ledger";
import { isAsset } from "@concord/types";
import type { Asset, DomainEvent, Money } from "@concord/types";
import { ApprovalLedger } from "./approval-ledger.js";
import { CustodyAccount, toWalletAmount } from "./custody.js";
import { DepositGateway } from "./deposit-gateway.js";
import type { EmitContext } from "./emitter.js";
import { proposalCorrelationId } from "./emitter.js";
import { MultisigError } from "./errors.js";
import type {
  ApprovalGrantedPayload,
  ApprovalRevokedPayload,
  MultisigEventType,
  ProposalCreatedPayload,
} from "./events.js";
import { MULTISIG_EVENTS, walletStreamId } from "./events.js";
import { ExecutionEngine } from "./execution-engine.js";
import { checkInvariants } from "./invariants.js";
import type { MembershipCheckpoint } from "./membership.js";
import { assertIdentity, MembershipRegistry } from "./membership.js";
import { ProposalStore } from "./proposal-store.js";
import type {
  ApprovalEntry,
  DepositReceipt,
  ExecutionResult,
  ParticipantId,
  Proposal,
  ProposalAction,
  ProposalFilter,
  WalletConfig,
  WalletSnapshot,
} from "./types.js";
import { RecordingValueTransfer } from "./value-transfer.js";
import type { ValueTransfer } from "./value-transfer.js";

export interface WalletDeps {
  /** Outbound rail. Default: RecordingValueTransfer */
  readonly transfer?: ValueTransfer;
  /** Receives committed notifications. Default: InMemoryEventStore */
  readonly eventStore?: EventStore;
  /** ISO timestamp source */
  readonly now?: () => string;
}

interface Checkpoint {
  readonly membership: MembershipCheckpoint;
  readonly proposals: readonly Proposal[];
  readonly approvals: readonly ApprovalEntry[];
  readonly balance: Money;
  readonly outboxLength: number;
  readonly streamVersion: number;
}

// =============================================================================
// Wallet
// =============================================================================

export class MultisigWallet {
  readonly walletId: string;
  readonly asset: Asset;
  readonly eventStore: EventStore;
  readonly transfer: ValueTransfer;

  private readonly membership: MembershipRegistry;
  private readonly proposals = new ProposalStore();
  private readonly approvals = new ApprovalLedger();
  private readonly custody: CustodyAccount;
  private readonly engine: ExecutionEngine;
  private readonly gateway: DepositGateway;
  private readonly now: () => string;

  private outbox: DomainEvent[] = [];
  private depth = 0;

  constructor(config: WalletConfig, deps: WalletDeps = {}) {
    if (config.walletId.trim() === "") {
      throw new MultisigError("INVALID_IDENTITY", "Wallet id must be non-empty");
    }
    if (!isAsset(config.asset)) {
      throw new MultisigError(
        "INVALID_AMOUNT",
        "Asset needs a currency and a non-negative integer number of decimals",
      );
    }

    this.walletId = config.walletId;
    this.asset = { currency: config.asset.currency, decimals: config.asset.decimals };
    this.membership = new MembershipRegistry(config.participants, config.threshold);
    this.custody = new CustodyAccount(this.asset);
    this.eventStore = deps.eventStore ?? new InMemoryEventStore();
    this.transfer = deps.transfer ?? new RecordingValueTransfer();
    this.now = deps.now ?? (() => new Date().toISOString());

    const emit = this.emit.bind(this);
    this.engine = new ExecutionEngine(
      {
        walletId: this.walletId,
        membership: this.membership,
        proposals: this.proposals,
        approvals: this.approvals,
        custody: this.custody,
      },
      this.transfer,
      emit,
      this.now,
    );
    this.gateway = new DepositGateway(this.custody, emit);
  }

  get streamId(): string {
    return walletStreamId(this.walletId);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Proposals
  // ───────────────────────────────────────────────────────────────────────

  proposeTransfer(caller: ParticipantId, destination: ParticipantId, amount: Money): Proposal {
    return this.propose(caller, { kind: "transfer", destination, amount });
  }

  proposeAddParticipant(caller: ParticipantId, participant: ParticipantId): Proposal {
    return this.propose(caller, { kind: "add_participant", participant });
  }

  proposeRemoveParticipant(caller: ParticipantId, participant: ParticipantId): Proposal {
    return this.propose(caller, { kind: "remove_participant", participant });
  }

  proposeChangeThreshold(caller: ParticipantId, threshold: number): Proposal {
    return this.propose(caller, { kind: "change_threshold", threshold });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Approvals
  // ───────────────────────────────────────────────────────────────────────

  /**
   * @throws MultisigError NOT_PARTICIPANT, PROPOSAL_NOT_FOUND,
   *   PROPOSAL_NOT_PENDING or ALREADY_APPROVED
   */
  approve(caller: ParticipantId, proposalId: number): Proposal {
    return this.atomically(() => {
      this.membership.requireParticipant(caller);
      this.proposals.requirePending(proposalId);
      return this.grant(caller, proposalId);
    });
  }

  /**
   * @throws MultisigError NOT_PARTICIPANT, PROPOSAL_NOT_FOUND,
   *   PROPOSAL_NOT_PENDING or NOT_APPROVED
   */
  revoke(caller: ParticipantId, proposalId: number): Proposal {
    return this.atomically(() => {
      this.membership.requireParticipant(caller);
      this.proposals.requirePending(proposalId);

      const approvalCount = this.approvals.withdraw(proposalId, caller);
      const proposal = this.proposals.setApprovalCount(proposalId, approvalCount);
      const payload: ApprovalRevokedPayload = {
        proposalId,
        participant: caller,
        approvalCount,
        cause: "revoked",
      };
      this.emit(MULTISIG_EVENTS.APPROVAL_REVOKED, payload, {
        actor: caller,
        correlationId: proposalCorrelationId(this.walletId, proposalId),
      });
      return proposal;
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Execution & Deposits
  // ───────────────────────────────────────────────────────────────────────

  execute(caller: ParticipantId, proposalId: number): ExecutionResult {
    return this.atomically(() => this.engine.execute(caller, proposalId));
  }

  deposit(from: ParticipantId, amount: Money): DepositReceipt {
    return this.atomically(() => this.gateway.deposit(from, amount));
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  get participants(): readonly ParticipantId[] {
    return this.membership.participants;
  }

  get threshold(): number {
    return this.membership.threshold;
  }

  get balance(): Money {
    return this.custody.balance;
  }

  get proposalCount(): number {
    return this.proposals.count;
  }

  isParticipant(identity: ParticipantId): boolean {
    return this.membership.has(identity);
  }

  getProposal(proposalId: number): Proposal | undefined {
    return this.proposals.get(proposalId);
  }

  listProposals(filter?: ProposalFilter): readonly Proposal[] {
    return this.proposals.list(filter);
  }

  approversOf(proposalId: number): readonly ParticipantId[] {
    this.proposals.require(proposalId);
    return this.approvals.approvers(proposalId);
  }

  hasApproved(proposalId: number, participant: ParticipantId): boolean {
    return this.approvals.hasApproved(proposalId, participant);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Snapshot
  // ───────────────────────────────────────────────────────────────────────

  snapshot(): WalletSnapshot {
    return {
      version: 1,
      walletId: this.walletId,
      asset: this.asset,
      participants: this.membership.participants,
      threshold: this.membership.threshold,
      balance: this.custody.balance,
      proposals: this.proposals.checkpoint(),
      approvals: this.approvals.entries(),
      asOf: this.now(),
    };
  }

  /**
   * Rebuild a wallet from a snapshot after verifying every invariant.
   *
   * @throws MultisigError INVALID_SNAPSHOT listing each violation
   */
  static fromSnapshot(snapshot: WalletSnapshot, deps: WalletDeps = {}): MultisigWallet {
    const violations = checkInvariants(snapshot);
    if (violations.length > 0) {
      throw new MultisigError(
        "INVALID_SNAPSHOT",
        `Snapshot of wallet '${snapshot.walletId}' violates invariants: ${violations.join("; ")}`,
      );
    }

    const wallet = new MultisigWallet(
      {
        walletId: snapshot.walletId,
        participants: snapshot.participants,
        threshold: snapshot.threshold,
        asset: snapshot.asset,
      },
      deps,
    );
    wallet.proposals.restore(snapshot.proposals);
    wallet.approvals.restore(snapshot.approvals);
    wallet.custody.restore(snapshot.balance);
    return wallet;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internal
  // ───────────────────────────────────────────────────────────────────────

  /**
   * The creation routine shared by all four propose operations.
   */
  private propose(caller: ParticipantId, action: ProposalAction): Proposal {
    return this.atomically(() => {
      this.membership.requireParticipant(caller);
      const validated = this.validateAction(action);

      const created = this.proposals.create(validated, caller, this.now());
      const payload: ProposalCreatedPayload = {
        proposalId: created.id,
        proposer: caller,
        action: validated,
      };
      this.emit(MULTISIG_EVENTS.PROPOSAL_CREATED, payload, {
        actor: caller,
        correlationId: proposalCorrelationId(this.walletId, created.id),
      });

      return this.grant(caller, created.id);
    });
  }

  private validateAction(action: ProposalAction): ProposalAction {
    switch (action.kind) {
      case "transfer": {
        assertIdentity(action.destination, "Destination");
        const amount = toWalletAmount(action.amount, this.asset);
        if (!isPositive(amount)) {
          throw new MultisigError(
            "INVALID_AMOUNT",
            `Transfer amount must be positive, got ${amount.amount}`,
          );
        }
        return { ...action, amount };
      }
      case "add_participant":
        this.membership.validateAddition(action.participant);
        return action;
      case "remove_participant":
        this.membership.validateRemoval(action.participant);
        return action;
      case "change_threshold":
        this.membership.validateThreshold(action.threshold);
        return action;
    }
  }

  private grant(caller: ParticipantId, proposalId: number): Proposal {
    const approvalCount = this.approvals.grant(proposalId, caller);
    const proposal = this.proposals.setApprovalCount(proposalId, approvalCount);
    const payload: ApprovalGrantedPayload = { proposalId, participant: caller, approvalCount };
    this.emit(MULTISIG_EVENTS.APPROVAL_GRANTED, payload, {
      actor: caller,
      correlationId: proposalCorrelationId(this.walletId, proposalId),
    });
    return proposal;
  }

  private emit(
    type: MultisigEventType,
    payload: Readonly<Record<string, unknown>>,
    context: EmitContext,
  ): string {
    const eventId = randomUUID();
    this.outbox.push({
      type,
      metadata: {
        eventId,
        timestamp: this.now(),
        actor: context.actor,
        correlationId: context.correlationId,
        ...(context.causationId !== undefined ? { causationId: context.causationId } : {}),
        source: context.source ?? "multisig",
      },
      payload,
    });
    return eventId;
  }

  private atomically<T>(operation: () => T): T {
    const checkpoint = this.checkpoint();
    this.depth += 1;
    let result: T;
    try {
      result = operation();
    } catch (err) {
      this.restore(checkpoint);
      throw err;
    } finally {
      this.depth -= 1;
    }

    if (this.depth === 0) {
      try {
        this.publish(checkpoint.streamVersion);
      } catch (err) {
        // A conflict is raised before anything is stored
        if (err instanceof EventStoreError && err.code === "CONCURRENCY_CONFLICT") {
          this.restore(checkpoint);
        }
        throw err;
      }
    }
    return result;
  }

  private checkpoint(): Checkpoint {
    return {
      membership: this.membership.checkpoint(),
      proposals: this.proposals.checkpoint(),
      approvals: this.approvals.entries(),
      balance: this.custody.balance,
      outboxLength: this.outbox.length,
      streamVersion: this.eventStore.streamVersion(this.streamId),
    };
  }

  private restore(checkpoint: Checkpoint): void {
    this.membership.restore(checkpoint.membership);
    this.proposals.restore(checkpoint.proposals);
    this.approvals.restore(checkpoint.approvals);
    this.custody.restore(checkpoint.balance);
    this.outbox.length = checkpoint.outboxLength;
  }

  private publish(expectedVersion: number): void {
    if (this.outbox.length === 0) {
      return;
    }
    const batch = this.outbox;
    this.outbox = [];
    this.eventStore.append(this.streamId, batch, { expectedVersion });
  }
}

/**
 * Membership Registry — the participant set and the approval threshold.
 *
 * Invariants, checked on construction and before every mutation:
 * - at least one participant
 * - 1 ≤ threshold ≤ participant count
 * - no duplicate or null identities
 */

import { MultisigError } from "./errors.js";
import type { ParticipantId } from "./types.js";

export interface MembershipCheckpoint {
  readonly participants: readonly ParticipantId[];
  readonly threshold: number;
}

export function isNullIdentity(identity: string): boolean {
  return identity.trim().length === 0;
}

export function assertIdentity(identity: string, label: string): void {
  if (isNullIdentity(identity)) {
    throw new MultisigError("INVALID_IDENTITY", `${label} must be a non-empty identity`);
  }
}

export class MembershipRegistry {
  private _participants: Set<ParticipantId>;
  private _threshold: number;

  constructor(participants: readonly ParticipantId[], threshold: number) {
    if (participants.length === 0) {
      throw new MultisigError("LAST_PARTICIPANT", "A wallet needs at least one participant");
    }

    const set = new Set<ParticipantId>();
    for (const participant of participants) {
      assertIdentity(participant, "Participant");
      if (set.has(participant)) {
        throw new MultisigError(
          "DUPLICATE_PARTICIPANT",
          `Participant '${participant}' is listed more than once`,
        );
      }
      set.add(participant);
    }

    this._participants = set;
    this._threshold = 0;
    this.validateThreshold(threshold);
    this._threshold = threshold;
  }

  // ─── Queries ────────────────────────────────────────────────────────

  get participants(): readonly ParticipantId[] {
    return [...this._participants];
  }

  get size(): number {
    return this._participants.size;
  }

  get threshold(): number {
    return this._threshold;
  }

  has(identity: ParticipantId): boolean {
    return this._participants.has(identity);
  }

  /**
   * @throws MultisigError NOT_PARTICIPANT
   */
  requireParticipant(caller: ParticipantId): void {
    if (!this._participants.has(caller)) {
      throw new MultisigError("NOT_PARTICIPANT", `'${caller}' is not a participant`);
    }
  }

  // ─── Validation ─────────────────────────────────────────────────────

  validateAddition(identity: ParticipantId): void {
    assertIdentity(identity, "Participant");
    if (this._participants.has(identity)) {
      throw new MultisigError(
        "DUPLICATE_PARTICIPANT",
        `'${identity}' is already a participant`,
      );
    }
  }

  validateRemoval(identity: ParticipantId): void {
    assertIdentity(identity, "Participant");
    if (!this._participants.has(identity)) {
      throw new MultisigError("UNKNOWN_PARTICIPANT", `'${identity}' is not a participant`);
    }
    const remaining = this._participants.size - 1;
    if (remaining < 1) {
      throw new MultisigError(
        "LAST_PARTICIPANT",
        `Cannot remove '${identity}': it is the last participant`,
      );
    }
    if (this._threshold > remaining) {
      throw new MultisigError(
        "REMOVAL_BREACHES_THRESHOLD",
        `Cannot remove '${identity}': threshold ${this._threshold} would exceed ${remaining} remaining participants`,
      );
    }
  }

  validateThreshold(threshold: number): void {
    if (!Number.isInteger(threshold) || threshold < 1 || threshold > this._participants.size) {
      throw new MultisigError(
        "INVALID_THRESHOLD",
        `Threshold must be an integer between 1 and ${this._participants.size}, got ${threshold}`,
      );
    }
  }

  // ─── Mutations ──────────────────────────────────────────────────────

  add(identity: ParticipantId): void {
    this.validateAddition(identity);
    this._participants.add(identity);
  }

  remove(identity: ParticipantId): void {
    this.validateRemoval(identity);
    this._participants.delete(identity);
  }

  /**
   * Overwrite the threshold and return the previous one.
   */
  changeThreshold(threshold: number): number {
    this.validateThreshold(threshold);
    const previous = this._threshold;
    this._threshold = threshold;
    return previous;
  }

  // ─── Checkpoint ─────────────────────────────────────────────────────

  checkpoint(): MembershipCheckpoint {
    return { participants: [...this._participants], threshold: this._threshold };
  }

  restore(checkpoint: MembershipCheckpoint): void {
    this._participants = new Set(checkpoint.participants);
    this._threshold = checkpoint.threshold;
  }
}

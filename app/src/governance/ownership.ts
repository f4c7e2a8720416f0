/**
 * Two-step ownership transfer
 *
 * Ownership moves only when the proposed candidate accepts. The transitions are
 * pure functions over OwnershipState; TwoStepOwnership holds the current state.
 */

import { AccountId, UnauthorizedError } from '../types';

export type OwnershipState =
  | { status: 'NoPendingTransfer'; owner: AccountId }
  | { status: 'PendingTransfer'; owner: AccountId; candidate: AccountId };

export function proposeTransfer(state: OwnershipState, caller: AccountId, candidate: AccountId): OwnershipState {
  if (caller !== state.owner) {
    throw new UnauthorizedError(caller, 'transfer ownership');
  }
  return { status: 'PendingTransfer', owner: state.owner, candidate };
}

export function acceptTransfer(state: OwnershipState, caller: AccountId): OwnershipState {
  if (state.status !== 'PendingTransfer' || state.candidate !== caller) {
    throw new UnauthorizedError(caller, 'accept ownership');
  }
  return { status: 'NoPendingTransfer', owner: caller };
}

export function cancelTransfer(state: OwnershipState, caller: AccountId): OwnershipState {
  if (caller !== state.owner) {
    throw new UnauthorizedError(caller, 'cancel ownership transfer');
  }
  return { status: 'NoPendingTransfer', owner: state.owner };
}

export class TwoStepOwnership {
  private state: OwnershipState;

  constructor(owner: AccountId) {
    this.state = { status: 'NoPendingTransfer', owner };
  }

  owner(): AccountId {
    return this.state.owner;
  }

  pendingOwner(): AccountId | null {
    return this.state.status === 'PendingTransfer' ? this.state.candidate : null;
  }

  current(): OwnershipState {
    return this.state;
  }

  /**
   * Throws Unauthorized unless caller is the current owner
   */
  requireOwner(caller: AccountId, action: string): void {
    if (caller !== this.state.owner) {
      throw new UnauthorizedError(caller, action);
    }
  }

  transferOwnership(caller: AccountId, candidate: AccountId): void {
    this.state = proposeTransfer(this.state, caller, candidate);
  }

  acceptOwnership(caller: AccountId): void {
    this.state = acceptTransfer(this.state, caller);
  }

  cancelOwnershipTransfer(caller: AccountId): void {
    this.state = cancelTransfer(this.state, caller);
  }
}

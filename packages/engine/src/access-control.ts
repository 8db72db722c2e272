/**
 * access-control.ts — Authority and evaluator roles.
 *
 * The role store is an external collaborator; the engine only talks to it through
 * {@link AccessControl}. {@link InMemoryAccessControl} is the default used when the
 * service owns its own state.
 */

import type { Operation, Role } from '@tenderflow/shared';
import { alreadyExists, invalidInput, notFound, unauthorized } from './errors.js';

export interface AccessControl {
  currentAuthority(): string;
  transferAuthority(caller: string, newAuthority: string): void;
  isEvaluator(identity: string): boolean;
  addEvaluator(caller: string, identity: string): void;
  removeEvaluator(caller: string, identity: string): void;
  listEvaluators(): string[];
}

export const REQUIRED_ROLE: Readonly<Record<Operation, Role>> = {
  createTender: 'authority',
  closeOfferPeriod: 'authority',
  markAsEvaluated: 'authority',
  calculateWinner: 'authority',
  submitOffer: 'any',
  evaluateOffer: 'evaluator',
  addEvaluator: 'authority',
  removeEvaluator: 'authority',
  transferAuthority: 'authority',
};

/** Throws UNAUTHORIZED unless `caller` holds the role `operation` requires. */
export function authorize(access: AccessControl, caller: string, operation: Operation): void {
  const role = REQUIRED_ROLE[operation];
  if (caller.trim().length === 0) {
    throw unauthorized(`${operation} requires an identified caller`, { operation });
  }
  if (role === 'authority' && caller !== access.currentAuthority()) {
    throw unauthorized(`${operation} is restricted to the authority`, { operation, caller });
  }
  if (role === 'evaluator' && !access.isEvaluator(caller)) {
    throw unauthorized(`${operation} is restricted to evaluators`, { operation, caller });
  }
}

/** Identities are compared exactly as given; only blank ones are refused. */
function requireIdentity(identity: string, field: string): string {
  if (identity.trim().length === 0) {
    throw invalidInput(`${field} must be a non-empty identity`, { field });
  }
  return identity;
}

export class InMemoryAccessControl implements AccessControl {
  private authority: string;
  private readonly evaluators = new Set<string>();

  constructor(authority: string, evaluators: Iterable<string> = []) {
    this.authority = requireIdentity(authority, 'authority');
    for (const evaluator of evaluators) {
      this.evaluators.add(requireIdentity(evaluator, 'evaluator'));
    }
  }

  currentAuthority(): string {
    return this.authority;
  }

  transferAuthority(caller: string, newAuthority: string): void {
    authorize(this, caller, 'transferAuthority');
    this.authority = requireIdentity(newAuthority, 'newAuthority');
  }

  isEvaluator(identity: string): boolean {
    return this.evaluators.has(identity);
  }

  addEvaluator(caller: string, identity: string): void {
    authorize(this, caller, 'addEvaluator');
    const evaluator = requireIdentity(identity, 'evaluator');
    if (this.evaluators.has(evaluator)) {
      throw alreadyExists('identity is already an evaluator', { evaluator });
    }
    this.evaluators.add(evaluator);
  }

  removeEvaluator(caller: string, identity: string): void {
    authorize(this, caller, 'removeEvaluator');
    if (!this.evaluators.has(identity)) {
      throw notFound('identity is not an evaluator', { evaluator: identity });
    }
    this.evaluators.delete(identity);
  }

  listEvaluators(): string[] {
    return [...this.evaluators];
  }
}

import { notFoundError } from '../errors.js';
import type { Identity } from '../types.js';

export type OwnershipAction = 'read' | 'write';

export interface OwnedResource {
  userId: string;
}

export type OwnershipPolicy = (
  identity: Identity,
  resource: OwnedResource,
  action: OwnershipAction,
) => boolean;

/** Only the owner may read or write. This is the policy every expense route uses. */
export const ownerOnly: OwnershipPolicy = (identity, resource) =>
  resource.userId === identity.userId;

/** Anyone authenticated may read; only the owner may write. Not wired into any route. */
export const ownerOrReadOnly: OwnershipPolicy = (identity, resource, action) =>
  action === 'read' || resource.userId === identity.userId;

/**
 * Returns the resource when the policy allows the action, otherwise reports it as
 * missing so callers cannot tell someone else's record from an absent one.
 */
export const authorizeOwned = <T extends OwnedResource>(
  policy: OwnershipPolicy,
  identity: Identity,
  resource: T | null,
  action: OwnershipAction,
  resourceName = 'Expense',
): T => {
  if (!resource || !policy(identity, resource, action)) {
    throw notFoundError(resourceName);
  }
  return resource;
};

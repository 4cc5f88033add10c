/**
 * Call identities are ordered paths of small integers describing where a hook
 * call sits in the nested call structure of a render. Maps key them by their
 * dotted form.
 */

export type CallIdentity = readonly number[];

/**
 * Dotted form of a CallIdentity, used as a map key. The root path is `""`.
 */
export type IdentityKey = string;

export const ROOT_KEY: IdentityKey = "";

export function identityKey(identity: CallIdentity): IdentityKey {
  return identity.join(".");
}

/**
 * Human-readable form for logs and error messages.
 */
export function formatIdentity(identity: CallIdentity | IdentityKey): string {
  const key = typeof identity === "string" ? identity : identityKey(identity);
  return key === ROOT_KEY ? "<root>" : key;
}

/**
 * True when `ancestor` is a strict prefix of `key`.
 */
export function isAncestorKey(ancestor: IdentityKey, key: IdentityKey): boolean {
  if (ancestor === key) return false;
  if (ancestor === ROOT_KEY) return true;
  return key.startsWith(`${ancestor}.`);
}

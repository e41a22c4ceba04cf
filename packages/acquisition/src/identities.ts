/**
 * Client Identities
 * 
 * The player clients the extractor can impersonate. Only some of them send
 * cookies upstream; the others are the credential-less fallbacks.
 */

export interface ClientIdentity {
  readonly id: string;
  readonly acceptsCredentials: boolean;
}

export const CLIENT_IDENTITIES: readonly ClientIdentity[] = [
  { id: 'web', acceptsCredentials: true },
  { id: 'mweb', acceptsCredentials: true },
  { id: 'tv', acceptsCredentials: true },
  { id: 'web_safari', acceptsCredentials: true },
  { id: 'ios', acceptsCredentials: false },
  { id: 'android', acceptsCredentials: false },
];

export function findIdentity(id: string): ClientIdentity | undefined {
  return CLIENT_IDENTITIES.find((identity) => identity.id === id);
}

/**
 * Resolve configured identity ids, keeping their order
 * 
 * @throws Error for ids that are not in the catalogue
 */
export function resolveIdentities(ids: readonly string[]): ClientIdentity[] {
  if (ids.length === 0) {
    return [...CLIENT_IDENTITIES];
  }
  return ids.map((id) => {
    const identity = findIdentity(id);
    if (!identity) {
      throw new Error(`Unknown client identity: ${id}`);
    }
    return identity;
  });
}

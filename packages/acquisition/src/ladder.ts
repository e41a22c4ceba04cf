/**
 * Egress Strategy Selector
 * 
 * Builds the bounded ladder of (route, client identity, credential) attempts a
 * job walks through. Routes that honour the tenant's credential come first,
 * then every route again without it. The ladder is fixed once built, except
 * that an identity block may insert one alternate-identity rung for the same
 * route right after the failing one.
 */

import { randomBytes } from 'node:crypto';
import { directRoute, withSession, describeRoute, type RouteDescriptor } from './routes.js';
import { CLIENT_IDENTITIES, type ClientIdentity } from './identities.js';

export const DEFAULT_MAX_RUNGS = 6;

export interface Rung {
  readonly route: RouteDescriptor;
  readonly identity: ClientIdentity;
  readonly useCredential: boolean;
}

export type SessionTagFactory = () => string;

export interface StrategySelectorOptions {
  /** Ordered routes; an empty list means direct only */
  routes?: readonly RouteDescriptor[];
  /** Ordered identities; defaults to the whole catalogue */
  identities?: readonly ClientIdentity[];
  maxRungs?: number;
  sessionTag?: SessionTagFactory;
}

const randomSessionTag: SessionTagFactory = () => randomBytes(4).toString('hex');

/**
 * Fresh session for proxy routes; direct routes have none
 */
function freshSession(route: RouteDescriptor, sessionTag: SessionTagFactory): RouteDescriptor {
  return route.scheme === 'direct' ? route : withSession(route, sessionTag());
}

export function describeRung(rung: Rung): string {
  return `${describeRoute(rung.route)} as ${rung.identity.id}${rung.useCredential ? ' with credential' : ''}`;
}

export class Ladder {
  private readonly rungs: Rung[];
  private readonly maxRungs: number;
  private readonly identities: readonly ClientIdentity[];
  private readonly sessionTag: SessionTagFactory;

  constructor(
    rungs: readonly Rung[],
    maxRungs: number,
    identities: readonly ClientIdentity[],
    sessionTag: SessionTagFactory
  ) {
    this.rungs = rungs.slice(0, maxRungs);
    this.maxRungs = maxRungs;
    this.identities = identities;
    this.sessionTag = sessionTag;
  }

  get length(): number {
    return this.rungs.length;
  }

  at(index: number): Rung | undefined {
    return this.rungs[index];
  }

  toArray(): readonly Rung[] {
    return [...this.rungs];
  }

  /**
   * The rung at `index` was refused because of its client identity. Insert the
   * same route under the next identity not yet tried on it, directly after
   * `index`. When the ladder is full its last rung makes room; when the failing
   * rung is itself the last slot nothing is inserted.
   * 
   * @returns the inserted rung, or null when there is no alternate or no room
   */
  rewriteForIdentityBlock(index: number): Rung | null {
    const failed = this.rungs[index];
    if (!failed) {
      return null;
    }
    if (index + 1 >= this.maxRungs) {
      return null;
    }

    const tried = new Set(
      this.rungs
        .slice(0, index + 1)
        .filter((rung) => rung.route.label === failed.route.label)
        .map((rung) => rung.identity.id)
    );
    const untried = this.identities.filter((identity) => !tried.has(identity.id));
    const alternate = failed.useCredential
      ? untried.find((identity) => identity.acceptsCredentials) ?? untried[0]
      : untried[0];
    if (!alternate) {
      return null;
    }

    const rung: Rung = {
      route: freshSession(failed.route, this.sessionTag),
      identity: alternate,
      useCredential: failed.useCredential && alternate.acceptsCredentials,
    };

    if (this.rungs.length >= this.maxRungs) {
      this.rungs.pop();
    }
    this.rungs.splice(index + 1, 0, rung);
    return rung;
  }
}

export class StrategySelector {
  private readonly routes: readonly RouteDescriptor[];
  private readonly identities: readonly ClientIdentity[];
  private readonly maxRungs: number;
  private readonly sessionTag: SessionTagFactory;

  constructor(options: StrategySelectorOptions = {}) {
    this.routes = options.routes && options.routes.length > 0 ? options.routes : [directRoute];
    this.identities = options.identities && options.identities.length > 0
      ? options.identities
      : CLIENT_IDENTITIES;
    this.maxRungs = Math.max(1, options.maxRungs ?? DEFAULT_MAX_RUNGS);
    this.sessionTag = options.sessionTag ?? randomSessionTag;
  }

  /**
   * Ladder for one job
   */
  buildLadder(hasCredential: boolean): Ladder {
    const rungs: Rung[] = [];
    const credentialIdentity = this.identities.find((identity) => identity.acceptsCredentials);
    const fallbackIdentity = this.identities.find((identity) => !identity.acceptsCredentials)
      ?? this.identities[0]
      ?? CLIENT_IDENTITIES[0];

    if (hasCredential && credentialIdentity) {
      for (const route of this.routes.filter((candidate) => candidate.supportsCredentials)) {
        rungs.push({ route: this.tag(route), identity: credentialIdentity, useCredential: true });
      }
    }

    if (fallbackIdentity) {
      for (const route of this.routes) {
        rungs.push({ route: this.tag(route), identity: fallbackIdentity, useCredential: false });
      }
    }

    return new Ladder(rungs, this.maxRungs, this.identities, this.sessionTag);
  }

  private tag(route: RouteDescriptor): RouteDescriptor {
    return freshSession(route, this.sessionTag);
  }
}

import type { RefreshedTokens } from '../types/idp.js';
import type { SessionRecord } from '../types/session.js';
import { createConsoleLogger, type Logger } from '../utils/logger.js';
import { EXPIRY_SKEW_SECONDS } from './config.js';

/**
 * Current wall-clock time in seconds since epoch (fractional).
 */
export function nowInSeconds(): number {
  return Date.now() / 1000;
}

/**
 * Fields a session is built from. `groups` may be any iterable of group ids.
 */
export type SessionData = Omit<SessionRecord, 'groups'> & { groups: Iterable<string> };

/**
 * An authenticated directory identity: its tokens, their expiry and the groups
 * resolved with them.
 *
 * Instances are snapshots. A refresh produces a new Session rather than
 * mutating one a caller may still hold.
 */
export class Session {
  readonly identity: string;
  readonly accessToken: string;
  readonly refreshToken: string;
  /** Access token expiry in seconds since epoch */
  readonly expiresAt: number;
  readonly tokenType: string;
  readonly resource: string;
  readonly scope: string;

  private readonly groupSet: ReadonlySet<string>;
  private readonly logger: Logger;

  constructor(data: SessionData, logger: Logger = createConsoleLogger()) {
    if (data.identity.length === 0) {
      throw new Error('Session identity must not be empty');
    }
    this.identity = data.identity;
    this.accessToken = data.accessToken;
    this.refreshToken = data.refreshToken;
    this.expiresAt = data.expiresAt;
    this.tokenType = data.tokenType;
    this.resource = data.resource;
    this.scope = data.scope;
    this.groupSet = new Set(data.groups);
    this.logger = logger;
  }

  /**
   * Rebuild a session from its stored record.
   */
  static fromRecord(record: SessionRecord, logger?: Logger): Session {
    return new Session(record, logger);
  }

  /** Group ids as of the last successful resolution */
  get groups(): ReadonlySet<string> {
    return this.groupSet;
  }

  /**
   * Whether the access token must no longer be used.
   * True from {@link EXPIRY_SKEW_SECONDS} before `expiresAt` onwards.
   */
  isExpired(now: number = nowInSeconds()): boolean {
    return now >= this.expiresAt - EXPIRY_SKEW_SECONDS;
  }

  /**
   * Seconds until `expiresAt`; negative once it has passed.
   */
  expiresIn(now: number = nowInSeconds()): number {
    return this.expiresAt - now;
  }

  /**
   * Group membership check used for authorization decisions.
   * A miss is logged as a denial.
   */
  hasGroup(group: string): boolean {
    if (this.groupSet.has(group)) {
      return true;
    }
    this.logger.warn('Session not in group', { identity: this.identity, group });
    return false;
  }

  /**
   * A copy of this session carrying refreshed tokens and the groups resolved with them.
   * Token type, resource and scope are kept.
   */
  withRefresh(tokens: RefreshedTokens, groups: Iterable<string>): Session {
    return new Session(
      {
        ...this.toRecord(),
        accessToken: tokens.accessToken,
        refreshToken: tokens.refreshToken,
        expiresAt: tokens.expiresAt,
        groups,
      },
      this.logger
    );
  }

  toRecord(): SessionRecord {
    return {
      identity: this.identity,
      accessToken: this.accessToken,
      refreshToken: this.refreshToken,
      expiresAt: this.expiresAt,
      tokenType: this.tokenType,
      resource: this.resource,
      scope: this.scope,
      groups: [...this.groupSet],
    };
  }
}

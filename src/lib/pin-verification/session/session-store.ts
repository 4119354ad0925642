import { getLogger } from '../../logger.js';
import { DEFAULT_PIN_VERIFICATION_CONFIG } from '../constants.js';
import { generatePin } from '../pin/index.js';
import {
  type PinSession,
  type PinVerificationConfig,
  type SessionStoreStats,
  VerificationStatus,
} from '../types.js';

const log = getLogger('PinSessionStore');

export interface PinSessionStoreOptions {
  /**
   * `attemptLimit` here is the lockout extension point: unset by default,
   * in which case BLOCKED is never reported and attempts are only counted.
   */
  config?: Partial<PinVerificationConfig>;
  /** Overrides PIN generation, e.g. to pin a known code in tests */
  generatePin?: () => string;
  /** Clock used for `createdAt` and session ids */
  now?: () => number;
}

/**
 * Owns the active PIN sessions, indexed by session id, by responder id (one
 * session each) and by initiator id (any number of sessions, one per
 * responder).
 *
 * Every method is synchronous and performs no I/O, so each call completes
 * before any other store call can run. Callers only ever receive copies of
 * the stored sessions.
 */
export class PinSessionStore {
  private readonly sessions = new Map<string, PinSession>();
  private readonly responderToSession = new Map<string, string>();
  private readonly initiatorToSessions = new Map<string, Set<string>>();
  private readonly config: PinVerificationConfig;
  private readonly pinSource: () => string;
  private readonly now: () => number;

  constructor(options: PinSessionStoreOptions = {}) {
    this.config = { ...DEFAULT_PIN_VERIFICATION_CONFIG, ...options.config };
    this.pinSource =
      options.generatePin ??
      (() => generatePin(this.config.pinLength, this.config.pinAlphabet));
    this.now = options.now ?? Date.now;
  }

  /**
   * Starts a pairing between two peers. A live session already held by the
   * same responder is removed first, so the responder index always points at
   * the live session and nothing is left orphaned. Sessions of the same
   * initiator with other responders are left alone.
   */
  createSession(
    connectionAddress: string,
    initiatorPeerId: string,
    responderPeerId: string,
  ): Readonly<PinSession> {
    const pin = this.pinSource();
    const createdAt = this.now();

    const superseded = this.responderToSession.get(responderPeerId);
    if (superseded !== undefined) {
      log.debug(`Superseding session ${superseded} of ${responderPeerId}`);
      this.removeSession(superseded);
    }

    const session: PinSession = {
      pin,
      sessionId: this.nextSessionId(connectionAddress, createdAt),
      initiatorPeerId,
      responderPeerId,
      connectionAddress,
      createdAt,
      verified: false,
      attemptCount: 0,
    };

    this.sessions.set(session.sessionId, session);
    this.responderToSession.set(responderPeerId, session.sessionId);
    const initiated =
      this.initiatorToSessions.get(initiatorPeerId) ?? new Set<string>();
    initiated.add(session.sessionId);
    this.initiatorToSessions.set(initiatorPeerId, initiated);

    log.debug(
      `Created PIN session ${session.sessionId} for initiator=${initiatorPeerId}, responder=${responderPeerId}`,
    );
    return { ...session };
  }

  /**
   * Case-insensitive PIN check, one character at a time.
   * Unknown sessions return false untouched.
   */
  validatePin(sessionId: string, enteredPin: string): boolean {
    const session = this.sessions.get(sessionId);
    if (!session) {
      log.warn(`Validation attempted for unknown session ${sessionId}`);
      return false;
    }

    const blocked = this.isBlocked(session);
    session.attemptCount++;

    if (blocked) {
      log.warn(
        `Session ${sessionId} is blocked after ${session.attemptCount} attempts`,
      );
      return false;
    }

    const isValid = pinsMatch(session.pin, enteredPin);
    if (isValid) {
      session.verified = true;
      log.debug(`PIN verified for session ${sessionId}`);
    } else {
      log.debug(
        `Invalid PIN attempt ${session.attemptCount} for session ${sessionId}`,
      );
    }
    return isValid;
  }

  /**
   * A peer's responder session takes precedence. For an initiator with
   * several responders, the most recently created session is reported.
   */
  getStatus(peerId: string): VerificationStatus {
    const session = this.lookupPeer(peerId);
    if (!session) {
      return VerificationStatus.NOT_REQUIRED;
    }
    if (session.verified) {
      return VerificationStatus.VERIFIED;
    }
    if (this.isBlocked(session)) {
      return VerificationStatus.BLOCKED;
    }
    return session.initiatorPeerId === peerId
      ? VerificationStatus.PENDING_INITIATOR
      : VerificationStatus.PENDING_RESPONDER;
  }

  /** Marks a session verified without comparing a PIN. Idempotent. */
  markVerified(sessionId: string): void {
    const session = this.sessions.get(sessionId);
    if (!session) {
      return;
    }
    if (!session.verified) {
      session.verified = true;
      log.debug(`Marked session ${sessionId} as verified`);
    }
  }

  getSession(sessionId: string): Readonly<PinSession> | null {
    const session = this.sessions.get(sessionId);
    return session ? { ...session } : null;
  }

  getSessionForPeer(peerId: string): Readonly<PinSession> | null {
    const session = this.lookupPeer(peerId);
    return session ? { ...session } : null;
  }

  isVerified(peerId: string): boolean {
    return this.lookupPeer(peerId)?.verified ?? false;
  }

  /** True while the peer has a session that has not been verified */
  requiresVerification(peerId: string): boolean {
    const session = this.lookupPeer(peerId);
    return session !== undefined && !session.verified;
  }

  /** @returns the number of sessions removed (0 or 1) */
  removeSession(sessionId: string): number {
    const session = this.sessions.get(sessionId);
    if (!session) {
      return 0;
    }

    this.sessions.delete(sessionId);
    if (this.responderToSession.get(session.responderPeerId) === sessionId) {
      this.responderToSession.delete(session.responderPeerId);
    }
    const initiated = this.initiatorToSessions.get(session.initiatorPeerId);
    initiated?.delete(sessionId);
    if (initiated?.size === 0) {
      this.initiatorToSessions.delete(session.initiatorPeerId);
    }

    log.debug(`Removed PIN session ${sessionId}`);
    return 1;
  }

  /** Removes every session in which the peer takes part, in either role */
  removeSessionsForPeer(peerId: string): number {
    return this.removeWhere(
      (session) =>
        session.initiatorPeerId === peerId ||
        session.responderPeerId === peerId,
      `peer ${peerId}`,
    );
  }

  removeSessionsForConnection(connectionAddress: string): number {
    return this.removeWhere(
      (session) => session.connectionAddress === connectionAddress,
      `connection ${connectionAddress}`,
    );
  }

  /** Intended for process reset and tests */
  clearAll(): void {
    this.sessions.clear();
    this.responderToSession.clear();
    this.initiatorToSessions.clear();
    log.debug('Cleared all PIN sessions');
  }

  getStats(): SessionStoreStats {
    return {
      activeSessions: this.sessions.size,
      peerMappings:
        this.responderToSession.size + this.initiatorToSessions.size,
    };
  }

  private lookupPeer(peerId: string): PinSession | undefined {
    const responderSessionId = this.responderToSession.get(peerId);
    if (responderSessionId !== undefined) {
      return this.sessions.get(responderSessionId);
    }

    const initiated = this.initiatorToSessions.get(peerId);
    if (!initiated) {
      return undefined;
    }
    // sets keep insertion order, so the last entry is the newest session
    const newest = [...initiated].pop();
    return newest === undefined ? undefined : this.sessions.get(newest);
  }

  private removeWhere(
    predicate: (session: PinSession) => boolean,
    description: string,
  ): number {
    const matching = [...this.sessions.values()]
      .filter(predicate)
      .map((session) => session.sessionId);

    for (const sessionId of matching) {
      this.removeSession(sessionId);
    }
    if (matching.length > 0) {
      log.debug(`Removed ${matching.length} session(s) for ${description}`);
    }
    return matching.length;
  }

  private nextSessionId(connectionAddress: string, createdAt: number): string {
    const base = `${connectionAddress}_${createdAt}`;
    let sessionId = base;
    for (let n = 1; this.sessions.has(sessionId); n++) {
      sessionId = `${base}_${n}`;
    }
    return sessionId;
  }

  private isBlocked(session: PinSession): boolean {
    const { attemptLimit } = this.config;
    return (
      !session.verified &&
      attemptLimit !== undefined &&
      session.attemptCount >= attemptLimit
    );
  }
}

/** Same length and each pair of characters equal ignoring case */
function pinsMatch(pin: string, enteredPin: string): boolean {
  if (pin.length !== enteredPin.length) {
    return false;
  }
  for (let i = 0; i < pin.length; i++) {
    const expected = pin[i];
    const actual = enteredPin[i];
    if (
      expected !== actual &&
      expected.toUpperCase() !== actual.toUpperCase() &&
      expected.toLowerCase() !== actual.toLowerCase()
    ) {
      return false;
    }
  }
  return true;
}

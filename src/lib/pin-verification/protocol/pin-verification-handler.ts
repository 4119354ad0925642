import { EventEmitter } from 'node:events';

import { getLogger } from '../../logger.js';
import {
  PinVerificationMessageType,
  RESULT_ERROR_MESSAGES,
} from '../constants.js';
import { PinVerificationError } from '../errors.js';
import {
  type PinVerificationRequest,
  type PinVerificationResponse,
  type PinVerificationResult,
  decodePinVerificationRequest,
  decodePinVerificationResponse,
  decodePinVerificationResult,
  encodePinVerificationRequest,
  encodePinVerificationResponse,
  encodePinVerificationResult,
} from '../messages/index.js';
import { normalizePinInput } from '../pin/index.js';
import type { PinSessionStore } from '../session/index.js';
import { resolveUIState } from '../status/index.js';
import {
  type PinSession,
  type PinVerificationUIState,
  VerificationStatus,
} from '../types.js';
import { PinVerificationEvent, type PinVerificationTransport } from './types.js';

const log = getLogger('PinVerificationHandler');

interface IncomingVerification {
  request: PinVerificationRequest;
  verified: boolean;
}

/**
 * Runs the request/response/result handshake for the local peer on top of a
 * session store and a transport collaborator.
 *
 * As initiator it owns sessions in the store. As responder it keeps the
 * request it received from each initiator until a result arrives.
 */
export class PinVerificationHandler extends EventEmitter {
  private readonly incoming = new Map<string, IncomingVerification>();
  private readonly lastErrors = new Map<string, string>();

  constructor(
    private readonly localPeerId: string,
    private readonly store: PinSessionStore,
    private readonly transport: PinVerificationTransport,
  ) {
    super();
  }

  /**
   * Opens a session with the local peer as initiator and sends the request.
   * The returned session carries the PIN to display.
   */
  async startVerification(
    connectionAddress: string,
    remotePeerId: string,
  ): Promise<Readonly<PinSession>> {
    const session = this.store.createSession(
      connectionAddress,
      this.localPeerId,
      remotePeerId,
    );
    this.lastErrors.delete(remotePeerId);

    try {
      const payload = encodePinVerificationRequest({
        sessionId: session.sessionId,
        initiatorPeerId: this.localPeerId,
        timestamp: session.createdAt,
      });
      await this.transport.send(
        remotePeerId,
        PinVerificationMessageType.REQUEST,
        payload,
      );
    } catch (error) {
      log.error(
        `Failed to send verification request to ${remotePeerId}:`,
        error,
      );
      this.store.removeSession(session.sessionId);
      throw error;
    }

    log.info(`Started PIN verification with ${remotePeerId}`);
    return session;
  }

  /**
   * Sends the PIN typed by the local user back to the initiator.
   * @throws PinVerificationError if no request from that peer is pending
   */
  async submitPin(initiatorPeerId: string, enteredPin: string): Promise<void> {
    const pending = this.incoming.get(initiatorPeerId);
    if (!pending) {
      throw new PinVerificationError(
        `No verification request pending from ${initiatorPeerId}`,
      );
    }

    const payload = encodePinVerificationResponse({
      sessionId: pending.request.sessionId,
      enteredPin: normalizePinInput(enteredPin),
      responderPeerId: this.localPeerId,
    });
    await this.transport.send(
      initiatorPeerId,
      PinVerificationMessageType.RESPONSE,
      payload,
    );
    log.debug(`Submitted PIN for session ${pending.request.sessionId}`);
  }

  /** Entry point for payloads delivered by the transport */
  async handleMessage(
    fromPeerId: string,
    type: number,
    payload: Uint8Array,
  ): Promise<void> {
    switch (type) {
      case PinVerificationMessageType.REQUEST:
        this.handleRequest(fromPeerId, payload);
        return;
      case PinVerificationMessageType.RESPONSE:
        await this.handleResponse(fromPeerId, payload);
        return;
      case PinVerificationMessageType.RESULT:
        this.handleResult(fromPeerId, payload);
        return;
      default:
        log.warn(
          `Dropping message of unknown type 0x${type.toString(16)} from ${fromPeerId}`,
        );
    }
  }

  getStatus(peerId: string): VerificationStatus {
    const status = this.store.getStatus(peerId);
    if (status !== VerificationStatus.NOT_REQUIRED) {
      return status;
    }

    const pending = this.incoming.get(peerId);
    if (!pending) {
      return VerificationStatus.NOT_REQUIRED;
    }
    return pending.verified
      ? VerificationStatus.VERIFIED
      : VerificationStatus.PENDING_RESPONDER;
  }

  getUIState(peerId: string): PinVerificationUIState {
    const errorMessage = this.lastErrors.get(peerId);
    const pending = this.incoming.get(peerId);

    if (this.store.getSessionForPeer(peerId) || !pending) {
      return resolveUIState(this.store, peerId, errorMessage);
    }

    const state: PinVerificationUIState = {
      status: this.getStatus(peerId),
      peerId,
      sessionId: pending.request.sessionId,
    };
    if (errorMessage !== undefined) {
      state.errorMessage = errorMessage;
    }
    return state;
  }

  handlePeerDisconnected(peerId: string): void {
    this.store.removeSessionsForPeer(peerId);
    this.incoming.delete(peerId);
    this.lastErrors.delete(peerId);
  }

  /** Only the store's sessions know their connection address */
  handleConnectionClosed(connectionAddress: string): void {
    this.store.removeSessionsForConnection(connectionAddress);
  }

  private handleRequest(fromPeerId: string, payload: Uint8Array): void {
    const request = decodePinVerificationRequest(payload);
    if (!request) {
      log.warn(`Dropping malformed verification request from ${fromPeerId}`);
      return;
    }

    this.incoming.set(fromPeerId, { request, verified: false });
    this.lastErrors.delete(fromPeerId);
    log.debug(
      `Verification request ${request.sessionId} received from ${fromPeerId}`,
    );
    this.emit(PinVerificationEvent.REQUESTED, fromPeerId, request);
  }

  private async handleResponse(
    fromPeerId: string,
    payload: Uint8Array,
  ): Promise<void> {
    const response = decodePinVerificationResponse(payload);
    if (!response) {
      log.warn(`Dropping malformed verification response from ${fromPeerId}`);
      return;
    }

    const result = this.checkResponsePin(fromPeerId, response);
    if (result.success) {
      this.lastErrors.delete(fromPeerId);
      this.emit(PinVerificationEvent.VERIFIED, fromPeerId, result.sessionId);
    } else {
      const errorMessage =
        result.errorMessage ?? RESULT_ERROR_MESSAGES.INCORRECT_PIN;
      this.lastErrors.set(fromPeerId, errorMessage);
      this.emit(
        PinVerificationEvent.REJECTED,
        fromPeerId,
        result.sessionId,
        errorMessage,
      );
    }

    await this.transport.send(
      fromPeerId,
      PinVerificationMessageType.RESULT,
      encodePinVerificationResult(result),
    );
  }

  /**
   * Only the session's responder, answering under its own id, may submit a
   * PIN. Anyone else is told the session is unknown and no attempt is counted.
   */
  private checkResponsePin(
    fromPeerId: string,
    { sessionId, enteredPin, responderPeerId }: PinVerificationResponse,
  ): PinVerificationResult {
    const session = this.store.getSession(sessionId);
    if (
      !session ||
      session.responderPeerId !== fromPeerId ||
      session.responderPeerId !== responderPeerId
    ) {
      if (session) {
        log.warn(
          `Response for session ${sessionId} from ${fromPeerId} does not come from its responder`,
        );
      }
      return {
        sessionId,
        success: false,
        errorMessage: RESULT_ERROR_MESSAGES.UNKNOWN_SESSION,
      };
    }
    if (this.store.validatePin(sessionId, enteredPin)) {
      return { sessionId, success: true };
    }

    const blocked =
      this.store.getStatus(session.responderPeerId) ===
      VerificationStatus.BLOCKED;
    return {
      sessionId,
      success: false,
      errorMessage: blocked
        ? RESULT_ERROR_MESSAGES.TOO_MANY_ATTEMPTS
        : RESULT_ERROR_MESSAGES.INCORRECT_PIN,
    };
  }

  private handleResult(fromPeerId: string, payload: Uint8Array): void {
    const result = decodePinVerificationResult(payload);
    if (!result) {
      log.warn(`Dropping malformed verification result from ${fromPeerId}`);
      return;
    }

    const pending = this.incoming.get(fromPeerId);
    if (!pending || pending.request.sessionId !== result.sessionId) {
      log.warn(
        `Ignoring result for stale session ${result.sessionId} from ${fromPeerId}`,
      );
      return;
    }

    if (result.success) {
      pending.verified = true;
      this.store.markVerified(result.sessionId);
      this.lastErrors.delete(fromPeerId);
      log.info(`PIN verification with ${fromPeerId} succeeded`);
      this.emit(PinVerificationEvent.VERIFIED, fromPeerId, result.sessionId);
      return;
    }

    const errorMessage =
      result.errorMessage ?? RESULT_ERROR_MESSAGES.INCORRECT_PIN;
    this.lastErrors.set(fromPeerId, errorMessage);
    log.info(`PIN verification with ${fromPeerId} failed: ${errorMessage}`);
    this.emit(
      PinVerificationEvent.REJECTED,
      fromPeerId,
      result.sessionId,
      errorMessage,
    );
  }
}

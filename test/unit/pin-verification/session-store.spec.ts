import { expect } from 'chai';

import { PinSessionStore } from '../../../src/lib/pin-verification/session/index.js';
import { VerificationStatus } from '../../../src/lib/pin-verification/types.js';

const CREATED_AT = 1700000000000;

function createStore(options: { attemptLimit?: number } = {}) {
  return new PinSessionStore({
    generatePin: () => 'B7K2M9',
    now: () => CREATED_AT,
    config: options,
  });
}

describe('PinSessionStore', function () {
  let store: PinSessionStore;

  beforeEach(function () {
    store = createStore();
  });

  describe('createSession', function () {
    it('should create an unverified session with a generated PIN', function () {
      const session = store.createSession('AA:BB', 'peerA', 'peerB');
      expect(session).to.deep.equal({
        pin: 'B7K2M9',
        sessionId: `AA:BB_${CREATED_AT}`,
        initiatorPeerId: 'peerA',
        responderPeerId: 'peerB',
        connectionAddress: 'AA:BB',
        createdAt: CREATED_AT,
        verified: false,
        attemptCount: 0,
      });
    });

    it('should use the secure generator when none is injected', function () {
      const session = new PinSessionStore().createSession('AA:BB', 'a', 'b');
      expect(session.pin).to.match(/^[A-HJ-NP-Z2-9]{6}$/);
    });

    it('should keep session ids unique within the same millisecond', function () {
      const first = store.createSession('AA:BB', 'peerA', 'peerB');
      const second = store.createSession('AA:BB', 'peerC', 'peerD');
      expect(first.sessionId).to.equal(`AA:BB_${CREATED_AT}`);
      expect(second.sessionId).to.equal(`AA:BB_${CREATED_AT}_1`);
      expect(store.getStats().activeSessions).to.equal(2);
    });

    it('should replace the previous session of the same responder', function () {
      let clock = CREATED_AT;
      const timed = new PinSessionStore({
        generatePin: () => 'B7K2M9',
        now: () => clock++,
      });
      const old = timed.createSession('AA:BB', 'peerA', 'peerB');
      const fresh = timed.createSession('CC:DD', 'peerC', 'peerB');

      expect(timed.getSession(old.sessionId)).to.be.null;
      expect(timed.getSessionForPeer('peerB')?.sessionId).to.equal(
        fresh.sessionId,
      );
      expect(timed.getStatus('peerA')).to.equal(VerificationStatus.NOT_REQUIRED);
      expect(timed.getStats()).to.deep.equal({
        activeSessions: 1,
        peerMappings: 2,
      });
    });

    it('should keep one initiator paired with several responders', function () {
      const first = store.createSession('AA:BB', 'local', 'peerB');
      const second = store.createSession('CC:DD', 'local', 'peerC');

      expect(store.getStats()).to.deep.equal({
        activeSessions: 2,
        peerMappings: 3,
      });
      expect(store.getStatus('peerB')).to.equal(
        VerificationStatus.PENDING_RESPONDER,
      );
      expect(store.getStatus('peerC')).to.equal(
        VerificationStatus.PENDING_RESPONDER,
      );
      expect(store.validatePin(first.sessionId, 'B7K2M9')).to.be.true;
      expect(store.validatePin(second.sessionId, 'b7k2m9')).to.be.true;
      expect(store.getStatus('peerB')).to.equal(VerificationStatus.VERIFIED);
      expect(store.getStatus('peerC')).to.equal(VerificationStatus.VERIFIED);
    });

    it('should report the newest session for an initiator', function () {
      const first = store.createSession('AA:BB', 'local', 'peerB');
      const second = store.createSession('CC:DD', 'local', 'peerC');
      store.markVerified(first.sessionId);

      expect(store.getSessionForPeer('local')?.sessionId).to.equal(
        second.sessionId,
      );
      expect(store.getStatus('local')).to.equal(
        VerificationStatus.PENDING_INITIATOR,
      );

      store.removeSession(second.sessionId);
      expect(store.getStatus('local')).to.equal(VerificationStatus.VERIFIED);
    });

    it('should only supersede the session of the same responder', function () {
      let clock = CREATED_AT;
      const timed = new PinSessionStore({
        generatePin: () => 'B7K2M9',
        now: () => clock++,
      });
      const kept = timed.createSession('AA:BB', 'local', 'peerB');
      const old = timed.createSession('CC:DD', 'local', 'peerC');
      const fresh = timed.createSession('CC:DD', 'local', 'peerC');

      expect(timed.getSession(kept.sessionId)).to.not.be.null;
      expect(timed.getSession(old.sessionId)).to.be.null;
      expect(timed.getSessionForPeer('peerC')?.sessionId).to.equal(
        fresh.sessionId,
      );
      expect(timed.getStats().activeSessions).to.equal(2);
    });

    it('should hand out copies that later calls do not change', function () {
      const session = store.createSession('AA:BB', 'peerA', 'peerB');
      store.validatePin(session.sessionId, 'B7K2M9');
      expect(session.verified).to.be.false;
      expect(session.attemptCount).to.equal(0);
      expect(store.getSession(session.sessionId)?.verified).to.be.true;
    });
  });

  describe('validatePin', function () {
    it('should verify case-insensitively', function () {
      const { sessionId } = store.createSession('AA:BB', 'peerA', 'peerB');
      expect(store.getStatus('peerA')).to.equal(
        VerificationStatus.PENDING_INITIATOR,
      );
      expect(store.getStatus('peerB')).to.equal(
        VerificationStatus.PENDING_RESPONDER,
      );

      expect(store.validatePin(sessionId, 'b7k2m9')).to.be.true;
      expect(store.getStatus('peerB')).to.equal(VerificationStatus.VERIFIED);
      expect(store.getStatus('peerA')).to.equal(VerificationStatus.VERIFIED);
    });

    it('should reject input whose case mapping changes its length', function () {
      const sharp = new PinSessionStore({ generatePin: () => 'SSABCD' });
      const { sessionId } = sharp.createSession('AA:BB', 'peerA', 'peerB');

      expect(sharp.validatePin(sessionId, 'ßABCD')).to.be.false;
      expect(sharp.getSession(sessionId)?.attemptCount).to.equal(1);
      expect(sharp.validatePin(sessionId, 'ssabcd')).to.be.true;
    });

    it('should reject a PIN with extra characters', function () {
      const { sessionId } = store.createSession('AA:BB', 'peerA', 'peerB');
      expect(store.validatePin(sessionId, 'B7K2M9X')).to.be.false;
    });

    it('should count a wrong PIN and leave the status pending', function () {
      const { sessionId } = store.createSession('AA:BB', 'peerA', 'peerB');

      expect(store.validatePin(sessionId, 'WRONG1')).to.be.false;
      expect(store.getSession(sessionId)?.attemptCount).to.equal(1);
      expect(store.getStatus('peerB')).to.equal(
        VerificationStatus.PENDING_RESPONDER,
      );
    });

    it('should count every attempt exactly once', function () {
      const { sessionId } = store.createSession('AA:BB', 'peerA', 'peerB');
      store.validatePin(sessionId, 'WRONG1');
      store.validatePin(sessionId, 'WRONG2');
      store.validatePin(sessionId, 'B7K2M9');
      store.validatePin(sessionId, 'WRONG3');
      expect(store.getSession(sessionId)?.attemptCount).to.equal(4);
    });

    it('should never reset verified after a later wrong PIN', function () {
      const { sessionId } = store.createSession('AA:BB', 'peerA', 'peerB');
      store.validatePin(sessionId, 'B7K2M9');
      expect(store.validatePin(sessionId, 'WRONG1')).to.be.false;
      expect(store.getSession(sessionId)?.verified).to.be.true;
    });

    it('should return false for an unknown session without side effects', function () {
      const { sessionId } = store.createSession('AA:BB', 'peerA', 'peerB');
      expect(store.validatePin('missing', 'B7K2M9')).to.be.false;
      expect(store.getSession(sessionId)?.attemptCount).to.equal(0);
    });
  });

  describe('attempt limit', function () {
    it('should report BLOCKED once the limit is reached', function () {
      const limited = createStore({ attemptLimit: 2 });
      const { sessionId } = limited.createSession('AA:BB', 'peerA', 'peerB');

      expect(limited.validatePin(sessionId, 'WRONG1')).to.be.false;
      expect(limited.getStatus('peerB')).to.equal(
        VerificationStatus.PENDING_RESPONDER,
      );
      expect(limited.validatePin(sessionId, 'WRONG2')).to.be.false;
      expect(limited.getStatus('peerB')).to.equal(VerificationStatus.BLOCKED);

      expect(limited.validatePin(sessionId, 'B7K2M9')).to.be.false;
      expect(limited.getSession(sessionId)?.attemptCount).to.equal(3);
      expect(limited.getSession(sessionId)?.verified).to.be.false;
    });

    it('should never block without a configured limit', function () {
      const { sessionId } = store.createSession('AA:BB', 'peerA', 'peerB');
      for (let i = 0; i < 50; i++) {
        store.validatePin(sessionId, 'WRONG1');
      }
      expect(store.validatePin(sessionId, 'B7K2M9')).to.be.true;
    });
  });

  describe('markVerified', function () {
    it('should verify without a PIN and be idempotent', function () {
      const { sessionId } = store.createSession('AA:BB', 'peerA', 'peerB');
      store.markVerified(sessionId);
      store.markVerified(sessionId);
      expect(store.isVerified('peerA')).to.be.true;
      expect(store.getSession(sessionId)?.attemptCount).to.equal(0);
    });

    it('should ignore unknown sessions', function () {
      expect(() => store.markVerified('missing')).to.not.throw();
      expect(store.getStats().activeSessions).to.equal(0);
    });
  });

  describe('queries', function () {
    it('should report NOT_REQUIRED for unknown peers', function () {
      expect(store.getStatus('nobody')).to.equal(
        VerificationStatus.NOT_REQUIRED,
      );
      expect(store.getSessionForPeer('nobody')).to.be.null;
      expect(store.isVerified('nobody')).to.be.false;
      expect(store.requiresVerification('nobody')).to.be.false;
    });

    it('should require verification until the PIN matches', function () {
      const { sessionId } = store.createSession('AA:BB', 'peerA', 'peerB');
      expect(store.requiresVerification('peerB')).to.be.true;
      store.validatePin(sessionId, 'B7K2M9');
      expect(store.requiresVerification('peerB')).to.be.false;
    });
  });

  describe('removal', function () {
    it('should remove a session from both indices', function () {
      const { sessionId } = store.createSession('AA:BB', 'peerA', 'peerB');
      expect(store.removeSession(sessionId)).to.equal(1);
      expect(store.removeSession(sessionId)).to.equal(0);
      expect(store.getStats()).to.deep.equal({
        activeSessions: 0,
        peerMappings: 0,
      });
      expect(store.getStatus('peerA')).to.equal(
        VerificationStatus.NOT_REQUIRED,
      );
    });

    it('should remove sessions of a peer in either role', function () {
      store.createSession('AA:BB', 'peerA', 'peerB');
      store.createSession('CC:DD', 'peerC', 'peerD');

      expect(store.removeSessionsForPeer('peerA')).to.equal(1);
      expect(store.getStatus('peerB')).to.equal(
        VerificationStatus.NOT_REQUIRED,
      );
      expect(store.getStatus('peerD')).to.equal(
        VerificationStatus.PENDING_RESPONDER,
      );
    });

    it('should remove every session of a connection and nothing else', function () {
      let clock = CREATED_AT;
      const timed = new PinSessionStore({
        generatePin: () => 'B7K2M9',
        now: () => clock++,
      });
      timed.createSession('AA:BB', 'peerA', 'peerB');
      timed.createSession('AA:BB', 'peerC', 'peerD');
      const other = timed.createSession('EE:FF', 'peerE', 'peerF');

      expect(timed.removeSessionsForConnection('AA:BB')).to.equal(2);
      for (const peerId of ['peerA', 'peerB', 'peerC', 'peerD']) {
        expect(timed.getSessionForPeer(peerId)).to.be.null;
      }
      expect(timed.getSessionForPeer('peerF')?.sessionId).to.equal(
        other.sessionId,
      );
      expect(timed.getStats()).to.deep.equal({
        activeSessions: 1,
        peerMappings: 2,
      });
    });

    it('should clear everything', function () {
      store.createSession('AA:BB', 'peerA', 'peerB');
      store.createSession('CC:DD', 'peerC', 'peerD');
      store.clearAll();
      expect(store.getStats()).to.deep.equal({
        activeSessions: 0,
        peerMappings: 0,
      });
    });
  });
});

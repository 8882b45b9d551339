import { User } from '../../../../src/database/models';
import { ConflictError } from '../../../../src/utils/errors';
import { Harness, createHarness } from '../../../support/fixtures';

describe('HeartbeatMonitor', () => {
  let h: Harness;
  let owner: User;
  let client: User;

  beforeEach(async () => {
    h = createHarness();
    owner = await h.createUser('owner', 0);
    client = await h.createUser('client', 100);
  });

  describe('processHeartbeat', () => {
    it('smooths quality samples and schedules the next heartbeat', async () => {
      const { node } = await h.registerNode(owner.id);
      h.clock.advance(30);

      const response = await h.services.heartbeat.processHeartbeat(node.id, {
        currentConnections: 0,
        uptimeSample: 90,
        latencyMs: 100,
      });

      expect(response).toEqual({ status: 'ok', nextHeartbeat: 30, actions: [] });
      const stored = await h.services.directory.getNode(node.id);
      expect(stored.quality).toEqual({ uptimePercentage: 99, avgLatencyMs: 60, reputationScore: 100 });
      expect(stored.lastHeartbeat).toEqual(h.clock.now());
    });

    it('forwards session counters and asks the node to drop dead sessions', async () => {
      const { node } = await h.registerNode(owner.id);
      const { session } = await h.services.supervisor.connect({ userId: client.id, protocol: 'WIREGUARD' });
      const { session: ended } = await h.services.supervisor.connect({ userId: client.id, protocol: 'WIREGUARD' });
      await h.services.supervisor.disconnect(ended.id, client.id);

      const response = await h.services.heartbeat.processHeartbeat(node.id, {
        currentConnections: 2,
        uptimeSample: 100,
        sessions: [
          { sessionId: session.id, bytesTransferred: 2_000_000 },
          { sessionId: ended.id, bytesTransferred: 10 },
          { sessionId: 'missing-session', bytesTransferred: 10 },
        ],
      });

      expect(response.actions).toEqual([
        { type: 'closeSession', payload: { sessionId: ended.id, reason: 'SESSION_CLOSED' } },
        { type: 'closeSession', payload: { sessionId: 'missing-session', reason: 'NOT_FOUND' } },
      ]);
      await expect(h.services.supervisor.getSession(session.id)).resolves.toMatchObject({
        state: 'ACTIVE',
        creditsEarned: 2,
      });
    });

    it('asks for a close when the report itself ends the session', async () => {
      const { node } = await h.registerNode(owner.id);
      const { session } = await h.services.supervisor.connect({ userId: client.id, protocol: 'WIREGUARD' });

      const response = await h.services.heartbeat.processHeartbeat(node.id, {
        currentConnections: 1,
        uptimeSample: 100,
        sessions: [{ sessionId: session.id, bytesTransferred: 500, trafficType: 'TORRENT' }],
      });

      expect(response.actions).toEqual([
        { type: 'closeSession', payload: { sessionId: session.id, reason: 'POLICY_VIOLATION' } },
      ]);
    });

    it('rejects heartbeats from deregistered nodes', async () => {
      const { node } = await h.registerNode(owner.id);
      await h.services.directory.deregister(node.id, owner.id);

      await expect(
        h.services.heartbeat.processHeartbeat(node.id, { currentConnections: 0, uptimeSample: 100 })
      ).rejects.toThrow(ConflictError);
    });
  });

  describe('reconcile', () => {
    it('leaves punctual nodes alone', async () => {
      await h.registerNode(owner.id);
      h.clock.advance(20);

      await expect(h.services.heartbeat.reconcile()).resolves.toEqual({
        checked: 1,
        decayed: 0,
        offline: 0,
        sessionsClosed: 0,
      });
    });

    it('decays reputation per missed heartbeat and takes silent nodes offline', async () => {
      const { node } = await h.registerNode(owner.id);
      const { session } = await h.services.supervisor.connect({ userId: client.id, protocol: 'WIREGUARD' });

      h.clock.advance(65);
      await expect(h.services.heartbeat.reconcile()).resolves.toEqual({
        checked: 1,
        decayed: 1,
        offline: 0,
        sessionsClosed: 0,
      });
      await expect(h.services.directory.getNode(node.id)).resolves.toMatchObject({
        isOnline: true,
        missedHeartbeats: 2,
        quality: { reputationScore: 81 },
      });

      h.clock.advance(30);
      await expect(h.services.heartbeat.reconcile()).resolves.toEqual({
        checked: 1,
        decayed: 1,
        offline: 1,
        sessionsClosed: 1,
      });
      await expect(h.services.directory.getNode(node.id)).resolves.toMatchObject({
        isOnline: false,
        missedHeartbeats: 3,
        currentConnections: 0,
        quality: { reputationScore: 72.9 },
      });
      await expect(h.services.supervisor.getSession(session.id)).resolves.toMatchObject({
        state: 'CLOSED',
        closeReason: 'NODE_UNRESPONSIVE',
      });
    });

    it('settles an active session up to its last report when the node goes silent', async () => {
      const { node } = await h.registerNode(owner.id);
      const { session } = await h.services.supervisor.connect({ userId: client.id, protocol: 'WIREGUARD' });
      await h.services.supervisor.reportTraffic(session.id, { bytesTransferred: 7_000_000 }, node.id);

      h.clock.advance(95);
      await expect(h.services.heartbeat.reconcile()).resolves.toMatchObject({ offline: 1, sessionsClosed: 1 });

      await expect(h.services.supervisor.getSession(session.id)).resolves.toMatchObject({
        state: 'CLOSED',
        closeReason: 'NODE_UNRESPONSIVE',
        bytesTransferred: 7_000_000,
        creditsEarned: 7,
      });
      await expect(h.services.ledger.getSettlement(session.id)).resolves.toMatchObject({
        sessionId: session.id,
        clientCharge: 7,
        ownerCredit: 7,
        shortfall: 0,
      });
      await expect(h.services.ledger.balance(client.id)).resolves.toBe(93);
      await expect(h.services.ledger.balance(owner.id)).resolves.toBe(7);
      const earned = await h.services.ledger.history(owner.id);
      expect(earned).toHaveLength(1);
      expect(earned[0]).toMatchObject({ amount: 7, type: 'EARNED', sessionId: session.id });
      await expect(h.services.ledger.audit()).resolves.toEqual([]);
    });

    it('only recovers reputation on heartbeats that arrive on time', async () => {
      const { node } = await h.registerNode(owner.id);
      h.clock.advance(95);
      await h.services.heartbeat.reconcile();

      await h.services.heartbeat.processHeartbeat(node.id, { currentConnections: 0, uptimeSample: 100 });
      const back = await h.services.directory.getNode(node.id);
      expect(back).toMatchObject({ isOnline: true, missedHeartbeats: 0, quality: { reputationScore: 72.9 } });

      h.clock.advance(30);
      await h.services.heartbeat.processHeartbeat(node.id, { currentConnections: 0, uptimeSample: 100 });
      await expect(h.services.directory.getNode(node.id)).resolves.toMatchObject({
        quality: { reputationScore: 73.44 },
      });
    });
  });
});

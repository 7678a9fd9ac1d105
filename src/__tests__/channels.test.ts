import request from 'supertest';
import { v4 as uuidv4, v7 as uuidv7 } from 'uuid';
import { app } from '../app';
import { connectionManager } from '../realtime/ConnectionManager';
import { ChannelService } from '../services/ChannelService';
import { RelayService } from '../services/RelayService';
import { MessagePayload } from '../models';
import { addDevice, b64, createUser, FakeTransport, flush, login, TestUser } from './helpers';

function ciphertext(label: string): string {
  return b64(new TextEncoder().encode(`sealed:${label}`));
}

describe('Channels and message relay', () => {
  let alice: TestUser;
  let bob: TestUser;
  let carol: TestUser;
  let aliceToken: string;

  beforeEach(async () => {
    alice = await createUser('alice');
    bob = await createUser('bob');
    carol = await createUser('carol');
    aliceToken = await login(alice);
  });

  describe('channel directory', () => {
    it('creates a channel with the caller and the named users, and tells them', async () => {
      const bobTransport = new FakeTransport();
      connectionManager.attach(bob.user.id, bob.device.device_id, bobTransport);

      const res = await request(app)
        .post('/api/channel')
        .set('Authorization', `Bearer ${aliceToken}`)
        .send({ participants: ['bob', 'bob'] });
      await flush();

      expect(res.status).toBe(201);
      const usernames = res.body.data.participants.map((user: { username: string }) => user.username);
      const deviceIds = res.body.data.devices.map((device: { device_id: string }) => device.device_id);
      expect(usernames).toEqual(['alice', 'bob']);
      expect(deviceIds.sort()).toEqual([alice.device.device_id, bob.device.device_id].sort());

      expect(bobTransport.frames).toHaveLength(1);
      expect(bobTransport.frames[0].type).toBe('channel_created');
      expect(bobTransport.frames[0].counter).toBe(0);
    });

    it('requires two distinct participants', async () => {
      const res = await request(app)
        .post('/api/channel')
        .set('Authorization', `Bearer ${aliceToken}`)
        .send({ participants: ['alice'] });

      expect(res.status).toBe(400);
      expect(res.body.kind).toBe('invalid_participants');
    });

    it('rejects unknown usernames', async () => {
      const res = await request(app)
        .post('/api/channel')
        .set('Authorization', `Bearer ${aliceToken}`)
        .send({ participants: ['bob', 'mallory'] });

      expect(res.status).toBe(404);
      expect(res.body.kind).toBe('user_not_found');
    });

    it('always creates a new channel for the same members', async () => {
      const first = await ChannelService.createChannel(alice.user.id, ['bob']);
      const second = await ChannelService.createChannel(alice.user.id, ['bob']);

      expect(second.channel_id).not.toBe(first.channel_id);
      const listed = await ChannelService.listChannels(alice.user.id);
      expect(listed.map((channel) => channel.channel_id)).toEqual([
        second.channel_id,
        first.channel_id,
      ]);
    });

    it('hides a channel from non-participants', async () => {
      const channel = await ChannelService.createChannel(alice.user.id, ['bob']);
      const carolToken = await login(carol);

      const res = await request(app)
        .get(`/api/channel/${channel.channel_id}`)
        .set('Authorization', `Bearer ${carolToken}`);

      expect(res.status).toBe(404);
      expect(res.body.kind).toBe('channel_not_found');
    });

    it('lists every keyed device of every participant as the fan-out set', async () => {
      const aliceSecond = await addDevice(alice);
      const channel = await ChannelService.createChannel(alice.user.id, ['bob']);

      const info = await ChannelService.getChannel(bob.user.id, channel.channel_id);

      expect(info.devices.map((device) => device.device_id).sort()).toEqual(
        [alice.device.device_id, aliceSecond.device.device_id, bob.device.device_id].sort()
      );
    });
  });

  describe('send', () => {
    let channelId: string;
    let aliceSecondId: string;

    beforeEach(async () => {
      aliceSecondId = (await addDevice(alice)).device.device_id;
      channelId = (await ChannelService.createChannel(alice.user.id, ['bob'])).channel_id;
    });

    function fanOut(label: string) {
      return [
        {
          recipient_device_id: bob.device.device_id,
          ciphertext: ciphertext(`${label}:bob`),
          is_pre_key: true,
        },
        {
          recipient_device_id: aliceSecondId,
          ciphertext: ciphertext(`${label}:alice2`),
          is_pre_key: false,
        },
      ];
    }

    it('stores one payload per recipient and pushes to online devices', async () => {
      const bobTransport = new FakeTransport();
      connectionManager.attach(bob.user.id, bob.device.device_id, bobTransport);
      const messageId = uuidv7();

      const res = await request(app)
        .post(`/api/channel/${channelId}/msg`)
        .set('Authorization', `Bearer ${aliceToken}`)
        .send({ message_id: messageId, device_id: alice.device.device_id, payloads: fanOut('hi') });
      await flush();

      expect(res.status).toBe(201);
      expect(res.body.data).toMatchObject({
        message_id: messageId,
        channel_id: channelId,
        recipients: 2,
        delivered: 1,
      });
      expect(await MessagePayload.countByMessageId(messageId)).toBe(2);

      expect(bobTransport.frames).toHaveLength(1);
      expect(bobTransport.frames[0]).toMatchObject({
        counter: 0,
        type: 'message',
        data: {
          message_id: messageId,
          channel_id: channelId,
          author_id: alice.user.id,
          device_id: alice.device.device_id,
          ciphertext: ciphertext('hi:bob'),
          is_pre_key: true,
        },
      });
    });

    it('gives each recipient device exactly its own payload in history', async () => {
      const messageId = uuidv7();
      await RelayService.send(alice.user.id, channelId, {
        message_id: messageId,
        device_id: alice.device.device_id,
        payloads: fanOut('x'),
      });

      const bobHistory = await RelayService.history(bob.user.id, channelId, bob.device.device_id);
      const aliceHistory = await RelayService.history(alice.user.id, channelId, aliceSecondId);
      const senderHistory = await RelayService.history(
        alice.user.id,
        channelId,
        alice.device.device_id
      );

      expect(bobHistory.map((m) => [m.message_id, m.ciphertext, m.is_pre_key])).toEqual([
        [messageId, ciphertext('x:bob'), true],
      ]);
      expect(aliceHistory.map((m) => [m.message_id, m.ciphertext, m.is_pre_key])).toEqual([
        [messageId, ciphertext('x:alice2'), false],
      ]);
      expect(senderHistory).toEqual([]);
    });

    it('returns history in ascending message id order after the cursor', async () => {
      const ids = [uuidv7(), uuidv7(), uuidv7()];
      // Stored out of order: order comes from the id, not arrival.
      for (const id of [ids[1], ids[0], ids[2]]) {
        await RelayService.send(alice.user.id, channelId, {
          message_id: id,
          device_id: alice.device.device_id,
          payloads: fanOut(id),
        });
      }

      const all = await RelayService.history(bob.user.id, channelId, bob.device.device_id);
      const afterFirst = await RelayService.history(
        bob.user.id,
        channelId,
        bob.device.device_id,
        ids[0]
      );
      const limited = await request(app)
        .get(`/api/channel/${channelId}/history`)
        .query({ device: aliceSecondId, after: ids[0], limit: 1 })
        .set('Authorization', `Bearer ${aliceToken}`);

      expect(all.map((m) => m.message_id)).toEqual(ids);
      expect(afterFirst.map((m) => m.message_id)).toEqual(ids.slice(1));
      expect(limited.status).toBe(200);
      expect(limited.body.data.map((m: { message_id: string }) => m.message_id)).toEqual([ids[1]]);
    });

    it('rejects a reused message id', async () => {
      const message = {
        message_id: uuidv7(),
        device_id: alice.device.device_id,
        payloads: fanOut('a'),
      };
      await RelayService.send(alice.user.id, channelId, message);

      await expect(RelayService.send(alice.user.id, channelId, message)).rejects.toMatchObject({
        kind: 'message_exists',
        status: 409,
      });
    });

    it('rejects a message id that is not a UUIDv7', async () => {
      await expect(
        RelayService.send(alice.user.id, channelId, {
          message_id: uuidv4(),
          device_id: alice.device.device_id,
          payloads: fanOut('a'),
        })
      ).rejects.toMatchObject({ kind: 'validation_failed' });
    });

    it('rejects a payload for a device outside the channel', async () => {
      const messageId = uuidv7();

      await expect(
        RelayService.send(alice.user.id, channelId, {
          message_id: messageId,
          device_id: alice.device.device_id,
          payloads: [
            {
              recipient_device_id: carol.device.device_id,
              ciphertext: ciphertext('c'),
              is_pre_key: false,
            },
          ],
        })
      ).rejects.toMatchObject({ kind: 'validation_failed', status: 400 });
      expect(await MessagePayload.countByMessageId(messageId)).toBe(0);
    });

    it('rejects two payloads for the same device', async () => {
      const [first] = fanOut('a');

      await expect(
        RelayService.send(alice.user.id, channelId, {
          message_id: uuidv7(),
          device_id: alice.device.device_id,
          payloads: [first, first],
        })
      ).rejects.toMatchObject({ kind: 'validation_failed' });
    });

    it('rejects sending from a device the caller does not own', async () => {
      await expect(
        RelayService.send(alice.user.id, channelId, {
          message_id: uuidv7(),
          device_id: bob.device.device_id,
          payloads: fanOut('a'),
        })
      ).rejects.toMatchObject({ kind: 'forbidden', status: 403 });
    });

    it('rejects a sender outside the channel', async () => {
      const carolToken = await login(carol);

      const res = await request(app)
        .post(`/api/channel/${channelId}/msg`)
        .set('Authorization', `Bearer ${carolToken}`)
        .send({ message_id: uuidv7(), device_id: carol.device.device_id, payloads: fanOut('a') });

      expect(res.status).toBe(404);
      expect(res.body.kind).toBe('channel_not_found');
    });

    it('refuses history for a device the caller does not own', async () => {
      await expect(
        RelayService.history(alice.user.id, channelId, bob.device.device_id)
      ).rejects.toMatchObject({ kind: 'forbidden' });
    });
  });
});

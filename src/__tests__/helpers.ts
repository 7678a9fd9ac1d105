import nacl from 'tweetnacl';
import { AuthService } from '../services/AuthService';
import { IdentityService } from '../services/IdentityService';
import { EventTransport } from '../realtime/DeviceConnection';
import { CloseReason, EventFrame, ResyncRequired } from '../realtime/events';
import { challengeSigningBytes } from '../utils/crypto';
import { DevicePublicKeys, InboundDeviceKeys, UserInfo } from '../types';

export function b64(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('base64');
}

export interface DeviceKeys {
  sign: nacl.SignKeyPair;
  agreementKey: Uint8Array;
  body: InboundDeviceKeys;
}

/** Fresh identity keys with a valid binding signature. */
export function makeDeviceKeys(): DeviceKeys {
  const sign = nacl.sign.keyPair();
  const agreementKey = nacl.box.keyPair().publicKey;
  return {
    sign,
    agreementKey,
    body: {
      verify_key: b64(sign.publicKey),
      agreement_key: b64(agreementKey),
      signature: b64(nacl.sign.detached(agreementKey, sign.secretKey)),
    },
  };
}

export interface TestUser {
  user: UserInfo;
  device: DevicePublicKeys;
  keys: DeviceKeys;
}

export async function createUser(username: string): Promise<TestUser> {
  const keys = makeDeviceKeys();
  const { user, device } = await IdentityService.registerUser(username, keys.body);
  return { user, device, keys };
}

export async function addDevice(owner: TestUser): Promise<{ device: DevicePublicKeys; keys: DeviceKeys }> {
  const keys = makeDeviceKeys();
  const device = await IdentityService.addDevice(owner.user.id, keys.body);
  return { device, keys };
}

/** Random 32-byte public keys. */
export function randomKeys(count: number): Uint8Array[] {
  return Array.from({ length: count }, () => nacl.box.keyPair().publicKey);
}

export function signBatch(secretKey: Uint8Array, keys: Uint8Array[]): string {
  return b64(nacl.sign.detached(Buffer.concat(keys), secretKey));
}

export function signChallenge(
  secretKey: Uint8Array,
  challenge: { challenge_id: string; nonce: string; expires_at: string }
): string {
  const bytes = challengeSigningBytes(
    challenge.challenge_id,
    challenge.nonce,
    new Date(challenge.expires_at)
  );
  return b64(nacl.sign.detached(bytes, secretKey));
}

/** Full challenge-response login; returns the bearer token. */
export async function login(account: TestUser): Promise<string> {
  const challenge = await AuthService.startChallenge(account.user.username);
  const session = await AuthService.completeChallenge(
    challenge.challenge_id,
    signChallenge(account.keys.sign.secretKey, challenge),
    account.device.device_id
  );
  return session.token;
}

/** Let queued promise callbacks and delivery loops run. */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

interface PendingDelivery {
  resolve: () => void;
  reject: (error: Error) => void;
}

/** Records what a connection sends. With `autoAck` off, deliveries wait for `ack()`/`fail()`. */
export class FakeTransport implements EventTransport {
  readonly frames: EventFrame[] = [];
  readonly signals: ResyncRequired[] = [];
  closedWith: CloseReason | null = null;
  private pending: PendingDelivery[] = [];

  constructor(private readonly autoAck = true) {}

  deliver(frame: EventFrame): Promise<void> {
    this.frames.push(frame);
    if (this.autoAck) return Promise.resolve();
    return new Promise((resolve, reject) => {
      this.pending.push({ resolve, reject });
    });
  }

  signal(control: ResyncRequired): void {
    this.signals.push(control);
  }

  close(reason: CloseReason): void {
    this.closedWith = reason;
  }

  get counters(): number[] {
    return this.frames.map((frame) => frame.counter);
  }

  async ack(): Promise<void> {
    const next = this.pending.shift();
    if (!next) throw new Error('No delivery is waiting for an ack');
    next.resolve();
    await flush();
  }

  async fail(): Promise<void> {
    const next = this.pending.shift();
    if (!next) throw new Error('No delivery is waiting for an ack');
    next.reject(new Error('operation has timed out'));
    await flush();
  }
}

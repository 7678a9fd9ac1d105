import type { ErrorKind } from '../errors';

// User types
export interface UserInfo {
  id: string;
  username: string;
  created_at: Date;
}

// Device types

/** Public identity material of a device. Private keys are never uploaded. */
export interface DevicePublicKeys {
  device_id: string;
  user_id: string;
  verify_key: string;
  agreement_key: string;
}

export interface DeviceSummary {
  device_id: string;
  user_id: string;
  has_keys: boolean;
  created_at: Date;
  last_seen_at: Date;
}

/** Identity keys as submitted by a client, base64-encoded. */
export interface InboundDeviceKeys {
  verify_key: string;
  agreement_key: string;
  signature: string;
}

// One-time pre-key types
export interface InboundPreKeys {
  keys: string[];
  signature: string;
  removed?: string[];
  removed_signature?: string;
}

export interface ClaimedPreKey {
  id: string;
  device_id: string;
  public_key: string;
}

export interface PreKeyPoolStatus {
  device_id: string;
  count: number;
  low_water_mark: number;
  target_size: number;
  needs_more: boolean;
}

export interface PreKeyUploadResult {
  accepted: number;
  removed: number;
  pool_size: number;
}

// Channel types
export interface ChannelInfo {
  channel_id: string;
  created_at: Date;
  participants: UserInfo[];
  /** Fan-out set: every keyed device of every participant. */
  devices: DevicePublicKeys[];
}

export interface ChannelSummary {
  channel_id: string;
  created_at: Date;
  participants: UserInfo[];
}

// Message types
export interface InboundMessagePayload {
  recipient_device_id: string;
  ciphertext: string;
  is_pre_key: boolean;
}

export interface InboundChatMessage {
  message_id: string;
  device_id: string;
  payloads: InboundMessagePayload[];
}

/** One payload as seen by its recipient device. */
export interface OutboundChatMessage {
  message_id: string;
  channel_id: string;
  author_id: string;
  device_id: string;
  ciphertext: string;
  is_pre_key: boolean;
  timestamp: Date;
}

export interface SendAck {
  message_id: string;
  channel_id: string;
  created_at: Date;
  recipients: number;
  delivered: number;
}

// Auth types
export interface ChallengeResponse {
  challenge_id: string;
  nonce: string;
  expires_at: string;
}

export interface SessionResponse {
  token: string;
  expires_at: Date;
  user: UserInfo;
}

// API Response types
export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  kind?: ErrorKind;
  message?: string;
}

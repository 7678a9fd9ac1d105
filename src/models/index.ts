export { BaseModel } from './BaseModel';
export { User } from './User';
export { Device } from './Device';
export { OneTimeKey } from './OneTimeKey';
export type { ClaimOutcome } from './OneTimeKey';
export { KeyDigest } from './KeyDigest';
export { Channel } from './Channel';
export { Message } from './Message';
export { MessagePayload } from './MessagePayload';
export { AuthChallenge } from './AuthChallenge';
export { Session } from './Session';

/**
 * Notification channels as bit flags, so a notification or preference can
 * target any subset of them.
 */

export enum NotificationChannel {
  NONE = 0,
  IN_APP = 1 << 0,
  EMAIL = 1 << 1,
  PUSH = 1 << 2,
  WEBHOOK = 1 << 3,
  ALL = IN_APP | EMAIL | PUSH | WEBHOOK,
}

/** Bitwise union of NotificationChannel flags. */
export type ChannelSet = number;

export type ChannelName = 'in_app' | 'email' | 'push' | 'webhook';

export const SINGLE_CHANNELS: readonly NotificationChannel[] = [
  NotificationChannel.IN_APP,
  NotificationChannel.EMAIL,
  NotificationChannel.PUSH,
  NotificationChannel.WEBHOOK,
];

const CHANNEL_BY_NAME: Record<ChannelName, NotificationChannel> = {
  in_app: NotificationChannel.IN_APP,
  email: NotificationChannel.EMAIL,
  push: NotificationChannel.PUSH,
  webhook: NotificationChannel.WEBHOOK,
};

export const CHANNEL_NAMES: readonly ChannelName[] = ['in_app', 'email', 'push', 'webhook'];

export function isChannelName(value: string): value is ChannelName {
  return Object.prototype.hasOwnProperty.call(CHANNEL_BY_NAME, value);
}

export function isValidChannelSet(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && (value & ~NotificationChannel.ALL) === 0;
}

export function combineChannels(...channels: ChannelSet[]): ChannelSet {
  return channels.reduce<ChannelSet>((set, channel) => set | channel, NotificationChannel.NONE);
}

export function intersectChannels(left: ChannelSet, right: ChannelSet): ChannelSet {
  return left & right;
}

export function hasChannel(set: ChannelSet, channel: NotificationChannel): boolean {
  return channel !== NotificationChannel.NONE && (set & channel) === channel;
}

export function withChannel(set: ChannelSet, channel: NotificationChannel): ChannelSet {
  return set | channel;
}

export function withoutChannel(set: ChannelSet, channel: NotificationChannel): ChannelSet {
  return set & ~channel;
}

/** Single channels contained in the set, lowest bit first. */
export function listChannels(set: ChannelSet): NotificationChannel[] {
  return SINGLE_CHANNELS.filter((channel) => hasChannel(set, channel));
}

export function channelName(channel: NotificationChannel): string {
  const entry = Object.entries(CHANNEL_BY_NAME).find(([, value]) => value === channel);
  return entry ? entry[0] : `channel(${channel})`;
}

export function formatChannels(set: ChannelSet): string {
  const names = listChannels(set).map(channelName);
  return names.length > 0 ? names.join('|') : 'none';
}

export function channelFromName(name: ChannelName): NotificationChannel {
  return CHANNEL_BY_NAME[name];
}

/**
 * Parses a comma separated list such as "in_app,email". Returns null when an
 * entry is not a known channel name.
 */
export function parseChannelList(raw: string): ChannelSet | null {
  const names = raw
    .split(',')
    .map((name) => name.trim().toLowerCase())
    .filter((name) => name.length > 0);

  let set: ChannelSet = NotificationChannel.NONE;
  for (const name of names) {
    if (name === 'all') {
      set |= NotificationChannel.ALL;
      continue;
    }
    if (!isChannelName(name)) {
      return null;
    }
    set |= CHANNEL_BY_NAME[name];
  }
  return set;
}

/** Parses request channel names; unknown names collapse to NONE, which fails request validation. */
export function channelSetFromNames(names: string[]): ChannelSet {
  return parseChannelList(names.join(',')) ?? NotificationChannel.NONE;
}

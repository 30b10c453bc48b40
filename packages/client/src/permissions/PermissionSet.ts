import { z } from "zod";

export type ChannelAccess = {
  read: boolean;
  write: boolean;
};

export type PermissionEntry = {
  topic: string;
  channels: ReadonlyMap<number, ChannelAccess>;
  /** Seconds the grant stays valid, when the grant is temporary. */
  ttl?: number;
};

const channelAccessSchema = z.object({
  channel: z.number().int().nonnegative(),
  read: z.boolean().default(false),
  write: z.boolean().default(false),
});

export const PermissionEntrySchema = z.object({
  topic: z.string().min(1),
  channels: z.array(channelAccessSchema).default([]),
  ttl: z.number().int().positive().optional(),
});

export const PermissionListSchema = z.array(PermissionEntrySchema);

export type PermissionEntryWire = z.input<typeof PermissionEntrySchema>;
export type ParsedPermissionEntry = z.output<typeof PermissionEntrySchema>;

function toEntry(wire: ParsedPermissionEntry): PermissionEntry {
  const channels = new Map<number, ChannelAccess>();
  for (const access of wire.channels) {
    const existing = channels.get(access.channel);
    channels.set(access.channel, {
      read: access.read || (existing?.read ?? false),
      write: access.write || (existing?.write ?? false),
    });
  }
  return wire.ttl === undefined ? { topic: wire.topic, channels } : { topic: wire.topic, channels, ttl: wire.ttl };
}

function sortNumeric(values: Iterable<number>): number[] {
  return Array.from(values).sort((a, b) => a - b);
}

/**
 * Immutable snapshot of what the session may read and write. Several entries
 * for the same topic add up: a channel is readable when any of them says so.
 */
export class PermissionSet {
  private readonly list: readonly PermissionEntry[];

  constructor(entries: Iterable<PermissionEntry> = []) {
    this.list = Object.freeze(Array.from(entries));
  }

  static empty(): PermissionSet {
    return new PermissionSet();
  }

  /** Validates a wire payload (an array of entries) into a snapshot. */
  static parse(raw: unknown): PermissionSet {
    return PermissionSet.fromParsed(PermissionListSchema.parse(raw));
  }

  static fromParsed(entries: readonly ParsedPermissionEntry[]): PermissionSet {
    return new PermissionSet(entries.map(toEntry));
  }

  get entries(): readonly PermissionEntry[] {
    return this.list;
  }

  get size(): number {
    return this.list.length;
  }

  topics(): string[] {
    return Array.from(new Set(this.list.map((entry) => entry.topic)));
  }

  hasTopic(topic: string): boolean {
    return this.list.some((entry) => entry.topic === topic);
  }

  forTopic(topic: string): PermissionEntry[] {
    return this.list.filter((entry) => entry.topic === topic);
  }

  channelsOf(topic: string): number[] {
    const channels = new Set<number>();
    for (const entry of this.forTopic(topic)) {
      for (const channel of entry.channels.keys()) {
        channels.add(channel);
      }
    }
    return sortNumeric(channels);
  }

  canRead(topic: string, channel: number): boolean {
    return this.forTopic(topic).some((entry) => entry.channels.get(channel)?.read === true);
  }

  canWrite(topic: string, channel: number): boolean {
    return this.forTopic(topic).some((entry) => entry.channels.get(channel)?.write === true);
  }

  /**
   * Channels a subscription may attach to. A negative `requestedChannel`
   * means every readable channel among `availablePartitions`.
   */
  computeReadableChannels(topic: string, requestedChannel: number, availablePartitions: Iterable<number>): number[] {
    const available = new Set(availablePartitions);
    if (requestedChannel >= 0) {
      return available.has(requestedChannel) && this.canRead(topic, requestedChannel) ? [requestedChannel] : [];
    }
    return sortNumeric(Array.from(available).filter((channel) => this.canRead(topic, channel)));
  }
}

/**
 * Typed publish/subscribe registry connecting pipeline stages.
 *
 * Constructed once by the pipeline and handed to every worker; nothing here is
 * a process-wide singleton. Delivery is fire-and-forget: `publish` posts a
 * deep copy into each subscriber's mailbox and returns. A subscriber that
 * refuses the message (stopped or full mailbox) costs a log line, never an
 * exception for the publisher.
 *
 * Queue groups: subscribers registered with the same `group` share a topic,
 * and each message goes to exactly one live member of that group
 * (round-robin). Ungrouped subscribers all get every message.
 */
import type { Deliverable } from "../actors/mailbox.js";
import { BusClosedError } from "../errors.js";
import { logBus } from "../logging.js";
import { recordPublish } from "../ops/metrics.js";

export interface SubscribeOptions {
  group?: string;
}

export type Unsubscribe = () => void;

interface GroupState<T> {
  members: Deliverable<T>[];
  next: number;
}

interface TopicTable<T> {
  direct: Set<Deliverable<T>>;
  groups: Map<string, GroupState<T>>;
}

export class Broker<Topics extends object> {
  private tables: { [K in keyof Topics]?: TopicTable<Topics[K]> } = {};
  private closed = false;

  subscribe<K extends keyof Topics>(
    topic: K,
    handle: Deliverable<Topics[K]>,
    opts: SubscribeOptions = {},
  ): Unsubscribe {
    const table = this.table<K>(topic);

    if (opts.group === undefined) {
      table.direct.add(handle);
      logBus.debug({ topic, subscriber: handle.name }, "Subscribed");
      return () => {
        table.direct.delete(handle);
      };
    }

    const group = opts.group;
    let state = table.groups.get(group);
    if (!state) {
      state = { members: [], next: 0 };
      table.groups.set(group, state);
    }
    if (!state.members.includes(handle)) state.members.push(handle);
    logBus.debug({ topic, group, subscriber: handle.name }, "Subscribed to queue group");

    const members = state;
    return () => {
      const idx = members.members.indexOf(handle);
      if (idx === -1) return;
      members.members.splice(idx, 1);
      if (members.next > idx) members.next--;
      if (members.members.length === 0) table.groups.delete(group);
    };
  }

  /**
   * Deliver `message` to every current subscriber of `topic`.
   * Returns how many mailboxes accepted it.
   */
  publish<K extends keyof Topics>(topic: K, message: Topics[K]): number {
    if (this.closed) throw new BusClosedError(String(topic));

    const table = this.tables[topic];
    if (!table) {
      recordPublish(0, 0);
      return 0;
    }

    let delivered = 0;
    let dropped = 0;

    for (const handle of table.direct) {
      if (this.deliver(topic, handle, message)) delivered++;
      else dropped++;
    }

    for (const [group, state] of table.groups) {
      if (this.deliverToGroup(topic, group, state, message)) delivered++;
      else dropped++;
    }

    recordPublish(delivered, dropped);
    return delivered;
  }

  subscriberCount<K extends keyof Topics>(topic: K): number {
    const table = this.tables[topic];
    if (!table) return 0;
    let count = table.direct.size;
    for (const state of table.groups.values()) count += state.members.length;
    return count;
  }

  /** After close, publish throws. Subscriptions are discarded. */
  close(): void {
    this.closed = true;
    this.tables = {};
  }

  get isClosed(): boolean {
    return this.closed;
  }

  private deliver<K extends keyof Topics>(topic: K, handle: Deliverable<Topics[K]>, message: Topics[K]): boolean {
    const accepted = handle.post(structuredClone(message));
    if (!accepted) {
      logBus.warn({ topic, subscriber: handle.name }, "Delivery refused — message dropped");
    }
    return accepted;
  }

  private deliverToGroup<K extends keyof Topics>(
    topic: K,
    group: string,
    state: GroupState<Topics[K]>,
    message: Topics[K],
  ): boolean {
    const count = state.members.length;
    for (let attempt = 0; attempt < count; attempt++) {
      const idx = (state.next + attempt) % count;
      const member = state.members[idx];
      if (member.post(structuredClone(message))) {
        state.next = (idx + 1) % count;
        return true;
      }
    }
    logBus.warn({ topic, group, members: count }, "No queue group member accepted — message dropped");
    return false;
  }

  private table<K extends keyof Topics>(topic: K): TopicTable<Topics[K]> {
    const existing = this.tables[topic];
    if (existing) return existing;
    const table: TopicTable<Topics[K]> = { direct: new Set(), groups: new Map() };
    this.tables[topic] = table;
    return table;
  }
}

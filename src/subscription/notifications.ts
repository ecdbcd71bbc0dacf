import { ProtocolError } from '../errors.js';
import type { DetectionEvent } from '../types.js';
import type { RawNotification } from './transport.js';

export const DEFAULT_PERSON_TOPIC = 'RuleEngine/MyRuleDetector/PeopleDetect';

/** Data items that carry the person-present flag, in lookup order. */
export const STATE_ITEM_NAMES = ['State', 'IsPeople', 'IsPerson'] as const;

export type NotificationFilter = {
  device: string;
  channel: number;
  topics: string[];
};

/** `tns1:RuleEngine/tnsreolink:MyRuleDetector/PeopleDetect` → `ruleengine/myruledetector/peopledetect` */
export function normalizeTopic(topic: string): string {
  return topic
    .trim()
    .split('/')
    .map(segment => segment.replace(/^[^:]*:/, ''))
    .filter(segment => segment.length > 0)
    .join('/')
    .toLowerCase();
}

export function matchesTopic(topic: string, topics: string[]): boolean {
  const normalized = normalizeTopic(topic);
  return topics.some(candidate => normalizeTopic(candidate) === normalized);
}

export function parseBooleanItem(value: string): boolean | null {
  switch (value.trim().toLowerCase()) {
    case 'true':
    case '1':
      return true;
    case 'false':
    case '0':
      return false;
    default:
      return null;
  }
}

function readPresence(notification: RawNotification, device: string): boolean {
  for (const name of STATE_ITEM_NAMES) {
    const value = notification.data[name];
    if (value === undefined) {
      continue;
    }
    const parsed = parseBooleanItem(value);
    if (parsed === null) {
      throw new ProtocolError('malformed', `State item ${name}="${value}" is not a boolean`, { device });
    }
    return parsed;
  }
  throw new ProtocolError('malformed', 'Notification carries no state item', { device });
}

function checkChannel(notification: RawNotification, filter: NotificationFilter) {
  const value = notification.source.Channel;
  if (value === undefined || !/^\d+$/.test(value.trim())) {
    return;
  }
  const channel = Number.parseInt(value, 10);
  if (channel !== filter.channel) {
    throw new ProtocolError(
      'channel-mismatch',
      `Notification for channel ${channel} ignored (device channel ${filter.channel})`,
      { device: filter.device }
    );
  }
}

/**
 * Turns a raw notification into a detection event or throws `ProtocolError` when it does not
 * describe person presence on this device's channel.
 */
export function toDetectionEvent(
  notification: RawNotification,
  filter: NotificationFilter,
  observedAt: number,
  receivedAt: Date
): DetectionEvent {
  if (!notification.topic) {
    throw new ProtocolError('malformed', 'Notification has no topic', { device: filter.device });
  }
  if (!matchesTopic(notification.topic, filter.topics)) {
    throw new ProtocolError('topic-mismatch', `Topic ${notification.topic} is not a person topic`, {
      device: filter.device
    });
  }
  checkChannel(notification, filter);
  const isPresent = readPresence(notification, filter.device);

  return {
    device: filter.device,
    observedAt,
    wallTime: notification.utcTime ?? receivedAt,
    isPresent,
    topic: notification.topic
  };
}
